/**
 * Default Comparator
 *
 * Compares two values under a value type. The failure text lists both labels
 * and both formatted values.
 */

import type { Comparator, ComparisonOutcome, ValueType } from "./comparison.types";
import type { MessageWriter } from "./message-writer";

export class DefaultComparator<T> implements Comparator<T> {
	constructor(readonly type: ValueType<T>) {}

	compare(actual: T, expected: T): ComparisonOutcome {
		const type = this.type;
		return {
			equal: type.equals(actual, expected),
			renderFailure(writer: MessageWriter, actualLabel: string, expectedLabel: string): void {
				writer
					.write(`Values ${actualLabel} and ${expectedLabel} are not the same, actual is`)
					.newline()
					.write(`${type.format(actual)} `)
					.newline()
					.write("but expected")
					.newline()
					.write(type.format(expected));
			},
		};
	}
}

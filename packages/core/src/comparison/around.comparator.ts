/**
 * Around Comparator
 *
 * Numeric comparison with an absolute tolerance.
 */

import type { Comparator, ComparisonOutcome } from "./comparison.types";
import type { MessageWriter } from "./message-writer";

export class Around implements Comparator<number> {
	constructor(readonly epsilon = 0) {}

	compare(actual: number, expected: number): ComparisonOutcome {
		const epsilon = this.epsilon;
		return {
			equal: Math.abs(actual - expected) <= epsilon,
			renderFailure(writer: MessageWriter, actualLabel: string, expectedLabel: string): void {
				writer.write(
					`Value ${actualLabel} is not around ${expectedLabel}, actual is ${actual} but expected ${expected} ± ${epsilon}`,
				);
			},
		};
	}
}

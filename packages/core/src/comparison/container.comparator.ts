/**
 * Container Comparator
 *
 * Element-wise comparison of two iterables. Elements are compared under the
 * given value type, or with automatic dispatch over `types` when none is given.
 * Constructed by `compareAs(Container, ...)` it dispatches over the built-in
 * types only; construct it with `[...custom, ...DEFAULT_TYPES]` and use
 * `compareWith` to include custom ones.
 */

import type { Comparator, ComparisonOutcome, ValueType } from "./comparison.types";
import { DefaultComparator } from "./default.comparator";
import { type ResolvedComparison, resolveComparator } from "./dispatch";
import type { MessageWriter } from "./message-writer";
import { accept, DEFAULT_TYPES, unknownType } from "./value-types";

export class Container implements Comparator<Iterable<unknown>> {
	constructor(
		readonly elementType?: ValueType<unknown>,
		readonly types: readonly ValueType<unknown>[] = DEFAULT_TYPES,
	) {}

	compare(actual: Iterable<unknown>, expected: Iterable<unknown>): ComparisonOutcome {
		const difference = this.describeDifference([...actual], [...expected]);
		return {
			equal: difference === undefined,
			renderFailure(writer: MessageWriter, actualLabel: string, expectedLabel: string): void {
				writer.write(`Containers ${actualLabel} and ${expectedLabel} have different ${difference}`);
			},
		};
	}

	private describeDifference(actual: unknown[], expected: unknown[]): string | undefined {
		if (actual.length !== expected.length) {
			return `size, actual ${actual.length} but ${expected.length} expected.`;
		}

		for (let index = 0; index < actual.length; index++) {
			const resolved = this.resolveElement(actual[index], expected[index]);
			if (!resolved.comparator.compare(resolved.actual, resolved.expected).equal) {
				const { type } = resolved;
				return `contents, actual ${type.format(resolved.actual)} but ${type.format(resolved.expected)} expected on position ${index}.`;
			}
		}
		return undefined;
	}

	private resolveElement(actual: unknown, expected: unknown): ResolvedComparison {
		if (!this.elementType) {
			return resolveComparator(actual, expected, this.types);
		}

		const type = this.elementType;
		const convertedActual = accept(type, actual);
		const convertedExpected = accept(type, expected);
		if (!convertedActual || !convertedExpected) {
			return { type: unknownType, comparator: new DefaultComparator(unknownType), actual, expected };
		}
		return {
			type,
			comparator: new DefaultComparator(type),
			actual: convertedActual.value,
			expected: convertedExpected.value,
		};
	}
}

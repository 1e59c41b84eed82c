/**
 * Comparator Dispatch
 *
 * Resolves how two values are compared:
 * - two numbers: compare as `number`, even when both are whole
 * - same type: compare under that type
 * - different types: convert the actual value to the expected value's type,
 *   otherwise use the narrowest registered type both convert to
 * - explicit value type or comparator: used verbatim, no search
 */

import type { Comparator, ComparatorClass, ValueType } from "./comparison.types";
import { TesterUsageError } from "../execution/signals";
import { DefaultComparator } from "./default.comparator";
import { accept, DEFAULT_TYPES, integerType, numberType, unknownType } from "./value-types";

const isNumeric = (type: ValueType<unknown>): boolean => type === integerType || type === numberType;

/**
 * Comparator together with the operands it has to be invoked with.
 * Operands are the original references unless a conversion was needed.
 */
export interface ResolvedComparison {
	readonly type: ValueType<unknown>;
	readonly comparator: Comparator<unknown>;
	readonly actual: unknown;
	readonly expected: unknown;
}

/**
 * Get the first type that accepts the value without conversion
 */
export function classify(value: unknown, types: readonly ValueType<unknown>[] = DEFAULT_TYPES): ValueType<unknown> {
	const type = types.find((candidate) => candidate.is(value));
	if (!type) {
		throw new TesterUsageError(`No comparison type accepts ${unknownType.format(value)}`);
	}
	return type;
}

/**
 * Resolve the comparator for two values automatically
 */
export function resolveComparator(
	actual: unknown,
	expected: unknown,
	types: readonly ValueType<unknown>[] = DEFAULT_TYPES,
): ResolvedComparison {
	const actualType = classify(actual, types);
	const expectedType = classify(expected, types);

	// Whole-valued doubles are still doubles; `integer` stays exact only when asked for
	if (isNumeric(actualType) && isNumeric(expectedType)) {
		return { type: numberType, comparator: new DefaultComparator(numberType), actual, expected };
	}

	if (actualType === expectedType) {
		return { type: actualType, comparator: new DefaultComparator(actualType), actual, expected };
	}

	const converted = accept(expectedType, actual);
	if (converted) {
		return { type: expectedType, comparator: new DefaultComparator(expectedType), actual: converted.value, expected };
	}

	for (const type of types) {
		const commonActual = accept(type, actual);
		const commonExpected = accept(type, expected);
		if (commonActual && commonExpected) {
			return {
				type,
				comparator: new DefaultComparator(type),
				actual: commonActual.value,
				expected: commonExpected.value,
			};
		}
	}

	throw new TesterUsageError(`Values of type ${actualType.name} and ${expectedType.name} have no common comparison type`);
}

/**
 * Resolve the comparator for an explicit value type or comparator class
 */
export function resolveExplicit<TActual, TExpected>(
	as: ValueType<unknown> | ComparatorClass<TActual, TExpected>,
	actual: TActual,
	expected: TExpected,
): Pick<ResolvedComparison, "comparator" | "actual" | "expected"> {
	if (typeof as === "function") {
		return { comparator: new as(), actual, expected };
	}

	const convertedActual = accept(as, actual);
	const convertedExpected = accept(as, expected);
	if (!convertedActual || !convertedExpected) {
		const failing = convertedActual ? expected : actual;
		throw new TesterUsageError(`Value ${unknownType.format(failing)} cannot be compared as ${as.name}`);
	}
	return {
		comparator: new DefaultComparator(as),
		actual: convertedActual.value,
		expected: convertedExpected.value,
	};
}

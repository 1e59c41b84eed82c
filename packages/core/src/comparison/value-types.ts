/**
 * Value Types
 *
 * Built-in comparison types, ordered from the narrowest to the widest.
 * Dispatch classifies each operand by the first type that accepts it and, for
 * operands of different types, looks for a type both convert to.
 */

import { inspect, isDeepStrictEqual } from "node:util";
import type { Converted, ValueType } from "./comparison.types";

/** Relative epsilon used for `number` comparisons */
export const NUMBER_EPSILON = 1.0e-14;

/**
 * Fuzzy floating-point equality: relative for regular values, absolute near zero
 */
export function fuzzyEquals(actual: number, expected: number, epsilon = NUMBER_EPSILON): boolean {
	if (actual === expected || (Number.isNaN(actual) && Number.isNaN(expected))) {
		return true;
	}

	const difference = Math.abs(actual - expected);
	if (actual === 0 || expected === 0 || difference < epsilon) {
		return difference < epsilon;
	}
	return difference / (Math.abs(actual) + Math.abs(expected)) < epsilon;
}

/**
 * Numeric value of a bigint or of an object whose `valueOf()` yields a number
 */
function numericValue(value: unknown): number | undefined {
	if (typeof value === "bigint") {
		return Number(value);
	}
	if (typeof value === "object" && value !== null && !(value instanceof Date)) {
		const valueOf: unknown = Reflect.get(value, "valueOf");
		const primitive: unknown = typeof valueOf === "function" ? valueOf.call(value) : undefined;
		if (typeof primitive === "number") {
			return primitive;
		}
	}
	return undefined;
}

function formatStructured(value: unknown): string {
	return inspect(value, { depth: 4, breakLength: Number.POSITIVE_INFINITY });
}

export const booleanType: ValueType<boolean> = {
	name: "boolean",
	is(value: unknown): value is boolean {
		return typeof value === "boolean";
	},
	convert(value: unknown): Converted<boolean> | undefined {
		return value instanceof Boolean ? { value: value.valueOf() } : undefined;
	},
	equals: (actual, expected) => actual === expected,
	format: (value) => String(value),
};

export const integerType: ValueType<number> = {
	name: "integer",
	is(value: unknown): value is number {
		return typeof value === "number" && Number.isInteger(value);
	},
	convert(value: unknown): Converted<number> | undefined {
		if (typeof value === "bigint" && (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER))) {
			return undefined;
		}
		const numeric = numericValue(value);
		return numeric !== undefined && Number.isInteger(numeric) ? { value: numeric } : undefined;
	},
	equals: (actual, expected) => actual === expected,
	format: (value) => String(value),
};

export const numberType: ValueType<number> = {
	name: "number",
	is(value: unknown): value is number {
		return typeof value === "number";
	},
	convert(value: unknown): Converted<number> | undefined {
		const numeric = numericValue(value);
		return numeric === undefined ? undefined : { value: numeric };
	},
	equals: (actual, expected) => fuzzyEquals(actual, expected),
	format: (value) => String(value),
};

export const bigintType: ValueType<bigint> = {
	name: "bigint",
	is(value: unknown): value is bigint {
		return typeof value === "bigint";
	},
	convert(value: unknown): Converted<bigint> | undefined {
		return typeof value === "number" && Number.isSafeInteger(value) ? { value: BigInt(value) } : undefined;
	},
	equals: (actual, expected) => actual === expected,
	format: (value) => String(value),
};

export const stringType: ValueType<string> = {
	name: "string",
	is(value: unknown): value is string {
		return typeof value === "string";
	},
	convert(value: unknown): Converted<string> | undefined {
		return value instanceof String ? { value: value.valueOf() } : undefined;
	},
	equals: (actual, expected) => actual === expected,
	format: (value) => value,
};

export const dateType: ValueType<Date> = {
	name: "date",
	is(value: unknown): value is Date {
		return value instanceof Date;
	},
	convert: () => undefined,
	equals: (actual, expected) => Object.is(actual.getTime(), expected.getTime()),
	format: (value) => (Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString()),
};

export const arrayType: ValueType<readonly unknown[]> = {
	name: "array",
	is(value: unknown): value is readonly unknown[] {
		return Array.isArray(value);
	},
	convert(value: unknown): Converted<readonly unknown[]> | undefined {
		return value instanceof Set ? { value: [...value] } : undefined;
	},
	equals: (actual, expected) => isDeepStrictEqual(actual, expected),
	format: formatStructured,
};

export const objectType: ValueType<object> = {
	name: "object",
	is(value: unknown): value is object {
		return typeof value === "object" && value !== null;
	},
	convert: () => undefined,
	equals: (actual, expected) => isDeepStrictEqual(actual, expected),
	format: formatStructured,
};

/**
 * Widest type: accepts everything and compares by identity
 */
export const unknownType: ValueType<unknown> = {
	name: "unknown",
	is(_value: unknown): _value is unknown {
		return true;
	},
	convert: (value) => ({ value }),
	equals: (actual, expected) => Object.is(actual, expected),
	format: (value) => (typeof value === "string" ? value : formatStructured(value)),
};

/**
 * Built-in value types by name
 */
export const Types = {
	boolean: booleanType,
	integer: integerType,
	number: numberType,
	bigint: bigintType,
	string: stringType,
	date: dateType,
	array: arrayType,
	object: objectType,
	unknown: unknownType,
} as const;

/**
 * Built-in types in resolution order (narrowest first)
 */
export const DEFAULT_TYPES: readonly ValueType<unknown>[] = [
	booleanType,
	integerType,
	numberType,
	bigintType,
	stringType,
	dateType,
	arrayType,
	objectType,
	unknownType,
];

/**
 * Take a value as-is when it is of the type, otherwise try to convert it
 */
export function accept<T>(type: ValueType<T>, value: unknown): Converted<T> | undefined {
	return type.is(value) ? { value } : type.convert(value);
}

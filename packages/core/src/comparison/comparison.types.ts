/**
 * Comparison Types
 *
 * Capability interfaces shared by value types, comparators and the dispatcher.
 */

import type { MessageWriter } from "./message-writer";

// =============================================================================
// Value Types
// =============================================================================

/**
 * Result of converting a value into a value type.
 * Wrapped so that `undefined` stays a representable converted value.
 */
export interface Converted<T> {
	readonly value: T;
}

/**
 * Runtime descriptor of a comparison type.
 *
 * Values are classified by the first registered type whose `is()` accepts
 * them; `convert()` describes which values of other types can be compared
 * under this one.
 */
export interface ValueType<T> {
	readonly name: string;
	is(value: unknown): value is T;
	/** Convert a value that is not of this type, or return undefined */
	convert(value: unknown): Converted<T> | undefined;
	equals(actual: T, expected: T): boolean;
	format(value: T): string;
}

// =============================================================================
// Comparators
// =============================================================================

/**
 * Outcome of a single comparator invocation
 */
export interface ComparisonOutcome {
	readonly equal: boolean;
	/**
	 * Write the failure explanation. Receives the operand labels as they
	 * appear in the check call.
	 */
	renderFailure(writer: MessageWriter, actual: string, expected: string): void;
}

/**
 * Comparator capability
 */
export interface Comparator<TActual, TExpected = TActual> {
	compare(actual: TActual, expected: TExpected): ComparisonOutcome;
}

/**
 * Comparator class usable with `compareAs()`; constructed with its defaults
 */
export type ComparatorClass<TActual, TExpected = TActual> = new () => Comparator<TActual, TExpected>;


/**
 * Core Utilities
 */

/**
 * Number of decimal digits of a non-negative integer
 */
export function digitCount(value: number): number {
	return String(Math.max(0, Math.trunc(value))).length;
}

/**
 * Spaces that right-align `id` to the width of `maxId`
 */
export function padding(id: number, maxId: number): string {
	return " ".repeat(Math.max(0, digitCount(maxId) - digitCount(id)));
}

/**
 * Normalize a thrown value to an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

/**
 * Signals and Errors
 *
 * Case-scoped control signals and usage errors of the tester.
 */

// =============================================================================
// Case Signals
// =============================================================================

/**
 * Kind of a failed check
 * - fail: the check did not pass
 * - xpass: the check passed inside an expected-failure scope
 */
export type CheckFailureKind = "fail" | "xpass";

/**
 * Thrown by a failed check. Aborts the current test case only.
 */
export class CheckFailure extends Error {
	constructor(
		message: string,
		public readonly kind: CheckFailureKind,
	) {
		super(message);
		this.name = "CheckFailure";
	}
}

/**
 * Thrown by `skip()`. Aborts the current test case without counting an error.
 */
export class SkipSignal extends Error {
	constructor(message: string) {
		super(message);
		this.name = "SkipSignal";
	}
}

// =============================================================================
// Usage Errors
// =============================================================================

/**
 * Misuse of the tester API (nested expected-failure scopes, empty
 * registrations, values without a common comparison type)
 */
export class TesterUsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "TesterUsageError";
	}
}

/**
 * Invalid command-line arguments
 */
export class ArgumentError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ArgumentError";
	}
}


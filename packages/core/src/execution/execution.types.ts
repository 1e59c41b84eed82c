/**
 * Execution Types
 *
 * Types for test cases, case events and run results.
 */

// =============================================================================
// Test Cases
// =============================================================================

/**
 * Body of a test case, setup or teardown. Invoked with the suite as `this`.
 */
export type TestCaseFunction = () => void | Promise<void>;

/**
 * Registered test case
 */
export interface TestCase {
	/** 1-based registration ordinal */
	readonly id: number;
	readonly name: string;
	readonly body: TestCaseFunction;
	readonly setup?: TestCaseFunction;
	readonly teardown?: TestCaseFunction;
}

/**
 * Identity of a test case as seen by reporters
 */
export interface CaseInfo {
	readonly id: number;
	readonly name: string;
}

/**
 * Location of a check in the test source
 */
export interface SourceLocation {
	readonly file: string;
	readonly line: number;
}

// =============================================================================
// Case Events
// =============================================================================

/**
 * Reportable event raised while a case runs
 * - fail: a check failed outside an expected-failure scope
 * - xfail: a check failed inside an expected-failure scope
 * - xpass: a check passed inside an expected-failure scope
 * - skip: the case called `skip()`
 * - error: the case threw something that is not a tester signal
 */
export type CaseEvent =
	| {
			readonly kind: "fail" | "xfail" | "xpass";
			readonly testCase: CaseInfo;
			readonly location: SourceLocation;
			readonly details: readonly string[];
	  }
	| {
			readonly kind: "skip" | "error";
			readonly testCase: CaseInfo;
			readonly details: readonly string[];
	  };

// =============================================================================
// Results
// =============================================================================

/**
 * Terminal outcome of a case
 * - empty: the case ran but performed no checks
 */
export type CaseOutcome = "ok" | "failed" | "skipped" | "empty";

/**
 * Test case result
 */
export interface CaseResult {
	id: number;
	name: string;
	outcome: CaseOutcome;
	/** Checks performed by this case, including its setup and teardown */
	checks: number;
	expectedFailures: number;
	events: CaseEvent[];
	/** First detail line of the failing or skipping event */
	message?: string;
	startTime: number;
	endTime: number;
	duration: number;
}

/**
 * Overall status of a run
 */
export type ExitStatus = "success" | "failure" | "no-tests";

/**
 * Process exit codes of each status
 */
export const EXIT_CODES: Readonly<Record<ExitStatus, number>> = {
	success: 0,
	failure: 1,
	"no-tests": 2,
};

/**
 * Suite run result
 */
export interface SuiteResult {
	name: string;
	status: ExitStatus;
	exitCode: number;
	cases: CaseResult[];
	/** Number of failed cases */
	errors: number;
	checks: number;
	emptyCases: number;
	skippedCases: number;
	startTime: number;
	endTime: number;
	duration: number;
}

/**
 * Information passed to reporters when a run starts
 */
export interface SuiteStartInfo {
	name: string;
	/** Number of selected cases */
	caseCount: number;
	/** Highest selected ordinal, determines the id padding */
	maxId: number;
	startTime: number;
}

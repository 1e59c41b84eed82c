/**
 * Run State
 *
 * Mutable state of one suite run, shared by the run loop and the check
 * evaluator. Case fields are reset when a case begins; totals accumulate.
 */

import type { ExpectedFailure } from "./expected-failure";
import type { SourceLocation, TestCase } from "./execution.types";

export class RunState {
	caseId = 0;
	caseName = "";
	location?: SourceLocation;

	/** Checks performed in the whole run */
	checkCount = 0;
	/** Checks performed in the current case */
	caseCheckCount = 0;
	caseExpectedFailures = 0;
	caseFailed = false;
	caseSkipped = false;

	expectedFailure?: ExpectedFailure;

	beginCase(testCase: TestCase): void {
		this.caseId = testCase.id;
		this.caseName = testCase.name;
		this.location = undefined;
		this.caseCheckCount = 0;
		this.caseExpectedFailures = 0;
		this.caseFailed = false;
		this.caseSkipped = false;
		this.expectedFailure = undefined;
	}

	beginRun(): void {
		this.checkCount = 0;
	}
}

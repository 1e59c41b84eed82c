/**
 * Allure Writer
 *
 * Destination of the converted suite: one result per test case, one
 * container for the suite and its environment properties.
 */

import type { TestResult, TestResultContainer } from "allure-js-commons";

export interface AllureWriter {
	/** Stores the result of one test case */
	writeTestResult(result: TestResult): void;

	/** Stores the suite container grouping the case results */
	writeContainer(container: TestResultContainer): void;

	/** Stores suite-wide key/value pairs shown on the report overview */
	writeEnvironment(info: Record<string, string>): void;
}

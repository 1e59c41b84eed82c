/**
 * Result Converter
 *
 * Pure functions to convert casebook run results to Allure format.
 */

import { createHash, randomUUID } from "node:crypto";
import {
	type StepResult as AllureStepResult,
	type TestResult as AllureTestResult,
	type Label,
	LabelName,
	Stage,
	Status,
	type StatusDetails,
	type TestResultContainer,
} from "allure-js-commons";
import type { CaseEvent, CaseResult, SuiteResult } from "casebook";
import type { AllureReporterOptions } from "./types";

/**
 * Generate MD5 hash for historyId/testCaseId
 */
function md5(input: string): string {
	return createHash("md5").update(input).digest("hex");
}

/**
 * Convert a case outcome to Allure Status enum. A failure caused by an
 * unexpected exception is reported as broken.
 */
export function convertStatus(result: Pick<CaseResult, "outcome" | "events">): Status {
	switch (result.outcome) {
		case "ok":
			return Status.PASSED;
		case "failed":
			return result.events.some((event) => event.kind === "error") ? Status.BROKEN : Status.FAILED;
		case "skipped":
		case "empty":
			return Status.SKIPPED;
	}
}

/**
 * Convert the failing or skipping event of a case to StatusDetails
 */
export function convertStatusDetails(result: Pick<CaseResult, "outcome" | "events">): StatusDetails {
	if (result.outcome === "empty") {
		return { message: "Test case didn't contain any checks" };
	}
	const event = result.events.find((e) => e.kind !== "xfail");
	return { message: event ? event.details.join("\n") : undefined };
}

/**
 * Convert a reported event to Allure StepResult
 */
export function convertEvent(event: CaseEvent): AllureStepResult {
	const label = event.kind.toUpperCase();
	const name = event.kind === "skip" || event.kind === "error"
		? label
		: `${label} at ${event.location.file} on line ${event.location.line}`;

	return {
		name,
		status: convertEventStatus(event),
		statusDetails: { message: event.details.join("\n") },
		stage: Stage.FINISHED,
		steps: [],
		attachments: [],
		parameters: [],
	};
}

function convertEventStatus(event: CaseEvent): Status {
	switch (event.kind) {
		case "xfail":
			return Status.PASSED;
		case "fail":
		case "xpass":
			return Status.FAILED;
		case "skip":
			return Status.SKIPPED;
		case "error":
			return Status.BROKEN;
	}
}

/**
 * Build the labels of every test result of a suite
 */
export function convertLabels(suiteName: string, options: AllureReporterOptions): Label[] {
	const labels: Label[] = [
		{ name: LabelName.FRAMEWORK, value: "casebook" },
		{ name: LabelName.LANGUAGE, value: "typescript" },
		{ name: LabelName.SUITE, value: suiteName },
	];
	if (options.labels) {
		labels.push(...options.labels);
	}
	return labels;
}

/**
 * Convert CaseResult to Allure TestResult
 */
export function convertTestCase(
	testCase: CaseResult,
	suiteName: string,
	options: AllureReporterOptions,
): AllureTestResult {
	const fullName = `${suiteName}::${testCase.name}`;

	return {
		uuid: randomUUID(),
		historyId: md5(fullName),
		testCaseId: md5(fullName),
		name: testCase.name,
		fullName,
		status: convertStatus(testCase),
		statusDetails: convertStatusDetails(testCase),
		stage: Stage.FINISHED,
		start: testCase.startTime,
		stop: testCase.endTime,
		steps: testCase.events.map(convertEvent),
		labels: convertLabels(suiteName, options),
		links: [],
		attachments: [],
		parameters: [{ name: "id", value: String(testCase.id) }],
	};
}

/**
 * Convert SuiteResult to Allure TestResultContainer
 */
export function convertToContainer(suite: SuiteResult, testCaseUuids: string[]): TestResultContainer {
	return {
		uuid: randomUUID(),
		name: suite.name,
		children: testCaseUuids,
		befores: [],
		afters: [],
	};
}

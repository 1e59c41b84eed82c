/**
 * Allure Result Converter Tests
 */

import {
	convertEvent,
	convertLabels,
	convertStatus,
	convertStatusDetails,
	convertTestCase,
	convertToContainer,
	LabelName,
	Stage,
	Status,
} from "@casebook/reporter-allure";
import type { CaseEvent, CaseResult, SuiteResult } from "casebook";
import { describe, expect, it } from "vitest";

const createCaseResult = (overrides: Partial<CaseResult> = {}): CaseResult => ({
	id: 2,
	name: "parsesInput",
	outcome: "ok",
	checks: 1,
	expectedFailures: 0,
	events: [],
	startTime: 1000,
	endTime: 1050,
	duration: 50,
	...overrides,
});

const failEvent = {
	kind: "fail",
	testCase: { id: 2, name: "parsesInput" },
	location: { file: "parser.test.ts", line: 42 },
	details: ["Values a and b are not the same, actual is", "5 ", "but expected", "3"],
} satisfies CaseEvent;

const errorEvent: CaseEvent = {
	kind: "error",
	testCase: { id: 2, name: "parsesInput" },
	details: ["Unexpected exception TypeError: x is not a function"],
};

describe("convertStatus", () => {
	it("should map case outcomes to statuses", () => {
		expect(convertStatus(createCaseResult())).toBe(Status.PASSED);
		expect(convertStatus(createCaseResult({ outcome: "failed", events: [failEvent] }))).toBe(Status.FAILED);
		expect(convertStatus(createCaseResult({ outcome: "skipped" }))).toBe(Status.SKIPPED);
		expect(convertStatus(createCaseResult({ outcome: "empty" }))).toBe(Status.SKIPPED);
	});

	it("should report unexpected exceptions as broken", () => {
		expect(convertStatus(createCaseResult({ outcome: "failed", events: [errorEvent] }))).toBe(Status.BROKEN);
	});
});

describe("convertStatusDetails", () => {
	it("should join the details of the reported event", () => {
		const xfail: CaseEvent = { ...failEvent, kind: "xfail", details: ["Known issue."] };

		expect(convertStatusDetails(createCaseResult({ outcome: "failed", events: [xfail, failEvent] }))).toEqual({
			message: "Values a and b are not the same, actual is\n5 \nbut expected\n3",
		});
	});

	it("should describe empty cases", () => {
		expect(convertStatusDetails(createCaseResult({ outcome: "empty" }))).toEqual({
			message: "Test case didn't contain any checks",
		});
	});

	it("should leave the message out for passed cases", () => {
		expect(convertStatusDetails(createCaseResult())).toEqual({ message: undefined });
	});
});

describe("convertEvent", () => {
	it("should name located events after their location", () => {
		expect(convertEvent(failEvent)).toEqual({
			name: "FAIL at parser.test.ts on line 42",
			status: Status.FAILED,
			statusDetails: { message: "Values a and b are not the same, actual is\n5 \nbut expected\n3" },
			stage: Stage.FINISHED,
			steps: [],
			attachments: [],
			parameters: [],
		});
	});

	it("should map every event kind", () => {
		const skip: CaseEvent = { kind: "skip", testCase: failEvent.testCase, details: ["Later."] };

		expect(convertEvent({ ...failEvent, kind: "xfail" }).status).toBe(Status.PASSED);
		expect(convertEvent({ ...failEvent, kind: "xpass" }).status).toBe(Status.FAILED);
		expect(convertEvent(skip).name).toBe("SKIP");
		expect(convertEvent(skip).status).toBe(Status.SKIPPED);
		expect(convertEvent(errorEvent).status).toBe(Status.BROKEN);
	});
});

describe("convertLabels", () => {
	it("should include framework, language, suite and default labels", () => {
		expect(convertLabels("ParserTest", { labels: [{ name: LabelName.OWNER, value: "parsers" }] })).toEqual([
			{ name: LabelName.FRAMEWORK, value: "casebook" },
			{ name: LabelName.LANGUAGE, value: "typescript" },
			{ name: LabelName.SUITE, value: "ParserTest" },
			{ name: LabelName.OWNER, value: "parsers" },
		]);
	});
});

describe("convertTestCase", () => {
	it("should convert a case result", () => {
		const result = convertTestCase(createCaseResult({ outcome: "failed", events: [failEvent] }), "ParserTest", {});

		expect(result.name).toBe("parsesInput");
		expect(result.fullName).toBe("ParserTest::parsesInput");
		expect(result.status).toBe(Status.FAILED);
		expect(result.stage).toBe(Stage.FINISHED);
		expect(result.start).toBe(1000);
		expect(result.stop).toBe(1050);
		expect(result.steps.map((step) => step.name)).toEqual(["FAIL at parser.test.ts on line 42"]);
		expect(result.parameters).toEqual([{ name: "id", value: "2" }]);
		expect(result.historyId).toMatch(/^[0-9a-f]{32}$/);
		expect(result.testCaseId).toBe(result.historyId);
	});

	it("should keep the history id stable across runs", () => {
		const first = convertTestCase(createCaseResult(), "ParserTest", {});
		const second = convertTestCase(createCaseResult({ startTime: 5000 }), "ParserTest", {});

		expect(first.uuid).not.toBe(second.uuid);
		expect(first.historyId).toBe(second.historyId);
	});
});

describe("convertToContainer", () => {
	it("should list the test results of a run", () => {
		const suite: SuiteResult = {
			name: "ParserTest",
			status: "success",
			exitCode: 0,
			cases: [],
			errors: 0,
			checks: 2,
			emptyCases: 0,
			skippedCases: 0,
			startTime: 1000,
			endTime: 1100,
			duration: 100,
		};
		const container = convertToContainer(suite, ["a", "b"]);

		expect(container.name).toBe("ParserTest");
		expect(container.children).toEqual(["a", "b"]);
		expect(container.befores).toEqual([]);
	});
});

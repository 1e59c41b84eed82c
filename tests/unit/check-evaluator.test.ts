/**
 * Check Evaluator Tests
 */

import {
	type CaseEvent,
	CheckEvaluator,
	CheckFailure,
	DEFAULT_TYPES,
	ExpectedFailure,
	RunState,
	SkipSignal,
	TesterUsageError,
	Types,
} from "casebook";
import { beforeEach, describe, expect, it } from "vitest";
import { StringLength } from "../helpers/test-helpers";

const here = { file: "here.ts", line: 12 };

describe("CheckEvaluator", () => {
	let state: RunState;
	let events: CaseEvent[];
	let evaluator: CheckEvaluator;

	beforeEach(() => {
		state = new RunState();
		state.beginCase({ id: 3, name: "sample", body: () => {} });
		events = [];
		evaluator = new CheckEvaluator({ state, types: DEFAULT_TYPES, emit: (event) => events.push(event) });
	});

	describe("without expected failure", () => {
		it("should count passing checks silently", () => {
			evaluator.verify(here, "ready", true);
			evaluator.compare(here, "2 + 2", 2 + 2, "4", 4);
			evaluator.compareWith(here, new StringLength(), '"abc"', "abc", '"xyz"', "xyz");

			expect(state.checkCount).toBe(3);
			expect(state.caseCheckCount).toBe(3);
			expect(state.location).toEqual(here);
			expect(events).toEqual([]);
		});

		it("should fail a false expression", () => {
			expect(() => evaluator.verify(here, "x > 1", false)).toThrow(CheckFailure);

			expect(state.caseFailed).toBe(true);
			expect(events).toEqual([
				{
					kind: "fail",
					testCase: { id: 3, name: "sample" },
					location: here,
					details: ["Expression x > 1 failed."],
				},
			]);
		});

		it("should fail unequal values with both values formatted", () => {
			let thrown: unknown;
			try {
				evaluator.compare(here, "name", "alice", "expected", "bob");
			} catch (error) {
				thrown = error;
			}

			expect(thrown).toBeInstanceOf(CheckFailure);
			expect(thrown instanceof CheckFailure && thrown.kind).toBe("fail");
			expect(events[0].details).toEqual([
				"Values name and expected are not the same, actual is",
				"alice ",
				"but expected",
				"bob",
			]);
		});

		it("should keep the case failed when the failure is caught", () => {
			try {
				evaluator.verify(here, "false", false);
			} catch {
				// ignored by the case
			}
			evaluator.verify(here, "true", true);

			expect(state.caseFailed).toBe(true);
		});
	});

	describe("with expected failure", () => {
		it("should report a failing check as expected and continue", () => {
			ExpectedFailure.run(state, "Not done yet.", true, () => {
				evaluator.compare(here, "2 + 2", 2 + 2, "5", 5);
				evaluator.verify(here, "done", false);
			});

			expect(state.caseFailed).toBe(false);
			expect(state.caseExpectedFailures).toBe(2);
			expect(events.map((e) => [e.kind, e.details])).toEqual([
				["xfail", ["Not done yet. 2 + 2 and 5 are not equal."]],
				["xfail", ["Not done yet. Expression done failed."]],
			]);
		});

		it("should fail a passing check as unexpected pass", () => {
			let thrown: unknown;
			try {
				ExpectedFailure.run(state, "Broken.", true, () => {
					evaluator.compare(here, "2 + 2", 2 + 2, "4", 4);
				});
			} catch (error) {
				thrown = error;
			}

			expect(thrown instanceof CheckFailure && thrown.kind).toBe("xpass");
			expect(state.caseFailed).toBe(true);
			expect(state.expectedFailure).toBeUndefined();
			expect(events.map((e) => [e.kind, e.details])).toEqual([
				["xpass", ["2 + 2 and 4 are not expected to be equal."]],
			]);
		});

		it("should fail a true expression as unexpected pass", () => {
			ExpectedFailure.run(state, "Broken.", true, () => {
				expect(() => evaluator.verify(here, "ok", true)).toThrow(CheckFailure);
			});

			expect(events[0].details).toEqual(["Expression ok was expected to fail."]);
		});

		it("should ignore a disabled scope", () => {
			ExpectedFailure.run(state, "Only on Windows.", false, () => {
				evaluator.verify(here, "true", true);
			});

			expect(state.caseFailed).toBe(false);
			expect(events).toEqual([]);
		});
	});

	describe("explicit comparison", () => {
		it("should compare under an explicit value type", () => {
			evaluator.compareAs(here, Types.number, "a", 1, "b", 1 + 1e-15);

			expect(events).toEqual([]);
		});

		it("should construct a comparator class with its defaults", () => {
			expect(() => evaluator.compareAs(here, StringLength, '"meh"', "meh", '"hello"', "hello")).toThrow(CheckFailure);

			expect(events[0].details).toEqual([
				'Length of actual "meh" doesn\'t match length of expected "hello" with epsilon 0',
			]);
		});

		it("should not count a check whose values do not fit the type", () => {
			expect(() => evaluator.compareAs(here, Types.integer, "a", 3.5, "b", 3)).toThrow(TesterUsageError);

			expect(state.checkCount).toBe(0);
		});
	});

	it("should skip with the message", () => {
		expect(() => evaluator.skip("Not supported.")).toThrow(new SkipSignal("Not supported."));
		expect(state.checkCount).toBe(0);
	});
});

describe("ExpectedFailure", () => {
	it("should register and release the active scope", () => {
		const state = new RunState();
		const scope = new ExpectedFailure(state, "outer");

		expect(state.expectedFailure).toBe(scope);
		scope.release();
		scope.release();
		expect(state.expectedFailure).toBeUndefined();
	});

	it("should reject a nested enabled scope", () => {
		const state = new RunState();
		new ExpectedFailure(state, "outer");

		expect(() => new ExpectedFailure(state, "inner")).toThrow(
			'Expected failure "inner" entered while "outer" is still active',
		);
		expect(() => new ExpectedFailure(state, "inner", false)).not.toThrow();
	});

	it("should release the scope when an asynchronous body settles", async () => {
		const state = new RunState();
		const pending = ExpectedFailure.run(state, "slow", true, async () => {
			await Promise.resolve();
		});

		expect(state.expectedFailure?.message).toBe("slow");
		await pending;
		expect(state.expectedFailure).toBeUndefined();
	});

	it("should release the scope when the body throws", () => {
		const state = new RunState();

		expect(() =>
			ExpectedFailure.run(state, "throws", true, () => {
				throw new Error("boom");
			}),
		).toThrow("boom");
		expect(state.expectedFailure).toBeUndefined();
	});
});

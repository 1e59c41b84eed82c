/**
 * Check Evaluator
 *
 * Implements the check primitives. A check either passes silently, reports
 * an expected failure and lets the case continue, or reports a failure and
 * aborts the case with a CheckFailure.
 *
 * | scope | result | action                          |
 * |-------|--------|---------------------------------|
 * | no    | pass   | continue                        |
 * | no    | fail   | FAIL event, abort case          |
 * | yes   | fail   | XFAIL event, continue           |
 * | yes   | pass   | XPASS event, abort case         |
 */

import type { Comparator, ComparatorClass, ComparisonOutcome, ValueType } from "../comparison/comparison.types";
import { resolveComparator, resolveExplicit } from "../comparison/dispatch";
import { MessageWriter } from "../comparison/message-writer";
import type { CaseEvent, SourceLocation } from "./execution.types";
import type { RunState } from "./run-state";
import { CheckFailure, type CheckFailureKind, SkipSignal } from "./signals";

export interface CheckEvaluatorOptions {
	state: RunState;
	/** Value types consulted by automatic comparator dispatch */
	types: readonly ValueType<unknown>[];
	emit(event: CaseEvent): void;
}

export class CheckEvaluator {
	constructor(private readonly options: CheckEvaluatorOptions) {}

	/**
	 * Check that a value is truthy
	 */
	verify(location: SourceLocation, expression: string, value: unknown): void {
		this.countCheck(location);

		const passed = Boolean(value);
		const scope = this.options.state.expectedFailure;
		if (!scope) {
			if (passed) return;
			throw this.failure("fail", location, [`Expression ${expression} failed.`]);
		}

		if (!passed) {
			this.expectedFailure(location, [`${scope.message} Expression ${expression} failed.`]);
			return;
		}
		throw this.failure("xpass", location, [`Expression ${expression} was expected to fail.`]);
	}

	/**
	 * Compare two values with an automatically resolved comparator
	 */
	compare(location: SourceLocation, actualLabel: string, actual: unknown, expectedLabel: string, expected: unknown): void {
		const resolved = resolveComparator(actual, expected, this.options.types);
		this.evaluate(location, () => resolved.comparator.compare(resolved.actual, resolved.expected), actualLabel, expectedLabel);
	}

	/**
	 * Compare two values under an explicit value type or comparator class
	 */
	compareAs<TActual, TExpected>(
		location: SourceLocation,
		as: ValueType<unknown> | ComparatorClass<TActual, TExpected>,
		actualLabel: string,
		actual: TActual,
		expectedLabel: string,
		expected: TExpected,
	): void {
		const resolved = resolveExplicit(as, actual, expected);
		this.evaluate(location, () => resolved.comparator.compare(resolved.actual, resolved.expected), actualLabel, expectedLabel);
	}

	/**
	 * Compare two values with a comparator instance
	 */
	compareWith<TActual, TExpected>(
		location: SourceLocation,
		comparator: Comparator<TActual, TExpected>,
		actualLabel: string,
		actual: TActual,
		expectedLabel: string,
		expected: TExpected,
	): void {
		this.evaluate(location, () => comparator.compare(actual, expected), actualLabel, expectedLabel);
	}

	/**
	 * Abort the current case as skipped
	 */
	skip(message: string): never {
		throw new SkipSignal(message);
	}

	private evaluate(
		location: SourceLocation,
		compare: () => ComparisonOutcome,
		actualLabel: string,
		expectedLabel: string,
	): void {
		this.countCheck(location);

		const outcome = compare();
		const scope = this.options.state.expectedFailure;
		if (!scope) {
			if (outcome.equal) return;
			const writer = new MessageWriter();
			outcome.renderFailure(writer, actualLabel, expectedLabel);
			throw this.failure("fail", location, writer.getLines());
		}

		if (!outcome.equal) {
			this.expectedFailure(location, [`${scope.message} ${actualLabel} and ${expectedLabel} are not equal.`]);
			return;
		}
		throw this.failure("xpass", location, [`${actualLabel} and ${expectedLabel} are not expected to be equal.`]);
	}

	private countCheck(location: SourceLocation): void {
		const { state } = this.options;
		state.checkCount++;
		state.caseCheckCount++;
		state.location = location;
	}

	private expectedFailure(location: SourceLocation, details: string[]): void {
		const { state } = this.options;
		state.caseExpectedFailures++;
		this.options.emit({
			kind: "xfail",
			testCase: { id: state.caseId, name: state.caseName },
			location,
			details,
		});
	}

	/**
	 * Mark the case failed, report the failure and build the signal to throw
	 */
	private failure(kind: CheckFailureKind, location: SourceLocation, details: string[]): CheckFailure {
		const { state } = this.options;
		state.caseFailed = true;
		this.options.emit({
			kind,
			testCase: { id: state.caseId, name: state.caseName },
			location,
			details,
		});
		return new CheckFailure(details.join("\n"), kind);
	}
}

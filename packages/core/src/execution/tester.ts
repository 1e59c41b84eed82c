/**
 * Tester Class
 *
 * Base class of a test suite. Subclasses register their cases in the
 * constructor and call the check primitives from the case bodies.
 *
 * @example
 * ```typescript
 * class MathTest extends Tester {
 *   constructor() {
 *     super({ name: "MathTest" });
 *     this.addTests([this.addition, this.division]);
 *   }
 *
 *   addition(): void {
 *     this.compare("2 + 2", 2 + 2, "4", 4);
 *   }
 *
 *   division(): void {
 *     this.expectFail("Integer division is not implemented", () => {
 *       this.compare("7 / 2", 7 / 2, "3", 3);
 *     });
 *   }
 * }
 *
 * await testMain(new MathTest());
 * ```
 */

import type { Comparator, ComparatorClass, ValueType } from "../comparison/comparison.types";
import { DEFAULT_TYPES } from "../comparison/value-types";
import { parseArguments, type TesterArguments } from "../cli/arguments";
import { ALL_CASES, createSelection, type Selection, selectIds } from "../cli/selection";
import { type OutputStream, resolveColor } from "../recording/output";
import { CompositeReporter, type TestReporter, TextReporter } from "../recording/reporter";
import { toError } from "../utils";
import { CheckEvaluator } from "./check-evaluator";
import { ExpectedFailure } from "./expected-failure";
import {
	type CaseEvent,
	type CaseResult,
	EXIT_CODES,
	type SourceLocation,
	type SuiteResult,
	type TestCase,
	type TestCaseFunction,
} from "./execution.types";
import { RunState } from "./run-state";
import { ArgumentError, CheckFailure, SkipSignal } from "./signals";
import { type LocatorBoundary, type SourceLocator, StackLocator } from "./source-locator";
import { TestCaseRegistry } from "./test-case-registry";

/**
 * Tester configuration
 */
export interface TesterConfiguration {
	/** Suite name used in the report (default: class name) */
	name?: string;
	/** File printed in FAIL/XFAIL/XPASS lines (default: file of the check call) */
	file?: string;
	/** Default: process.stdout */
	logOutput?: OutputStream;
	/** Default: process.stderr */
	errorOutput?: OutputStream;
	/** Reporters notified in addition to the text report */
	reporters?: TestReporter[];
	/** Value types consulted before the built-in ones */
	types?: readonly ValueType<unknown>[];
	locator?: SourceLocator;
	/** Command-line prefixes (`--<prefix>-...`) left for someone else */
	skippedArgumentPrefixes?: readonly string[];
}

/**
 * Tester - base class of test suites
 */
export abstract class Tester {
	private readonly config: TesterConfiguration;
	private readonly registry = new TestCaseRegistry();
	private readonly state = new RunState();
	private readonly checks: CheckEvaluator;
	private readonly locator: SourceLocator;
	private reporter: TestReporter = new CompositeReporter([]);
	private caseEvents: CaseEvent[] = [];

	constructor(config: TesterConfiguration = {}) {
		this.config = config;
		this.locator = config.locator ?? new StackLocator();
		this.checks = new CheckEvaluator({
			state: this.state,
			types: [...(config.types ?? []), ...DEFAULT_TYPES],
			emit: (event) => this.emit(event),
		});
	}

	// =========================================================================
	// Suite Information
	// =========================================================================

	get testName(): string {
		return this.config.name ?? this.constructor.name;
	}

	/**
	 * Ordinal of the case being run
	 */
	testCaseId(): number {
		return this.state.caseId;
	}

	/**
	 * Name of the case being run
	 */
	testCaseName(): string {
		return this.state.caseName;
	}

	// =========================================================================
	// Registration
	// =========================================================================

	/**
	 * Add test cases, optionally with a setup and teardown run around each
	 * of them. Cases are invoked with the suite as `this`.
	 */
	protected addTests(
		cases: readonly TestCaseFunction[],
		setup?: TestCaseFunction,
		teardown?: TestCaseFunction,
	): void {
		this.registry.add(cases, setup, teardown);
	}

	// =========================================================================
	// Checks
	// =========================================================================

	/**
	 * Verify that a value is truthy
	 */
	protected verify(expression: string, value: unknown): void {
		this.checks.verify(this.location(Tester.prototype.verify), expression, value);
	}

	/**
	 * Compare two values. The comparison type is resolved from the values.
	 */
	protected compare(actualLabel: string, actual: unknown, expectedLabel: string, expected: unknown): void {
		this.checks.compare(this.location(Tester.prototype.compare), actualLabel, actual, expectedLabel, expected);
	}

	/**
	 * Compare two values under an explicit value type, or with a comparator
	 * class constructed with its default parameters
	 */
	protected compareAs(
		as: ValueType<unknown>,
		actualLabel: string,
		actual: unknown,
		expectedLabel: string,
		expected: unknown,
	): void;
	protected compareAs<TActual, TExpected>(
		as: ComparatorClass<TActual, TExpected>,
		actualLabel: string,
		actual: TActual,
		expectedLabel: string,
		expected: TExpected,
	): void;
	protected compareAs(
		as: ValueType<unknown> | ComparatorClass<unknown, unknown>,
		actualLabel: string,
		actual: unknown,
		expectedLabel: string,
		expected: unknown,
	): void {
		this.checks.compareAs(this.location(Tester.prototype.compareAs), as, actualLabel, actual, expectedLabel, expected);
	}

	/**
	 * Compare two values with a comparator instance
	 */
	protected compareWith<TActual, TExpected>(
		comparator: Comparator<TActual, TExpected>,
		actualLabel: string,
		actual: TActual,
		expectedLabel: string,
		expected: TExpected,
	): void {
		this.checks.compareWith(
			this.location(Tester.prototype.compareWith),
			comparator,
			actualLabel,
			actual,
			expectedLabel,
			expected,
		);
	}

	/**
	 * Skip the rest of the current case
	 */
	protected skip(message: string): never {
		return this.checks.skip(message);
	}

	/**
	 * Expect every check in `body` to fail
	 */
	protected expectFail(message: string, body: () => Promise<void>): Promise<void>;
	protected expectFail(message: string, body: () => void): void;
	protected expectFail(message: string, body: () => void | Promise<void>): void | Promise<void> {
		return ExpectedFailure.run(this.state, message, true, body);
	}

	/**
	 * Expect every check in `body` to fail if `condition` is truthy
	 */
	protected expectFailIf(condition: unknown, message: string, body: () => Promise<void>): Promise<void>;
	protected expectFailIf(condition: unknown, message: string, body: () => void): void;
	protected expectFailIf(condition: unknown, message: string, body: () => void | Promise<void>): void | Promise<void> {
		return ExpectedFailure.run(this.state, message, Boolean(condition), body);
	}

	// =========================================================================
	// Execution
	// =========================================================================

	/**
	 * Parse command-line arguments, run the selected cases and return the
	 * process exit code
	 */
	async exec(argv: readonly string[] = []): Promise<number> {
		const logOutput = this.config.logOutput ?? process.stdout;
		const errorOutput = this.config.errorOutput ?? process.stderr;

		let args: TesterArguments;
		try {
			args = parseArguments(argv, {
				programName: this.testName,
				skippedPrefixes: this.config.skippedArgumentPrefixes,
				writeHelp: (text) => logOutput.write(text),
			});
		} catch (error) {
			if (!(error instanceof ArgumentError)) {
				throw error;
			}
			const reporter = new TextReporter({ logOutput, errorOutput, useColor: resolveColor("auto", errorOutput) });
			new CompositeReporter([reporter, ...(this.config.reporters ?? [])]).onError(error);
			return EXIT_CODES.failure;
		}

		if (args.help) {
			return EXIT_CODES.success;
		}

		const reporter = new TextReporter({
			logOutput,
			errorOutput,
			useColor: resolveColor(args.color, logOutput),
			errorColor: resolveColor(args.color, errorOutput),
		});
		const result = await this.run(createSelection(args), reporter);
		return result.exitCode;
	}

	/**
	 * Run the selected cases in registration order
	 */
	async run(selection: Selection = ALL_CASES, reporter?: TestReporter): Promise<SuiteResult> {
		this.registry.seal();
		this.reporter = new CompositeReporter([...(reporter ? [reporter] : []), ...(this.config.reporters ?? [])]);
		this.state.beginRun();

		const startTime = Date.now();
		if (this.registry.size === 0) {
			const result = this.createResult("no-tests", [], startTime);
			this.reporter.onComplete(result);
			return result;
		}

		const cases = this.registry.select(selectIds(this.registry.size, selection));
		this.reporter.onStart?.({
			name: this.testName,
			caseCount: cases.length,
			maxId: cases.length > 0 ? cases[cases.length - 1].id : 0,
			startTime,
		});

		const results: CaseResult[] = [];
		for (const testCase of cases) {
			results.push(await this.runCase(testCase));
		}

		const failed = results.some((r) => r.outcome === "failed");
		const result = this.createResult(failed ? "failure" : "success", results, startTime);
		this.reporter.onComplete(result);
		return result;
	}

	/**
	 * Run one case: setup, body, teardown. Teardown runs even when setup or
	 * the body aborted; the body is not run when setup aborted.
	 */
	private async runCase(testCase: TestCase): Promise<CaseResult> {
		const { state } = this;
		state.beginCase(testCase);
		this.caseEvents = [];
		this.reporter.onCaseStart?.({ id: testCase.id, name: testCase.name });

		const startTime = Date.now();
		const setupCompleted = testCase.setup ? await this.runPhase(testCase.setup) : true;
		if (setupCompleted) {
			await this.runPhase(testCase.body);
		}
		if (testCase.teardown) {
			await this.runPhase(testCase.teardown);
		}
		const endTime = Date.now();

		const outcome = state.caseFailed
			? "failed"
			: state.caseSkipped
				? "skipped"
				: state.caseCheckCount === 0
					? "empty"
					: "ok";
		const reported = this.caseEvents.find((event) => event.kind !== "xfail");

		const result: CaseResult = {
			id: testCase.id,
			name: testCase.name,
			outcome,
			checks: state.caseCheckCount,
			expectedFailures: state.caseExpectedFailures,
			events: this.caseEvents,
			message: reported?.details[0],
			startTime,
			endTime,
			duration: endTime - startTime,
		};
		this.reporter.onCaseComplete?.(result);
		return result;
	}

	/**
	 * Run a phase of a case, turning whatever it throws into the case outcome.
	 * Returns false when the phase aborted.
	 */
	private async runPhase(phase: TestCaseFunction): Promise<boolean> {
		try {
			await phase.call(this);
			return true;
		} catch (error) {
			if (error instanceof SkipSignal) {
				this.state.caseSkipped = true;
				this.emit({ kind: "skip", testCase: this.caseInfo(), details: [error.message] });
			} else if (error instanceof CheckFailure) {
				this.state.caseFailed = true;
			} else {
				const err = toError(error);
				this.state.caseFailed = true;
				this.emit({ kind: "error", testCase: this.caseInfo(), details: [`Unexpected exception ${err.name}: ${err.message}`] });
			}
			return false;
		} finally {
			this.state.expectedFailure = undefined;
		}
	}

	private createResult(status: SuiteResult["status"], cases: CaseResult[], startTime: number): SuiteResult {
		const endTime = Date.now();
		return {
			name: this.testName,
			status,
			exitCode: EXIT_CODES[status],
			cases,
			errors: cases.filter((c) => c.outcome === "failed").length,
			checks: this.state.checkCount,
			emptyCases: cases.filter((c) => c.outcome === "empty").length,
			skippedCases: cases.filter((c) => c.outcome === "skipped").length,
			startTime,
			endTime,
			duration: endTime - startTime,
		};
	}

	private caseInfo() {
		return { id: this.state.caseId, name: this.state.caseName };
	}

	private location(boundary: LocatorBoundary): SourceLocation {
		const located = this.locator.locate(boundary);
		return {
			file: this.config.file ?? located?.file ?? "<unknown>",
			line: located?.line ?? 0,
		};
	}

	private emit(event: CaseEvent): void {
		this.caseEvents.push(event);
		this.reporter.onCaseEvent?.(event);
	}
}

/**
 * Run a suite with the process arguments and set the process exit code
 */
export async function testMain(tester: Tester, argv: readonly string[] = process.argv.slice(2)): Promise<number> {
	const exitCode = await tester.exec(argv);
	process.exitCode = exitCode;
	return exitCode;
}

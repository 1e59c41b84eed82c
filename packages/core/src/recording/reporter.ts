/**
 * Test Reporter
 *
 * Interface and implementations for reporting test runs.
 */

import type {
	CaseEvent,
	CaseInfo,
	CaseResult,
	SuiteResult,
	SuiteStartInfo,
} from "../execution/execution.types";
import { padding } from "../utils";
import { type OutputStream, renderLine, type Segment, type Style, styled } from "./output";

/**
 * Test Reporter Interface
 */
export interface TestReporter {
	/** Reporter name */
	readonly name: string;

	/** Called when the selected cases start running */
	onStart?(info: SuiteStartInfo): void;

	/** Called before the setup of a case */
	onCaseStart?(testCase: CaseInfo): void;

	/** Called for every FAIL, XFAIL, XPASS, SKIP and unexpected error */
	onCaseEvent?(event: CaseEvent): void;

	/** Called after the teardown of a case */
	onCaseComplete?(result: CaseResult): void;

	/** Called when the run completes */
	onComplete(result: SuiteResult): void;

	/** Called when the run cannot start (invalid arguments) */
	onError?(error: Error): void;
}

// =============================================================================
// Text Reporter
// =============================================================================

const DETAIL_INDENT = "        ";

const BOLD_DEFAULT: Style = { color: "default", bold: true };
const BOLD_RED: Style = { color: "red", bold: true };
const BOLD_YELLOW: Style = { color: "yellow", bold: true };

export interface TextReporterOptions {
	/** Receives progress, OK, SKIP, XFAIL and summary lines */
	logOutput: OutputStream;
	/** Receives FAIL and XPASS lines */
	errorOutput: OutputStream;
	useColor?: boolean;
	/** Colors on the error output (default: `useColor`) */
	errorColor?: boolean;
}

/**
 * Text Reporter
 *
 * Writes the line-oriented report:
 *
 * ```
 * Starting MySuite with 3 test cases...
 *     OK [1] first()
 *   FAIL [2] second() at my-suite.ts on line 12
 *         Expression a > b failed.
 *   SKIP [3] third()
 *         Not supported here.
 * Finished MySuite with 1 errors out of 2 checks.
 * ```
 */
export class TextReporter implements TestReporter {
	readonly name = "text";
	private readonly logOutput: OutputStream;
	private readonly errorOutput: OutputStream;
	private readonly useColor: boolean;
	private readonly errorColor: boolean;
	private maxId = 1;

	constructor(options: TextReporterOptions) {
		this.logOutput = options.logOutput;
		this.errorOutput = options.errorOutput;
		this.useColor = options.useColor ?? false;
		this.errorColor = options.errorColor ?? this.useColor;
	}

	onStart(info: SuiteStartInfo): void {
		this.maxId = info.maxId;
		this.log([[styled(`Starting ${info.name} with ${info.caseCount} test cases...`, "default", true)]]);
	}

	onCaseEvent(event: CaseEvent): void {
		switch (event.kind) {
			case "fail":
			case "xpass":
				this.error([
					[...this.head(event.kind === "fail" ? "FAIL" : "XPASS", BOLD_RED, event.testCase), this.at(event.location)],
					...this.details(event.details),
				]);
				break;
			case "xfail":
				this.log([
					[...this.head("XFAIL", BOLD_YELLOW, event.testCase), this.at(event.location)],
					...this.details(event.details),
				]);
				break;
			case "skip":
				this.log([
					[...this.head("SKIP", BOLD_DEFAULT, event.testCase), { text: " " }],
					...this.details(event.details),
				]);
				break;
			case "error":
				this.error([
					[...this.head("FAIL", BOLD_RED, event.testCase), { text: " " }],
					...this.details(event.details),
				]);
				break;
		}
	}

	onCaseComplete(result: CaseResult): void {
		if (result.outcome === "ok") {
			this.log([this.head("OK", BOLD_DEFAULT, result)]);
		} else if (result.outcome === "empty") {
			this.log([this.head("?", BOLD_YELLOW, { id: result.id, name: "<unknown>" })]);
		}
	}

	onComplete(result: SuiteResult): void {
		if (result.status === "no-tests") {
			this.error([[styled(`No tests to run in ${result.name}!`, "red", true)]]);
			return;
		}

		const summary: Segment[] = [
			styled(`Finished ${result.name} with `, "default", true),
			styled(`${result.errors} errors`, result.errors > 0 ? "red" : "default", true),
			styled(` out of ${result.checks} checks.`, "default", true),
		];
		if (result.emptyCases > 0) {
			summary.push(styled(` ${result.emptyCases} test cases didn't contain any checks!`, "yellow", true));
		}
		this.log([summary]);
	}

	onError(error: Error): void {
		this.error([[styled(error.message, "red", true)]]);
	}

	/**
	 * Status label, bracketed id and case name
	 */
	private head(label: string, style: Style, testCase: CaseInfo): Segment[] {
		return [
			{ text: label.padStart(6), style },
			{ text: " " },
			styled("[", "blue"),
			styled(`${padding(testCase.id, this.maxId)}${testCase.id}`, "cyan", true),
			styled("]", "blue"),
			{ text: " " },
			styled(`${testCase.name}()`, "default", true),
		];
	}

	private at(location: { file: string; line: number }): Segment {
		return { text: ` at ${location.file} on line ${location.line} ` };
	}

	private details(lines: readonly string[]): Segment[][] {
		return lines.map((line) => [{ text: `${DETAIL_INDENT}${line}` }]);
	}

	private log(lines: Segment[][]): void {
		this.write(this.logOutput, lines, this.useColor);
	}

	private error(lines: Segment[][]): void {
		this.write(this.errorOutput, lines, this.errorColor);
	}

	private write(stream: OutputStream, lines: Segment[][], useColor: boolean): void {
		stream.write(`${lines.map((line) => renderLine(line, useColor)).join("\n")}\n`);
	}
}

// =============================================================================
// Silent Reporter
// =============================================================================

/**
 * Silent Reporter
 *
 * Does not output anything; keeps results and events for inspection.
 */
export class SilentReporter implements TestReporter {
	readonly name = "silent";
	private results: SuiteResult[] = [];
	private events: CaseEvent[] = [];

	onCaseEvent(event: CaseEvent): void {
		this.events.push(event);
	}

	onComplete(result: SuiteResult): void {
		this.results.push(result);
	}

	getResults(): SuiteResult[] {
		return this.results;
	}

	getLastResult(): SuiteResult | undefined {
		return this.results[this.results.length - 1];
	}

	getEvents(): CaseEvent[] {
		return this.events;
	}
}

// =============================================================================
// Composite Reporter
// =============================================================================

/**
 * Composite Reporter
 *
 * Combines multiple reporters.
 */
export class CompositeReporter implements TestReporter {
	readonly name = "composite";
	private reporters: TestReporter[];

	constructor(reporters: TestReporter[]) {
		this.reporters = reporters;
	}

	onStart(info: SuiteStartInfo): void {
		for (const reporter of this.reporters) {
			reporter.onStart?.(info);
		}
	}

	onCaseStart(testCase: CaseInfo): void {
		for (const reporter of this.reporters) {
			reporter.onCaseStart?.(testCase);
		}
	}

	onCaseEvent(event: CaseEvent): void {
		for (const reporter of this.reporters) {
			reporter.onCaseEvent?.(event);
		}
	}

	onCaseComplete(result: CaseResult): void {
		for (const reporter of this.reporters) {
			reporter.onCaseComplete?.(result);
		}
	}

	onComplete(result: SuiteResult): void {
		for (const reporter of this.reporters) {
			reporter.onComplete(result);
		}
	}

	onError(error: Error): void {
		for (const reporter of this.reporters) {
			reporter.onError?.(error);
		}
	}

	/**
	 * Add a reporter
	 */
	addReporter(reporter: TestReporter): void {
		this.reporters.push(reporter);
	}

	/**
	 * Remove a reporter by name
	 */
	removeReporter(name: string): void {
		this.reporters = this.reporters.filter((r) => r.name !== name);
	}
}

/**
 * Allure Reporter
 *
 * Writes one Allure test result per case and a container per suite run.
 */

import type { CaseResult, SuiteResult, SuiteStartInfo, TestReporter } from "casebook";
import { convertTestCase, convertToContainer } from "./result-converter";
import type { AllureReporterOptions } from "./types";
import { FileSystemWriter } from "./writers/file-writer";
import type { AllureWriter } from "./writers/writer";

export class AllureReporter implements TestReporter {
	readonly name = "allure";
	private readonly options: AllureReporterOptions;
	private readonly writer: AllureWriter;
	private suiteName = "";
	private testCaseUuids: string[] = [];

	constructor(options?: AllureReporterOptions) {
		this.options = {
			resultsDir: "allure-results",
			...options,
		};
		this.writer = this.options.writer ?? new FileSystemWriter(this.options.resultsDir ?? "allure-results");
	}

	/**
	 * Get reporter options
	 */
	getOptions(): AllureReporterOptions {
		return this.options;
	}

	onStart(info: SuiteStartInfo): void {
		this.suiteName = info.name;
		this.testCaseUuids = [];
	}

	onCaseComplete(result: CaseResult): void {
		const testResult = convertTestCase(result, this.suiteName, this.options);
		this.writer.writeTestResult(testResult);
		this.testCaseUuids.push(testResult.uuid);
	}

	onComplete(result: SuiteResult): void {
		if (result.status === "no-tests") {
			return;
		}
		this.writer.writeContainer(convertToContainer(result, this.testCaseUuids));
		if (this.options.environmentInfo) {
			this.writer.writeEnvironment(this.options.environmentInfo);
		}
	}
}

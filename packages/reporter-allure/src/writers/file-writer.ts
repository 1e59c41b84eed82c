/**
 * FileSystem Writer
 *
 * Writes Allure result files to the file system.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { TestResult, TestResultContainer } from "allure-js-commons";
import type { AllureWriter } from "./writer";

/**
 * FileSystemWriter - writes Allure result files to disk
 */
export class FileSystemWriter implements AllureWriter {
	private readonly resultsDir: string;

	constructor(resultsDir: string) {
		this.resultsDir = resultsDir;
	}

	writeTestResult(result: TestResult): void {
		this.writeFile(`${result.uuid}-result.json`, JSON.stringify(result, null, 2));
	}

	writeContainer(container: TestResultContainer): void {
		this.writeFile(`${container.uuid}-container.json`, JSON.stringify(container, null, 2));
	}

	writeEnvironment(info: Record<string, string>): void {
		const lines = Object.entries(info).map(([key, value]) => `${key}=${value}`);
		this.writeFile("environment.properties", lines.join("\n"));
	}

	getResultsDir(): string {
		return this.resultsDir;
	}

	/**
	 * Write a file, creating the results directory on first use
	 */
	private writeFile(filename: string, content: string): void {
		fs.mkdirSync(this.resultsDir, { recursive: true });
		fs.writeFileSync(path.join(this.resultsDir, filename), content);
	}
}

/**
 * Allure Reporter for casebook
 *
 * Writes Allure result files for every suite run.
 *
 * @example
 * ```typescript
 * import { Tester } from "casebook";
 * import { AllureReporter } from "@casebook/reporter-allure";
 *
 * class ParserTest extends Tester {
 *   constructor() {
 *     super({
 *       reporters: [new AllureReporter({ resultsDir: "allure-results" })],
 *     });
 *     this.addTests([this.emptyInput]);
 *   }
 *   // ...
 * }
 * ```
 */

export { AllureReporter } from "./allure-reporter";
export {
	convertEvent,
	convertLabels,
	convertStatus,
	convertStatusDetails,
	convertTestCase,
	convertToContainer,
} from "./result-converter";
export type { AllureReporterOptions } from "./types";
export { LabelName, Stage, Status } from "allure-js-commons";
export { FileSystemWriter } from "./writers/file-writer";
export type { AllureWriter } from "./writers/writer";

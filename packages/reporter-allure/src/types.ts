/**
 * Allure Reporter Types
 */

import type { Label } from "allure-js-commons";
import type { AllureWriter } from "./writers/writer";

/**
 * Allure reporter options
 */
export interface AllureReporterOptions {
	/** Output directory (default: "allure-results") */
	resultsDir?: string;

	/** Environment info written to environment.properties */
	environmentInfo?: Record<string, string>;

	/** Default labels for all tests */
	labels?: Label[];

	/** Writer used instead of a FileSystemWriter on `resultsDir` */
	writer?: AllureWriter;
}

/**
 * Casebook Core
 *
 * A unit-test harness: suites register named test cases, run them in order
 * and report every check that failed, was skipped or failed as expected.
 *
 * For reporters:
 * - @casebook/reporter-allure - Allure results output
 *
 * @example
 * ```typescript
 * import { Around, Tester, testMain } from "casebook";
 *
 * class VectorTest extends Tester {
 *   constructor() {
 *     super();
 *     this.addTests([this.magnitude, this.normalize], this.setup, this.teardown);
 *   }
 *
 *   setup(): void {}
 *   teardown(): void {}
 *
 *   magnitude(): void {
 *     this.compare("magnitude([3, 4])", magnitude([3, 4]), "5", 5);
 *   }
 *
 *   normalize(): void {
 *     this.compareWith(new Around(1e-6), "normalize([3, 4])[0]", normalize([3, 4])[0], "0.6", 0.6);
 *   }
 * }
 *
 * await testMain(new VectorTest());
 * ```
 */

// Comparison (ValueType, Types, comparators, dispatch)
export * from "./comparison";
// Execution (Tester, testMain, signals, results)
export * from "./execution";
// Recording (TestReporter, TextReporter, output)
export * from "./recording";
// Command line (parseArguments, selection)
export * from "./cli";
export { digitCount, padding } from "./utils";

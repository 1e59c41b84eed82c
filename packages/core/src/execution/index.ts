/**
 * Execution Module
 *
 * Tester base class, run loop, check evaluation and case signals.
 */

export * from "./execution.types";
export * from "./signals";
export * from "./run-state";
export * from "./expected-failure";
export * from "./source-locator";
export * from "./check-evaluator";
export * from "./test-case-registry";
export * from "./tester";

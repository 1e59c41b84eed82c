/**
 * CLI Module
 *
 * Command-line arguments and case selection.
 */

export * from "./arguments";
export * from "./selection";

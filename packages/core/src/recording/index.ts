/**
 * Recording Module
 *
 * Reporters and colorable output.
 */

export * from "./output";
export * from "./reporter";

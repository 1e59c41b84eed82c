/**
 * Comparison Module
 *
 * Value types, comparators and comparator dispatch.
 */

export * from "./comparison.types";
export * from "./message-writer";
export * from "./value-types";
export * from "./dispatch";
export * from "./default.comparator";
export * from "./around.comparator";
export * from "./container.comparator";

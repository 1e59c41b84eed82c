/**
 * Source Locator
 *
 * Finds the file and line of the check being evaluated.
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { SourceLocation } from "./execution.types";

/**
 * Function whose frame (and every frame above it) is excluded from the lookup
 */
export type LocatorBoundary = (...args: never[]) => unknown;

export interface SourceLocator {
	locate(boundary: LocatorBoundary): SourceLocation | undefined;
}

const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

/**
 * Parse the first stack frame of a V8 stack trace
 */
export function parseStackFrame(stack: string, cwd = process.cwd()): SourceLocation | undefined {
	for (const line of stack.split("\n")) {
		const match = FRAME_PATTERN.exec(line);
		if (!match) {
			continue;
		}

		const [, location, lineNumber] = match;
		const file = location.startsWith("file://") ? fileURLToPath(location) : location;
		return {
			file: path.isAbsolute(file) ? path.relative(cwd, file) : file,
			line: Number(lineNumber),
		};
	}
	return undefined;
}

/**
 * Locator reading the caller frame of the boundary function from a captured
 * stack trace
 */
export class StackLocator implements SourceLocator {
	locate(boundary: LocatorBoundary): SourceLocation | undefined {
		const holder: { stack?: string } = {};
		Error.captureStackTrace(holder, boundary);
		return holder.stack ? parseStackFrame(holder.stack) : undefined;
	}
}

/**
 * Command-Line Arguments
 *
 * Parses the tester flags:
 *   --only "<ids>"   run only the given case numbers
 *   --skip "<ids>"   skip the given case numbers
 *   --color <mode>   on, off or auto
 */

import { Command, CommanderError, Option } from "commander";
import { ArgumentError } from "../execution/signals";
import type { ColorMode } from "../recording/output";

export interface TesterArguments {
	only?: number[];
	skip: number[];
	color: ColorMode;
	/** Help was requested and printed; nothing should run */
	help: boolean;
}

export interface ParseArgumentsOptions {
	/** Arguments starting with `--<prefix>-` are ignored together with their value */
	skippedPrefixes?: readonly string[];
	programName?: string;
	/** Receives the help text */
	writeHelp?: (text: string) => void;
}

type ParsedOptions = {
	only?: string;
	skip?: string;
	color: ColorMode;
};

/**
 * Parse a whitespace-separated list of 1-based case numbers
 */
export function parseIds(value: string, flag: string): number[] {
	const ids: number[] = [];
	for (const token of value.split(/\s+/)) {
		if (token === "") continue;
		if (!/^\d+$/.test(token) || Number(token) === 0) {
			throw new ArgumentError(`Invalid test case number "${token}" in ${flag}`);
		}
		ids.push(Number(token));
	}
	return ids;
}

/**
 * Remove arguments meant for someone else
 */
export function dropSkippedArguments(argv: readonly string[], prefixes: readonly string[]): string[] {
	const remaining: string[] = [];
	for (let index = 0; index < argv.length; index++) {
		const arg = argv[index];
		if (!prefixes.some((prefix) => arg.startsWith(`--${prefix}-`))) {
			remaining.push(arg);
			continue;
		}

		const next = argv[index + 1];
		if (!arg.includes("=") && next !== undefined && !next.startsWith("--")) {
			index++;
		}
	}
	return remaining;
}

function createProgram(options: ParseArgumentsOptions): Command {
	return new Command()
		.name(options.programName ?? "tester")
		.description(
			"Runs test cases in the order in which they were added and exits with a non-zero code if any of them failed.",
		)
		.option("--only <ids>", 'run only test cases with given numbers, e.g. "1 3 7"')
		.option("--skip <ids>", "skip test cases with given numbers")
		.addOption(new Option("--color <mode>", "colored output").choices(["on", "off", "auto"]).default("auto"))
		.exitOverride()
		.configureOutput({
			writeOut: (text) => options.writeHelp?.(text),
			writeErr: () => undefined,
		});
}

/**
 * Parse tester arguments (without the executable and script path)
 */
export function parseArguments(argv: readonly string[], options: ParseArgumentsOptions = {}): TesterArguments {
	const program = createProgram(options);
	const args = dropSkippedArguments(argv, options.skippedPrefixes ?? []);

	try {
		program.parse(args, { from: "user" });
	} catch (error) {
		if (!(error instanceof CommanderError)) {
			throw error;
		}
		if (error.code === "commander.helpDisplayed") {
			return { skip: [], color: "auto", help: true };
		}
		throw new ArgumentError(error.message);
	}

	const parsed = program.opts<ParsedOptions>();
	return {
		only: parsed.only === undefined ? undefined : parseIds(parsed.only, "--only"),
		skip: parsed.skip === undefined ? [] : parseIds(parsed.skip, "--skip"),
		color: parsed.color,
		help: false,
	};
}

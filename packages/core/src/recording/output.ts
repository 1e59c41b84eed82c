/**
 * Output
 *
 * Colorable text segments and their rendering to ANSI-capable streams.
 */

/**
 * Terminal colors
 */
export type Color = "default" | "black" | "red" | "green" | "yellow" | "blue" | "magenta" | "cyan" | "white";

export interface Style {
	color: Color;
	bold?: boolean;
}

/**
 * Piece of a line; unstyled segments are written in the terminal's default style
 */
export interface Segment {
	text: string;
	style?: Style;
}

/**
 * Writable target of the reporter (process.stdout, process.stderr, or any
 * object collecting strings)
 */
export interface OutputStream {
	write(chunk: string): unknown;
	isTTY?: boolean;
}

/**
 * Color handling requested on the command line
 */
export type ColorMode = "on" | "off" | "auto";

const COLOR_CODES: Record<Color, number> = {
	black: 30,
	red: 31,
	green: 32,
	yellow: 33,
	blue: 34,
	magenta: 35,
	cyan: 36,
	white: 37,
	default: 39,
};

const RESET = "\x1b[0m";

/**
 * Create a styled segment
 */
export function styled(text: string, color: Color, bold = false): Segment {
	return { text, style: { color, bold } };
}

/**
 * Render segments into a single line of text
 */
export function renderLine(segments: readonly Segment[], useColor: boolean): string {
	if (!useColor) {
		return segments.map((segment) => segment.text).join("");
	}

	let line = "";
	let styledOutput = false;
	for (const segment of segments) {
		if (segment.style) {
			line += `\x1b[${segment.style.bold ? 1 : 0};${COLOR_CODES[segment.style.color]}m`;
			styledOutput = true;
		} else if (styledOutput) {
			line += RESET;
			styledOutput = false;
		}
		line += segment.text;
	}
	return styledOutput ? line + RESET : line;
}

/**
 * Decide whether colors are used for a stream
 */
export function resolveColor(mode: ColorMode, stream: OutputStream): boolean {
	if (mode === "auto") {
		return stream.isTTY === true && process.env.NO_COLOR === undefined;
	}
	return mode === "on";
}

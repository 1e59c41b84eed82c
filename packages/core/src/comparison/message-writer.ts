/**
 * Message Writer
 *
 * Collects the lines of a failure explanation. The reporter decides how the
 * lines are indented and where they are written.
 */

export class MessageWriter {
	private current: string[] = [];
	private completed: string[] = [];

	/**
	 * Append text to the current line
	 */
	write(text: string): this {
		this.current.push(text);
		return this;
	}

	/**
	 * Finish the current line
	 */
	newline(): this {
		this.completed.push(this.current.join(""));
		this.current = [];
		return this;
	}

	/**
	 * Get all lines written so far, including an unfinished last line
	 */
	getLines(): string[] {
		if (this.current.length === 0) {
			return [...this.completed];
		}
		return [...this.completed, this.current.join("")];
	}
}

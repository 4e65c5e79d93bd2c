import { SourceFailureError, SourceInterruptedError } from "./errors.js";
import { resolveWidth, type Terminal } from "./terminal.js";

export type Formatter = (text: string, width: number) => string;

export type StreamTermination =
	| { kind: "completed" }
	| { kind: "interrupted" }
	| { kind: "failed"; error: SourceFailureError };

export type RenderResult = {
	text: string;
	/** Line breaks written while streaming. */
	visualLineCount: number;
	/** Terminal rows cleared before the formatted render. */
	erasedRows: number;
	termination: StreamTermination;
};

const DELIMITER = /[\n \t]/;

/**
 * Word-wrapping writer for a live token stream.
 *
 * A word is written only once a delimiter (or the end of the stream)
 * confirms it is complete, so a line never breaks inside a word. Words wider
 * than the terminal are written unbroken on a line of their own.
 */
export class LineWrapper {
	readonly width: number;
	#write: (chunk: string) => void;
	#text = "";
	#buffer = "";
	#column = 0;
	#pendingSpaces = 0;
	#lineCount = 0;
	#rowCount = 0;

	constructor(width: number, write: (chunk: string) => void) {
		this.width = resolveWidth(width);
		this.#write = write;
	}

	get text(): string {
		return this.#text;
	}

	get column(): number {
		return this.#column;
	}

	get visualLineCount(): number {
		return this.#lineCount;
	}

	/** Rows the written lines occupy once the terminal's own autowrap is counted. */
	get rowCount(): number {
		return this.#rowCount;
	}

	push(token: string): void {
		this.#text += token;
		this.#buffer += token.replace(/\r/g, "");
		let match = DELIMITER.exec(this.#buffer);
		while (match) {
			const word = this.#buffer.slice(0, match.index);
			this.#buffer = this.#buffer.slice(match.index + 1);
			if (word) this.#emitWord(word);
			if (match[0] === "\n") {
				this.#breakLine();
			} else {
				this.#pendingSpaces += 1;
			}
			match = DELIMITER.exec(this.#buffer);
		}
	}

	/** Flush the partial word and terminate the last line. */
	finish(): void {
		if (this.#buffer) {
			this.#emitWord(this.#buffer);
			this.#buffer = "";
		}
		this.#pendingSpaces = 0;
		if (this.#column > 0) this.#breakLine();
	}

	#emitWord(word: string): void {
		// no separator at the start of a line
		let separator = this.#column === 0 ? 0 : this.#pendingSpaces;
		this.#pendingSpaces = 0;
		if (this.#column > 0 && this.#column + separator + word.length > this.width) {
			this.#breakLine();
			separator = 0;
		}
		this.#write(" ".repeat(separator) + word);
		this.#column += separator + word.length;
	}

	#breakLine(): void {
		this.#write("\n");
		this.#lineCount += 1;
		this.#rowCount += Math.max(1, Math.ceil(this.#column / this.width));
		this.#column = 0;
		this.#pendingSpaces = 0;
	}
}

/**
 * Stream tokens to the terminal word-wrapped, then erase what was streamed
 * and write `format(text)` in its place. Finalization runs whatever way the
 * stream ends; an interrupted or failed stream is reported in `termination`
 * rather than thrown.
 */
export async function renderStream(
	source: AsyncIterable<string>,
	terminal: Terminal,
	format: Formatter
): Promise<RenderResult> {
	const width = resolveWidth(terminal.columns());
	const wrapper = new LineWrapper(width, (chunk) => terminal.write(chunk));
	let termination: StreamTermination = { kind: "completed" };

	try {
		for await (const token of source) {
			wrapper.push(token);
		}
	} catch (err) {
		if (err instanceof SourceInterruptedError) {
			termination = { kind: "interrupted" };
		} else if (err instanceof SourceFailureError) {
			termination = { kind: "failed", error: err };
		} else {
			throw err;
		}
	} finally {
		wrapper.finish();
		if (wrapper.visualLineCount > 0) {
			terminal.eraseRows(wrapper.rowCount);
		}
		if (wrapper.text.trim().length > 0) {
			const formatted = format(wrapper.text, width);
			terminal.write(formatted.endsWith("\n") ? formatted : `${formatted}\n`);
		}
	}

	return {
		text: wrapper.text,
		visualLineCount: wrapper.visualLineCount,
		erasedRows: wrapper.rowCount,
		termination,
	};
}

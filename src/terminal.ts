export const FALLBACK_WIDTH = 80;

const CURSOR_UP = "\u001B[1A";
const ERASE_LINE = "\u001B[2K";

/** The slice of a terminal the streaming renderer needs. */
export interface Terminal {
	columns(): number | undefined;
	write(text: string): void;
	/** Erase `rows` rows above the cursor, leaving it at column 0 of the topmost one. */
	eraseRows(rows: number): void;
}

export function resolveWidth(columns: number | undefined): number {
	if (typeof columns !== "number" || !Number.isFinite(columns) || columns < 1) {
		return FALLBACK_WIDTH;
	}
	return Math.floor(columns);
}

export function eraseRowsSequence(rows: number): string {
	if (rows <= 0) return "";
	return `${CURSOR_UP}${ERASE_LINE}`.repeat(rows) + "\r";
}

export function createStdoutTerminal(
	stream: NodeJS.WriteStream = process.stdout
): Terminal {
	return {
		columns: () => stream.columns,
		write: (text) => {
			stream.write(text);
		},
		eraseRows: (rows) => {
			const sequence = eraseRowsSequence(rows);
			if (sequence) stream.write(sequence);
		},
	};
}

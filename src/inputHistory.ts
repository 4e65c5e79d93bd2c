import fs from "node:fs/promises";
import path from "node:path";
import { isMissingFileError } from "./config.js";

export const MAX_HISTORY_ITEMS = 1000;

export async function loadInputHistory(file: string): Promise<string[]> {
	try {
		const raw = await fs.readFile(file, "utf8");
		const data: unknown = JSON.parse(raw);
		if (!Array.isArray(data)) return [];
		return data
			.filter((entry): entry is string => typeof entry === "string" && entry.length > 0)
			.slice(-MAX_HISTORY_ITEMS);
	} catch (err) {
		if (isMissingFileError(err)) return [];
		if (err instanceof SyntaxError) {
			console.warn(`[inputHistory] ignoring malformed ${file}`);
			return [];
		}
		throw err;
	}
}

export async function saveInputHistory(file: string, entries: readonly string[]): Promise<void> {
	await fs.mkdir(path.dirname(file), { recursive: true });
	const json = JSON.stringify(entries.slice(-MAX_HISTORY_ITEMS), null, 2);
	await fs.writeFile(file, json, "utf8");
}

/** Newest entry last; repeats of the previous entry are not recorded. */
export function pushHistory(entries: readonly string[], value: string): string[] {
	if (!value.trim() || entries[entries.length - 1] === value) {
		return [...entries];
	}
	return [...entries, value].slice(-MAX_HISTORY_ITEMS);
}

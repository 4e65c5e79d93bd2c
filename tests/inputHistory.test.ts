import { describe, it, expect, vi, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import {
	MAX_HISTORY_ITEMS,
	loadInputHistory,
	pushHistory,
	saveInputHistory,
} from "../src/inputHistory.js";
import { withTempDir } from "./helpers/tempWorkspace.js";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("input history", () => {
	it("skips blank entries and immediate repeats", () => {
		let entries = pushHistory([], "first");
		entries = pushHistory(entries, "first");
		entries = pushHistory(entries, "   ");
		entries = pushHistory(entries, "second");
		entries = pushHistory(entries, "first");
		expect(entries).toEqual(["first", "second", "first"]);
	});

	it("keeps only the newest entries", () => {
		const full = Array.from({ length: MAX_HISTORY_ITEMS }, (_, i) => `line ${i}`);
		const entries = pushHistory(full, "newest");
		expect(entries).toHaveLength(MAX_HISTORY_ITEMS);
		expect(entries[0]).toBe("line 1");
		expect(entries[entries.length - 1]).toBe("newest");
	});

	it("saves and reloads history, creating the directory", async () => {
		await withTempDir(async (dir) => {
			const file = path.join(dir, "state", "history.json");
			await saveInputHistory(file, ["/models", "hello"]);
			expect(await loadInputHistory(file)).toEqual(["/models", "hello"]);
		});
	});

	it("starts empty when the file is missing or malformed", async () => {
		await withTempDir(async (dir) => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
			expect(await loadInputHistory(path.join(dir, "missing.json"))).toEqual([]);

			const broken = path.join(dir, "broken.json");
			await fs.writeFile(broken, "[", "utf8");
			expect(await loadInputHistory(broken)).toEqual([]);
			expect(warn).toHaveBeenCalledWith(`[inputHistory] ignoring malformed ${broken}`);
		});
	});

	it("ignores entries that are not strings", async () => {
		await withTempDir(async (dir) => {
			const file = path.join(dir, "history.json");
			await fs.writeFile(file, JSON.stringify(["ok", 3, "", null, "fine"]), "utf8");
			expect(await loadInputHistory(file)).toEqual(["ok", "fine"]);
		});
	});
});

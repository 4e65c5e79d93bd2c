import { describe, it, expect } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { RECALL_NOTE } from "../src/conversation.js";
import { stripAnsi } from "../src/markdown.js";
import { formatContextWarning, formatStats, runTurn } from "../src/turn.js";
import { createTestSession, type TestSession } from "./helpers/fakeBackend.js";
import { withTempDir } from "./helpers/tempWorkspace.js";

function withExchange(t: TestSession, question: string, answer: string): void {
	t.session.conversation.addUser(question);
	t.session.conversation.addAssistant(answer);
}

function contents(t: TestSession): string[] {
	return t.session.conversation.messages.map((m) => m.content);
}

describe("formatting", () => {
	it("formats turn stats", () => {
		expect(formatStats({ tokensGenerated: 42, durationSeconds: 4, promptTokens: 310 })).toBe(
			"  42 tokens | 10.5 tok/s | 310 prompt tokens"
		);
		expect(formatStats({ tokensGenerated: 0, durationSeconds: 0, promptTokens: 5 })).toBe(
			"  0 tokens | 5 prompt tokens"
		);
	});

	it("formats the context warning with grouped numbers", () => {
		expect(formatContextWarning(1900, 2048, { ratio: 1900 / 2048, tier: "warning" })).toBe(
			"Warning: context window 93% full (1,900 / 2,048 tokens)"
		);
	});
});

describe("runTurn", () => {
	it("streams the reply, records it and replaces the raw stream", async () => {
		const t = createTestSession();
		t.session.conversation.addUser("Hi");
		t.backend.enqueue({ tokens: ["Hello", " there"], stats: { promptTokens: 100 } });

		const outcome = await runTurn(t.session);

		expect(outcome.kind).toBe("completed");
		expect(contents(t)).toEqual(["Hi", "Hello there"]);
		expect(t.session.conversation.lastStats?.promptTokens).toBe(100);
		expect(t.backend.requests[0]).toEqual({
			model: "llama3.2",
			messages: [{ role: "user", content: "Hi" }],
			options: {},
		});
		expect(stripAnsi(t.terminal.writes[0])).toBe("Assistant:\n");
		expect(t.terminal.writes[t.terminal.writes.length - 1]).toBe("Hello there\n");
		expect(t.printer.lines).toEqual([]);
	});

	it("sends the system prompt and the session's options", async () => {
		const t = createTestSession({ systemPrompt: "Be brief." });
		t.session.options.temperature = 0;
		t.session.conversation.addUser("Hi");
		t.backend.enqueue({ tokens: ["Ok"] });
		await runTurn(t.session);
		expect(t.backend.requests[0].messages[0]).toEqual({ role: "system", content: "Be brief." });
		expect(t.backend.requests[0].options).toEqual({ temperature: 0 });
	});

	it("prints stats when enabled", async () => {
		const t = createTestSession();
		t.session.showStats = true;
		t.session.conversation.addUser("Hi");
		t.backend.enqueue({ tokens: ["a", "b"], stats: { promptTokens: 100 } });
		await runTurn(t.session);
		expect(t.printer.texts("dim")).toEqual(["  2 tokens | 2.0 tok/s | 100 prompt tokens"]);
	});

	it("warns as the context window fills up", async () => {
		const t = createTestSession();
		t.session.conversation.addUser("Hi");
		t.backend.enqueue({ tokens: ["ok"], stats: { promptTokens: 1900 } });
		const outcome = await runTurn(t.session);
		expect(outcome.kind === "completed" && outcome.budget.tier).toBe("warning");
		expect(t.printer.texts("warn")).toEqual([
			"Warning: context window 93% full (1,900 / 2,048 tokens)",
		]);
	});

	it("escalates a nearly full context window", async () => {
		const t = createTestSession();
		t.session.conversation.addUser("Hi");
		t.backend.enqueue({ tokens: ["ok"], stats: { promptTokens: 2000 } });
		await runTurn(t.session);
		expect(t.printer.texts("error")).toEqual([
			"Warning: context window 98% full (2,000 / 2,048 tokens). Older messages may be truncated; /clear or /save and start over.",
		]);
	});

	it("uses a per-model context limit", async () => {
		const t = createTestSession({ ai: { contextLimits: { "llama3.2": 8192 } } });
		t.session.conversation.addUser("Hi");
		t.backend.enqueue({ tokens: ["ok"], stats: { promptTokens: 1900 } });
		const outcome = await runTurn(t.session);
		expect(outcome.kind === "completed" && outcome.budget.tier).toBe("ok");
		expect(t.printer.lines).toEqual([]);
	});

	it("sends a recalled exchange once", async () => {
		const t = createTestSession();
		withExchange(t, "first", "one");
		withExchange(t, "second", "two");
		t.session.recallSet.push(t.session.conversation.recall(2));
		t.session.conversation.addUser("third");
		t.backend.enqueue({ tokens: ["three"] });

		await runTurn(t.session);

		expect(t.backend.requests[0].messages.slice(-4)).toEqual([
			{ role: "user", content: RECALL_NOTE },
			{ role: "user", content: "first" },
			{ role: "assistant", content: "one" },
			{ role: "user", content: "third" },
		]);
		expect(t.session.recallSet).toEqual([]);
		expect(contents(t)).toEqual(["first", "one", "second", "two", "third", "three"]);
	});

	it("keeps partial text of an interrupted reply, marked as such", async () => {
		const t = createTestSession();
		t.session.conversation.addUser("Tell me a story");
		t.backend.enqueue({ tokens: ["Once", " upon"], end: "interrupt" });

		const outcome = await runTurn(t.session);

		expect(outcome.kind).toBe("interrupted");
		expect(contents(t)).toEqual(["Tell me a story", "Once upon [interrupted]"]);
		expect(t.session.conversation.lastStats).toBeUndefined();
		expect(t.printer.texts("info")).toEqual(["Response interrupted."]);
	});

	it("aborts the stream on Ctrl-C", async () => {
		const t = createTestSession();
		t.session.conversation.addUser("Count");
		t.backend.enqueue({ tokens: ["one ", "two ", "three"] });
		t.terminal.onWrite = () => t.interrupt();

		const outcome = await runTurn(t.session);

		expect(outcome.kind).toBe("interrupted");
		expect(contents(t)).toEqual(["Count", "one [interrupted]"]);
	});

	it("drops the question when an interrupted reply produced nothing", async () => {
		const t = createTestSession();
		t.session.conversation.addUser("Hi");
		t.backend.enqueue({ tokens: [], end: "interrupt" });
		await runTurn(t.session);
		expect(contents(t)).toEqual([]);
	});

	it("removes the unanswered question when the server fails", async () => {
		const t = createTestSession();
		withExchange(t, "first", "one");
		t.session.conversation.addUser("second");
		t.backend.enqueue({
			tokens: [],
			end: "fail",
			failure: "Lost connection to Ollama. Is it still running?",
		});

		const outcome = await runTurn(t.session);

		expect(outcome.kind).toBe("failed");
		expect(contents(t)).toEqual(["first", "one"]);
		expect(t.printer.texts("error")).toEqual([
			"Lost connection to Ollama. Is it still running?",
		]);
	});

	it("puts the previous reply back when a retry fails", async () => {
		const t = createTestSession();
		withExchange(t, "What is 2+2?", "5");
		const retried = t.session.conversation.retry();
		t.backend.enqueue({ tokens: [], end: "fail", failure: "Ollama error: 500 boom" });

		await runTurn(t.session, { retried });

		expect(contents(t)).toEqual(["What is 2+2?", "5"]);
		expect(t.session.conversation.lastMessage).toBe(retried);
	});

	it("prints request diagnostics in debug mode", async () => {
		const t = createTestSession();
		t.session.debug = true;
		t.session.conversation.addUser("Hi");
		t.backend.enqueue({ tokens: ["ok"] });
		await runTurn(t.session);
		expect(t.printer.texts("dim")).toEqual(["[debug] llama3.2: 1 messages, options {}"]);
	});

	it("auto-saves a named conversation after each reply", async () => {
		await withTempDir(async (dir) => {
			const t = createTestSession({ conversationsDir: dir, autoSave: true });
			t.session.conversation.name = "daily";
			t.session.conversation.addUser("Hi");
			t.backend.enqueue({ tokens: ["Hello"] });

			await runTurn(t.session);

			const raw: unknown = JSON.parse(
				await fs.readFile(path.join(dir, "daily.json"), "utf8")
			);
			expect(raw).toMatchObject({
				name: "daily",
				model: "llama3.2",
				messages: [
					{ role: "user", content: "Hi" },
					{ role: "assistant", content: "Hello" },
				],
			});
		});
	});

	it("does not auto-save a conversation that was never named", async () => {
		await withTempDir(async (dir) => {
			const t = createTestSession({ conversationsDir: dir, autoSave: true });
			t.session.conversation.addUser("Hi");
			t.backend.enqueue({ tokens: ["Hello"] });
			await runTurn(t.session);
			expect(await fs.readdir(dir)).toEqual([]);
		});
	});
});

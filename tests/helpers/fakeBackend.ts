import type { ReactElement } from "react";
import { render } from "ink-testing-library";
import { normalizeConfig, type AppConfig } from "../../src/config.js";
import { SourceFailureError, SourceInterruptedError } from "../../src/errors.js";
import type { ChatBackend, ChatRequest } from "../../src/llm.js";
import { stripAnsi } from "../../src/markdown.js";
import { createSession, type ChatSession } from "../../src/session.js";
import type { Terminal } from "../../src/terminal.js";
import { BaseTokenSource, type TokenSource, type TurnStats } from "../../src/tokenSource.js";
import type { Printer, ReadLineOptions } from "../../src/ui.js";

export type ScriptedReply = {
	tokens: string[];
	/** How the stream ends after the tokens; defaults to completing. */
	end?: "complete" | "interrupt" | "fail";
	failure?: string;
	stats?: Partial<TurnStats>;
};

/** Replays scripted fragments as a token stream. */
export class ScriptedTokenSource extends BaseTokenSource {
	aborted = false;
	#reply: ScriptedReply;

	constructor(reply: ScriptedReply) {
		super();
		this.#reply = reply;
	}

	abort(): void {
		this.aborted = true;
	}

	protected async *produce(): AsyncGenerator<string, TurnStats> {
		for (const token of this.#reply.tokens) {
			if (this.aborted) throw new SourceInterruptedError();
			yield token;
		}
		if (this.aborted || this.#reply.end === "interrupt") {
			throw new SourceInterruptedError();
		}
		if (this.#reply.end === "fail") {
			throw new SourceFailureError(this.#reply.failure ?? "Lost connection to Ollama.");
		}
		return {
			tokensGenerated: this.#reply.tokens.length,
			durationSeconds: 1,
			promptTokens: 0,
			...this.#reply.stats,
		};
	}
}

/** In-process stand-in for the Ollama server. */
export class FakeBackend implements ChatBackend {
	readonly baseUrl = "http://ollama.test/v1";
	readonly requests: ChatRequest[] = [];
	models: string[] = ["llama3.2", "mistral"];
	available = true;
	#replies: ScriptedReply[] = [];

	enqueue(...replies: ScriptedReply[]): this {
		this.#replies.push(...replies);
		return this;
	}

	async isAvailable(): Promise<boolean> {
		return this.available;
	}

	async listModels(): Promise<string[]> {
		return [...this.models];
	}

	chat(request: ChatRequest): TokenSource {
		this.requests.push(request);
		const reply = this.#replies.shift() ?? { tokens: [] };
		return new ScriptedTokenSource(reply);
	}
}

/** Captures raw writes and erase calls. */
export class FakeTerminal implements Terminal {
	readonly writes: string[] = [];
	readonly erased: number[] = [];
	/** Called after every write, e.g. to press Ctrl-C mid-stream. */
	onWrite: ((text: string) => void) | undefined;
	#width: number | undefined;

	constructor(width: number | undefined = 80) {
		this.#width = width;
	}

	columns(): number | undefined {
		return this.#width;
	}

	write(text: string): void {
		this.writes.push(text);
		this.onWrite?.(text);
	}

	eraseRows(rows: number): void {
		this.erased.push(rows);
	}

	get output(): string {
		return this.writes.join("");
	}
}

export type PrintedLine = { kind: "info" | "warn" | "error" | "dim" | "show"; text: string };

/** Records notices; shown elements are rendered to frames without styling. */
export class RecordingPrinter implements Printer {
	readonly lines: PrintedLine[] = [];

	async show(node: ReactElement): Promise<void> {
		const instance = render(node);
		this.lines.push({ kind: "show", text: stripAnsi(instance.lastFrame() ?? "") });
		instance.unmount();
	}

	async info(text: string): Promise<void> {
		this.lines.push({ kind: "info", text });
	}

	async warn(text: string): Promise<void> {
		this.lines.push({ kind: "warn", text });
	}

	async error(text: string): Promise<void> {
		this.lines.push({ kind: "error", text });
	}

	async dim(text: string): Promise<void> {
		this.lines.push({ kind: "dim", text });
	}

	texts(kind: PrintedLine["kind"]): string[] {
		return this.lines.filter((line) => line.kind === kind).map((line) => line.text);
	}

	get last(): PrintedLine | undefined {
		return this.lines[this.lines.length - 1];
	}
}

export type TestSession = {
	session: ChatSession;
	backend: FakeBackend;
	terminal: FakeTerminal;
	printer: RecordingPrinter;
	/** Lines the prompt will return, in order; `null` is Ctrl-D. */
	input: (string | null)[];
	prompts: ReadLineOptions[];
	interrupt: () => void;
};

export function createTestSession(overrides: Record<string, unknown> = {}): TestSession {
	const backend = new FakeBackend();
	const terminal = new FakeTerminal();
	const printer = new RecordingPrinter();
	const input: (string | null)[] = [];
	const prompts: ReadLineOptions[] = [];
	let onInterrupt: (() => void) | undefined;

	const config: AppConfig = normalizeConfig({
		conversationsDir: "/nonexistent/parley-test/conversations",
		historyFile: "/nonexistent/parley-test/history.json",
		autoSave: false,
		...overrides,
	});

	const session = createSession({
		config,
		configPath: "/nonexistent/parley-test/config.json",
		backend,
		model: "llama3.2",
		io: {
			printer,
			terminal,
			// plain formatter so assertions see the text unchanged
			format: (text) => text.trim(),
			readLine: async (options) => {
				prompts.push(options);
				return input.length > 0 ? (input.shift() ?? null) : null;
			},
			onInterrupt: (handler) => {
				onInterrupt = handler;
				return () => {
					onInterrupt = undefined;
				};
			},
		},
	});

	return {
		session,
		backend,
		terminal,
		printer,
		input,
		prompts,
		interrupt: () => onInterrupt?.(),
	};
}

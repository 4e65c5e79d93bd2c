import type { AppConfig, ModelOptions } from "./config.js";
import { contextLimitFor } from "./contextBudget.js";
import { Conversation, type Exchange } from "./conversation.js";
import type { ChatBackend } from "./llm.js";
import type { Formatter } from "./renderer.js";
import type { Terminal } from "./terminal.js";
import type { Printer, ReadLineOptions } from "./ui.js";

/** Everything the REPL touches besides state: screen, keyboard and signals. */
export type SessionIO = {
	printer: Printer;
	terminal: Terminal;
	format: Formatter;
	readLine: (options: ReadLineOptions) => Promise<string | null>;
	/** Run `handler` on Ctrl-C until the returned function is called. */
	onInterrupt: (handler: () => void) => () => void;
};

/** Mutable state of one interactive chat. */
export type ChatSession = {
	config: AppConfig;
	configPath: string;
	backend: ChatBackend;
	model: string;
	options: ModelOptions;
	conversation: Conversation;
	/** Exchanges sent along with the next request only. */
	recallSet: Exchange[];
	showStats: boolean;
	debug: boolean;
	history: string[];
	io: SessionIO;
};

export type SessionInit = {
	config: AppConfig;
	configPath: string;
	backend: ChatBackend;
	model: string;
	io: SessionIO;
	debug?: boolean;
	history?: string[];
};

export function createSession(init: SessionInit): ChatSession {
	return {
		config: init.config,
		configPath: init.configPath,
		backend: init.backend,
		model: init.model,
		options: { ...init.config.options },
		conversation: new Conversation(init.config.systemPrompt),
		recallSet: [],
		showStats: false,
		debug: init.debug ?? false,
		history: init.history ?? [],
		io: init.io,
	};
}

export function sessionContextLimit(session: ChatSession): number {
	return contextLimitFor(
		session.model,
		session.config.ai.contextLimits,
		session.config.ai.contextLimit
	);
}

export function processInterrupts(handler: () => void): () => void {
	process.on("SIGINT", handler);
	return () => {
		process.off("SIGINT", handler);
	};
}

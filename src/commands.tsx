import React from "react";
import { optionKeyFromLabel, optionLabel, MODEL_OPTION_KEYS, parseOptionValue } from "./config.js";
import type { Message } from "./conversation.js";
import {
	type ConversationDocument,
	type LoadedConversation,
	getConversationPath,
	listConversations,
	loadConversation,
	readConversationFile,
	saveConversation,
} from "./conversationStore.js";
import { describeError, isChatError } from "./errors.js";
import type { ChatSession } from "./session.js";
import {
	CommandHelp,
	ConfigTable,
	ConversationList,
	InfoTable,
	ModelList,
	OptionsTable,
	TranscriptView,
} from "./ui.js";

export type CommandOutcome =
	| { kind: "continue" }
	| { kind: "exit" }
	| { kind: "generate"; retried: Message };

export type ParsedCommand = {
	name: string;
	args: string;
};

// Tab completion candidates.
export const COMMANDS: readonly string[] = [
	"/?",
	"/cat",
	"/clear",
	"/config",
	"/conversations",
	"/exit",
	"/help",
	"/info",
	"/load",
	"/model",
	"/models",
	"/recall",
	"/retry",
	"/save",
	"/set",
	"/stats",
	"/system",
];

export function parseCommand(text: string): ParsedCommand {
	const trimmed = text.trim();
	const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(trimmed);
	return {
		name: (match?.[1] ?? trimmed).toLowerCase(),
		args: match?.[2]?.trim() ?? "",
	};
}

const CONTINUE: CommandOutcome = { kind: "continue" };

type Handler = (session: ChatSession, args: string) => Promise<CommandOutcome>;

const handlers: Record<string, Handler> = {
	"/help": async (session) => {
		await session.io.printer.show(<CommandHelp />);
		return CONTINUE;
	},

	"/exit": async (session) => {
		await session.io.printer.info("Goodbye!");
		return { kind: "exit" };
	},

	"/clear": async (session) => {
		session.conversation.clear();
		session.recallSet = [];
		await session.io.printer.info("Conversation cleared.");
		return CONTINUE;
	},

	"/models": async (session) => {
		const { printer } = session.io;
		let models: string[];
		try {
			models = await session.backend.listModels();
		} catch (err) {
			await printer.error(`Failed to list models: ${describeError(err)}`);
			return CONTINUE;
		}
		if (models.length === 0) {
			await printer.info("No models installed. Pull one with: ollama pull <model>");
		} else {
			await printer.show(<ModelList models={models} current={session.model} />);
		}
		return CONTINUE;
	},

	"/model": async (session, args) => {
		if (!args) {
			await session.io.printer.info(`Current model: ${session.model}`);
		} else {
			session.model = args;
			await session.io.printer.info(`Switched to model: ${args}`);
		}
		return CONTINUE;
	},

	"/system": async (session, args) => {
		const { conversation } = session;
		if (!args) {
			await session.io.printer.info(
				`Current system prompt: ${conversation.systemPrompt ?? "(none)"}`
			);
		} else {
			conversation.setSystemPrompt(args);
			await session.io.printer.info("System prompt set.");
		}
		return CONTINUE;
	},

	"/recall": async (session, args) => {
		const n = Number(args);
		if (!args || !Number.isInteger(n)) {
			await session.io.printer.error("Usage: /recall <n>  (1 = most recent exchange)");
			return CONTINUE;
		}
		const exchange = session.conversation.recall(n);
		session.recallSet.push(exchange);
		await session.io.printer.info(
			`Recalled exchange ${n} into context for the next message.`
		);
		return CONTINUE;
	},

	"/retry": async (session) => {
		const retried = session.conversation.retry();
		return { kind: "generate", retried };
	},

	"/save": async (session, args) => {
		try {
			const file = await saveConversation(
				session.config.conversationsDir,
				session.conversation,
				session.model,
				args || undefined
			);
			await session.io.printer.info(`Conversation saved: ${file}`);
		} catch (err) {
			await session.io.printer.error(`Failed to save: ${describeError(err)}`);
		}
		return CONTINUE;
	},

	"/load": async (session, args) => {
		const { printer } = session.io;
		if (!args) {
			await printer.error("Usage: /load <name>");
			return CONTINUE;
		}
		let loaded: LoadedConversation | undefined;
		try {
			loaded = await loadConversation(session.config.conversationsDir, args);
		} catch (err) {
			await printer.error(`Failed to load: ${describeError(err)}`);
			return CONTINUE;
		}
		if (!loaded) {
			await printer.error(`No saved conversation named '${args}'.`);
			return CONTINUE;
		}
		session.conversation = loaded.conversation;
		session.recallSet = [];
		if (loaded.model) session.model = loaded.model;
		await printer.info(
			`Loaded conversation: ${args} (${loaded.conversation.messages.length} messages, model: ${session.model})`
		);
		return CONTINUE;
	},

	"/conversations": async (session) => {
		const items = await listConversations(session.config.conversationsDir);
		if (items.length === 0) {
			await session.io.printer.info("No saved conversations.");
		} else {
			await session.io.printer.show(<ConversationList items={items} />);
		}
		return CONTINUE;
	},

	"/cat": async (session, args) => {
		const { printer } = session.io;
		if (!args) {
			await printer.error("Usage: /cat <name>");
			return CONTINUE;
		}
		let doc: ConversationDocument | undefined;
		try {
			doc = await readConversationFile(
				getConversationPath(session.config.conversationsDir, args)
			);
		} catch (err) {
			await printer.error(`Failed to read '${args}': ${describeError(err)}`);
			return CONTINUE;
		}
		if (!doc) {
			await printer.error(`No saved conversation named '${args}'.`);
		} else {
			await printer.show(<TranscriptView doc={doc} />);
		}
		return CONTINUE;
	},

	"/set": async (session, args) => {
		const { printer } = session.io;
		if (!args) {
			await printer.show(<OptionsTable options={session.options} />);
			return CONTINUE;
		}
		const [label = "", ...rest] = args.split(/\s+/);
		const key = optionKeyFromLabel(label);
		if (!key) {
			const known = MODEL_OPTION_KEYS.map(optionLabel).join(", ");
			await printer.error(`Unknown option: ${label}. Available: ${known}`);
			return CONTINUE;
		}
		if (rest.length === 0) {
			await printer.error(`Usage: /set ${optionLabel(key)} <value|default>`);
			return CONTINUE;
		}
		const value = parseOptionValue(key, rest.join(" "));
		if (value instanceof Error) {
			await printer.error(value.message);
		} else if (value === undefined) {
			delete session.options[key];
			await printer.info(`${optionLabel(key)} reset to default.`);
		} else {
			session.options[key] = value;
			await printer.info(`${optionLabel(key)} set to ${value}.`);
		}
		return CONTINUE;
	},

	"/info": async (session) => {
		await session.io.printer.show(<InfoTable info={session.conversation.info()} />);
		return CONTINUE;
	},

	"/stats": async (session) => {
		session.showStats = !session.showStats;
		await session.io.printer.info(`Stats display: ${session.showStats ? "on" : "off"}`);
		return CONTINUE;
	},

	"/config": async (session) => {
		await session.io.printer.show(
			<ConfigTable
				config={session.config}
				model={session.model}
				options={session.options}
				configPath={session.configPath}
			/>
		);
		return CONTINUE;
	},
};

handlers["/?"] = handlers["/help"];

/**
 * Run one slash command. Chat errors (an out-of-range recall, a retry with
 * nothing to retry) are reported and the session carries on.
 */
export async function handleCommand(
	session: ChatSession,
	text: string
): Promise<CommandOutcome> {
	const { name, args } = parseCommand(text);
	const handler = handlers[name];
	if (!handler) {
		await session.io.printer.error(
			`Unknown command: ${name}. Type /help for available commands.`
		);
		return CONTINUE;
	}
	try {
		return await handler(session, args);
	} catch (err) {
		if (!isChatError(err)) throw err;
		await session.io.printer.error(err.message);
		return CONTINUE;
	}
}

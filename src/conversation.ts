import { InvalidStateError, OutOfRangeError } from "./errors.js";
import type { TurnStats } from "./tokenSource.js";

export type Role = "system" | "user" | "assistant";

export type Message = Readonly<{
	role: "user" | "assistant";
	content: string;
	/** Unset for messages loaded from a file that had no readable timestamp. */
	timestamp: Date | undefined;
}>;

export type RequestMessage = {
	role: Role;
	content: string;
};

export type Exchange = {
	user: Message;
	assistant: Message;
};

/** Serialized form of a message, as stored on disk. */
export type ConversationRecord = {
	role: Role;
	content: string;
	timestamp: string;
};

export type ConversationInfo = {
	messages: number;
	userMessages: number;
	assistantMessages: number;
	words: number;
	characters: number;
	/** characters / 4, not a model count */
	estimatedTokens: number;
	/** Prompt size the server reported for the latest turn. */
	promptTokens?: number;
};

export const RECALL_NOTE =
	"[The following exchange is recalled from earlier in the conversation for context]";

const CHARS_PER_TOKEN = 4;

export class Conversation {
	#messages: Message[] = [];
	systemPrompt: string | undefined;
	name: string | undefined;
	lastStats: TurnStats | undefined;

	constructor(systemPrompt?: string) {
		this.systemPrompt = normalizePrompt(systemPrompt);
	}

	get messages(): readonly Message[] {
		return this.#messages;
	}

	get lastMessage(): Message | undefined {
		return this.#messages[this.#messages.length - 1];
	}

	addUser(text: string, timestamp = new Date()): Message {
		return this.#append({ role: "user", content: text, timestamp });
	}

	addAssistant(text: string, stats?: TurnStats, timestamp = new Date()): Message {
		const message = this.#append({ role: "assistant", content: text, timestamp });
		if (stats) this.lastStats = stats;
		return message;
	}

	setSystemPrompt(text: string | undefined): void {
		this.systemPrompt = normalizePrompt(text);
	}

	clear(): void {
		this.#messages = [];
		this.lastStats = undefined;
	}

	/**
	 * Remove the latest assistant reply so it can be generated again.
	 * The user message it answered stays in place.
	 */
	retry(): Message {
		const last = this.lastMessage;
		if (!last) {
			throw new InvalidStateError("Nothing to retry: the conversation is empty.");
		}
		if (last.role !== "assistant") {
			throw new InvalidStateError(
				"Nothing to retry: the last message is not a response."
			);
		}
		const previous = this.#messages[this.#messages.length - 2];
		if (previous?.role !== "user") {
			throw new InvalidStateError(
				"Cannot retry: the last response does not follow a user message."
			);
		}
		this.#messages.pop();
		return last;
	}

	/** Put back a reply removed by `retry` when its regeneration produced nothing. */
	reinstate(message: Message): void {
		if (message.role !== "assistant" || this.lastMessage?.role !== "user") {
			throw new InvalidStateError("Only a response to the last message can be reinstated.");
		}
		this.#messages.push(message);
	}

	/** Drop the trailing user message of a turn that never got an answer. */
	discardPendingUser(): Message {
		const last = this.lastMessage;
		if (last?.role !== "user") {
			throw new InvalidStateError("There is no unanswered message to discard.");
		}
		this.#messages.pop();
		return last;
	}

	/**
	 * Completed (user, assistant) exchanges, oldest first. A trailing user
	 * message still waiting for its answer is not part of any exchange.
	 */
	exchanges(): Exchange[] {
		const result: Exchange[] = [];
		const messages = this.#messages;
		for (let i = 0; i < messages.length; i += 2) {
			const user = messages[i];
			const assistant = messages[i + 1];
			if (user.role !== "user") {
				throw new InvalidStateError(
					`History is out of order: message ${i + 1} should be from the user.`
				);
			}
			if (!assistant) break;
			if (assistant.role !== "assistant") {
				throw new InvalidStateError(
					`History is out of order: message ${i + 2} should be a response.`
				);
			}
			result.push({ user, assistant });
		}
		return result;
	}

	/** The `n`-th most recent exchange, counting from 1. History is not modified. */
	recall(n: number): Exchange {
		const exchanges = this.exchanges();
		if (!Number.isInteger(n) || n < 1 || n > exchanges.length) {
			const range = exchanges.length === 0 ? "none available" : `1-${exchanges.length}`;
			throw new OutOfRangeError(`Exchange ${n} is out of range (${range}).`);
		}
		return exchanges[exchanges.length - n];
	}

	/**
	 * Messages for one request: system prompt first, then stored history. A
	 * recalled block goes after history but ahead of the message awaiting an
	 * answer, and is never stored.
	 */
	toRequest(recallSet: readonly Exchange[] = []): RequestMessage[] {
		const request: RequestMessage[] = [];
		if (this.systemPrompt) {
			request.push({ role: "system", content: this.systemPrompt });
		}
		const history = this.#messages.map(toRequestMessage);
		const pending =
			this.lastMessage?.role === "user" ? history.pop() : undefined;
		request.push(...history);
		if (recallSet.length > 0) {
			request.push({ role: "user", content: RECALL_NOTE });
			for (const exchange of recallSet) {
				request.push(toRequestMessage(exchange.user));
				request.push(toRequestMessage(exchange.assistant));
			}
		}
		if (pending) request.push(pending);
		return request;
	}

	info(): ConversationInfo {
		const messages = this.#messages;
		const userMessages = messages.filter((m) => m.role === "user").length;
		const characters = messages.reduce((sum, m) => sum + m.content.length, 0);
		const words = messages.reduce((sum, m) => sum + countWords(m.content), 0);
		const info: ConversationInfo = {
			messages: messages.length,
			userMessages,
			assistantMessages: messages.length - userMessages,
			words,
			characters,
			estimatedTokens: Math.ceil(characters / CHARS_PER_TOKEN),
		};
		if (this.lastStats) info.promptTokens = this.lastStats.promptTokens;
		return info;
	}

	toRecords(): ConversationRecord[] {
		return this.#messages.map((m) => ({
			role: m.role,
			content: m.content,
			timestamp: m.timestamp?.toISOString() ?? "",
		}));
	}

	/**
	 * Rebuild a conversation from stored records. A `system` record only
	 * supplies the system prompt when none is given.
	 */
	static fromRecords(
		records: readonly ConversationRecord[],
		systemPrompt?: string,
		name?: string
	): Conversation {
		const conversation = new Conversation(systemPrompt);
		conversation.name = name;
		for (const record of records) {
			if (record.role === "system") {
				conversation.systemPrompt ??= normalizePrompt(record.content);
				continue;
			}
			conversation.#append({
				role: record.role,
				content: record.content,
				timestamp: parseTimestamp(record.timestamp),
			});
		}
		return conversation;
	}

	#append(message: Message): Message {
		const frozen = Object.freeze({ ...message });
		this.#messages.push(frozen);
		return frozen;
	}
}

function toRequestMessage(message: Message): RequestMessage {
	return { role: message.role, content: message.content };
}

function normalizePrompt(text: string | undefined): string | undefined {
	return text && text.trim().length > 0 ? text : undefined;
}

function countWords(text: string): number {
	const trimmed = text.trim();
	return trimmed ? trimmed.split(/\s+/).length : 0;
}

function parseTimestamp(value: string): Date | undefined {
	if (!value) return undefined;
	const date = new Date(value);
	return Number.isNaN(date.getTime()) ? undefined : date;
}

import fs from "node:fs/promises";
import path from "node:path";
import { isMissingFileError } from "./config.js";
import { Conversation, type ConversationRecord, type Role } from "./conversation.js";

export type ConversationDocument = {
	name: string;
	model: string;
	systemPrompt: string;
	savedAt: string;
	messages: ConversationRecord[];
};

export type ConversationSummary = {
	name: string;
	file: string;
	model: string;
	savedAt: string;
	messageCount: number;
};

export type LoadedConversation = {
	conversation: Conversation;
	model: string;
};

const CONVERSATION_EXT = ".json";

export function createConversationName(date = new Date()): string {
	const pad = (value: number) => value.toString().padStart(2, "0");
	const year = date.getFullYear();
	const month = pad(date.getMonth() + 1);
	const day = pad(date.getDate());
	const hours = pad(date.getHours());
	const mins = pad(date.getMinutes());
	const secs = pad(date.getSeconds());
	return `${year}${month}${day}_${hours}${mins}${secs}`;
}

export function sanitizeName(name: string): string {
	return name.replace(/[^a-zA-Z0-9_-]/g, "_");
}

export function getConversationPath(dir: string, name: string): string {
	return path.resolve(dir, `${sanitizeName(name)}${CONVERSATION_EXT}`);
}

export function toDocument(
	conversation: Conversation,
	name: string,
	model: string,
	savedAt = new Date()
): ConversationDocument {
	return {
		name,
		model,
		systemPrompt: conversation.systemPrompt ?? "",
		savedAt: savedAt.toISOString(),
		messages: conversation.toRecords(),
	};
}

/**
 * Write the whole conversation under `name` (a timestamp when omitted) and
 * remember that name on the conversation. Returns the file written.
 */
export async function saveConversation(
	dir: string,
	conversation: Conversation,
	model: string,
	name?: string
): Promise<string> {
	const chosen = sanitizeName(
		name?.trim() || conversation.name || createConversationName()
	);
	await fs.mkdir(dir, { recursive: true });
	const file = getConversationPath(dir, chosen);
	const json = JSON.stringify(toDocument(conversation, chosen, model), null, 2);
	await fs.writeFile(file, json, "utf8");
	conversation.name = chosen;
	return file;
}

export async function readConversationFile(
	file: string
): Promise<ConversationDocument | undefined> {
	try {
		const raw = await fs.readFile(file, "utf8");
		const parsed: unknown = JSON.parse(raw);
		return normalizeDocument(parsed, stripExtension(path.basename(file)));
	} catch (err) {
		if (isMissingFileError(err)) {
			return undefined;
		}
		throw err;
	}
}

export async function loadConversation(
	dir: string,
	name: string
): Promise<LoadedConversation | undefined> {
	const doc = await readConversationFile(getConversationPath(dir, name));
	if (!doc) return undefined;
	return {
		conversation: Conversation.fromRecords(
			doc.messages,
			doc.systemPrompt,
			sanitizeName(name)
		),
		model: doc.model,
	};
}

/** Saved conversations, most recently written first. */
export async function listConversations(dir: string): Promise<ConversationSummary[]> {
	let entries: string[];
	try {
		entries = await fs.readdir(dir);
	} catch (err) {
		if (isMissingFileError(err)) {
			return [];
		}
		throw err;
	}

	const summaries: { summary: ConversationSummary; mtime: number }[] = [];
	await Promise.all(
		entries.map(async (entry) => {
			if (!entry.endsWith(CONVERSATION_EXT)) return;
			const file = path.join(dir, entry);
			try {
				const [doc, stat] = await Promise.all([
					readConversationFile(file),
					fs.stat(file),
				]);
				if (!doc) return;
				summaries.push({
					summary: {
						name: stripExtension(entry),
						file,
						model: doc.model,
						savedAt: doc.savedAt,
						messageCount: doc.messages.length,
					},
					mtime: stat.mtimeMs,
				});
			} catch (err) {
				console.warn(`[conversationStore] skipping unreadable ${file}:`, err);
			}
		})
	);

	return summaries
		.sort((a, b) => b.mtime - a.mtime || a.summary.name.localeCompare(b.summary.name))
		.map((entry) => entry.summary);
}

/**
 * Accepts both this tool's documents and the older snake_case layout
 * (`system_prompt`, messages without timestamps).
 */
export function normalizeDocument(raw: unknown, fallbackName: string): ConversationDocument {
	const data = asRecord(raw);
	const systemPrompt = data["systemPrompt"] ?? data["system_prompt"];
	const savedAt = typeof data["savedAt"] === "string" ? data["savedAt"] : "";
	return {
		name:
			typeof data["name"] === "string" && data["name"].trim().length > 0
				? sanitizeName(data["name"].trim())
				: fallbackName,
		model: typeof data["model"] === "string" ? data["model"] : "",
		systemPrompt: typeof systemPrompt === "string" ? systemPrompt : "",
		savedAt: sanitizeIsoTimestamp(savedAt),
		messages: normalizeRecords(data["messages"]),
	};
}

function normalizeRecords(raw: unknown): ConversationRecord[] {
	if (!Array.isArray(raw)) return [];
	const records: ConversationRecord[] = [];
	for (const item of raw) {
		const entry = asRecord(item);
		const role = toRole(entry["role"]);
		const content = entry["content"];
		if (!role || typeof content !== "string") continue;
		const timestamp = entry["timestamp"];
		records.push({
			role,
			content,
			// absent or unreadable timestamps stay empty rather than invented
			timestamp: typeof timestamp === "string" ? toIsoOrEmpty(timestamp) : "",
		});
	}
	return records;
}

function toRole(value: unknown): Role | undefined {
	return value === "user" || value === "assistant" || value === "system"
		? value
		: undefined;
}

function asRecord(value: unknown): Record<string, unknown> {
	if (value && typeof value === "object" && !Array.isArray(value)) {
		return Object.fromEntries(Object.entries(value));
	}
	return {};
}

function sanitizeIsoTimestamp(value: string): string {
	const date = new Date(value);
	if (Number.isNaN(date.getTime())) {
		return new Date().toISOString();
	}
	return date.toISOString();
}

function toIsoOrEmpty(value: string): string {
	const date = new Date(value);
	return Number.isNaN(date.getTime()) ? "" : date.toISOString();
}

function stripExtension(name: string): string {
	return name.endsWith(CONVERSATION_EXT)
		? name.slice(0, -CONVERSATION_EXT.length)
		: name;
}

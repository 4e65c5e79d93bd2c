import type { ConversationDocument } from "./conversationStore.js";

export type TranscriptOptions = {
	header?: boolean;
};

const RULE = "-".repeat(60);

export function formatTimestamp(iso: string): string {
	if (!iso) return "";
	const date = new Date(iso);
	if (Number.isNaN(date.getTime())) return "";
	const pad = (value: number) => value.toString().padStart(2, "0");
	return (
		`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
		`${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
	);
}

export function speakerLabel(role: string): string {
	if (role === "user") return "You";
	if (role === "assistant") return "Assistant";
	return role.charAt(0).toUpperCase() + role.slice(1);
}

/** Plain-text transcript of a saved conversation. */
export function conversationToText(
	doc: Pick<ConversationDocument, "model" | "systemPrompt" | "messages">,
	{ header = true }: TranscriptOptions = {}
): string {
	const lines: string[] = [];

	if (header) {
		if (doc.model) lines.push(`Model: ${doc.model}`);
		if (doc.systemPrompt) lines.push(`System prompt: ${doc.systemPrompt}`);
		if (lines.length > 0) lines.push("", RULE, "");
	}

	doc.messages.forEach((msg, index) => {
		const stamp = formatTimestamp(msg.timestamp);
		const suffix = stamp ? ` (${stamp})` : "";
		lines.push(`${speakerLabel(msg.role)}${suffix}:`);
		lines.push(msg.content);
		if (index < doc.messages.length - 1) lines.push("");
	});

	return `${lines.join("\n")}\n`;
}

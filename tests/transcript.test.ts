import { describe, it, expect } from "vitest";
import { conversationToText, formatTimestamp, speakerLabel } from "../src/transcript.js";

// local-time instants, so the expected text does not depend on the machine's zone
const HI_AT = new Date(2024, 2, 1, 9, 5, 7).toISOString();
const HELLO_AT = new Date(2024, 2, 1, 9, 5, 9).toISOString();

const doc = {
	model: "llama3.2",
	systemPrompt: "Be brief.",
	messages: [
		{ role: "user" as const, content: "Hi", timestamp: HI_AT },
		{ role: "assistant" as const, content: "Hello!\nHow can I help?", timestamp: HELLO_AT },
	],
};

describe("transcript export", () => {
	it("writes a header, a rule and one block per message", () => {
		expect(conversationToText(doc)).toBe(
			[
				"Model: llama3.2",
				"System prompt: Be brief.",
				"",
				"-".repeat(60),
				"",
				"You (2024-03-01 09:05:07):",
				"Hi",
				"",
				"Assistant (2024-03-01 09:05:09):",
				"Hello!",
				"How can I help?",
				"",
			].join("\n")
		);
	});

	it("can leave the header out", () => {
		const text = conversationToText(doc, { header: false });
		expect(text.startsWith("You (2024-03-01 09:05:07):\nHi\n")).toBe(true);
	});

	it("omits the timestamp suffix when a message has none", () => {
		const text = conversationToText({
			model: "",
			systemPrompt: "",
			messages: [{ role: "user", content: "Hi", timestamp: "" }],
		});
		expect(text).toBe("You:\nHi\n");
	});

	it("formats timestamps and labels speakers", () => {
		expect(formatTimestamp("garbage")).toBe("");
		expect(formatTimestamp("")).toBe("");
		expect(speakerLabel("user")).toBe("You");
		expect(speakerLabel("assistant")).toBe("Assistant");
		expect(speakerLabel("system")).toBe("System");
	});
});

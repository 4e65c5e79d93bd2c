import { COMMANDS, handleCommand } from "./commands.js";
import { listConversations } from "./conversationStore.js";
import { describeError } from "./errors.js";
import { pushHistory, saveInputHistory } from "./inputHistory.js";
import { completeLine } from "./prompt.js";
import type { ChatSession } from "./session.js";
import { runTurn } from "./turn.js";
import type { ReadLineOptions } from "./ui.js";

export const PROMPT = ">>> ";
export const CONTINUATION_PROMPT = "... ";
export const PLACEHOLDER = "Send a message (/? for help)";
export const MULTILINE_FENCE = '"""';

/**
 * Collect lines until a closing `"""`. Resolves `null` on end of input, so
 * the caller can exit the same way as from the main prompt.
 */
export async function readMultiline(
	readLine: (options: ReadLineOptions) => Promise<string | null>
): Promise<string | null> {
	const lines: string[] = [];
	for (;;) {
		const line = await readLine({ prefix: CONTINUATION_PROMPT });
		if (line === null) return null;
		if (line.trim() === MULTILINE_FENCE) return lines.join("\n");
		lines.push(line);
	}
}

async function conversationNames(session: ChatSession): Promise<string[]> {
	try {
		const items = await listConversations(session.config.conversationsDir);
		return items.map((item) => item.name);
	} catch (err) {
		if (session.debug) console.warn("[repl] cannot list conversations:", err);
		return [];
	}
}

/**
 * One interactive session: read, dispatch, repeat. Returns on /exit or
 * Ctrl-D; input history is written back either way.
 */
export async function runRepl(session: ChatSession): Promise<void> {
	const { io } = session;
	try {
		for (;;) {
			const names = await conversationNames(session);
			const line = await io.readLine({
				prefix: PROMPT,
				placeholder: PLACEHOLDER,
				history: session.history,
				complete: (value) => completeLine(value, COMMANDS, names),
				debug: session.debug,
			});
			if (line === null) break;

			let text = line.trim();
			if (!text) continue;
			session.history = pushHistory(session.history, line);

			if (text === MULTILINE_FENCE) {
				const block = await readMultiline(io.readLine);
				if (block === null) break;
				if (!block.trim()) continue;
				text = block;
			}

			try {
				if (text.startsWith("/")) {
					const outcome = await handleCommand(session, text);
					if (outcome.kind === "exit") break;
					if (outcome.kind === "generate") {
						await runTurn(session, { retried: outcome.retried });
					}
					continue;
				}
				session.conversation.addUser(text);
				await runTurn(session);
			} catch (err) {
				// keep the session alive; the prompt comes back
				await io.printer.error(`Unexpected error: ${describeError(err)}`);
				if (session.debug) console.error("[repl]", err);
			}
		}
	} finally {
		await saveInputHistory(session.config.historyFile, session.history).catch((err) => {
			console.warn(`[repl] could not save input history: ${describeError(err)}`);
		});
	}
}

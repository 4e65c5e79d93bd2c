import chalk from "chalk";
import { classify, type BudgetStatus } from "./contextBudget.js";
import type { Message } from "./conversation.js";
import { saveConversation } from "./conversationStore.js";
import { describeError, type ChatError } from "./errors.js";
import { renderStream, type RenderResult } from "./renderer.js";
import { sessionContextLimit, type ChatSession } from "./session.js";
import { tokensPerSecond, type TurnStats } from "./tokenSource.js";
import { formatNumber } from "./ui.js";

export type TurnOutcome =
	| { kind: "completed"; message: Message; stats: TurnStats; budget: BudgetStatus }
	| { kind: "interrupted"; message?: Message }
	| { kind: "failed"; error: ChatError };

export type TurnOptions = {
	/** Reply removed by /retry; it comes back if the new one never arrives. */
	retried?: Message;
};

export const INTERRUPTED_MARKER = " [interrupted]";

export function formatStats(stats: TurnStats): string {
	const parts = [`${stats.tokensGenerated} tokens`];
	const rate = tokensPerSecond(stats);
	if (rate !== undefined) parts.push(`${rate.toFixed(1)} tok/s`);
	parts.push(`${stats.promptTokens} prompt tokens`);
	return `  ${parts.join(" | ")}`;
}

export function formatContextWarning(
	promptTokens: number,
	contextLimit: number,
	status: BudgetStatus
): string {
	const pct = Math.round(status.ratio * 100);
	const base = `Warning: context window ${pct}% full (${formatNumber(promptTokens)} / ${formatNumber(contextLimit)} tokens)`;
	return status.tier === "critical"
		? `${base}. Older messages may be truncated; /clear or /save and start over.`
		: base;
}

/**
 * Generate the reply to the message at the end of the conversation.
 *
 * Streams it to the terminal, then records it. A failed turn leaves history
 * as it was before the user typed; an interrupted one keeps whatever text
 * arrived, marked as interrupted.
 */
export async function runTurn(
	session: ChatSession,
	{ retried }: TurnOptions = {}
): Promise<TurnOutcome> {
	const { conversation, io } = session;
	const messages = conversation.toRequest(session.recallSet);
	// a recall applies to one request only
	session.recallSet = [];

	if (session.debug) {
		await io.printer.dim(
			`[debug] ${session.model}: ${messages.length} messages, options ${JSON.stringify(session.options)}`
		);
	}

	io.terminal.write(`${chalk.bold.blue("Assistant:")}\n`);
	const source = session.backend.chat({
		model: session.model,
		messages,
		options: session.options,
	});
	const release = io.onInterrupt(() => source.abort());
	let result: RenderResult;
	try {
		result = await renderStream(source, io.terminal, io.format);
	} finally {
		release();
	}

	const restore = () => {
		if (retried) conversation.reinstate(retried);
		else conversation.discardPendingUser();
	};

	switch (result.termination.kind) {
		case "completed": {
			const stats = source.stats();
			const message = conversation.addAssistant(result.text, stats);
			const limit = sessionContextLimit(session);
			const budget = classify(stats.promptTokens, limit);
			if (session.showStats) await io.printer.dim(formatStats(stats));
			if (budget.tier !== "ok") {
				const warning = formatContextWarning(stats.promptTokens, limit, budget);
				await (budget.tier === "critical"
					? io.printer.error(warning)
					: io.printer.warn(warning));
			}
			await autoSave(session);
			return { kind: "completed", message, stats, budget };
		}
		case "interrupted": {
			await io.printer.info("Response interrupted.");
			if (result.text.trim().length === 0) {
				restore();
				return { kind: "interrupted" };
			}
			const message = conversation.addAssistant(result.text.trimEnd() + INTERRUPTED_MARKER);
			return { kind: "interrupted", message };
		}
		case "failed": {
			const { error } = result.termination;
			await io.printer.error(error.message);
			restore();
			return { kind: "failed", error };
		}
	}
}

async function autoSave(session: ChatSession): Promise<void> {
	const { conversation, config } = session;
	if (!config.autoSave || !conversation.name) return;
	try {
		await saveConversation(config.conversationsDir, conversation, session.model);
	} catch (err) {
		await session.io.printer.error(`Auto-save failed: ${describeError(err)}`);
	}
}

import React from "react";
import { Box, Text, render } from "ink";
import {
	SERVER_DEFAULT_OPTIONS,
	MODEL_OPTION_KEYS,
	optionLabel,
	type AppConfig,
	type ModelOptions,
} from "./config.js";
import type { ConversationInfo, ConversationRecord } from "./conversation.js";
import type { ConversationDocument, ConversationSummary } from "./conversationStore.js";
import { Prompt, type PromptProps } from "./prompt.js";
import { formatTimestamp } from "./transcript.js";

export type NoticeKind = "info" | "warning" | "error" | "dim";

const NOTICE_COLORS: Record<NoticeKind, string> = {
	info: "cyan",
	warning: "yellow",
	error: "red",
	dim: "gray",
};

export const Notice = ({ kind, children }: { kind: NoticeKind; children: string }) => (
	<Text color={NOTICE_COLORS[kind]} bold={kind === "error"}>
		{children}
	</Text>
);

export const Welcome = ({ model, baseUrl }: { model: string; baseUrl: string }) => (
	<Box flexDirection="column" marginY={1}>
		<Text color="cyan">
			<Text bold>parley</Text> (Ollama at {baseUrl})
		</Text>
		<Text>
			Model: <Text bold>{model}</Text>
		</Text>
		<Text>
			Type <Text bold>/?</Text> for commands, <Text bold>/exit</Text> to quit.
		</Text>
	</Box>
);

export type TableProps = {
	title?: string;
	headers: readonly string[];
	rows: readonly (readonly string[])[];
};

/** Column-aligned table; the last column is left unpadded. */
export const Table = ({ title, headers, rows }: TableProps) => {
	const widths = headers.map((header, col) =>
		Math.max(header.length, ...rows.map((row) => (row[col] ?? "").length))
	);
	const line = (cells: readonly string[]) =>
		cells
			.map((cell, col) => (col === cells.length - 1 ? cell : cell.padEnd(widths[col])))
			.join("  ");
	return (
		<Box flexDirection="column">
			{title ? <Text bold>{title}</Text> : null}
			<Text bold color="cyan">
				{line(headers)}
			</Text>
			{rows.map((row, idx) => (
				<Text key={idx}>{line(row)}</Text>
			))}
		</Box>
	);
};

export const COMMAND_HELP: readonly (readonly [string, string])[] = [
	["/help, /?", "Show this help message"],
	["/exit", "Quit the application"],
	["/cat <name>", "Print a saved conversation"],
	["/clear", "Clear conversation history"],
	["/models", "List available models"],
	["/model [name]", "Show or switch the model"],
	["/system [prompt]", "Show or set the system prompt"],
	["/recall <n>", "Recall exchange n (1 = latest, as numbered by /cat) into the next request"],
	["/retry", "Regenerate the last response"],
	["/save [name]", "Save conversation (default: timestamp)"],
	["/load <name>", "Load a saved conversation"],
	["/conversations", "List saved conversations"],
	["/set", "Show model options (seed, temperature, top_p)"],
	["/set <key> <value>", "Set a model option ('default' to reset)"],
	["/info", "Show conversation statistics"],
	["/stats", "Toggle token stats after each response"],
	["/config", "Show current configuration"],
	['"""', "Start or end multiline input"],
];

export const CommandHelp = () => (
	<Table title="Commands" headers={["Command", "Description"]} rows={COMMAND_HELP} />
);

export const ModelList = ({ models, current }: { models: readonly string[]; current: string }) => (
	<Table
		title="Available Models"
		headers={["Model", "Active"]}
		rows={models.map((model) => [model, model === current ? "*" : ""])}
	/>
);

export const ConversationList = ({ items }: { items: readonly ConversationSummary[] }) => (
	<Table
		title="Saved Conversations"
		headers={["Name", "Model", "Messages", "Saved"]}
		rows={items.map((item) => [
			item.name,
			item.model || "-",
			String(item.messageCount),
			formatTimestamp(item.savedAt),
		])}
	/>
);

function optionRows(options: ModelOptions): string[][] {
	return MODEL_OPTION_KEYS.map((key) => {
		const value = options[key];
		return [
			optionLabel(key),
			value === undefined ? `${SERVER_DEFAULT_OPTIONS[key]} (default)` : String(value),
		];
	});
}

export const OptionsTable = ({ options }: { options: ModelOptions }) => (
	<Table title="Model Options" headers={["Option", "Value"]} rows={optionRows(options)} />
);

export type ConfigTableProps = {
	config: AppConfig;
	model: string;
	options: ModelOptions;
	configPath: string;
};

export const ConfigTable = ({ config, model, options, configPath }: ConfigTableProps) => (
	<Table
		title="Configuration"
		headers={["Setting", "Value"]}
		rows={[
			["config file", configPath],
			["model", model || "(none)"],
			["ai.model", config.ai.model || "(first available)"],
			["ai.baseUrl", config.ai.baseUrl],
			["ai.contextLimit", formatNumber(config.ai.contextLimits[model] ?? config.ai.contextLimit)],
			["systemPrompt", config.systemPrompt || "(none)"],
			["conversationsDir", config.conversationsDir],
			["historyFile", config.historyFile],
			["autoSave", config.autoSave ? "on" : "off"],
			...optionRows(options),
		]}
	/>
);

export const InfoTable = ({ info }: { info: ConversationInfo }) => (
	<Table
		title="Conversation Info"
		headers={["Statistic", "Value"]}
		rows={[
			[
				"Messages",
				`${info.messages} (${info.userMessages} you, ${info.assistantMessages} AI)`,
			],
			["Words", formatNumber(info.words)],
			["Characters", formatNumber(info.characters)],
			["Estimated tokens", `~${formatNumber(info.estimatedTokens)}`],
			...(info.promptTokens === undefined
				? []
				: [["Prompt tokens", formatNumber(info.promptTokens)]]),
		]}
	/>
);

/**
 * Label per message: the number `/recall` takes for its exchange, so the
 * newest answered exchange is 1. An unanswered trailing message gets none.
 */
export function exchangeLabels(
	messages: readonly ConversationRecord[]
): (number | undefined)[] {
	const answered = messages.filter(
		(msg, idx) => msg.role === "user" && messages[idx + 1]?.role === "assistant"
	).length;
	let seen = 0;
	let current: number | undefined;
	return messages.map((msg, idx) => {
		if (msg.role === "user") {
			seen += 1;
			current =
				messages[idx + 1]?.role === "assistant" ? answered - seen + 1 : undefined;
		}
		return current;
	});
}

/** A saved conversation as printed by /cat. */
export const TranscriptView = ({ doc }: { doc: ConversationDocument }) => {
	const labels = exchangeLabels(doc.messages);
	return (
		<Box flexDirection="column" marginTop={1}>
			<Text>
				<Text bold>Conversation:</Text> {doc.name}
			</Text>
			{doc.model ? (
				<Text>
					<Text bold>Model:</Text> {doc.model}
				</Text>
			) : null}
			{doc.systemPrompt ? (
				<Text>
					<Text bold>System prompt:</Text> {doc.systemPrompt}
				</Text>
			) : null}
			{doc.messages.length === 0 ? (
				<Box marginTop={1}>
					<Text dimColor>  (no messages)</Text>
				</Box>
			) : (
				doc.messages.map((msg, idx) => {
					const stamp = formatTimestamp(msg.timestamp);
					const isUser = msg.role === "user";
					const label = labels[idx];
					return (
						<Box key={idx} flexDirection="column" marginTop={1}>
							<Text>
								{label === undefined ? null : <Text dimColor>[{label}] </Text>}
								<Text bold color={isUser ? "green" : "blue"}>
									{isUser ? "You:" : "Assistant:"}
								</Text>
								{stamp ? <Text dimColor>  {stamp}</Text> : null}
							</Text>
							<Text>{msg.content}</Text>
						</Box>
					);
				})
			)}
		</Box>
	);
};

export function formatNumber(value: number): string {
	return value.toLocaleString("en-US");
}

/** Where command and turn output goes. */
export interface Printer {
	show(node: React.ReactElement): Promise<void>;
	info(text: string): Promise<void>;
	warn(text: string): Promise<void>;
	error(text: string): Promise<void>;
	dim(text: string): Promise<void>;
}

/** Render a static element once and leave its output on screen. */
export async function printStatic(node: React.ReactElement): Promise<void> {
	const instance = render(node, { exitOnCtrlC: false, patchConsole: false });
	instance.unmount();
	await instance.waitUntilExit();
}

export function createInkPrinter(): Printer {
	const notice = (kind: NoticeKind) => (text: string) =>
		printStatic(<Notice kind={kind}>{text}</Notice>);
	return {
		show: printStatic,
		info: notice("info"),
		warn: notice("warning"),
		error: notice("error"),
		dim: notice("dim"),
	};
}

export type ReadLineOptions = Omit<PromptProps, "onSubmit" | "onEof">;

/** Prompt for one line; resolves `null` on Ctrl-D at an empty prompt. */
export function readLine(options: ReadLineOptions): Promise<string | null> {
	return new Promise((resolve) => {
		let settled = false;
		const finish = (value: string | null) => {
			if (settled) return;
			settled = true;
			instance.unmount();
			resolve(value);
		};
		const instance = render(
			<Prompt {...options} onSubmit={(value) => finish(value)} onEof={() => finish(null)} />,
			{ exitOnCtrlC: false, patchConsole: false }
		);
	});
}

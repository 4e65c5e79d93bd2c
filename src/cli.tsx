#!/usr/bin/env node
import React from "react";
import fs from "node:fs/promises";
import meow from "meow";
import { getConfigPath, loadConfig, setConfigPathOverride, type AppConfig } from "./config.js";
import {
	type ConversationDocument,
	getConversationPath,
	readConversationFile,
} from "./conversationStore.js";
import { describeError } from "./errors.js";
import { loadInputHistory } from "./inputHistory.js";
import { OllamaBackend } from "./llm.js";
import { formatMarkdown } from "./markdown.js";
import { runRepl } from "./repl.js";
import { createSession, processInterrupts } from "./session.js";
import { createStdoutTerminal } from "./terminal.js";
import { conversationToText } from "./transcript.js";
import { ConfigTable, Welcome, createInkPrinter, readLine } from "./ui.js";

const cli = meow(
	`
	Usage
	  $ parley [chat]             Chat with a local Ollama model
	  $ parley export <file>      Print a saved conversation as plain text
	  $ parley config             Show the effective configuration

	Options
	  --model, -m   Model to use (defaults to ai.model, then the first installed)
	  --url         Ollama base URL (default: http://localhost:11434)
	  --config, -c  Path to the config file (or set PARLEY_CONFIG)
	  --debug       Print request diagnostics and key events

	Export options
	  --output, -o  Write the transcript to a file instead of stdout
	  --no-header   Leave out the model and system prompt header

	Examples
	  $ parley -m llama3.2
	  $ parley export 20240101_120000 -o chat.txt
`,
	{
		importMeta: import.meta,
		flags: {
			model: {
				type: "string",
				shortFlag: "m",
			},
			url: {
				type: "string",
			},
			config: {
				type: "string",
				shortFlag: "c",
			},
			debug: {
				type: "boolean",
				default: false,
			},
			output: {
				type: "string",
				shortFlag: "o",
			},
			header: {
				type: "boolean",
				default: true,
			},
		},
	}
);

const printer = createInkPrinter();

async function exportConversation(config: AppConfig, target: string | undefined): Promise<number> {
	if (!target) {
		await printer.error("Usage: parley export <file|name> [-o output] [--no-header]");
		return 2;
	}
	// a path on disk wins over a saved conversation of the same name
	let doc: ConversationDocument | undefined;
	try {
		doc =
			(await readConversationFile(target)) ??
			(await readConversationFile(getConversationPath(config.conversationsDir, target)));
	} catch (err) {
		const reason = err instanceof SyntaxError ? `invalid JSON: ${err.message}` : describeError(err);
		await printer.error(`Error: ${reason}`);
		return 1;
	}
	if (!doc) {
		await printer.error(`Error: ${target} not found`);
		return 1;
	}
	const text = conversationToText(doc, { header: cli.flags.header });
	if (cli.flags.output) {
		await fs.writeFile(cli.flags.output, text, "utf8");
		await printer.info(`Wrote ${cli.flags.output}`);
	} else {
		process.stdout.write(text);
	}
	return 0;
}

async function chat(config: AppConfig): Promise<number> {
	const backend = new OllamaBackend({
		baseUrl: cli.flags.url ?? config.ai.baseUrl,
		apiKey: config.ai.apiKey,
	});

	if (!(await backend.isAvailable())) {
		await printer.error(
			`Cannot connect to Ollama at ${backend.baseUrl}. Make sure it's running with: ollama serve`
		);
		return 1;
	}

	let model = cli.flags.model?.trim() || config.ai.model;
	if (!model) {
		let models: string[];
		try {
			models = await backend.listModels();
		} catch (err) {
			await printer.error(`Failed to list models: ${describeError(err)}`);
			return 1;
		}
		if (models.length === 0) {
			await printer.error("No models found. Pull one first with: ollama pull <model>");
			return 1;
		}
		model = models[0];
	}

	const session = createSession({
		config,
		configPath: getConfigPath(),
		backend,
		model,
		debug: cli.flags.debug,
		history: await loadInputHistory(config.historyFile),
		io: {
			printer,
			terminal: createStdoutTerminal(),
			format: (text, width) => formatMarkdown(text, width),
			readLine,
			onInterrupt: processInterrupts,
		},
	});

	await printer.show(<Welcome model={model} baseUrl={backend.baseUrl} />);
	await runRepl(session);
	return 0;
}

async function main(): Promise<number> {
	if (cli.flags.config) setConfigPathOverride(cli.flags.config);
	const config = await loadConfig();
	const [subcommand = "chat", target] = cli.input;

	switch (subcommand) {
		case "chat":
			return chat(config);
		case "export":
			return exportConversation(config, target);
		case "config":
			await printer.show(
				<ConfigTable
					config={config}
					model={cli.flags.model ?? config.ai.model}
					options={config.options}
					configPath={getConfigPath()}
				/>
			);
			return 0;
		default:
			await printer.error(`Unknown command: ${subcommand}`);
			cli.showHelp(2);
			return 2;
	}
}

try {
	process.exitCode = await main();
} catch (err) {
	console.error(`[parley] ${describeError(err)}`);
	if (cli.flags.debug) console.error(err);
	process.exitCode = 1;
}

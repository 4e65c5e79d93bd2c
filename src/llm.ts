import OpenAI, { APIUserAbortError } from "openai";
import type { ModelOptions } from "./config.js";
import type { RequestMessage } from "./conversation.js";
import {
	ChatError,
	SourceFailureError,
	SourceInterruptedError,
	describeError,
} from "./errors.js";
import { BaseTokenSource, type TokenSource, type TurnStats } from "./tokenSource.js";

export type ChatRequest = {
	model: string;
	messages: RequestMessage[];
	options: ModelOptions;
};

export interface ChatBackend {
	readonly baseUrl: string;
	isAvailable(): Promise<boolean>;
	listModels(): Promise<string[]>;
	chat(request: ChatRequest): TokenSource;
}

type ChunkStream = AsyncIterable<OpenAI.Chat.ChatCompletionChunk>;
export type ChunkStreamFactory = (signal: AbortSignal) => Promise<ChunkStream>;

const REQUEST_TIMEOUT_MS = 120_000;

// Ollama serves an OpenAI-compatible API under /v1
export function normalizeBaseUrl(raw: string): string {
	const cleaned = raw.trim().replace(/\/+$/, "");
	if (!cleaned) return "";
	return /\/v1(?:\/|$)/.test(cleaned) ? cleaned : `${cleaned}/v1`;
}

export function buildCompletionParams(
	request: ChatRequest
): OpenAI.Chat.ChatCompletionCreateParamsStreaming {
	const params: OpenAI.Chat.ChatCompletionCreateParamsStreaming = {
		model: request.model,
		messages: request.messages.map(toCompletionMessage),
		stream: true,
		stream_options: { include_usage: true },
	};
	const { seed, temperature, topP } = request.options;
	if (seed !== undefined) params.seed = seed;
	if (temperature !== undefined) params.temperature = temperature;
	if (topP !== undefined) params.top_p = topP;
	return params;
}

function toCompletionMessage(
	message: RequestMessage
): OpenAI.Chat.ChatCompletionMessageParam {
	switch (message.role) {
		case "system":
			return { role: "system", content: message.content };
		case "assistant":
			return { role: "assistant", content: message.content };
		case "user":
			return { role: "user", content: message.content };
	}
}

/** Token stream over one streamed chat completion. */
export class OllamaChatStream extends BaseTokenSource {
	#open: ChunkStreamFactory;
	#controller = new AbortController();
	#now: () => number;

	constructor(open: ChunkStreamFactory, now: () => number = () => performance.now()) {
		super();
		this.#open = open;
		this.#now = now;
	}

	abort(): void {
		this.#controller.abort();
	}

	protected async *produce(): AsyncGenerator<string, TurnStats> {
		const signal = this.#controller.signal;
		const started = this.#now();
		let fragments = 0;
		let tokensGenerated: number | undefined;
		let promptTokens = 0;

		try {
			const chunks = await this.#open(signal);
			for await (const chunk of chunks) {
				if (signal.aborted) throw new SourceInterruptedError();
				const content = chunk.choices[0]?.delta?.content;
				if (content) {
					fragments += 1;
					yield content;
				}
				if (chunk.usage) {
					tokensGenerated = chunk.usage.completion_tokens;
					promptTokens = chunk.usage.prompt_tokens;
				}
			}
		} catch (err) {
			throw toSourceError(err, signal);
		}
		if (signal.aborted) throw new SourceInterruptedError();

		return {
			// servers that skip usage still get a rough count
			tokensGenerated: tokensGenerated ?? fragments,
			durationSeconds: Math.max(0, this.#now() - started) / 1000,
			promptTokens,
		};
	}
}

export function toSourceError(err: unknown, signal?: AbortSignal): ChatError {
	if (err instanceof ChatError) return err;
	if (err instanceof APIUserAbortError || signal?.aborted) {
		return new SourceInterruptedError();
	}
	if (err instanceof OpenAI.APIConnectionError) {
		return new SourceFailureError("Lost connection to Ollama. Is it still running?", err);
	}
	if (err instanceof OpenAI.APIError) {
		return new SourceFailureError(`Ollama error: ${err.message}`, err);
	}
	return new SourceFailureError(describeError(err), err);
}

export class OllamaBackend implements ChatBackend {
	readonly baseUrl: string;
	#client: OpenAI;

	constructor(settings: { baseUrl: string; apiKey?: string }, client?: OpenAI) {
		this.baseUrl = normalizeBaseUrl(settings.baseUrl);
		this.#client =
			client ??
			new OpenAI({
				// any non-empty key works for Ollama
				apiKey: settings.apiKey?.trim() || "ollama",
				baseURL: this.baseUrl,
				timeout: REQUEST_TIMEOUT_MS,
				maxRetries: 1,
			});
	}

	async isAvailable(): Promise<boolean> {
		try {
			await this.#client.models.list();
			return true;
		} catch {
			return false;
		}
	}

	async listModels(): Promise<string[]> {
		const page = await this.#client.models.list();
		return page.data.map((model) => model.id);
	}

	chat(request: ChatRequest): TokenSource {
		const params = buildCompletionParams(request);
		return new OllamaChatStream((signal) =>
			this.#client.chat.completions.create(params, { signal })
		);
	}
}

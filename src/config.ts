import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export type ModelOptions = {
	seed?: number;
	temperature?: number;
	topP?: number;
};

export type ModelOptionKey = keyof ModelOptions;

export type AppConfig = {
	ai: {
		baseUrl: string; // Ollama server, with or without the /v1 suffix
		model: string; // empty: first model the server lists
		apiKey: string; // Ollama ignores it; the OpenAI client wants a non-empty one
		contextLimit: number;
		contextLimits: Record<string, number>;
	};
	systemPrompt: string;
	conversationsDir: string;
	historyFile: string;
	autoSave: boolean;
	// absent: let the server decide
	options: ModelOptions;
};

const DATA_DIR = path.join(os.homedir(), ".local", "share", "parley");

export const DEFAULT_CONFIG: AppConfig = {
	ai: {
		baseUrl: "http://localhost:11434",
		model: "",
		apiKey: "",
		contextLimit: 2048,
		contextLimits: {},
	},
	systemPrompt: "",
	conversationsDir: path.join(DATA_DIR, "conversations"),
	historyFile: path.join(DATA_DIR, "history.json"),
	autoSave: true,
	options: {},
};

// Values the server falls back to when an option is left unset.
export const SERVER_DEFAULT_OPTIONS: Required<ModelOptions> = {
	seed: 0,
	temperature: 0.8,
	topP: 0.9,
};

export const MODEL_OPTION_KEYS: readonly ModelOptionKey[] = [
	"seed",
	"temperature",
	"topP",
] as const;

const MIN_CONTEXT = 256;
const MAX_CONTEXT = 2_097_152;

let configPathOverride: string | undefined;

export function setConfigPathOverride(p: string | undefined): void {
	configPathOverride = p && p.trim().length > 0 ? p.trim() : undefined;
}

export function getConfigPath(): string {
	const explicit = configPathOverride ?? process.env["PARLEY_CONFIG"];
	if (explicit && explicit.trim().length > 0) {
		return path.resolve(expandHome(explicit.trim()));
	}
	return path.join(os.homedir(), ".config", "parley", "config.json");
}

export async function loadConfig(): Promise<AppConfig> {
	const file = getConfigPath();
	try {
		const raw = await fs.readFile(file, "utf8");
		const data: unknown = JSON.parse(raw);
		return normalizeConfig(data);
	} catch (err) {
		if (isMissingFileError(err)) {
			return normalizeConfig({});
		}
		throw err;
	}
}

export function normalizeConfig(input: unknown): AppConfig {
	const root = asRecord(input);
	const ai = asRecord(root["ai"]);
	const options = asRecord(root["options"]);

	return {
		ai: {
			baseUrl: nonEmptyString(ai["baseUrl"], DEFAULT_CONFIG.ai.baseUrl),
			model: typeof ai["model"] === "string" ? ai["model"].trim() : DEFAULT_CONFIG.ai.model,
			apiKey: typeof ai["apiKey"] === "string" ? ai["apiKey"] : DEFAULT_CONFIG.ai.apiKey,
			contextLimit: clampInt(
				ai["contextLimit"],
				MIN_CONTEXT,
				MAX_CONTEXT,
				DEFAULT_CONFIG.ai.contextLimit
			),
			contextLimits: normalizeLimits(ai["contextLimits"]),
		},
		systemPrompt:
			typeof root["systemPrompt"] === "string"
				? root["systemPrompt"]
				: DEFAULT_CONFIG.systemPrompt,
		conversationsDir: expandHome(
			nonEmptyString(root["conversationsDir"], DEFAULT_CONFIG.conversationsDir)
		),
		historyFile: expandHome(nonEmptyString(root["historyFile"], DEFAULT_CONFIG.historyFile)),
		autoSave: root["autoSave"] !== false,
		options: normalizeOptions(options),
	};
}

/** Parse a user-typed option value; `undefined` means "server default". */
export function parseOptionValue(
	key: ModelOptionKey,
	raw: string
): number | undefined | Error {
	const text = raw.trim();
	if (text === "default") return undefined;
	const value = Number(text);
	if (text.length === 0 || !Number.isFinite(value)) {
		return new Error(`Invalid value for ${optionLabel(key)}: ${raw}`);
	}
	if (key === "seed" && !Number.isInteger(value)) {
		return new Error("seed must be an integer.");
	}
	if (key === "topP" && (value < 0 || value > 1)) {
		return new Error("top_p must be between 0 and 1.");
	}
	if (key === "temperature" && value < 0) {
		return new Error("temperature cannot be negative.");
	}
	return value;
}

/** Wire names for model options, as typed after /set. */
export function optionLabel(key: ModelOptionKey): string {
	return key === "topP" ? "top_p" : key;
}

export function optionKeyFromLabel(label: string): ModelOptionKey | undefined {
	const normalized = label.trim().toLowerCase();
	return MODEL_OPTION_KEYS.find((key) => optionLabel(key) === normalized);
}

export function isMissingFileError(err: unknown): boolean {
	if (!(err instanceof Error) || !("code" in err)) return false;
	return err.code === "ENOENT" || err.code === "ENOTDIR";
}

function normalizeOptions(input: Record<string, unknown>): ModelOptions {
	const options: ModelOptions = {};
	for (const key of MODEL_OPTION_KEYS) {
		const raw = input[key] ?? input[optionLabel(key)];
		if (typeof raw !== "number" && typeof raw !== "string") continue;
		const parsed = parseOptionValue(key, String(raw));
		if (typeof parsed === "number") options[key] = parsed;
	}
	return options;
}

function normalizeLimits(input: unknown): Record<string, number> {
	const limits: Record<string, number> = {};
	for (const [model, value] of Object.entries(asRecord(input))) {
		const n = Number(value);
		if (model.trim().length > 0 && Number.isInteger(n) && n > 0) {
			limits[model.trim()] = Math.min(MAX_CONTEXT, n);
		}
	}
	return limits;
}

function asRecord(value: unknown): Record<string, unknown> {
	if (value && typeof value === "object" && !Array.isArray(value)) {
		return Object.fromEntries(Object.entries(value));
	}
	return {};
}

function nonEmptyString(value: unknown, fallback: string): string {
	if (typeof value === "string" && value.trim().length > 0) {
		return value.trim();
	}
	return fallback;
}

function clampInt(v: unknown, min: number, max: number, def: number): number {
	const n = Number(v);
	if (v === null || v === undefined || !Number.isInteger(n)) return def;
	return Math.max(min, Math.min(max, n));
}

function expandHome(p: string): string {
	if (p === "~") return os.homedir();
	if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
	return p;
}

import React, { useEffect, useState } from "react";
import { Box, Text, useInput, type Key } from "ink";

export type EditorState = {
	value: string;
	cursor: number;
	historyIndex: number | null;
	draft: string;
};

export type EditorContext = {
	history: readonly string[];
	complete?: (value: string) => string | undefined;
};

export type EditorOutcome =
	| { kind: "edit"; state: EditorState }
	| { kind: "submit"; value: string }
	| { kind: "eof" };

export type EditorKey = Pick<
	Key,
	| "return"
	| "backspace"
	| "delete"
	| "leftArrow"
	| "rightArrow"
	| "upArrow"
	| "downArrow"
	| "tab"
	| "ctrl"
	| "meta"
	| "shift"
	| "escape"
>;

export const EMPTY_EDITOR: EditorState = {
	value: "",
	cursor: 0,
	historyIndex: null,
	draft: "",
};

const isWordChar = (ch: string) => /[0-9A-Za-z_]/.test(ch);

function prevWordIndex(s: string, from: number): number {
	let i = from;
	while (i > 0 && !isWordChar(s[i - 1])) i--;
	while (i > 0 && isWordChar(s[i - 1])) i--;
	return i;
}

function nextWordIndex(s: string, from: number): number {
	let i = from;
	while (i < s.length && !isWordChar(s[i])) i++;
	while (i < s.length && isWordChar(s[i])) i++;
	return i;
}

function withValue(state: EditorState, value: string, cursor = value.length): EditorState {
	return { ...state, value, cursor: Math.max(0, Math.min(value.length, cursor)) };
}

/** Apply one keypress to the line being edited. */
export function applyKey(
	state: EditorState,
	input: string,
	key: EditorKey,
	ctx: EditorContext
): EditorOutcome {
	const { value, cursor } = state;
	const edit = (next: EditorState): EditorOutcome => ({ kind: "edit", state: next });

	if (key.return) {
		return { kind: "submit", value };
	}
	if (key.ctrl && input === "c") {
		return edit(EMPTY_EDITOR);
	}
	if (key.ctrl && input === "d") {
		if (value.length === 0) return { kind: "eof" };
		return edit(withValue(state, value.slice(0, cursor) + value.slice(cursor + 1), cursor));
	}

	if (key.tab) {
		const completed = ctx.complete?.(value);
		return edit(completed === undefined ? state : withValue(state, completed));
	}

	if (key.upArrow) {
		const { history } = ctx;
		if (history.length === 0) return edit(state);
		if (state.historyIndex === null) {
			const idx = history.length - 1;
			return edit({ ...withValue(state, history[idx]), historyIndex: idx, draft: value });
		}
		if (state.historyIndex > 0) {
			const idx = state.historyIndex - 1;
			return edit({ ...withValue(state, history[idx]), historyIndex: idx });
		}
		return edit(state);
	}
	if (key.downArrow) {
		const { history } = ctx;
		if (state.historyIndex === null) return edit(state);
		if (state.historyIndex < history.length - 1) {
			const idx = state.historyIndex + 1;
			return edit({ ...withValue(state, history[idx]), historyIndex: idx });
		}
		return edit({ ...withValue(state, state.draft), historyIndex: null, draft: "" });
	}

	if (key.leftArrow) {
		return edit(withValue(state, value, key.meta ? prevWordIndex(value, cursor) : cursor - 1));
	}
	if (key.rightArrow) {
		return edit(withValue(state, value, key.meta ? nextWordIndex(value, cursor) : cursor + 1));
	}

	// Home/End via Ctrl+A / Ctrl+E
	if (key.ctrl && input === "a") return edit(withValue(state, value, 0));
	if (key.ctrl && input === "e") return edit(withValue(state, value, value.length));

	// Kill line: Ctrl+U (to start), Ctrl+K (to end)
	if (key.ctrl && input === "u") return edit(withValue(state, value.slice(cursor), 0));
	if (key.ctrl && input === "k") {
		return edit(withValue(state, value.slice(0, cursor), cursor));
	}

	// Some terminals report Backspace as Delete; Ink then sets only the delete flag.
	if (key.backspace || key.delete || (key.ctrl && input === "h")) {
		if (cursor === 0) return edit(state);
		const start = key.meta ? prevWordIndex(value, cursor) : cursor - 1;
		return edit(withValue(state, value.slice(0, start) + value.slice(cursor), start));
	}

	if (key.ctrl || key.meta || key.escape || input.length === 0) {
		return edit(state);
	}

	// pasted text may carry newlines; keep them so multi-line pastes survive
	const text = input.replace(/\r\n?/g, "\n");
	return edit(
		withValue(state, value.slice(0, cursor) + text + value.slice(cursor), cursor + text.length)
	);
}

/**
 * Complete a slash command, or a saved conversation name after `/load ` or
 * `/cat `. Several matches complete to their common prefix.
 */
export function completeLine(
	value: string,
	commands: readonly string[],
	names: readonly string[]
): string | undefined {
	const nameCommand = /^(\/(?:load|cat)\s+)(\S*)$/.exec(value);
	if (nameCommand) {
		const [, head, partial] = nameCommand;
		const match = completePrefix(partial, names);
		return match === undefined ? undefined : head + match;
	}
	if (value.startsWith("/") && !/\s/.test(value)) {
		return completePrefix(value, commands);
	}
	return undefined;
}

function completePrefix(partial: string, candidates: readonly string[]): string | undefined {
	const matches = candidates.filter((c) => c.startsWith(partial));
	if (matches.length === 0) return undefined;
	if (matches.length === 1) return matches[0];
	let prefix = matches[0];
	for (const candidate of matches.slice(1)) {
		while (!candidate.startsWith(prefix)) prefix = prefix.slice(0, -1);
	}
	return prefix.length > partial.length ? prefix : undefined;
}

export type PromptProps = {
	prefix?: string;
	placeholder?: string;
	history?: readonly string[];
	complete?: (value: string) => string | undefined;
	onSubmit: (value: string) => void;
	onEof: () => void;
	debug?: boolean;
};

export const Prompt = ({
	prefix = ">>> ",
	placeholder = "",
	history = [],
	complete,
	onSubmit,
	onEof,
	debug = false,
}: PromptProps) => {
	const [state, setState] = useState<EditorState>(EMPTY_EDITOR);
	const [submitted, setSubmitted] = useState<string | null>(null);
	const [lastAction, setLastAction] = useState<string>("");

	useInput(
		(input, key) => {
			const outcome = applyKey(state, input, key, { history, complete });
			if (debug) setLastAction(`${outcome.kind} ${JSON.stringify(input)}`);
			if (outcome.kind === "submit") setSubmitted(outcome.value);
			else if (outcome.kind === "eof") onEof();
			else setState(outcome.state);
		},
		{ isActive: submitted === null }
	);

	// report after the submitted line has been drawn, so it stays on screen
	useEffect(() => {
		if (submitted !== null) onSubmit(submitted);
	}, [submitted]);

	const left = state.value.slice(0, state.cursor);
	const under = state.value.slice(state.cursor, state.cursor + 1);
	const right = state.value.slice(state.cursor + 1);

	return (
		<Box flexDirection="column" flexShrink={0}>
			<Text>
				<Text color="green" bold>
					{prefix}
				</Text>
				{submitted !== null ? (
					submitted
				) : state.value.length === 0 ? (
					<>
						<Text inverse> </Text>
						<Text color="gray">{placeholder}</Text>
					</>
				) : (
					<>
						{left}
						<Text inverse>{under === "" || under === "\n" ? " " : under}</Text>
						{under === "\n" ? "\n" : ""}
						{right}
					</>
				)}
			</Text>
			{debug && submitted === null && (
				<Text color="gray">
					[debug] cursor: {state.cursor}/{state.value.length} last: {lastAction}
				</Text>
			)}
		</Box>
	);
};

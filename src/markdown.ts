import chalk, { type ChalkInstance } from "chalk";
import { marked, type Token } from "marked";

type FormatOptions = {
	chalk?: ChalkInstance;
};

const lexerOptions = {
	gfm: true,
	breaks: true,
};

const ANSI_PATTERN = /\u001B\[[0-9;]*m/g;
const HEADING_COLORS = ["cyan", "green", "magenta", "yellow"] as const;
const RULE_WIDTH = 24;

export function stripAnsi(value: string): string {
	return value.replace(ANSI_PATTERN, "");
}

export function visibleLength(value: string): number {
	return stripAnsi(value).length;
}

/** Render markdown as ANSI-styled terminal text, wrapped to `width` columns. */
export function formatMarkdown(
	content: string,
	width: number,
	options: FormatOptions = {}
): string {
	const tokens = marked.lexer(content ?? "", lexerOptions);
	const ctx: RenderContext = { c: options.chalk ?? chalk };
	const lines: string[] = [];
	for (const token of tokens) {
		lines.push(...renderBlockToken(token, ctx, Math.max(1, width)));
	}
	while (lines.length > 0 && lines[lines.length - 1].trim() === "") {
		lines.pop();
	}
	return lines.join("\n");
}

type RenderContext = {
	c: ChalkInstance;
};

function renderBlockToken(token: Token, ctx: RenderContext, width: number): string[] {
	const { c } = ctx;
	switch (token.type) {
		case "space":
			return [""];
		case "paragraph":
			return wrapText(renderInlineTokens(token.tokens ?? [], ctx), width);
		case "heading": {
			const color =
				HEADING_COLORS[Math.min(token.depth - 1, HEADING_COLORS.length - 1)];
			const text = renderInlineTokens(token.tokens ?? [], ctx);
			return wrapText(c[color].bold(text), width).concat("");
		}
		case "code": {
			const gutter = c.gray("│ ");
			const body = String(token.text ?? "")
				.split("\n")
				.map((line) => gutter + c.magenta(line));
			const label = token.lang ? [c.gray.dim(String(token.lang))] : [];
			return [...label, ...body, ""];
		}
		case "blockquote": {
			const inner = childTokens(token).flatMap((child) =>
				renderBlockToken(child, ctx, Math.max(1, width - 2))
			);
			return trimTrailingBlank(inner).map((line) => c.gray("> ") + line);
		}
		case "list":
			return renderList(token, ctx, width).concat("");
		case "table": {
			const header: string = token.header
				.map((cell: { tokens?: Token[] }) => inlineTokensToPlain(cell.tokens ?? []))
				.join(" | ");
			const rule = c.gray(token.header.map(() => "---").join(" | "));
			const rows: string[] = (token.rows ?? []).map((row: { tokens?: Token[] }[]) =>
				row.map((cell) => inlineTokensToPlain(cell.tokens ?? [])).join(" | ")
			);
			return [c.bold(header), rule, ...rows, ""];
		}
		case "hr":
			return [c.gray("─".repeat(Math.min(RULE_WIDTH, width))), ""];
		case "html":
			return wrapText(String(token.text ?? ""), width);
		case "text":
			if (token.tokens) {
				return wrapText(renderInlineTokens(token.tokens, ctx), width);
			}
			return wrapText(unescapeHtml(String(token.text ?? "")), width);
		default:
			return wrapText(String(token.raw ?? ""), width);
	}
}

function renderList(token: Token, ctx: RenderContext, width: number): string[] {
	if (token.type !== "list") return [];
	const start =
		typeof token.start === "number" && !Number.isNaN(token.start) ? token.start : 1;
	const items: Token[] = token.items ?? [];
	const lines: string[] = [];
	for (const [idx, item] of items.entries()) {
		if (item.type !== "list_item") continue;
		const marker = item.task
			? `[${item.checked ? "x" : " "}]`
			: token.ordered
				? `${start + idx}.`
				: "•";
		const indent = " ".repeat(marker.length + 1);
		const itemLines = trimTrailingBlank(
			renderListItem(item, ctx, Math.max(1, width - indent.length))
		);
		for (const [lineIdx, line] of itemLines.entries()) {
			lines.push((lineIdx === 0 ? `${marker} ` : indent) + line);
		}
	}
	return lines;
}

function renderListItem(item: Token, ctx: RenderContext, width: number): string[] {
	const isLoose = item.type === "list_item" && Boolean(item.loose);

	return childTokens(item).flatMap((token) => {
		if (!isLoose && token.type === "text") {
			return wrapText(renderInlineTokens(token.tokens ?? [token], ctx), width);
		}
		// a task checkbox already shows up as the marker
		if (token.type === "checkbox") return [];
		return renderBlockToken(token, ctx, width);
	});
}

function childTokens(token: Token): Token[] {
	return "tokens" in token && Array.isArray(token.tokens) ? token.tokens : [];
}

function renderInlineTokens(tokens: Token[], ctx: RenderContext): string {
	const { c } = ctx;
	return tokens
		.map((token) => {
			switch (token.type) {
				case "text":
					if (token.tokens) return renderInlineTokens(token.tokens, ctx);
					return unescapeHtml(String(token.text ?? ""));
				case "strong":
					return c.bold(renderInlineTokens(token.tokens ?? [], ctx));
				case "em":
					return c.italic(renderInlineTokens(token.tokens ?? [], ctx));
				case "codespan":
					return c.bgGray.black(` ${unescapeHtml(String(token.text ?? ""))} `);
				case "br":
					return "\n";
				case "del":
					return c.strikethrough(renderInlineTokens(token.tokens ?? [], ctx));
				case "link": {
					const label = renderInlineTokens(token.tokens ?? [], ctx);
					return c.underline.cyan(token.href ? `${label} (${token.href})` : label);
				}
				case "image": {
					const label = String(token.text || "image");
					return c.underline.cyan(token.href ? `${label} (${token.href})` : label);
				}
				case "escape":
					return unescapeHtml(String(token.text ?? ""));
				default:
					return String(token.raw ?? "");
			}
		})
		.join("");
}

function inlineTokensToPlain(tokens: Token[]): string {
	return tokens
		.map((token) => {
			switch (token.type) {
				case "text":
				case "codespan":
				case "escape":
					return unescapeHtml(String(token.text ?? ""));
				case "strong":
				case "em":
				case "del":
				case "link":
					return inlineTokensToPlain(token.tokens ?? []);
				case "br":
					return "\n";
				default:
					return String(token.raw ?? "");
			}
		})
		.join("");
}

/**
 * Greedy word wrap measured on visible characters, so ANSI styling does not
 * count toward the width. Explicit newlines are kept.
 */
export function wrapText(text: string, width: number): string[] {
	const lines: string[] = [];
	for (const paragraph of text.split("\n")) {
		let line = "";
		let lineLength = 0;
		for (const word of paragraph.split(" ")) {
			const length = visibleLength(word);
			if (lineLength > 0 && lineLength + 1 + length > width) {
				lines.push(line);
				line = word;
				lineLength = length;
			} else if (lineLength > 0 || line.length > 0) {
				line += ` ${word}`;
				lineLength += 1 + length;
			} else {
				line = word;
				lineLength = length;
			}
		}
		lines.push(line);
	}
	return lines;
}

function trimTrailingBlank(lines: string[]): string[] {
	const copy = [...lines];
	while (copy.length > 0 && copy[copy.length - 1].trim() === "") copy.pop();
	return copy;
}

const ENTITIES: Record<string, string> = {
	"&amp;": "&",
	"&lt;": "<",
	"&gt;": ">",
	"&quot;": '"',
	"&#39;": "'",
};

function unescapeHtml(text: string): string {
	return text.replace(/&(?:amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity);
}

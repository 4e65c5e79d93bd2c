export type BudgetTier = "ok" | "warning" | "critical";

export type BudgetStatus = {
	/** promptTokens / contextLimit */
	ratio: number;
	tier: BudgetTier;
};

export const WARNING_RATIO = 0.75;
export const CRITICAL_RATIO = 0.95;

export function classify(promptTokens: number, contextLimit: number): BudgetStatus {
	if (!Number.isFinite(contextLimit) || contextLimit <= 0) {
		throw new RangeError(`Context limit must be a positive number, got ${contextLimit}.`);
	}
	const used = Number.isFinite(promptTokens) ? Math.max(0, promptTokens) : 0;
	const ratio = used / contextLimit;
	let tier: BudgetTier = "ok";
	if (ratio > CRITICAL_RATIO) tier = "critical";
	else if (ratio >= WARNING_RATIO) tier = "warning";
	return { ratio, tier };
}

/** Context size for `model`: a per-model override, else the configured default. */
export function contextLimitFor(
	model: string,
	limits: Readonly<Record<string, number>>,
	fallback: number
): number {
	return limits[model] ?? fallback;
}

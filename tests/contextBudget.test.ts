import { describe, it, expect } from "vitest";
import { classify, contextLimitFor } from "../src/contextBudget.js";

describe("classify", () => {
	it("warns at 1900 of 2048 tokens", () => {
		const status = classify(1900, 2048);
		expect(status.tier).toBe("warning");
		expect(status.ratio).toBeCloseTo(0.9277, 4);
	});

	it("uses inclusive bounds for the warning tier", () => {
		expect(classify(749, 1000).tier).toBe("ok");
		expect(classify(750, 1000).tier).toBe("warning");
		expect(classify(950, 1000).tier).toBe("warning");
		expect(classify(951, 1000).tier).toBe("critical");
	});

	it("treats an empty prompt as ok", () => {
		expect(classify(0, 2048)).toEqual({ ratio: 0, tier: "ok" });
	});

	it("counts an unusable prompt token count as zero", () => {
		expect(classify(Number.NaN, 2048)).toEqual({ ratio: 0, tier: "ok" });
		expect(classify(Number.POSITIVE_INFINITY, 2048)).toEqual({ ratio: 0, tier: "ok" });
		expect(classify(-5, 2048)).toEqual({ ratio: 0, tier: "ok" });
	});

	it("rejects a non-positive limit", () => {
		expect(() => classify(10, 0)).toThrow(RangeError);
		expect(() => classify(10, Number.NaN)).toThrow(RangeError);
	});
});

describe("contextLimitFor", () => {
	it("prefers a per-model limit", () => {
		const limits = { "llama3.2": 8192 };
		expect(contextLimitFor("llama3.2", limits, 2048)).toBe(8192);
		expect(contextLimitFor("mistral", limits, 2048)).toBe(2048);
	});
});

import { describe, expect, it } from "vitest";
import { validate } from "../lib/validation/index.js";
import { strategyConfigSchema } from "./config.js";

function parse(doc: unknown) {
	return validate(strategyConfigSchema, doc);
}

function issuesOf(doc: unknown): { path: readonly (string | number)[]; message: string }[] {
	const result = parse(doc);
	if (result.ok) throw new Error("expected the document to be rejected");
	return result.error.issues.map((i) => ({ path: i.path, message: i.message }));
}

describe("strategyConfigSchema", () => {
	describe("accepted documents", () => {
		it.each<[string, unknown]>([
			["null", "null"],
			["always_buy integer", { always_buy: 5 }],
			["always_buy u64 digit string", { always_buy: "18446744073709551615" }],
			["always_sell fraction", { always_sell: { numerator: 5, denominator: 2 } }],
			["threshold buy only", { threshold: { buy: { at: 100, amount: 5 } } }],
			[
				"threshold both sides",
				{ threshold: { buy: { at: 90, amount: 1 }, sell: { at: 110, amount: "2" } } },
			],
			["threshold with explicit null", { threshold: { buy: null, sell: { at: 1, amount: 1 } } }],
			["empty threshold", { threshold: {} }],
			[
				"nested ema",
				{ ema: { carry: 0.9, inner: { ema: { carry: 0.1, inner: { always_buy: 1 } } } } },
			],
		])("%s", (_label, doc) => {
			const result = parse(doc);
			expect(result.ok).toBe(true);
			if (result.ok) expect(result.value).toEqual(doc);
		});

		it("does not range-check numbers", () => {
			expect(parse({ ema: { carry: 7, inner: "null" } }).ok).toBe(true);
			expect(parse({ ema: { carry: -0.5, inner: "null" } }).ok).toBe(true);
			expect(parse({ always_buy: { numerator: 1, denominator: 0 } }).ok).toBe(true);
			const overlapping = {
				threshold: { buy: { at: 200, amount: 1 }, sell: { at: 100, amount: 1 } },
			};
			expect(parse(overlapping).ok).toBe(true);
		});
	});

	describe("rejected documents", () => {
		it("unknown variant name", () => {
			expect(issuesOf("bogus")).toEqual([
				{
					path: [],
					message: 'Unknown strategy "bogus", expected one of: null, always_buy, always_sell, threshold, ema',
				},
			]);
		});

		it("unknown top-level key", () => {
			expect(issuesOf({ moving_average: { carry: 1 } })).toEqual([
				{ path: [], message: "Unrecognized key(s) in object: 'moving_average'" },
			]);
		});

		it("unknown nested field", () => {
			expect(issuesOf({ threshold: { buy: { at: 1, amount: 1, slippage: 2 } } })).toEqual([
				{ path: ["threshold", "buy"], message: "Unrecognized key(s) in object: 'slippage'" },
			]);
		});

		it("unknown field inside a nested inner strategy", () => {
			expect(issuesOf({ ema: { carry: 0.5, inner: { always_buy: 1, note: "x" } } })).toEqual([
				{ path: ["ema", "inner"], message: "Unrecognized key(s) in object: 'note'" },
			]);
		});

		it("empty object", () => {
			expect(issuesOf({})).toEqual([
				{ path: [], message: "Expected one of: null, always_buy, always_sell, threshold, ema" },
			]);
		});

		it("two variants in one node", () => {
			expect(issuesOf({ always_buy: 1, always_sell: 1 })).toEqual([
				{
					path: [],
					message: "Expected exactly one strategy variant, got: always_buy, always_sell",
				},
			]);
		});

		it("missing inner strategy", () => {
			expect(issuesOf({ ema: { carry: 0.5 } })).toEqual([
				{ path: ["ema", "inner"], message: "Required" },
			]);
		});

		it("wrongly typed carry", () => {
			expect(issuesOf({ ema: { carry: "0.5", inner: "null" } })).toEqual([
				{ path: ["ema", "carry"], message: "Expected number, received string" },
			]);
		});

		it("non-object documents", () => {
			const expected = [{ path: [], message: 'Expected "null" or a strategy object' }];
			expect(issuesOf(null)).toEqual(expected);
			expect(issuesOf(42)).toEqual(expected);
		});

		it("amounts outside the u64 range", () => {
			expect(issuesOf({ always_buy: "18446744073709551616" })).toEqual([
				{ path: ["always_buy"], message: "Exceeds the u64 range" },
			]);
		});

		it.each<[string, unknown]>([
			["negative", -1],
			["fractional", 2.5],
			["above 2^53", 2 ** 60],
			["non-digit string", "5e3"],
			["boolean", true],
		])("amount: %s", (_label, amount) => {
			const issues = issuesOf({ always_sell: amount });
			expect(issues[0]?.path).toEqual(["always_sell"]);
		});

		it("fraction with an unknown field", () => {
			const issues = issuesOf({ always_buy: { numerator: 1, denominator: 2, scale: 3 } });
			expect(issues[0]?.path).toEqual(["always_buy"]);
		});
	});
});

/**
 * Declarative strategy configuration.
 *
 * The document is a tree mirroring the strategy variants, one key per node:
 *
 * ```json
 * { "ema": { "carry": 0.9, "inner": { "threshold": { "buy": { "at": 100, "amount": 5 } } } } }
 * ```
 *
 * Every object is strict (unknown fields are rejected). Numeric ranges are
 * not checked here: a carry outside [0, 1] or a zero denominator is a valid
 * document.
 */

import { z } from "../lib/validation/index.js";
import { U64_MAX } from "../shared/fraction.js";

// ── Document types ──────────────────────────────────────────────────

/** Unsigned integer: a safe integer number, or a digit string for the full u64 range. */
export type U64Config = number | string;

export interface FractionConfig {
	readonly numerator: U64Config;
	readonly denominator: U64Config;
}

/** Plain integer (denominator 1) or an explicit numerator/denominator pair. */
export type AmountConfig = U64Config | FractionConfig;

export interface ThresholdPointConfig {
	readonly at: number;
	readonly amount: AmountConfig;
}

export interface ThresholdConfig {
	readonly buy?: ThresholdPointConfig | null | undefined;
	readonly sell?: ThresholdPointConfig | null | undefined;
}

export interface EmaConfig {
	readonly carry: number;
	readonly inner: StrategyConfig;
}

export type StrategyConfig =
	| "null"
	| { readonly always_buy: AmountConfig }
	| { readonly always_sell: AmountConfig }
	| { readonly threshold: ThresholdConfig }
	| { readonly ema: EmaConfig };

export const STRATEGY_VARIANTS = ["null", "always_buy", "always_sell", "threshold", "ema"] as const;

// ── Schemas ─────────────────────────────────────────────────────────

const DIGITS = /^\d+$/;

const u64Schema = z.union([
	z
		.number()
		.int()
		.nonnegative()
		.max(Number.MAX_SAFE_INTEGER, "Integers above 2^53 - 1 must be written as digit strings"),
	z
		.string()
		.regex(DIGITS, "Expected a decimal digit string")
		// refinements still run after a failed regex; only digit strings reach BigInt
		.refine((s) => !DIGITS.test(s) || BigInt(s) <= U64_MAX, "Exceeds the u64 range"),
]);

export const amountSchema = z.union([
	u64Schema,
	z.object({ numerator: u64Schema, denominator: u64Schema }).strict(),
]);

const thresholdPointSchema = z.object({ at: z.number(), amount: amountSchema }).strict();

const thresholdSchema = z
	.object({
		buy: thresholdPointSchema.nullable().optional(),
		sell: thresholdPointSchema.nullable().optional(),
	})
	.strict();

const emaSchema = z
	.object({
		carry: z.number(),
		inner: z.lazy(() => strategyConfigSchema),
	})
	.strict();

const OBJECT_VARIANTS = ["always_buy", "always_sell", "threshold", "ema"] as const;

const taggedStrategySchema = z
	.object(
		{
			always_buy: amountSchema.optional(),
			always_sell: amountSchema.optional(),
			threshold: thresholdSchema.optional(),
			ema: emaSchema.optional(),
		},
		{ invalid_type_error: 'Expected "null" or a strategy object' },
	)
	.strict()
	.transform((node, ctx): StrategyConfig => {
		const present = OBJECT_VARIANTS.filter((key) => node[key] !== undefined);
		if (present.length !== 1) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message:
					present.length === 0
						? `Expected one of: ${STRATEGY_VARIANTS.join(", ")}`
						: `Expected exactly one strategy variant, got: ${present.join(", ")}`,
			});
			return z.NEVER;
		}
		if (node.always_buy !== undefined) return { always_buy: node.always_buy };
		if (node.always_sell !== undefined) return { always_sell: node.always_sell };
		if (node.threshold !== undefined) return { threshold: node.threshold };
		if (node.ema !== undefined) return { ema: node.ema };
		return z.NEVER;
	});

/**
 * Schema for a whole strategy tree. The string `"null"` selects the null
 * strategy; anything else must be a single-key variant object.
 */
export const strategyConfigSchema: z.ZodType<StrategyConfig, z.ZodTypeDef, unknown> = z
	.unknown()
	.transform((doc, ctx): StrategyConfig => {
		if (doc === "null") return "null";
		if (doc === undefined) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Required" });
			return z.NEVER;
		}
		if (typeof doc === "string") {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Unknown strategy "${doc}", expected one of: ${STRATEGY_VARIANTS.join(", ")}`,
			});
			return z.NEVER;
		}
		const parsed = taggedStrategySchema.safeParse(doc);
		if (parsed.success) return parsed.data;
		for (const issue of parsed.error.issues) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
		}
		return z.NEVER;
	});

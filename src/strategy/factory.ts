/**
 * Strategy factory — configuration tree in, one type-erased Strategy out.
 *
 * Built once at startup and reused for the whole run. Construction is the
 * only place the decision pipeline can fail: a malformed document is reported
 * as a ConfigError before the loop ever starts.
 */

import { validate } from "../lib/validation/index.js";
import { ConfigError } from "../shared/errors.js";
import { Fraction } from "../shared/fraction.js";
import { type Result, err, flatMap, map, mapErr, ok, tryCatch } from "../shared/result.js";
import { AlwaysBuy, AlwaysSell } from "./always.js";
import {
	type AmountConfig,
	type StrategyConfig,
	type ThresholdPointConfig,
	strategyConfigSchema,
} from "./config.js";
import { ExponentialMovingAverage } from "./ema.js";
import { NullStrategy } from "./null-strategy.js";
import { ThresholdStrategy } from "./threshold.js";
import type { Strategy, ThresholdPoint } from "./types.js";

/** Deepest accepted chain of nested `ema` wrappers (the leaf counts as one level). */
export const MAX_STRATEGY_DEPTH = 64;

function depthExceeded(depth: number): ConfigError {
	return new ConfigError(
		`Strategy configuration nests deeper than ${MAX_STRATEGY_DEPTH} levels`,
		{ depth, maxDepth: MAX_STRATEGY_DEPTH },
	);
}

/**
 * Counts `ema.inner` levels without recursing, so an absurdly deep document
 * is rejected before schema validation walks it. Stops one level past the
 * cap, which also bounds the walk over a cyclic document.
 */
function documentDepth(doc: unknown): number {
	let depth = 1;
	let node: unknown = doc;
	while (typeof node === "object" && node !== null && depth <= MAX_STRATEGY_DEPTH) {
		const ema: unknown = Reflect.get(node, "ema");
		if (typeof ema !== "object" || ema === null) break;
		node = Reflect.get(ema, "inner");
		depth++;
	}
	return depth;
}

/**
 * Validate an untrusted document (typically parsed JSON) against the
 * strategy configuration shape.
 */
export function parseStrategyConfig(doc: unknown): Result<StrategyConfig, ConfigError> {
	const depth = documentDepth(doc);
	if (depth > MAX_STRATEGY_DEPTH) return err(depthExceeded(depth));

	return mapErr(
		validate(strategyConfigSchema, doc),
		(e) =>
			new ConfigError(`Invalid strategy configuration: ${e.message}`, {
				issues: e.issues,
				cause: e,
			}),
	);
}

export function toFraction(amount: AmountConfig): Result<Fraction, ConfigError> {
	return mapErr(
		tryCatch(() =>
			typeof amount === "object"
				? Fraction.from(amount.numerator, amount.denominator)
				: Fraction.of(amount),
		),
		(e) => new ConfigError(`Invalid amount: ${e.message}`, { cause: e }),
	);
}

function toPoint(
	point: ThresholdPointConfig | null | undefined,
): Result<ThresholdPoint | null, ConfigError> {
	if (point === null || point === undefined) return ok(null);
	return map(toFraction(point.amount), (amount) => ({ at: point.at, amount }));
}

function buildAt(config: StrategyConfig, depth: number): Result<Strategy, ConfigError> {
	if (depth > MAX_STRATEGY_DEPTH) return err(depthExceeded(depth));

	if (config === "null") {
		return ok(new NullStrategy());
	}
	if ("always_buy" in config) {
		return map(toFraction(config.always_buy), (amount) => new AlwaysBuy(amount));
	}
	if ("always_sell" in config) {
		return map(toFraction(config.always_sell), (amount) => new AlwaysSell(amount));
	}
	if ("threshold" in config) {
		const { threshold } = config;
		return flatMap(toPoint(threshold.buy), (buy) =>
			map(toPoint(threshold.sell), (sell) => new ThresholdStrategy({ buy, sell })),
		);
	}
	const { carry, inner } = config.ema;
	return map(buildAt(inner, depth + 1), (built) => new ExponentialMovingAverage(carry, built));
}

/**
 * Build a strategy from an already-typed configuration tree. Inner
 * strategies of `ema` nodes are built first and then wrapped.
 *
 * No numeric range checks: carry outside [0, 1], overlapping thresholds and
 * zero denominators all build.
 */
export function buildStrategy(config: StrategyConfig): Result<Strategy, ConfigError> {
	return buildAt(config, 1);
}

/**
 * Parse and build in one step.
 *
 * @example
 * ```ts
 * const strategy = unwrap(createStrategy(JSON.parse(text)));
 * strategy.trade({ priceLossy: 101.2 });
 * ```
 */
export function createStrategy(doc: unknown): Result<Strategy, ConfigError> {
	return flatMap(parseStrategyConfig(doc), buildStrategy);
}

import { describe, expect, it } from "vitest";
import { ConfigError, ErrorCategory } from "../shared/errors.js";
import { Fraction } from "../shared/fraction.js";
import { unwrap } from "../shared/result.js";
import { AlwaysBuy, AlwaysSell } from "./always.js";
import type { StrategyConfig } from "./config.js";
import { ExponentialMovingAverage } from "./ema.js";
import {
	MAX_STRATEGY_DEPTH,
	buildStrategy,
	createStrategy,
	parseStrategyConfig,
	toFraction,
} from "./factory.js";
import { NullStrategy } from "./null-strategy.js";
import { ThresholdStrategy } from "./threshold.js";
import { buy, tradesEqual } from "./trade.js";
import type { Strategy } from "./types.js";

function emaChain(levels: number): StrategyConfig {
	let config: StrategyConfig = "null";
	for (let i = 1; i < levels; i++) {
		config = { ema: { carry: 0.5, inner: config } };
	}
	return config;
}

function run(strategy: Strategy, prices: readonly number[]) {
	return prices.map((priceLossy) => strategy.trade({ priceLossy }));
}

describe("createStrategy", () => {
	it("builds the null strategy from the string form", () => {
		const strategy = unwrap(createStrategy("null"));
		expect(strategy).toBeInstanceOf(NullStrategy);
		expect(strategy.trade({ priceLossy: 1 })).toBeNull();
	});

	it("builds always_buy and always_sell", () => {
		const buyer = unwrap(createStrategy({ always_buy: 5 }));
		const seller = unwrap(createStrategy({ always_sell: { numerator: 1, denominator: 2 } }));

		expect(buyer).toBeInstanceOf(AlwaysBuy);
		expect(seller).toBeInstanceOf(AlwaysSell);
		expect(buyer.trade({ priceLossy: 0 })).toEqual(buy(Fraction.of(5)));
		expect(seller.trade({ priceLossy: 0 })?.amount.toString()).toBe("1/2");
	});

	it("treats a plain amount as a whole fraction", () => {
		const plain = unwrap(createStrategy({ always_buy: 5 }));
		const explicit = unwrap(createStrategy({ always_buy: { numerator: 5, denominator: 1 } }));
		expect(tradesEqual(plain.trade({ priceLossy: 3 }), explicit.trade({ priceLossy: 3 }))).toBe(
			true,
		);
	});

	it("keeps u64 amounts beyond the float range exact", () => {
		const strategy = unwrap(createStrategy({ always_buy: "18446744073709551615" }));
		expect(strategy.trade({ priceLossy: 1 })?.amount.numerator).toBe(18446744073709551615n);
	});

	it("builds a threshold with one side", () => {
		const strategy = unwrap(createStrategy({ threshold: { sell: { at: 110, amount: 2 } } }));
		expect(strategy).toBeInstanceOf(ThresholdStrategy);
		if (strategy instanceof ThresholdStrategy) {
			expect(strategy.buyPoint).toBeNull();
			expect(strategy.sellPoint?.at).toBe(110);
		}
	});

	it("behaves exactly like the same tree assembled by hand", () => {
		const configured = unwrap(
			createStrategy({
				ema: { carry: 0.9, inner: { threshold: { buy: { at: 100, amount: 5 } } } },
			}),
		);
		const manual = new ExponentialMovingAverage(
			0.9,
			new ThresholdStrategy({ buy: { at: 100, amount: Fraction.of(5) } }),
		);
		const prices = [120, 110, 90, 80, 60, 40, 20, 100, 140, 95];

		const fromConfig = run(configured, prices);
		const fromHand = run(manual, prices);

		expect(configured.name).toBe("EMA(Threshold)");
		expect(fromConfig.some((t) => t !== null)).toBe(true);
		fromConfig.forEach((trade, i) => {
			expect(tradesEqual(trade, fromHand[i] ?? null)).toBe(true);
		});
	});

	it("builds a carry outside [0, 1]", () => {
		const strategy = unwrap(createStrategy({ ema: { carry: 1.5, inner: "null" } }));
		expect(strategy).toBeInstanceOf(ExponentialMovingAverage);
	});

	it("builds a zero denominator", () => {
		const strategy = unwrap(createStrategy({ always_sell: { numerator: 3, denominator: 0 } }));
		expect(strategy.trade({ priceLossy: 1 })?.amount.denominator).toBe(0n);
	});

	it("wraps schema failures in a fatal ConfigError", () => {
		const result = createStrategy({ ema: { carry: "0.5", inner: "null" } });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ConfigError);
			expect(result.error.category).toBe(ErrorCategory.Fatal);
			expect(result.error.message).toBe(
				"Invalid strategy configuration: Validation failed at ema.carry: Expected number, received string",
			);
		}
	});
});

describe("nesting depth", () => {
	it(`accepts ${MAX_STRATEGY_DEPTH} levels`, () => {
		const strategy = unwrap(createStrategy(emaChain(MAX_STRATEGY_DEPTH)));
		expect(strategy.trade({ priceLossy: 10 })).toBeNull();
	});

	it("rejects one level more before validating", () => {
		const result = parseStrategyConfig(emaChain(MAX_STRATEGY_DEPTH + 1));
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("Strategy configuration nests deeper than 64 levels");
			expect(result.error.context["depth"]).toBe(65);
		}
	});

	it("rejects a document whose inner strategy refers back to itself", () => {
		const node: { ema?: { carry: number; inner: unknown } } = {};
		node.ema = { carry: 0.5, inner: node };

		const result = createStrategy(node);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ConfigError);
			expect(result.error.message).toBe("Strategy configuration nests deeper than 64 levels");
			expect(result.error.context["depth"]).toBe(MAX_STRATEGY_DEPTH + 1);
		}
	});

	it("is enforced by buildStrategy on typed trees", () => {
		const result = buildStrategy(emaChain(MAX_STRATEGY_DEPTH + 1));
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe("CONFIG_ERROR");
	});
});

describe("toFraction", () => {
	it("converts whole and fractional amounts", () => {
		expect(unwrap(toFraction(7)).equals(Fraction.of(7))).toBe(true);
		expect(unwrap(toFraction({ numerator: "1", denominator: 3 })).toString()).toBe("1/3");
	});

	it("reports amounts the schema would have rejected", () => {
		const result = toFraction(-3);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("Invalid amount: amount is outside the u64 range: -3");
		}
	});
});

import { bench, describe } from "vitest";
import { Fraction } from "../src/shared/fraction.js";
import { unwrap } from "../src/shared/result.js";
import { ExponentialMovingAverage } from "../src/strategy/ema.js";
import { createStrategy } from "../src/strategy/factory.js";
import { ThresholdStrategy } from "../src/strategy/threshold.js";

function generatePrices(n: number): number[] {
	const prices: number[] = [];
	let price = 1900;
	for (let i = 0; i < n; i++) {
		price += (Math.random() - 0.5) * 20;
		prices.push(price);
	}
	return prices;
}

const prices1k = generatePrices(1_000);

function threshold(): ThresholdStrategy {
	return new ThresholdStrategy({
		buy: { at: 1850, amount: Fraction.of(5) },
		sell: { at: 1950, amount: Fraction.of(5) },
	});
}

describe("strategy decisions", () => {
	bench("Threshold over 1k prices", () => {
		const strategy = threshold();
		for (const price of prices1k) strategy.trade({ priceLossy: price });
	});

	bench("EMA(Threshold) over 1k prices", () => {
		const strategy = new ExponentialMovingAverage(0.9, threshold());
		for (const price of prices1k) strategy.trade({ priceLossy: price });
	});

	bench("EMA x8 nesting over 1k prices", () => {
		let strategy = new ExponentialMovingAverage(0.5, threshold());
		for (let i = 0; i < 7; i++) strategy = new ExponentialMovingAverage(0.5, strategy);
		for (const price of prices1k) strategy.trade({ priceLossy: price });
	});
});

describe("strategy construction", () => {
	const doc = {
		ema: { carry: 0.9, inner: { threshold: { buy: { at: 1850, amount: 5 } } } },
	};

	bench("createStrategy from a parsed document", () => {
		unwrap(createStrategy(doc));
	});
});

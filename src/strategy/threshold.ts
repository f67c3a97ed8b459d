import { buy, sell } from "./trade.js";
import type { Strategy, ThresholdPoint, Trade, TradeContext } from "./types.js";

/** Optional buy and sell levels. Absent levels never fire. */
export interface ThresholdOptions {
	readonly buy?: ThresholdPoint | null | undefined;
	readonly sell?: ThresholdPoint | null | undefined;
}

/**
 * Buys at or below one price, sells at or above another.
 *
 * The buy side is checked first, so when both levels match (only possible
 * with `buy.at >= sell.at`) the result is a buy. Overlapping levels are not
 * rejected. A NaN price matches neither side.
 *
 * @example
 * ```ts
 * const s = new ThresholdStrategy({ buy: { at: 100, amount: Fraction.of(5) } });
 * s.trade({ priceLossy: 99 }); // { type: "buy", amount: 5 }
 * ```
 */
export class ThresholdStrategy implements Strategy {
	readonly name = "Threshold";
	readonly buyPoint: ThresholdPoint | null;
	readonly sellPoint: ThresholdPoint | null;

	constructor(options: ThresholdOptions) {
		this.buyPoint = options.buy ?? null;
		this.sellPoint = options.sell ?? null;
	}

	trade(ctx: TradeContext): Trade | null {
		const price = ctx.priceLossy;
		if (this.buyPoint !== null && price <= this.buyPoint.at) {
			return buy(this.buyPoint.amount);
		}
		if (this.sellPoint !== null && price >= this.sellPoint.at) {
			return sell(this.sellPoint.amount);
		}
		return null;
	}
}

import type { Strategy, Trade, TradeContext } from "./types.js";

/**
 * Exponential moving average over the observed price, feeding the smoothed
 * value to an inner strategy.
 *
 *   s0 = p0
 *   sn = s(n-1) * carry + pn * (1 - carry)
 *
 * The average is updated on every call, whether or not the inner strategy
 * trades. `carry` is not range-checked: values outside [0, 1] make the
 * recurrence diverge instead of smooth.
 */
export class ExponentialMovingAverage implements Strategy {
	readonly name: string;
	readonly carry: number;
	private readonly inner: Strategy;
	private last: number | null = null;

	constructor(carry: number, inner: Strategy) {
		this.carry = carry;
		this.inner = inner;
		this.name = `EMA(${inner.name})`;
	}

	trade(ctx: TradeContext): Trade | null {
		const price = ctx.priceLossy;
		const smoothed =
			this.last === null ? price : this.last * this.carry + price * (1 - this.carry);
		this.last = smoothed;
		return this.inner.trade({ priceLossy: smoothed });
	}

	/** Current average, `null` before the first observation. */
	smoothedPrice(): number | null {
		return this.last;
	}
}

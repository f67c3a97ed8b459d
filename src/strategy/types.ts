/**
 * Strategy capability and the values that flow through it.
 *
 * A strategy sees one TradeContext per block and answers with at most one
 * Trade. `trade()` is synchronous, total and free of I/O; composites own
 * their inner strategy and delegate to it.
 */

import type { Fraction } from "../shared/fraction.js";

/** Snapshot handed to a strategy each evaluation cycle. */
export interface TradeContext {
	/** Pool price computed upstream; lossy float, may be any IEEE-754 value. */
	readonly priceLossy: number;
}

/** Direction of a trade intent. */
export const TradeSide = {
	Buy: "buy",
	Sell: "sell",
} as const;

export type TradeSide = (typeof TradeSide)[keyof typeof TradeSide];

/** A proposed, not yet executed, swap. */
export type Trade =
	| { readonly type: typeof TradeSide.Buy; readonly amount: Fraction }
	| { readonly type: typeof TradeSide.Sell; readonly amount: Fraction };

export interface Strategy {
	readonly name: string;
	/** `null` means no trade this cycle. May update internal state. */
	trade(ctx: TradeContext): Trade | null;
}

/** Price level paired with the amount to trade once the level is crossed. */
export interface ThresholdPoint {
	readonly at: number;
	readonly amount: Fraction;
}

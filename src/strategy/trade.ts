import type { Fraction } from "../shared/fraction.js";
import { type Trade, TradeSide } from "./types.js";

export function buy(amount: Fraction): Trade {
	return { type: TradeSide.Buy, amount };
}

export function sell(amount: Fraction): Trade {
	return { type: TradeSide.Sell, amount };
}

export function isBuy(trade: Trade | null): trade is Extract<Trade, { type: "buy" }> {
	return trade !== null && trade.type === TradeSide.Buy;
}

export function isSell(trade: Trade | null): trade is Extract<Trade, { type: "sell" }> {
	return trade !== null && trade.type === TradeSide.Sell;
}

/** Structural equality; two absent trades are equal. */
export function tradesEqual(a: Trade | null, b: Trade | null): boolean {
	if (a === null || b === null) return a === b;
	return a.type === b.type && a.amount.equals(b.amount);
}

/** "buy 5", "sell 1/2", "none". */
export function describeTrade(trade: Trade | null): string {
	return trade === null ? "none" : `${trade.type} ${trade.amount.toString()}`;
}

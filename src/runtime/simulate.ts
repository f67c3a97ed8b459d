import type { Strategy, Trade } from "../strategy/types.js";

export interface SimulationStep {
	readonly index: number;
	readonly price: number;
	readonly trade: Trade | null;
}

/**
 * Feeds `prices` to `strategy` in order, one call per price, and records what
 * it decided. Stateful strategies keep their state afterwards.
 */
export function simulate(strategy: Strategy, prices: readonly number[]): SimulationStep[] {
	return prices.map((price, index) => ({
		index,
		price,
		trade: strategy.trade({ priceLossy: price }),
	}));
}

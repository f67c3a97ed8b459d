import type { Strategy, Trade, TradeContext } from "./types.js";

/** Never trades. Explicit "do nothing" and the base of composite chains. */
export class NullStrategy implements Strategy {
	readonly name = "Null";

	trade(_ctx: TradeContext): Trade | null {
		return null;
	}
}

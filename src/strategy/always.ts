/**
 * Unconditional strategies: trade a fixed amount every cycle, whatever the
 * price. Used for accumulation and for deterministic end-to-end runs.
 */

import type { Fraction } from "../shared/fraction.js";
import { buy, sell } from "./trade.js";
import type { Strategy, Trade, TradeContext } from "./types.js";

export class AlwaysBuy implements Strategy {
	readonly name = "AlwaysBuy";
	readonly amount: Fraction;

	constructor(amount: Fraction) {
		this.amount = amount;
	}

	trade(_ctx: TradeContext): Trade {
		return buy(this.amount);
	}
}

export class AlwaysSell implements Strategy {
	readonly name = "AlwaysSell";
	readonly amount: Fraction;

	constructor(amount: Fraction) {
		this.amount = amount;
	}

	trade(_ctx: TradeContext): Trade {
		return sell(this.amount);
	}
}

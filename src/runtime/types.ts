/**
 * Runtime bounded context — collaborator ports and loop vocabulary.
 *
 * The loop only talks to the chain through these three ports. Each call is
 * fallible and reports failure as an EngineError whose category decides
 * whether the loop retries on the next poll or stops.
 */

import type { EngineError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import type { Trade } from "../strategy/types.js";

/** Reports the newest block number the node knows about. */
export interface BlockSource {
	latestBlock(): Promise<Result<number, EngineError>>;
}

/** Prices the watched pool as of a block. */
export interface PriceSource {
	priceAt(block: number): Promise<Result<number, EngineError>>;
}

/** Block and price a trade intent was decided on. */
export interface ExecutionContext {
	readonly block: number;
	readonly price: number;
}

export interface ExecutionReceipt {
	readonly id: string;
	readonly block: number;
	readonly trade: Trade;
	readonly price: number;
	/** amount × price, 8 decimal places. */
	readonly notional: string;
	readonly timestampMs: number;
}

/** Carries out trade intents -- implemented by PaperTradeExecutor. */
export interface TradeExecutor {
	execute(trade: Trade, ctx: ExecutionContext): Promise<Result<ExecutionReceipt, EngineError>>;
}

// ── Loop ────────────────────────────────────────────────────────────

export interface LoopConfig {
	readonly pollIntervalMs: number;
	readonly maxConsecutiveFailures: number;
}

export const FailureStage = {
	Block: "block",
	Price: "price",
	Execution: "execution",
} as const;

export type FailureStage = (typeof FailureStage)[keyof typeof FailureStage];

/** Result of a single poll. */
export type StepOutcome =
	| { readonly type: "idle" }
	| { readonly type: "busy" }
	| { readonly type: "no_trade"; readonly block: number; readonly price: number }
	| {
			readonly type: "traded";
			readonly block: number;
			readonly price: number;
			readonly trade: Trade;
			readonly receipt: ExecutionReceipt;
	  }
	| { readonly type: "failed"; readonly stage: FailureStage; readonly error: EngineError };

/** Why `run()` returned. */
export type LoopStop =
	| { readonly reason: "aborted" }
	| { readonly reason: "fatal"; readonly error: EngineError }
	| { readonly reason: "too_many_failures"; readonly error: EngineError };

export type TradingLoopEvents = {
	block: (block: number, price: number) => void;
	trade: (receipt: ExecutionReceipt) => void;
	failure: (stage: FailureStage, error: EngineError) => void;
	stopped: (stop: LoopStop) => void;
};

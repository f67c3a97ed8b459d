/**
 * PaperTradeExecutor — simulated execution for replays and dry runs.
 *
 * Every intent fills in full at the decision price. No network calls;
 * deterministic when given a FakeClock.
 */

import { LibDecimal } from "../lib/decimal/index.js";
import { ErrorCategory, ExecutionError } from "../shared/errors.js";
import type { EngineError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import type { Trade } from "../strategy/types.js";
import type { ExecutionContext, ExecutionReceipt, TradeExecutor } from "./types.js";

export interface PaperTradeExecutorConfig {
	readonly clock: Clock;
	/** Oldest receipts are dropped beyond this many. */
	readonly maxReceipts: number;
}

const NOTIONAL_PLACES = 8;

export class PaperTradeExecutor implements TradeExecutor {
	private readonly config: PaperTradeExecutorConfig;
	private counter = 0;
	private readonly history: ExecutionReceipt[] = [];

	constructor(config?: Partial<PaperTradeExecutorConfig>) {
		const maxReceipts = config?.maxReceipts ?? 10_000;
		if (!Number.isSafeInteger(maxReceipts) || maxReceipts <= 0) {
			throw new RangeError(`maxReceipts must be a positive integer, got ${maxReceipts}`);
		}
		this.config = { clock: config?.clock ?? SystemClock, maxReceipts };
	}

	async execute(
		trade: Trade,
		ctx: ExecutionContext,
	): Promise<Result<ExecutionReceipt, EngineError>> {
		if (!Number.isFinite(ctx.price)) {
			return err(
				new ExecutionError(
					`Cannot fill at non-finite price ${ctx.price}`,
					ErrorCategory.NonRetryable,
					{ block: ctx.block },
				),
			);
		}
		if (trade.amount.denominator === 0n) {
			return err(
				new ExecutionError(
					`Trade amount ${trade.amount.toString()} has a zero denominator`,
					ErrorCategory.NonRetryable,
					{ block: ctx.block, amount: trade.amount.toJSON() },
				),
			);
		}

		this.counter++;
		const receipt: ExecutionReceipt = {
			id: `paper-${this.counter}`,
			block: ctx.block,
			trade,
			price: ctx.price,
			notional: notionalOf(trade, ctx.price),
			timestampMs: this.config.clock.now(),
		};
		this.history.push(receipt);
		if (this.history.length > this.config.maxReceipts) {
			this.history.shift();
		}
		return ok(receipt);
	}

	/** Receipts in execution order. */
	receipts(): readonly ExecutionReceipt[] {
		return [...this.history];
	}

	get executedCount(): number {
		return this.counter;
	}
}

function notionalOf(trade: Trade, price: number): string {
	const { numerator, denominator } = trade.amount;
	return LibDecimal.fromBigInt(numerator)
		.mul(LibDecimal.from(price))
		.div(LibDecimal.fromBigInt(denominator))
		.toFixed(NOTIONAL_PLACES);
}

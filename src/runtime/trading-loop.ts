/**
 * TradingLoop — polls the chain head and runs one strategy decision per new
 * block.
 *
 * Each poll: read the latest block, skip it if already processed, price it,
 * consult the strategy, hand any trade to the executor. A block counts as
 * processed once the strategy has seen it, so a failed execution is never
 * decided twice; a failed price lookup leaves the block for the next poll.
 */

import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { ConfigError, classifyError } from "../shared/errors.js";
import type { EngineError } from "../shared/errors.js";
import { err, tryCatchAsync } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock, Sleep } from "../shared/time.js";
import { Duration, SystemClock, sleep as defaultSleep } from "../shared/time.js";
import { describeTrade } from "../strategy/trade.js";
import type { Strategy } from "../strategy/types.js";
import { FailureStage } from "./types.js";
import type {
	BlockSource,
	LoopConfig,
	LoopStop,
	PriceSource,
	StepOutcome,
	TradeExecutor,
	TradingLoopEvents,
} from "./types.js";

export const DEFAULT_LOOP_CONFIG: LoopConfig = {
	pollIntervalMs: Duration.seconds(12),
	maxConsecutiveFailures: 5,
};

export interface TradingLoopDeps {
	readonly strategy: Strategy;
	readonly blocks: BlockSource;
	readonly prices: PriceSource;
	readonly executor: TradeExecutor;
	readonly logger: Logger;
	readonly clock?: Clock | undefined;
	readonly sleep?: Sleep | undefined;
}

export interface LoopStats {
	readonly blocksProcessed: number;
	readonly tradesExecuted: number;
	readonly failures: number;
	readonly lastProcessedBlock: number | null;
	readonly lastProcessedAtMs: number | null;
}

/** Collaborator calls that throw are folded into the Result channel. */
async function settle<T>(
	call: () => Promise<Result<T, EngineError>>,
): Promise<Result<T, EngineError>> {
	const outcome = await tryCatchAsync(call);
	return outcome.ok ? outcome.value : err(classifyError(outcome.error));
}

function positiveInt(name: keyof LoopConfig, value: number): number {
	if (!Number.isSafeInteger(value) || value <= 0) {
		throw new ConfigError(`${name} must be a positive integer, got ${value}`, { [name]: value });
	}
	return value;
}

export class TradingLoop {
	readonly events = new TypedEmitter<TradingLoopEvents>();
	private readonly deps: TradingLoopDeps;
	private readonly config: LoopConfig;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly sleep: Sleep;

	private stepInProgress = false;
	private running = false;
	private lastProcessedBlock: number | null = null;
	private lastProcessedAtMs: number | null = null;
	private blocksProcessed = 0;
	private tradesExecuted = 0;
	private failures = 0;

	constructor(deps: TradingLoopDeps, config?: Partial<LoopConfig>) {
		this.deps = deps;
		this.config = {
			pollIntervalMs: positiveInt(
				"pollIntervalMs",
				config?.pollIntervalMs ?? DEFAULT_LOOP_CONFIG.pollIntervalMs,
			),
			maxConsecutiveFailures: positiveInt(
				"maxConsecutiveFailures",
				config?.maxConsecutiveFailures ?? DEFAULT_LOOP_CONFIG.maxConsecutiveFailures,
			),
		};
		this.logger = deps.logger.child({ component: "trading-loop", strategy: deps.strategy.name });
		this.clock = deps.clock ?? SystemClock;
		this.sleep = deps.sleep ?? defaultSleep;
	}

	/** One poll. Concurrent calls return `busy` without touching any collaborator. */
	async step(): Promise<StepOutcome> {
		if (this.stepInProgress) {
			return { type: "busy" };
		}
		this.stepInProgress = true;
		try {
			return await this.poll();
		} finally {
			this.stepInProgress = false;
		}
	}

	/**
	 * Polls until `signal` aborts or a failure ends the run. Retryable
	 * failures are retried on the next poll; non-retryable ones stop at once.
	 */
	async run(signal: AbortSignal): Promise<LoopStop> {
		if (this.running) {
			throw new Error("TradingLoop is already running");
		}
		this.running = true;
		this.logger.info({ pollIntervalMs: this.config.pollIntervalMs }, "trading loop started");

		let stop: LoopStop = { reason: "aborted" };
		let consecutiveFailures = 0;
		try {
			while (!signal.aborted) {
				const outcome = await this.step();
				if (outcome.type === "failed") {
					if (!outcome.error.isRetryable) {
						stop = { reason: "fatal", error: outcome.error };
						break;
					}
					consecutiveFailures++;
					if (consecutiveFailures >= this.config.maxConsecutiveFailures) {
						stop = { reason: "too_many_failures", error: outcome.error };
						break;
					}
				} else if (outcome.type !== "busy") {
					consecutiveFailures = 0;
				}
				await this.sleep(this.config.pollIntervalMs, signal);
			}
		} finally {
			this.running = false;
		}

		if (stop.reason === "aborted") {
			this.logger.info({ reason: stop.reason }, "trading loop stopped");
		} else {
			this.logger.error({ reason: stop.reason, err: stop.error.toJSON() }, "trading loop stopped");
		}
		this.events.emit("stopped", stop);
		return stop;
	}

	stats(): LoopStats {
		return {
			blocksProcessed: this.blocksProcessed,
			tradesExecuted: this.tradesExecuted,
			failures: this.failures,
			lastProcessedBlock: this.lastProcessedBlock,
			lastProcessedAtMs: this.lastProcessedAtMs,
		};
	}

	private async poll(): Promise<StepOutcome> {
		const head = await settle(() => this.deps.blocks.latestBlock());
		if (!head.ok) {
			return this.fail(FailureStage.Block, head.error, null);
		}
		const block = head.value;
		if (this.lastProcessedBlock !== null && block <= this.lastProcessedBlock) {
			return { type: "idle" };
		}

		const quote = await settle(() => this.deps.prices.priceAt(block));
		if (!quote.ok) {
			return this.fail(FailureStage.Price, quote.error, block);
		}
		const price = quote.value;

		const trade = this.deps.strategy.trade({ priceLossy: price });
		this.lastProcessedBlock = block;
		this.lastProcessedAtMs = this.clock.now();
		this.blocksProcessed++;
		this.events.emit("block", block, price);

		if (trade === null) {
			this.logger.debug({ block, price }, "no trade");
			return { type: "no_trade", block, price };
		}

		this.logger.info({ block, price, trade: describeTrade(trade) }, "trade decided");
		const executed = await settle(() => this.deps.executor.execute(trade, { block, price }));
		if (!executed.ok) {
			return this.fail(FailureStage.Execution, executed.error, block);
		}

		const receipt = executed.value;
		this.tradesExecuted++;
		this.logger.info(
			{ block, receiptId: receipt.id, notional: receipt.notional },
			"trade executed",
		);
		this.events.emit("trade", receipt);
		return { type: "traded", block, price, trade, receipt };
	}

	private fail(stage: FailureStage, error: EngineError, block: number | null): StepOutcome {
		this.failures++;
		const fields = { stage, block, err: error.toJSON() };
		if (error.isRetryable) {
			this.logger.warn(fields, `${stage} stage failed, retrying on next poll`);
		} else {
			this.logger.error(fields, `${stage} stage failed`);
		}
		this.events.emit("failure", stage, error);
		return { type: "failed", stage, error };
	}
}

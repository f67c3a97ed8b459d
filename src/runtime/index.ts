export type {
	BlockSource,
	ExecutionContext,
	ExecutionReceipt,
	LoopConfig,
	LoopStop,
	PriceSource,
	StepOutcome,
	TradeExecutor,
	TradingLoopEvents,
} from "./types.js";
export { FailureStage } from "./types.js";

export { ReplayFeed } from "./replay-feed.js";
export type { ReplayFeedOptions } from "./replay-feed.js";
export { PaperTradeExecutor } from "./paper-executor.js";
export type { PaperTradeExecutorConfig } from "./paper-executor.js";
export { simulate } from "./simulate.js";
export type { SimulationStep } from "./simulate.js";
export { DEFAULT_LOOP_CONFIG, TradingLoop } from "./trading-loop.js";
export type { LoopStats, TradingLoopDeps } from "./trading-loop.js";

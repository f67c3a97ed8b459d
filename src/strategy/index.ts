export type {
	Strategy,
	ThresholdPoint,
	Trade,
	TradeContext,
} from "./types.js";
export { TradeSide } from "./types.js";

export { buy, sell, isBuy, isSell, tradesEqual, describeTrade } from "./trade.js";

export { NullStrategy } from "./null-strategy.js";
export { AlwaysBuy, AlwaysSell } from "./always.js";
export { ThresholdStrategy } from "./threshold.js";
export type { ThresholdOptions } from "./threshold.js";
export { ExponentialMovingAverage } from "./ema.js";

export type {
	AmountConfig,
	EmaConfig,
	FractionConfig,
	StrategyConfig,
	ThresholdConfig,
	ThresholdPointConfig,
	U64Config,
} from "./config.js";
export { STRATEGY_VARIANTS, strategyConfigSchema } from "./config.js";

export {
	MAX_STRATEGY_DEPTH,
	buildStrategy,
	createStrategy,
	parseStrategyConfig,
	toFraction,
} from "./factory.js";
export { loadStrategyFile } from "./loader.js";

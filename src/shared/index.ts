export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	unwrap,
	tryCatch,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	type ErrorContext,
	EngineError,
	ConfigError,
	BlockSourceError,
	PriceSourceError,
	ExecutionError,
	SystemError,
	classifyError,
	isConfigError,
} from "./errors.js";

export { Fraction, type U64Like, U64_MAX, toU64 } from "./fraction.js";
export { type Clock, SystemClock, FakeClock, type Sleep, sleep, Duration } from "./time.js";
export {
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	envOr,
	resolveConfig,
} from "./config.js";

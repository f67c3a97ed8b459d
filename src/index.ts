// ── Shared Kernel ────────────────────────────────────────────────────
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
	Fraction,
	type U64Like,
	U64_MAX,
	type Clock,
	SystemClock,
	FakeClock,
	type Sleep,
	sleep,
	Duration,
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	envOr,
	resolveConfig,
} from "./shared/index.js";

// ── Libraries ───────────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	LOG_LEVELS,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { ValidationError, type ValidationIssue } from "./lib/validation/index.js";
export { TypedEmitter } from "./lib/events/index.js";

// ── Strategy ────────────────────────────────────────────────────────
export * from "./strategy/index.js";

// ── Runtime ─────────────────────────────────────────────────────────
export * from "./runtime/index.js";

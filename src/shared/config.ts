/**
 * Engine configuration.
 *
 * Values resolve in three layers: built-in defaults, then `TICKWISE_*`
 * environment variables, then explicit overrides from the caller.
 */

import { LOG_LEVELS, type LogLevel, type Logger, isLogLevel } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { Duration } from "./time.js";

export interface EngineConfig {
	/** Bound as `name` on every log line. */
	readonly name: string;
	readonly chainId: number;
	/** JSON-RPC endpoint of the node the drivers read blocks from. */
	readonly rpcUrl: string;
	/** JSON strategy document loaded at startup. */
	readonly strategyPath: string;
	/** Delay between polls for a new block. */
	readonly pollIntervalMs: number;
	/** Retryable failures in a row before the loop gives up. */
	readonly maxConsecutiveFailures: number;
	readonly logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	name: "tickwise",
	chainId: 1,
	rpcUrl: "http://127.0.0.1:8545",
	strategyPath: "strategy.json",
	pollIntervalMs: Duration.seconds(12),
	maxConsecutiveFailures: 5,
	logLevel: "info",
};

/** Reads `key`, falling back when it is unset or empty. */
export function envOr(key: string, fallback: string, logger?: Logger): string {
	const value = process.env[key];
	if (value !== undefined && value !== "") {
		logger?.info(`Using provided value for ${key}`);
		return value;
	}
	logger?.info(`Env var ${key} not provided, using default ${fallback}`);
	return fallback;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function positiveInt(key: string, raw: string): number {
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed <= 0 || !Number.isSafeInteger(parsed)) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a positive integer`, { key });
	}
	return parsed;
}

function logLevel(key: string, raw: string): LogLevel {
	if (!isLogLevel(raw)) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be one of: ${LOG_LEVELS.join(", ")}`, {
			key,
		});
	}
	return raw;
}

function url(key: string, raw: string): string {
	const checked = validate(z.string().url(), raw);
	if (!checked.ok) {
		throw new ConfigError(`Invalid ${key}: "${raw}" is not a URL`, { key, cause: checked.error });
	}
	return checked.value;
}

/**
 * Reads TICKWISE_NAME, TICKWISE_CHAIN_ID, TICKWISE_RPC_URL,
 * TICKWISE_STRATEGY_PATH, TICKWISE_POLL_INTERVAL_MS,
 * TICKWISE_MAX_CONSECUTIVE_FAILURES and TICKWISE_LOG_LEVEL over the defaults.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(logger?: Logger): EngineConfig {
	const d = DEFAULT_ENGINE_CONFIG;
	return {
		name: envOr("TICKWISE_NAME", d.name, logger),
		chainId: positiveInt(
			"TICKWISE_CHAIN_ID",
			envOr("TICKWISE_CHAIN_ID", String(d.chainId), logger),
		),
		rpcUrl: url("TICKWISE_RPC_URL", envOr("TICKWISE_RPC_URL", d.rpcUrl, logger)),
		strategyPath: envOr("TICKWISE_STRATEGY_PATH", d.strategyPath, logger),
		pollIntervalMs: positiveInt(
			"TICKWISE_POLL_INTERVAL_MS",
			envOr("TICKWISE_POLL_INTERVAL_MS", String(d.pollIntervalMs), logger),
		),
		maxConsecutiveFailures: positiveInt(
			"TICKWISE_MAX_CONSECUTIVE_FAILURES",
			envOr("TICKWISE_MAX_CONSECUTIVE_FAILURES", String(d.maxConsecutiveFailures), logger),
		),
		logLevel: logLevel("TICKWISE_LOG_LEVEL", envOr("TICKWISE_LOG_LEVEL", d.logLevel, logger)),
	};
}

/**
 * Defaults, then environment, then `overrides`.
 *
 * @example
 * ```ts
 * const config = resolveConfig({ pollIntervalMs: Duration.seconds(1) });
 * ```
 */
export function resolveConfig(
	overrides: Partial<EngineConfig> = {},
	logger?: Logger,
): EngineConfig {
	return { ...configFromEnv(logger), ...overrides };
}

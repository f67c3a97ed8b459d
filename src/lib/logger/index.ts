/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Components receive a `Logger` and derive children with their own bindings
 * (`{ component: "trading-loop" }`). Strategies never log: the decision path
 * stays free of I/O.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	/** Bound as `name` on every line. */
	readonly name?: string | undefined;
	/** Custom sink; defaults to stdout. */
	readonly destination?: { write(msg: string): void } | undefined;
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Factory ─────────────────────────────────────────────────────────

type PinoMethod = "info" | "warn" | "error" | "debug";

function forward(
	pinoLogger: pino.Logger,
	method: PinoMethod,
): (msgOrObj: string | Record<string, unknown>, msg?: string) => void {
	return (msgOrObj, msg) => {
		if (typeof msgOrObj === "string") {
			pinoLogger[method](msgOrObj);
		} else {
			pinoLogger[method](msgOrObj, msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info: forward(pinoLogger, "info"),
		warn: forward(pinoLogger, "warn"),
		error: forward(pinoLogger, "error"),
		debug: forward(pinoLogger, "debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", name: "tickwise" });
 * logger.child({ component: "trading-loop" }).info({ block: 17_000_000 }, "block processed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: pino.LoggerOptions = { level: config.level };
	if (config.name !== undefined) {
		options.name = config.name;
	}
	const pinoLogger = config.destination ? pino(options, config.destination) : pino(options);
	return wrapPino(pinoLogger);
}

/** A logger that drops everything. Default for components built without one. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}

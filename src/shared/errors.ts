/**
 * EngineError hierarchy — structured error classification.
 *
 * The decision path itself never fails; these errors come from strategy
 * construction and from the collaborators around the driver loop. The
 * category decides whether the loop retries on the next poll or stops.
 */

/** Error severity categories that drive the loop's retry/abort policy. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Extra context accepted by every subclass; `cause` is lifted onto the error. */
export type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

export class EngineError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "EngineError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Malformed or unrecognized configuration. Fails startup. */
export class ConfigError extends EngineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

/** The block source could not report the chain head. */
export class BlockSourceError extends EngineError {
	constructor(
		message: string,
		category: ErrorCategory = ErrorCategory.Retryable,
		context: ErrorContext = {},
	) {
		super(message, "BLOCK_SOURCE_ERROR", category, context);
		this.name = "BlockSourceError";
	}
}

/** The price source could not price a block. */
export class PriceSourceError extends EngineError {
	constructor(
		message: string,
		category: ErrorCategory = ErrorCategory.Retryable,
		context: ErrorContext = {},
	) {
		super(message, "PRICE_SOURCE_ERROR", category, context);
		this.name = "PriceSourceError";
	}
}

/** The executor failed to carry out a trade intent. */
export class ExecutionError extends EngineError {
	constructor(
		message: string,
		category: ErrorCategory = ErrorCategory.Retryable,
		context: ErrorContext = {},
	) {
		super(message, "EXECUTION_ERROR", category, context);
		this.name = "ExecutionError";
	}
}

/** Unexpected internal failure. */
export class SystemError extends EngineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

// ── Classification ───────────────────────────────────────────────────

const RETRYABLE_CODES = new Set(["ETIMEDOUT", "ECONNREFUSED", "ECONNRESET", "ENOTFOUND"]);

function errnoCode(error: Error): string | undefined {
	const code: unknown = Reflect.get(error, "code");
	return typeof code === "string" ? code : undefined;
}

/**
 * Classify a thrown value. EngineErrors pass through, connection and timeout
 * failures become retryable `TRANSIENT_ERROR`s, anything else is a SystemError.
 */
export function classifyError(error: unknown): EngineError {
	if (error instanceof EngineError) return error;
	if (error instanceof Error) {
		const code = errnoCode(error);
		const msg = error.message.toLowerCase();
		if (
			(code !== undefined && RETRYABLE_CODES.has(code)) ||
			msg.includes("timeout") ||
			msg.includes("timed out") ||
			msg.includes("fetch failed")
		) {
			return new EngineError(error.message, "TRANSIENT_ERROR", ErrorCategory.Retryable, {
				cause: error,
			});
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

import { describe, expect, it } from "vitest";
import {
	BlockSourceError,
	ConfigError,
	EngineError,
	ErrorCategory,
	ExecutionError,
	PriceSourceError,
	SystemError,
	classifyError,
	isConfigError,
} from "./errors.js";

describe("EngineError hierarchy", () => {
	describe("categories", () => {
		const cases: Array<[string, EngineError, ErrorCategory]> = [
			["ConfigError", new ConfigError("bad config"), ErrorCategory.Fatal],
			["SystemError", new SystemError("panic"), ErrorCategory.Fatal],
			["BlockSourceError", new BlockSourceError("head unavailable"), ErrorCategory.Retryable],
			["PriceSourceError", new PriceSourceError("no price"), ErrorCategory.Retryable],
			["ExecutionError", new ExecutionError("reverted"), ErrorCategory.Retryable],
			[
				"PriceSourceError (explicit)",
				new PriceSourceError("out of range", ErrorCategory.NonRetryable),
				ErrorCategory.NonRetryable,
			],
		];

		it.each(cases)("%s has category %s", (_name, error, expected) => {
			expect(error.category).toBe(expected);
			expect(error.isRetryable).toBe(expected === ErrorCategory.Retryable);
		});
	});

	it("sets name and code per subclass", () => {
		const e = new ConfigError("bad");
		expect(e.name).toBe("ConfigError");
		expect(e.code).toBe("CONFIG_ERROR");
		expect(e).toBeInstanceOf(EngineError);
		expect(e).toBeInstanceOf(Error);
	});

	it("lifts cause out of the context", () => {
		const root = new Error("root");
		const e = new ConfigError("wrapped", { cause: root, path: "/tmp/x.json" });
		expect(e.cause).toBe(root);
		expect(e.context).toEqual({ path: "/tmp/x.json" });
	});

	it("serializes to JSON", () => {
		const e = new ExecutionError("reverted", ErrorCategory.NonRetryable, { block: 7 });
		expect(e.toJSON()).toEqual({
			name: "ExecutionError",
			message: "reverted",
			code: "EXECUTION_ERROR",
			category: "non_retryable",
			retryable: false,
			context: { block: 7 },
		});
	});

	it("isConfigError narrows", () => {
		expect(isConfigError(new ConfigError("x"))).toBe(true);
		expect(isConfigError(new SystemError("x"))).toBe(false);
		expect(isConfigError("x")).toBe(false);
	});
});

describe("classifyError", () => {
	it("passes EngineErrors through unchanged", () => {
		const e = new PriceSourceError("no price");
		expect(classifyError(e)).toBe(e);
	});

	it("maps errno connection failures to retryable", () => {
		const raw = Object.assign(new Error("connect failed"), { code: "ECONNREFUSED" });
		const classified = classifyError(raw);
		expect(classified.code).toBe("TRANSIENT_ERROR");
		expect(classified.isRetryable).toBe(true);
		expect(classified.cause).toBe(raw);
	});

	it("maps timeout messages to retryable", () => {
		expect(classifyError(new Error("Request timed out")).isRetryable).toBe(true);
	});

	it("maps other errors to fatal SystemError", () => {
		const classified = classifyError(new Error("unexpected"));
		expect(classified).toBeInstanceOf(SystemError);
		expect(classified.category).toBe(ErrorCategory.Fatal);
	});

	it("wraps non-Error values", () => {
		const classified = classifyError(42);
		expect(classified).toBeInstanceOf(SystemError);
		expect(classified.message).toBe("42");
	});
});

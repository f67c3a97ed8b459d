/**
 * Configuration-file loader: reads a JSON strategy document from disk and
 * builds the strategy it describes.
 */

import { readFile } from "node:fs/promises";
import type { Logger } from "../lib/logger/index.js";
import { ConfigError } from "../shared/errors.js";
import { type Result, err, tryCatch, tryCatchAsync } from "../shared/result.js";
import { createStrategy } from "./factory.js";
import type { Strategy } from "./types.js";

export async function loadStrategyFile(
	filePath: string,
	logger?: Logger,
): Promise<Result<Strategy, ConfigError>> {
	const text = await tryCatchAsync(() => readFile(filePath, "utf8"));
	if (!text.ok) {
		return err(
			new ConfigError(`Cannot read strategy file ${filePath}: ${text.error.message}`, {
				path: filePath,
				cause: text.error,
			}),
		);
	}

	const doc = tryCatch((): unknown => JSON.parse(text.value));
	if (!doc.ok) {
		return err(
			new ConfigError(`Strategy file ${filePath} is not valid JSON: ${doc.error.message}`, {
				path: filePath,
				cause: doc.error,
			}),
		);
	}

	const built = createStrategy(doc.value);
	if (built.ok) {
		logger?.info({ path: filePath, strategy: built.value.name }, "strategy loaded");
	} else {
		logger?.error({ path: filePath, err: built.error.toJSON() }, "strategy configuration rejected");
	}
	return built;
}

/**
 * Validation wrapper — Zod schemas in, Result<T, ValidationError> out.
 *
 * Domain modules build schemas with the re-exported `z` and never import
 * zod themselves, so the dependency stays behind this one path.
 */

import { z } from "zod";
import { EngineError, ErrorCategory } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the offending field. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

export class ValidationError extends EngineError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** "ema.carry: Expected number, received string"; "(root)" for top-level issues. */
export function formatIssue(issue: ValidationIssue): string {
	const where = issue.path.length === 0 ? "(root)" : issue.path.join(".");
	return `${where}: ${issue.message}`;
}

export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	const first = issues[0];
	const summary =
		first === undefined ? "Validation failed" : `Validation failed at ${formatIssue(first)}`;
	return err(new ValidationError(summary, issues));
}

/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code imports `{ z }` from here rather than from "zod" directly,
 * so the dependency stays behind a single import path.
 */

import { z } from "zod";
import { LedgerError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends LedgerError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", "non_retryable", { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}

	/** One line per issue, `path: message`. */
	describe(): string {
		return this.issues
			.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
			.join("; ");
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	label = "Validation failed",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError(label, issues));
}

export function isValidationError(e: unknown): e is ValidationError {
	return e instanceof ValidationError;
}

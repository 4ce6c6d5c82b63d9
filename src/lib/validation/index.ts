/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * The snapshot codec, config loader and file-backed collaborators all validate
 * through here. Re-exports `z` so schemas are built without importing zod directly.
 */

import { z } from "zod";
import { EngineError, ErrorCategory } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends EngineError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, {
			issues: issues.map(formatIssue),
		});
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** `positions.0.entries.1.quantity: Expected string, received number` */
export function formatIssue(issue: ValidationIssue): string {
	const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
	return `${path}: ${issue.message}`;
}

/**
 * Validate data against a Zod schema, returning a Result instead of throwing.
 * Transforming schemas are supported: the success value is the schema's output type.
 */
export function validate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
): Result<z.output<S>, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues));
}

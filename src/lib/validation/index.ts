/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Used for client configuration and for every message decoded off the wire:
 * proto-loader hands back plain objects, and the schemas here turn them into
 * typed responses.
 */

import { z } from "zod";
import { ErrorCategory, FederationError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends FederationError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, {
			issues: issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`),
		});
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/**
 * Validate data against a Zod schema, returning a Result instead of throwing.
 * @param label - Prefix for the error message, e.g. the message type being decoded
 */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	label = "Validation",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError(`${label} failed`, issues));
}

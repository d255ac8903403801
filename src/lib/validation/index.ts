/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Boundary code (Data API records, venue responses, files on disk) parses
 * through `validate()`; domain code never sees unvalidated input.
 */

import { z } from "zod";
import { Decimal } from "../../shared/decimal.js";
import { ErrorCategory, TradingError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";

/**
 * Zod re-export. Schemas are defined with `z` imported from here so the
 * dependency stays behind a single import path.
 */
export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable: a record or file did not match its schema. */
export class ValidationError extends TradingError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issues: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}

	/** `path: message` pairs joined for a single log line. */
	summary(): string {
		return this.issues
			.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
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

/**
 * Decimal field that arrives as a JSON string or number ("0.38" or 0.38).
 * Blank and non-numeric values are validation issues.
 */
export const decimalSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
	try {
		return Decimal.from(value);
	} catch (e) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: e instanceof Error ? e.message : `Invalid decimal: ${String(value)}`,
		});
		return z.NEVER;
	}
});

/**
 * TradingError hierarchy: structured error classification.
 *
 * Every error carries a category (retryable, non-retryable, fatal). The
 * liquidation loop reprices on retryable venue failures, the monitor loop
 * logs and continues on anything that is not fatal, and the CLI aborts
 * before trading on fatal errors.
 */

/** Error severity categories. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Optional cause and operator hint accepted by every subclass. */
interface TradingErrorOptions {
	readonly cause?: unknown;
	readonly hint?: string;
}

type ErrorContext = Record<string, unknown> & TradingErrorOptions;

/** Base error class for venue, data and configuration failures. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

function split(context: ErrorContext): {
	rest: Record<string, unknown>;
	cause: unknown;
	hint: string | undefined;
} {
	const { cause, hint, ...rest } = context;
	return { rest, cause, hint };
}

// ── Specific error types ─────────────────────────────────────────────

/** Retryable: the venue or data service could not be reached. */
export class NetworkError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { rest, cause, hint } = split(context);
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, rest, hint);
		this.name = "NetworkError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable: a request exceeded its deadline. */
export class TimeoutError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { rest, cause, hint } = split(context);
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, rest, hint);
		this.name = "TimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable: HTTP 429 from the venue; carries a retry-after hint in ms. */
export class RateLimitError extends TradingError {
	readonly retryAfterMs: number;
	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		const { rest, cause, hint } = split(context);
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, rest, hint);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			retryAfterMs: this.retryAfterMs,
		};
	}
}

/** Fatal: missing or invalid trading credentials. */
export class AuthError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { rest, cause, hint } = split(context);
		super(message, "AUTH_ERROR", ErrorCategory.Fatal, rest, hint);
		this.name = "AuthError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal: invalid or missing configuration. */
export class ConfigError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { rest, cause, hint } = split(context);
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest, hint);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable: unexpected failure with no better classification. */
export class SystemError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { rest, cause, hint } = split(context);
		super(message, "SYSTEM_ERROR", ErrorCategory.NonRetryable, rest, hint);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

function readStatus(value: unknown): number | undefined {
	if (typeof value !== "object" || value === null) return undefined;
	const status = "status" in value ? value.status : undefined;
	if (typeof status === "number" && status >= 400) return status;
	const response = "response" in value ? value.response : undefined;
	if (typeof response === "object" && response !== null && "status" in response) {
		const nested = response.status;
		if (typeof nested === "number" && nested >= 400) return nested;
	}
	return undefined;
}

/** HTTP status from the error itself, its context, or its cause. */
function getHttpStatus(error: Error): number | undefined {
	const direct = readStatus(error);
	if (direct !== undefined) return direct;
	if (error instanceof TradingError) {
		const fromContext = readStatus(error.context);
		if (fromContext !== undefined) return fromContext;
	}
	return error.cause instanceof Error ? readStatus(error.cause) : undefined;
}

function errnoCode(error: Error): string | undefined {
	return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

/** Classify an unknown thrown value into the matching TradingError subtype. */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const code = errnoCode(error);

		const httpStatus = getHttpStatus(error);
		if (httpStatus === 429) {
			return new RateLimitError(error.message, 1000, { cause: error });
		}
		if (httpStatus === 401 || httpStatus === 403) {
			return new AuthError(error.message, { cause: error });
		}
		if (httpStatus !== undefined && httpStatus >= 500) {
			return new NetworkError(error.message, { cause: error, status: httpStatus });
		}

		if (error.name === "TimeoutError" || error.name === "AbortError" || code === "ETIMEDOUT") {
			return new TimeoutError(error.message, { cause: error });
		}
		if (code === "ECONNREFUSED" || code === "ENOTFOUND" || code === "ECONNRESET") {
			return new NetworkError(error.message, { cause: error });
		}

		if (msg.includes("timeout") || msg.includes("timed out")) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (msg.includes("econnrefused") || msg.includes("enotfound") || msg.includes("fetch failed")) {
			return new NetworkError(error.message, { cause: error });
		}
		if (msg.includes("rate limit") || msg.includes("429")) {
			return new RateLimitError(error.message, 1000, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

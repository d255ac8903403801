/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Auto-redacts opaque credential objects (anything with `__opaque: true`),
 * supports path-based redaction, and can tee every line into a log file
 * alongside stdout.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/** Anything pino can write serialized lines to. */
export interface LogDestination {
	write(msg: string): void;
}

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	/** Replaces stdout. Used by tests to capture output. */
	readonly destination?: LogDestination;
	/** Appends every line to this file in addition to the main destination. */
	readonly filePath?: string;
}

/** Structured logger interface with auto-redaction of opaque credentials. */
export interface Logger {
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	fatal(msg: string): void;
	fatal(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Credential serializer ───────────────────────────────────────────

function isOpaqueCredential(value: unknown): boolean {
	return (
		typeof value === "object" && value !== null && "__opaque" in value && value.__opaque === true
	);
}

function redactCredentials(obj: object): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaqueCredential(value) ? "[REDACTED]" : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type WrappedLevel = "debug" | "info" | "warn" | "error" | "fatal";

function wrapPino(pinoLogger: pino.Logger): Logger {
	const log =
		(level: WrappedLevel) =>
		(msgOrObj: unknown, msg?: string): void => {
			if (typeof msgOrObj === "object" && msgOrObj !== null) {
				pinoLogger[level](redactCredentials(msgOrObj), msg ?? "");
			} else {
				pinoLogger[level](String(msgOrObj ?? ""));
			}
		};

	return {
		debug: log("debug"),
		info: log("info"),
		warn: log("warn"),
		error: log("error"),
		fatal: log("fatal"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", filePath: "stop-loss.log" });
 * logger.warn({ tokenId, pnlPct: -23.1 }, "stop loss triggered");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const main: pino.DestinationStream = config.destination ?? pino.destination(1);

	if (config.filePath === undefined) {
		return wrapPino(pino(pinoOptions, main));
	}

	const file = pino.destination({ dest: config.filePath, mkdir: true, sync: true });
	const streams = pino.multistream([
		{ level: config.level, stream: main },
		{ level: config.level, stream: file },
	]);
	return wrapPino(pino(pinoOptions, streams));
}

/** Logger that discards everything. Default for library consumers and tests. */
export function silentLogger(): Logger {
	return wrapPino(pino({ level: "silent" }));
}

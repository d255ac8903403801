/**
 * Process-level settings read from the environment (and `.env`, loaded by
 * the CLI entry point before anything here runs).
 */

import { Secret, sealPrivateKey } from "../auth/credentials.js";
import {
	POLYGON_CHAIN_ID,
	POLYMARKET_CLOB_HOST,
	PROXY_SIGNATURE_TYPE,
} from "../lib/clob/polymarket-providers.js";
import type { ClobConfig } from "../lib/clob/types.js";
import { type LogLevel, isLogLevel } from "../lib/logger/index.js";
import { DEFAULT_SELECTION_FILE } from "../persistence/selection-store.js";
import { POLYMARKET_DATA_API_URL } from "../position/data-api-provider.js";
import {
	DEFAULT_STOP_LOSS_CONFIG,
	SelectionMode,
	type StopLossConfig,
	configFromEnv,
	effectiveSelectionMode,
	validateConfig,
	withDryRun,
	withSelection,
} from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";
import { type EthAddress, type MarketTokenId, ethAddress } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

export const DEFAULT_LEDGER_FILE = "stop-loss-executions.jsonl";

export interface RuntimeSettings {
	/** Account whose positions are monitored. */
	readonly accountAddress: EthAddress | null;
	readonly privateKey: Secret<string> | null;
	/** Proxy wallet that holds the positions; defaults to the account address. */
	readonly funderAddress: EthAddress | null;
	readonly clobHost: string;
	readonly dataApiUrl: string;
	readonly telegramBotToken: Secret<string> | null;
	readonly telegramChatId: string | null;
	readonly logLevel: LogLevel;
	readonly logFile: string | null;
	readonly selectionFile: string;
	readonly ledgerFile: string;
	/** Rotate the ledger once it reaches this size; null never rotates. */
	readonly ledgerMaxBytes: number | null;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | null {
	const raw = env[key]?.trim();
	return raw === undefined || raw === "" ? null : raw;
}

function readAddress(env: NodeJS.ProcessEnv, key: string): EthAddress | null {
	const raw = readString(env, key);
	if (raw === null) return null;
	try {
		return ethAddress(raw);
	} catch {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a 0x-prefixed 20-byte address`);
	}
}

function readPositiveInt(env: NodeJS.ProcessEnv, key: string): number | null {
	const raw = readString(env, key);
	if (raw === null) return null;
	const value = Number(raw);
	if (!Number.isSafeInteger(value) || value <= 0) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a positive integer`);
	}
	return value;
}

/** @throws ConfigError naming the first malformed variable */
export function loadRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
	const accountAddress = readAddress(env, "STOP_LOSS_ACCOUNT_ADDRESS");
	const rawKey = readString(env, "PRIVATE_KEY");

	const logLevel = readString(env, "LOG_LEVEL")?.toLowerCase() ?? "info";
	if (!isLogLevel(logLevel)) {
		throw new ConfigError(`Invalid LOG_LEVEL: "${logLevel}"`, {
			hint: "Use one of trace, debug, info, warn, error, fatal",
		});
	}

	const token = readString(env, "TELEGRAM_BOT_TOKEN");
	return {
		accountAddress,
		privateKey: rawKey === null ? null : sealPrivateKey(rawKey),
		funderAddress: readAddress(env, "STOP_LOSS_FUNDER_ADDRESS") ?? accountAddress,
		clobHost: readString(env, "CLOB_HOST") ?? POLYMARKET_CLOB_HOST,
		dataApiUrl: readString(env, "DATA_API_URL") ?? POLYMARKET_DATA_API_URL,
		telegramBotToken: token === null ? null : new Secret(token),
		telegramChatId: readString(env, "TELEGRAM_CHAT_ID"),
		logLevel,
		logFile: readString(env, "LOG_FILE"),
		selectionFile: readString(env, "STOP_LOSS_SELECTION_FILE") ?? DEFAULT_SELECTION_FILE,
		ledgerFile: readString(env, "STOP_LOSS_LEDGER_FILE") ?? DEFAULT_LEDGER_FILE,
		ledgerMaxBytes: readPositiveInt(env, "STOP_LOSS_LEDGER_MAX_BYTES"),
	};
}

/** @throws ConfigError when the account address is missing */
export function requireAccount(settings: RuntimeSettings): EthAddress {
	if (settings.accountAddress === null) {
		throw new ConfigError("STOP_LOSS_ACCOUNT_ADDRESS is not set", {
			hint: "Set it to the Polymarket proxy address that holds the positions",
		});
	}
	return settings.accountAddress;
}

/** @throws AuthError when PRIVATE_KEY is missing, ConfigError when no funder is known */
export function clobConfigFrom(settings: RuntimeSettings): {
	config: ClobConfig;
	privateKey: Secret<string>;
} {
	const privateKey = settings.privateKey ?? sealPrivateKey(undefined);
	const funder = settings.funderAddress ?? requireAccount(settings);
	return {
		config: {
			host: settings.clobHost,
			chainId: POLYGON_CHAIN_ID,
			signatureType: PROXY_SIGNATURE_TYPE,
			funderAddress: funder,
		},
		privateKey,
	};
}

export interface RunFlags {
	readonly live: boolean;
	readonly all: boolean;
}

/**
 * Effective configuration: defaults, then environment thresholds, then the
 * command-line flags. Without `--all` the stored selection decides what is
 * monitored.
 */
export function buildStopLossConfig(
	env: NodeJS.ProcessEnv,
	flags: RunFlags,
	selected: readonly MarketTokenId[],
): Result<StopLossConfig, ConfigError> {
	let thresholds: ReturnType<typeof configFromEnv>;
	try {
		thresholds = configFromEnv(env);
	} catch (e: unknown) {
		if (e instanceof ConfigError) return err(e);
		throw e;
	}
	const validated = validateConfig({ ...DEFAULT_STOP_LOSS_CONFIG, ...thresholds });
	if (!validated.ok) return validated;

	let config = flags.all
		? withSelection(validated.value, SelectionMode.All)
		: withSelection(validated.value, SelectionMode.Selected, selected);
	if (flags.live) config = withDryRun(config, false);
	return ok(config);
}

/** Lines printed by `stop-loss config`. */
export function describeConfig(config: StopLossConfig, settings: RuntimeSettings): string[] {
	const selected = [...config.selectedTokenIds];
	const telegram = settings.telegramBotToken !== null && settings.telegramChatId !== null;
	const rotation =
		settings.ledgerMaxBytes === null ? "off" : `at ${settings.ledgerMaxBytes} bytes`;
	return [
		`Stop loss percentage: ${config.stopLossPercentage}%`,
		`Stop loss price: ${config.stopLossPrice === null ? "not set" : config.stopLossPrice}`,
		`Check interval: ${config.checkIntervalSeconds}s`,
		`Minimum position value: $${config.minPositionValue}`,
		`Max slippage: ${config.maxSlippage}`,
		`Dry run: ${config.dryRun ? "yes" : "no"}`,
		`Selection mode: ${effectiveSelectionMode(config)}`,
		`Selected positions: ${selected.length === 0 ? "none" : selected.join(", ")}`,
		`Account: ${settings.accountAddress ?? "not set"}`,
		`Private key: ${settings.privateKey === null ? "not set" : "set"}`,
		`Telegram: ${telegram ? "enabled" : "disabled"}`,
		`Selection file: ${settings.selectionFile}`,
		`Ledger file: ${settings.ledgerFile}`,
		`Ledger rotation: ${rotation}`,
		`Log file: ${settings.logFile ?? "none"}`,
	];
}

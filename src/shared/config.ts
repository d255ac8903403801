/**
 * Stop-loss configuration: an immutable value passed into every operation.
 *
 * Changes go through withThresholds / withSelection / withDryRun, which
 * validate and return a new config instead of mutating shared state.
 */

import { ConfigError } from "./errors.js";
import type { MarketTokenId } from "./identifiers.js";
import { type Result, err, ok } from "./result.js";

/** Which positions of a snapshot are under monitoring. */
export const SelectionMode = {
	None: "none",
	All: "all",
	Selected: "selected",
} as const;

export type SelectionMode = (typeof SelectionMode)[keyof typeof SelectionMode];

export interface StopLossConfig {
	/** Loss magnitude in percent that triggers a sale (20 means P&L% ≤ −20). */
	readonly stopLossPercentage: number;
	/** Absolute price floor trigger; null when unset. */
	readonly stopLossPrice: number | null;
	readonly checkIntervalSeconds: number;
	/** Positions worth less than this are dropped from the snapshot. */
	readonly minPositionValue: number;
	/** Advisory slippage bound, reported but not enforced by the executor. */
	readonly maxSlippage: number;
	/** Log intended sales instead of placing orders. */
	readonly dryRun: boolean;
	readonly selectionMode: SelectionMode;
	readonly selectedTokenIds: ReadonlySet<MarketTokenId>;
}

export const MIN_CHECK_INTERVAL_SECONDS = 10;

export const DEFAULT_STOP_LOSS_CONFIG: StopLossConfig = {
	stopLossPercentage: 20,
	stopLossPrice: null,
	checkIntervalSeconds: 60,
	minPositionValue: 0.1,
	maxSlippage: 0.05,
	dryRun: true,
	selectionMode: SelectionMode.None,
	selectedTokenIds: new Set(),
};

/**
 * Mode actually in effect: "selected" with nothing selected monitors nothing.
 * It never widens to "all".
 */
export function effectiveSelectionMode(config: StopLossConfig): SelectionMode {
	if (config.selectionMode === SelectionMode.Selected && config.selectedTokenIds.size === 0) {
		return SelectionMode.None;
	}
	return config.selectionMode;
}

/** Checks every numeric bound; returns the same config when valid. */
export function validateConfig(config: StopLossConfig): Result<StopLossConfig, ConfigError> {
	const p = config.stopLossPercentage;
	if (!Number.isFinite(p) || p <= 0 || p > 100) {
		return err(new ConfigError(`stopLossPercentage must be in (0, 100], got ${p}`, { value: p }));
	}
	const price = config.stopLossPrice;
	if (price !== null && (!Number.isFinite(price) || price <= 0)) {
		return err(new ConfigError(`stopLossPrice must be positive, got ${price}`, { value: price }));
	}
	const interval = config.checkIntervalSeconds;
	if (!Number.isInteger(interval) || interval < MIN_CHECK_INTERVAL_SECONDS) {
		return err(
			new ConfigError(
				`checkIntervalSeconds must be an integer >= ${MIN_CHECK_INTERVAL_SECONDS}, got ${interval}`,
				{ value: interval },
			),
		);
	}
	const minValue = config.minPositionValue;
	if (!Number.isFinite(minValue) || minValue < 0) {
		return err(
			new ConfigError(`minPositionValue must be >= 0, got ${minValue}`, { value: minValue }),
		);
	}
	const slippage = config.maxSlippage;
	if (!Number.isFinite(slippage) || slippage < 0 || slippage > 1) {
		return err(
			new ConfigError(`maxSlippage must be in [0, 1], got ${slippage}`, { value: slippage }),
		);
	}
	return ok(config);
}

/** Threshold fields that may be changed after startup. */
export type ThresholdPatch = Partial<
	Pick<
		StopLossConfig,
		| "stopLossPercentage"
		| "stopLossPrice"
		| "checkIntervalSeconds"
		| "minPositionValue"
		| "maxSlippage"
	>
>;

export function withThresholds(
	config: StopLossConfig,
	patch: ThresholdPatch,
): Result<StopLossConfig, ConfigError> {
	return validateConfig({ ...config, ...patch });
}

/**
 * Replaces the selection. `all` and `none` clear the id set; `selected`
 * keeps exactly the given ids (possibly none, which monitors nothing).
 */
export function withSelection(
	config: StopLossConfig,
	mode: SelectionMode,
	tokenIds: Iterable<MarketTokenId> = [],
): StopLossConfig {
	const ids = mode === SelectionMode.Selected ? new Set(tokenIds) : new Set<MarketTokenId>();
	return { ...config, selectionMode: mode, selectedTokenIds: ids };
}

export function withDryRun(config: StopLossConfig, dryRun: boolean): StopLossConfig {
	return { ...config, dryRun };
}

// ── Environment ──────────────────────────────────────────────────────

/** Mutable builder shape for Partial<StopLossConfig>. */
interface MutableThresholds {
	stopLossPercentage?: number;
	stopLossPrice?: number | null;
	checkIntervalSeconds?: number;
	minPositionValue?: number;
	maxSlippage?: number;
	dryRun?: boolean;
}

/**
 * Reads threshold overrides from the environment.
 * Supported: STOP_LOSS_PERCENTAGE, STOP_LOSS_PRICE, STOP_LOSS_CHECK_INTERVAL_SECONDS,
 * STOP_LOSS_MIN_POSITION_VALUE, STOP_LOSS_MAX_SLIPPAGE, STOP_LOSS_DRY_RUN.
 * @throws ConfigError if a variable holds a malformed number or boolean
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): MutableThresholds {
	const result: MutableThresholds = {};

	const pct = parseNumberEnv(env, "STOP_LOSS_PERCENTAGE");
	if (pct !== undefined) result.stopLossPercentage = pct;

	const rawPrice = env["STOP_LOSS_PRICE"];
	if (rawPrice !== undefined && rawPrice.trim().toLowerCase() === "none") {
		result.stopLossPrice = null;
	} else {
		const price = parseNumberEnv(env, "STOP_LOSS_PRICE");
		if (price !== undefined) result.stopLossPrice = price;
	}

	const interval = parseNumberEnv(env, "STOP_LOSS_CHECK_INTERVAL_SECONDS");
	if (interval !== undefined) result.checkIntervalSeconds = interval;

	const minValue = parseNumberEnv(env, "STOP_LOSS_MIN_POSITION_VALUE");
	if (minValue !== undefined) result.minPositionValue = minValue;

	const slippage = parseNumberEnv(env, "STOP_LOSS_MAX_SLIPPAGE");
	if (slippage !== undefined) result.maxSlippage = slippage;

	const dryRun = env["STOP_LOSS_DRY_RUN"];
	if (dryRun !== undefined && dryRun.trim().length > 0) {
		const normalized = dryRun.trim().toLowerCase();
		if (normalized !== "true" && normalized !== "false") {
			throw new ConfigError(`Invalid STOP_LOSS_DRY_RUN: "${dryRun}" must be true or false`);
		}
		result.dryRun = normalized === "true";
	}

	return result;
}

function parseNumberEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
	const raw = env[key];
	if (raw === undefined || raw.trim().length === 0) return undefined;
	const parsed = Number(raw.trim());
	if (!Number.isFinite(parsed)) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a number`);
	}
	return parsed;
}

/**
 * Builders shared by the test suites.
 */

import { DEFAULT_STOP_LOSS_CONFIG, type StopLossConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { marketTokenId } from "../shared/identifiers.js";
import { Position } from "../position/position.js";

export interface PositionOverrides {
	readonly tokenId?: string;
	readonly marketName?: string;
	readonly outcome?: string;
	readonly size?: string | number;
	readonly currentPrice?: string | number;
	readonly currentValue?: string | number;
	readonly initialValue?: string | number;
}

/** 100 shares at 0.40 bought for 50: P&L −10, P&L% −20. */
export function makePosition(overrides: PositionOverrides = {}): Position {
	return Position.create({
		tokenId: marketTokenId(overrides.tokenId ?? "tok-1"),
		marketName: overrides.marketName ?? "Will it rain in Lisbon?",
		outcome: overrides.outcome ?? "Yes",
		size: Decimal.from(overrides.size ?? "100"),
		currentPrice: Decimal.from(overrides.currentPrice ?? "0.4"),
		currentValue: Decimal.from(overrides.currentValue ?? "40"),
		initialValue: Decimal.from(overrides.initialValue ?? "50"),
	});
}

/** Position with the given P&L% on an initial value of 100. */
export function positionWithPnlPct(pnlPct: string, tokenId = "tok-1"): Position {
	const currentValue = Decimal.from("100").add(Decimal.from(pnlPct));
	return makePosition({ tokenId, currentValue: currentValue.toString(), initialValue: "100" });
}

export function makeConfig(overrides: Partial<StopLossConfig> = {}): StopLossConfig {
	return { ...DEFAULT_STOP_LOSS_CONFIG, selectionMode: "all", ...overrides };
}

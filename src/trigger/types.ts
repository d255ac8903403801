import type { Decimal } from "../shared/decimal.js";
import type { MarketTokenId } from "../shared/identifiers.js";
import type { Position } from "../position/position.js";

/** Why a position must be sold. Both variants can hold at once. */
export type TriggerReason =
	| { readonly type: "percentage"; readonly pnlPct: Decimal; readonly threshold: Decimal }
	| { readonly type: "price"; readonly currentPrice: Decimal; readonly stopLossPrice: Decimal };

export interface TriggerDecision {
	readonly triggered: boolean;
	readonly reasons: readonly TriggerReason[];
}

export interface SelectionResult {
	readonly monitored: readonly Position[];
	/** Selected ids absent from the snapshot, once each, in selection order. */
	readonly missingTokenIds: readonly MarketTokenId[];
}

/**
 * Monitor types: what one cycle saw and did.
 */

import type { ExecutionResult } from "../execution/types.js";
import type { Position } from "../position/position.js";
import type { TradingError } from "../shared/errors.js";
import type { MarketTokenId } from "../shared/identifiers.js";
import type { TriggerReason } from "../trigger/types.js";

export type CycleStatus = "completed" | "failed" | "skipped";

export interface TriggeredPosition {
	readonly position: Position;
	readonly reasons: readonly TriggerReason[];
}

/** Either a result or the error that prevented one. */
export type LiquidationOutcome =
	| { readonly tokenId: MarketTokenId; readonly ok: true; readonly result: ExecutionResult }
	| { readonly tokenId: MarketTokenId; readonly ok: false; readonly error: TradingError };

export interface CycleReport {
	readonly cycle: number;
	readonly status: CycleStatus;
	/** False for failed and skipped cycles. */
	readonly ok: boolean;
	readonly startedAt: number;
	readonly durationMs: number;
	readonly positions: readonly Position[];
	readonly monitored: readonly Position[];
	readonly triggered: readonly TriggeredPosition[];
	readonly outcomes: readonly LiquidationOutcome[];
	readonly missingTokenIds: readonly MarketTokenId[];
	/** Records skipped by the Data API schema. */
	readonly skippedRecords: number;
	readonly error: TradingError | null;
}

export interface SchedulerStats {
	readonly cycles: number;
	readonly failedCycles: number;
	readonly skippedCycles: number;
	readonly consecutiveErrors: number;
	readonly triggers: number;
	readonly liquidations: number;
	readonly executionErrors: number;
	readonly lastCycleAt: number | null;
}

/**
 * Execution ledger: one record per liquidation attempt, live or dry run.
 */

import { type ExecutionSummary, summarizeExecution } from "../execution/summary.js";
import type { ExecutionResult } from "../execution/types.js";
import type { Position } from "../position/position.js";

export interface LedgerPosition {
	readonly tokenId: string;
	readonly market: string;
	readonly outcome: string;
	readonly size: number;
	readonly value: number;
	readonly pnl: number;
	readonly pnlPct: number;
}

export interface LedgerRecord {
	/** ISO-8601 */
	readonly timestamp: string;
	readonly position: LedgerPosition;
	readonly result: ExecutionSummary;
}

/** Append-only store of liquidation records. */
export interface ExecutionLedger {
	append(record: LedgerRecord): Promise<void>;
	/** Waits for pending writes. */
	flush(): Promise<void>;
}

export function toLedgerRecord(
	position: Position,
	result: ExecutionResult,
	nowMs: number,
): LedgerRecord {
	const summary = position.toSummary();
	return {
		timestamp: new Date(nowMs).toISOString(),
		position: {
			tokenId: summary.tokenId,
			market: summary.market,
			outcome: summary.outcome,
			size: summary.size,
			value: summary.value,
			pnl: summary.pnl,
			pnlPct: summary.pnlPct,
		},
		result: summarizeExecution(result),
	};
}

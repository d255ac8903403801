/**
 * Bot events: what the monitor tells the outside world.
 *
 * Payloads are plain JSON-friendly values so subscribers (logs, Telegram,
 * the console) never touch Decimal or domain classes.
 */

import type { ExecutionSummary } from "../execution/summary.js";
import type { PositionSummary } from "../position/position.js";
import type { SelectionMode } from "../shared/config.js";

export type BotEvent =
	| BotStarted
	| TriggerFired
	| LiquidationExecuted
	| ExecutionErrored
	| CycleErrored
	| CycleCompleted;

export type BotEventType = BotEvent["type"];

/** Narrows the union to the member with the given `type`. */
export type BotEventOf<T extends BotEventType> = Extract<BotEvent, { type: T }>;

// ── Event types ──────────────────────────────────────────────────────

export interface BotStarted {
	readonly type: "bot_started";
	readonly timestamp: number;
	readonly stopLossPercentage: number;
	readonly stopLossPrice: number | null;
	readonly checkIntervalSeconds: number;
	readonly dryRun: boolean;
	readonly selectionMode: SelectionMode;
	readonly selectedCount: number;
}

export interface TriggerFired {
	readonly type: "trigger_fired";
	readonly timestamp: number;
	readonly position: PositionSummary;
	/** Human-readable trigger reasons, one per condition that held. */
	readonly reasons: readonly string[];
}

export interface LiquidationExecuted {
	readonly type: "liquidation_executed";
	readonly timestamp: number;
	readonly position: PositionSummary;
	readonly result: ExecutionSummary;
}

export interface ExecutionErrored {
	readonly type: "execution_error";
	readonly timestamp: number;
	readonly position: PositionSummary;
	readonly error: string;
	readonly code: string;
}

export interface CycleErrored {
	readonly type: "cycle_error";
	readonly timestamp: number;
	readonly error: string;
	readonly code: string;
	readonly consecutiveErrors: number;
}

export interface CycleCompleted {
	readonly type: "cycle_completed";
	readonly timestamp: number;
	readonly cycle: number;
	readonly positions: number;
	readonly monitored: number;
	readonly triggered: number;
	readonly liquidated: number;
	readonly durationMs: number;
}

export function isBotEventOf<T extends BotEventType>(
	event: BotEvent,
	type: T,
): event is BotEventOf<T> {
	return event.type === type;
}

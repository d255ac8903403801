/**
 * Sample bot events for subscriber tests.
 */

import type { BotEvent, BotEventOf } from "../events/bot-events.js";
import type { PositionSummary } from "../position/position.js";

export const SAMPLE_POSITION: PositionSummary = {
	tokenId: "tok-1",
	market: "Will it rain in Lisbon?",
	outcome: "Yes",
	size: 100,
	price: 0.4,
	value: 40,
	pnl: -10,
	pnlPct: -20,
};

export const TRIGGER_FIRED: BotEventOf<"trigger_fired"> = {
	type: "trigger_fired",
	timestamp: 1_000,
	position: SAMPLE_POSITION,
	reasons: ["P&L -20.00% <= -20%"],
};

export const LIQUIDATION_EXECUTED: BotEventOf<"liquidation_executed"> = {
	type: "liquidation_executed",
	timestamp: 2_000,
	position: SAMPLE_POSITION,
	result: {
		success: true,
		status: "done",
		ordersPlaced: 2,
		totalSizeOrdered: 100,
		remainingSize: 0,
		originalSize: 100,
		orders: [
			{ orderId: "ord-1", price: 0.38, size: 50, phase: "chunk" },
			{ orderId: "ord-2", price: 0.38, size: 50, phase: "chunk" },
		],
		attemptCount: 2,
		priceSource: "best_bid",
		error: null,
		dryRun: false,
	},
};

export const CYCLE_ERROR: BotEventOf<"cycle_error"> = {
	type: "cycle_error",
	timestamp: 3_000,
	error: "Data API returned 503",
	code: "NETWORK_ERROR",
	consecutiveErrors: 2,
};

export const ALL_SAMPLE_EVENTS: readonly BotEvent[] = [TRIGGER_FIRED, LIQUIDATION_EXECUTED, CYCLE_ERROR];

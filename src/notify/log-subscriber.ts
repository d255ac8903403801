/**
 * Turns every bot event into one structured log line.
 */

import type { BotEvent } from "../events/bot-events.js";
import type { BotEventBus } from "../events/event-bus.js";
import type { Logger } from "../lib/logger/index.js";

export function logBotEvent(logger: Logger, event: BotEvent): void {
	switch (event.type) {
		case "bot_started":
			logger.info(
				{
					stopLossPercentage: event.stopLossPercentage,
					stopLossPrice: event.stopLossPrice,
					checkIntervalSeconds: event.checkIntervalSeconds,
					dryRun: event.dryRun,
					selectionMode: event.selectionMode,
					selectedCount: event.selectedCount,
				},
				"Stop-loss monitor started",
			);
			return;
		case "trigger_fired":
			logger.warn(
				{ tokenId: event.position.tokenId, market: event.position.market, reasons: event.reasons },
				"STOP LOSS TRIGGERED",
			);
			return;
		case "liquidation_executed":
			logger.info(
				{
					tokenId: event.position.tokenId,
					market: event.position.market,
					status: event.result.status,
					ordersPlaced: event.result.ordersPlaced,
					totalSizeOrdered: event.result.totalSizeOrdered,
					remainingSize: event.result.remainingSize,
					dryRun: event.result.dryRun,
				},
				"STOP LOSS EXECUTED",
			);
			return;
		case "execution_error":
			logger.error(
				{
					tokenId: event.position.tokenId,
					market: event.position.market,
					code: event.code,
					error: event.error,
				},
				"Stop-loss execution failed",
			);
			return;
		case "cycle_error":
			logger.error(
				{ code: event.code, error: event.error, consecutiveErrors: event.consecutiveErrors },
				"Monitoring cycle failed",
			);
			return;
		case "cycle_completed":
			logger.info(
				{
					cycle: event.cycle,
					positions: event.positions,
					monitored: event.monitored,
					triggered: event.triggered,
					liquidated: event.liquidated,
					durationMs: event.durationMs,
				},
				"Monitoring cycle complete",
			);
			return;
	}
}

/** Subscribes a logger to the bus. Returns the unsubscribe function. */
export function attachLogSubscriber(bus: BotEventBus, logger: Logger): () => void {
	const log = logger.child({ module: "events" });
	return bus.onAny((event) => logBotEvent(log, event));
}

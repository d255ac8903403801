import { Decimal } from "../shared/decimal.js";
import type { StopLossConfig } from "../shared/config.js";
import type { Position } from "../position/position.js";
import type { TriggerDecision, TriggerReason } from "./types.js";

/**
 * Decides whether a position must be liquidated.
 *
 * Fires when P&L% ≤ −stopLossPercentage (inclusive) or, when a price trigger
 * is configured, when currentPrice ≤ stopLossPrice. Both conditions are
 * checked independently and every one that holds is reported. Pure.
 *
 * @example
 * ```ts
 * const decision = evaluateTrigger(position, config);
 * if (decision.triggered) logger.warn({ reasons: decision.reasons.map(describeReason) }, "trigger");
 * ```
 */
export function evaluateTrigger(position: Position, config: StopLossConfig): TriggerDecision {
	const reasons: TriggerReason[] = [];

	const threshold = Decimal.from(config.stopLossPercentage);
	if (position.pnlPct.lte(threshold.neg())) {
		reasons.push({ type: "percentage", pnlPct: position.pnlPct, threshold });
	}

	if (config.stopLossPrice !== null) {
		const stopLossPrice = Decimal.from(config.stopLossPrice);
		if (position.currentPrice.lte(stopLossPrice)) {
			reasons.push({ type: "price", currentPrice: position.currentPrice, stopLossPrice });
		}
	}

	return { triggered: reasons.length > 0, reasons };
}

/** Human-readable reason for logs and notifications. */
export function describeReason(reason: TriggerReason): string {
	switch (reason.type) {
		case "percentage":
			return `P&L ${reason.pnlPct.toFixed(2)}% <= -${reason.threshold.toString()}%`;
		case "price":
			return `price ${reason.currentPrice.toString()} <= stop price ${reason.stopLossPrice.toString()}`;
	}
}

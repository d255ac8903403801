/**
 * Plain-number projection of an ExecutionResult for events, the ledger and
 * notifications.
 */

import type { ExecutionResult, LiquidationStatus, OrderPhase, PriceSource } from "./types.js";

export interface OrderSummary {
	readonly orderId: string | null;
	readonly price: number;
	readonly size: number;
	readonly phase: OrderPhase;
}

export interface ExecutionSummary {
	readonly success: boolean;
	readonly status: LiquidationStatus;
	readonly ordersPlaced: number;
	readonly totalSizeOrdered: number;
	readonly remainingSize: number;
	readonly originalSize: number;
	readonly orders: readonly OrderSummary[];
	readonly attemptCount: number;
	readonly priceSource: PriceSource;
	readonly error: string | null;
	readonly dryRun: boolean;
}

export function summarizeExecution(result: ExecutionResult): ExecutionSummary {
	return {
		success: result.success,
		status: result.status,
		ordersPlaced: result.ordersPlaced,
		totalSizeOrdered: result.totalSizeOrdered.toNumber(),
		remainingSize: result.remainingSize.toNumber(),
		originalSize: result.originalSize.toNumber(),
		orders: result.orders.map((o) => ({
			orderId: o.orderId,
			price: o.price.toNumber(),
			size: o.size.toNumber(),
			phase: o.phase,
		})),
		attemptCount: result.attempts.length,
		priceSource: result.priceSource,
		error: result.error,
		dryRun: result.dryRun,
	};
}

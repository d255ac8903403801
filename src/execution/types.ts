/**
 * Execution bounded context: liquidation results, policy and the
 * Liquidator seam.
 *
 * ChunkedLiquidator and DryRunLiquidator sit behind the same interface so
 * the scheduler never knows whether orders are real.
 */

import type { Position } from "../position/position.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigError } from "../shared/errors.js";
import type { ExchangeOrderId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

/** Terminal state of one liquidation attempt. */
export const LiquidationStatus = {
	Done: "done",
	PartiallyFilled: "partially_filled",
	Failed: "failed",
} as const;

export type LiquidationStatus = (typeof LiquidationStatus)[keyof typeof LiquidationStatus];

/** Which part of the algorithm placed an order. */
export const OrderPhase = {
	Chunk: "chunk",
	FinalSweep: "final_sweep",
} as const;

export type OrderPhase = (typeof OrderPhase)[keyof typeof OrderPhase];

/** How the opening sell price was found. `no_bids` and `book_error` are fallbacks, not failures. */
export const PriceSource = {
	BestBid: "best_bid",
	NoBids: "no_bids",
	BookError: "book_error",
} as const;

export type PriceSource = (typeof PriceSource)[keyof typeof PriceSource];

/** An order the venue accepted. */
export interface OrderReceipt {
	readonly orderId: ExchangeOrderId | null;
	readonly price: Decimal;
	readonly size: Decimal;
	readonly phase: OrderPhase;
	/** 1-based submission counter across the whole liquidation. */
	readonly attempt: number;
}

export type AttemptOutcome = "accepted" | "rejected" | "error";

/** Every submission, accepted or not, for logs and post-mortems. */
export interface AttemptRecord {
	readonly attempt: number;
	readonly phase: OrderPhase;
	readonly price: Decimal;
	readonly size: Decimal;
	readonly outcome: AttemptOutcome;
	readonly remainingAfter: Decimal;
	readonly errorMsg: string | null;
}

export interface ExecutionResult {
	/** True iff at least one order was accepted. */
	readonly success: boolean;
	readonly status: LiquidationStatus;
	readonly ordersPlaced: number;
	readonly totalSizeOrdered: Decimal;
	/** Always `originalSize − totalSizeOrdered`. */
	readonly remainingSize: Decimal;
	readonly originalSize: Decimal;
	readonly orders: readonly OrderReceipt[];
	readonly attempts: readonly AttemptRecord[];
	readonly priceSource: PriceSource;
	readonly error: string | null;
	readonly dryRun: boolean;
}

/** Sells one position as completely as liquidity allows. */
export interface Liquidator {
	liquidate(position: Position, signal?: AbortSignal): Promise<ExecutionResult>;
}

/** Tuning constants for the chunked sell. */
export interface LiquidationPolicy {
	/** Remaining size at or below this is treated as fully sold. */
	readonly dustThreshold: Decimal;
	readonly maxChunkSize: Decimal;
	/** Consecutive failed submissions before falling through to the final sweep. */
	readonly maxRejectionsPerChunk: number;
	readonly priceFloor: Decimal;
	readonly noBidsDiscount: Decimal;
	readonly bookErrorDiscount: Decimal;
	readonly rejectionStep: Decimal;
	readonly exceptionStep: Decimal;
	readonly finalSweepDiscount: Decimal;
	/** Pause after an accepted order before polling its status. */
	readonly settleDelayMs: number;
}

export const DEFAULT_LIQUIDATION_POLICY: LiquidationPolicy = {
	dustThreshold: Decimal.from("0.1"),
	maxChunkSize: Decimal.from("50"),
	maxRejectionsPerChunk: 5,
	priceFloor: Decimal.from("0.001"),
	noBidsDiscount: Decimal.from("0.95"),
	bookErrorDiscount: Decimal.from("0.90"),
	rejectionStep: Decimal.from("0.95"),
	exceptionStep: Decimal.from("0.90"),
	finalSweepDiscount: Decimal.from("0.50"),
	settleDelayMs: 2_000,
};

const ONE = Decimal.from(1);

function isFraction(value: Decimal): boolean {
	return value.isPositive() && value.lte(ONE);
}

/** Checks that every step moves the price down and the loop terminates. */
export function validatePolicy(policy: LiquidationPolicy): Result<LiquidationPolicy, ConfigError> {
	if (policy.dustThreshold.isNegative()) {
		return err(new ConfigError(`dustThreshold must be >= 0, got ${policy.dustThreshold}`));
	}
	if (!policy.maxChunkSize.gt(policy.dustThreshold)) {
		return err(
			new ConfigError(
				`maxChunkSize must exceed dustThreshold, got ${policy.maxChunkSize} <= ${policy.dustThreshold}`,
			),
		);
	}
	if (!Number.isInteger(policy.maxRejectionsPerChunk) || policy.maxRejectionsPerChunk < 1) {
		return err(
			new ConfigError(
				`maxRejectionsPerChunk must be a positive integer, got ${policy.maxRejectionsPerChunk}`,
			),
		);
	}
	if (!policy.priceFloor.isPositive()) {
		return err(new ConfigError(`priceFloor must be positive, got ${policy.priceFloor}`));
	}
	const factors = {
		noBidsDiscount: policy.noBidsDiscount,
		bookErrorDiscount: policy.bookErrorDiscount,
		rejectionStep: policy.rejectionStep,
		exceptionStep: policy.exceptionStep,
		finalSweepDiscount: policy.finalSweepDiscount,
	};
	for (const [name, value] of Object.entries(factors)) {
		if (!isFraction(value)) {
			return err(new ConfigError(`${name} must be in (0, 1], got ${value}`));
		}
	}
	if (!Number.isFinite(policy.settleDelayMs) || policy.settleDelayMs < 0) {
		return err(new ConfigError(`settleDelayMs must be >= 0, got ${policy.settleDelayMs}`));
	}
	return ok(policy);
}

/**
 * ChunkedLiquidator: sells a position through the CLOB in bounded chunks,
 * repricing downward on every rejection until the venue takes it.
 *
 * 1. Opening price: best bid, else a discount off the last trade price.
 * 2. Chunk loop: GTC sells of at most `maxChunkSize`, repriced on failure,
 *    bounded by `maxRejectionsPerChunk` consecutive failures.
 * 3. Final sweep: whatever is left goes out once at a deep discount.
 *
 * @example
 * ```ts
 * const liquidator = new ChunkedLiquidator({ client, logger });
 * const result = await liquidator.liquidate(position, signal);
 * ```
 */

import type { ClobClient } from "../lib/clob/client.js";
import type { OrderBookSnapshot } from "../lib/clob/types.js";
import type { Logger } from "../lib/logger/index.js";
import type { Position } from "../position/position.js";
import { Decimal } from "../shared/decimal.js";
import { TimeoutError } from "../shared/errors.js";
import type { ExchangeOrderId } from "../shared/identifiers.js";
import { type Sleep, sleep as realSleep } from "../shared/time.js";
import {
	type AttemptOutcome,
	type AttemptRecord,
	DEFAULT_LIQUIDATION_POLICY,
	type ExecutionResult,
	type LiquidationPolicy,
	LiquidationStatus,
	type Liquidator,
	OrderPhase,
	type OrderReceipt,
	PriceSource,
	validatePolicy,
} from "./types.js";

export const NO_ORDERS_PLACED = "No orders could be placed";
export const ABORTED = "aborted";

export interface ChunkedLiquidatorDeps {
	readonly client: ClobClient;
	readonly logger: Logger;
	readonly policy?: LiquidationPolicy;
	readonly sleep?: Sleep;
}

export interface OpeningPrice {
	readonly price: Decimal;
	readonly source: PriceSource;
}

/** Highest bid across all levels; the venue does not promise an ordering. */
export function bestBid(book: OrderBookSnapshot): Decimal | null {
	let best: Decimal | null = null;
	for (const level of book.bids) {
		if (!level.price.isPositive()) continue;
		if (best === null || level.price.gt(best)) best = level.price;
	}
	return best;
}

export function applyFloor(price: Decimal, policy: LiquidationPolicy): Decimal {
	return Decimal.max(price, policy.priceFloor);
}

/** Opening sell price for a position, shared by the live and dry-run paths. */
export async function discoverPrice(
	client: ClobClient,
	position: Position,
	policy: LiquidationPolicy,
	logger: Logger,
): Promise<OpeningPrice> {
	const book = await client.getOrderBook(position.tokenId);
	if (!book.ok) {
		logger.warn(
			{ error: book.error.message, code: book.error.code },
			"Order book unavailable, pricing off current price",
		);
		return {
			price: applyFloor(position.currentPrice.mul(policy.bookErrorDiscount), policy),
			source: PriceSource.BookError,
		};
	}
	const bid = bestBid(book.value);
	if (bid === null) {
		return {
			price: applyFloor(position.currentPrice.mul(policy.noBidsDiscount), policy),
			source: PriceSource.NoBids,
		};
	}
	return { price: applyFloor(bid, policy), source: PriceSource.BestBid };
}

/** Mutable state of one liquidation; discarded when it returns. */
interface OrderChunk {
	remaining: Decimal;
	price: Decimal;
	consecutiveFailures: number;
	attempt: number;
	readonly orders: OrderReceipt[];
	readonly attempts: AttemptRecord[];
}

interface Submission {
	readonly outcome: AttemptOutcome;
	readonly orderId: ExchangeOrderId | null;
	readonly errorMsg: string | null;
}

export class ChunkedLiquidator implements Liquidator {
	private readonly client: ClobClient;
	private readonly logger: Logger;
	private readonly policy: LiquidationPolicy;
	private readonly sleep: Sleep;

	/** @throws ConfigError when the policy would never drain a position */
	constructor(deps: ChunkedLiquidatorDeps) {
		const policy = validatePolicy(deps.policy ?? DEFAULT_LIQUIDATION_POLICY);
		if (!policy.ok) throw policy.error;
		this.client = deps.client;
		this.logger = deps.logger.child({ module: "executor" });
		this.policy = policy.value;
		this.sleep = deps.sleep ?? realSleep;
	}

	async liquidate(position: Position, signal?: AbortSignal): Promise<ExecutionResult> {
		const log = this.logger.child({ tokenId: position.tokenId });
		const opening = await discoverPrice(this.client, position, this.policy, log);
		log.info(
			{
				market: position.label(),
				size: position.size.toString(),
				currentPrice: position.currentPrice.toString(),
				price: opening.price.toString(),
				priceSource: opening.source,
			},
			"Starting liquidation",
		);

		const state: OrderChunk = {
			remaining: position.size,
			price: opening.price,
			consecutiveFailures: 0,
			attempt: 0,
			orders: [],
			attempts: [],
		};
		let aborted = false;

		while (state.remaining.gt(this.policy.dustThreshold)) {
			if (signal?.aborted) {
				aborted = true;
				break;
			}
			if (state.consecutiveFailures >= this.policy.maxRejectionsPerChunk) {
				log.warn(
					{ failures: state.consecutiveFailures, price: state.price.toString() },
					"Rejection limit reached, falling through to final sweep",
				);
				break;
			}

			const chunk = Decimal.min(state.remaining, this.policy.maxChunkSize);
			const submission = await this.submit(state, position, chunk, OrderPhase.Chunk, log);

			if (submission.outcome === "accepted") {
				state.consecutiveFailures = 0;
				await this.sleep(this.policy.settleDelayMs, signal);
				await this.pollStatus(submission.orderId, log);
				continue;
			}

			state.consecutiveFailures += 1;
			const step =
				submission.outcome === "rejected" ? this.policy.rejectionStep : this.policy.exceptionStep;
			state.price = applyFloor(state.price.mul(step), this.policy);
			log.warn(
				{
					outcome: submission.outcome,
					error: submission.errorMsg,
					attempt: state.attempt,
					failures: state.consecutiveFailures,
					nextPrice: state.price.toString(),
				},
				"Chunk not placed, repricing",
			);
		}

		if (!aborted && signal?.aborted) aborted = true;

		if (!aborted && state.remaining.gt(this.policy.dustThreshold)) {
			const sweepPrice = applyFloor(
				position.currentPrice.mul(this.policy.finalSweepDiscount),
				this.policy,
			);
			state.price = sweepPrice;
			const sweep = await this.submit(
				state,
				position,
				state.remaining,
				OrderPhase.FinalSweep,
				log,
			);
			if (sweep.outcome !== "accepted") {
				log.error(
					{ outcome: sweep.outcome, error: sweep.errorMsg, price: sweepPrice.toString() },
					"Final sweep order failed",
				);
			}
		}

		const result = this.buildResult(position, state, opening.source, aborted);
		log.info(
			{
				status: result.status,
				ordersPlaced: result.ordersPlaced,
				totalSizeOrdered: result.totalSizeOrdered.toString(),
				remainingSize: result.remainingSize.toString(),
			},
			"Liquidation finished",
		);
		return result;
	}

	private async submit(
		state: OrderChunk,
		position: Position,
		size: Decimal,
		phase: OrderPhase,
		log: Logger,
	): Promise<Submission> {
		state.attempt += 1;
		const price = state.price;
		const posted = await this.client.postSellOrder({
			tokenId: position.tokenId,
			price,
			size,
			orderType: "GTC",
		});

		let submission: Submission;
		if (!posted.ok) {
			submission = { outcome: "error", orderId: null, errorMsg: posted.error.message };
			// The deadline only stops the wait. The request may still reach the book,
			// and the repost that follows can then sell more than the position holds.
			if (posted.error instanceof TimeoutError) {
				log.warn(
					{ attempt: state.attempt, phase, price: price.toString(), size: size.toString() },
					"Sell order timed out, it may still rest on the book",
				);
			}
		} else if (!posted.value.accepted) {
			submission = {
				outcome: "rejected",
				orderId: null,
				errorMsg: posted.value.errorMsg ?? "Unknown error",
			};
		} else {
			submission = { outcome: "accepted", orderId: posted.value.orderId, errorMsg: null };
		}

		if (submission.outcome === "accepted") {
			state.remaining = state.remaining.sub(size);
			state.orders.push({ orderId: submission.orderId, price, size, phase, attempt: state.attempt });
			log.info(
				{
					orderId: submission.orderId,
					phase,
					price: price.toString(),
					size: size.toString(),
					remaining: state.remaining.toString(),
				},
				"Sell order placed",
			);
		}
		state.attempts.push({
			attempt: state.attempt,
			phase,
			price,
			size,
			outcome: submission.outcome,
			remainingAfter: state.remaining,
			errorMsg: submission.errorMsg,
		});
		return submission;
	}

	/** Advisory only: the fill state never changes the bookkeeping. */
	private async pollStatus(orderId: ExchangeOrderId | null, log: Logger): Promise<void> {
		if (orderId === null) return;
		const status = await this.client.getOrderStatus(orderId);
		if (status.ok) {
			log.debug(
				{
					orderId,
					status: status.value.status,
					sizeMatched: status.value.sizeMatched?.toString() ?? null,
				},
				"Order status",
			);
		} else {
			log.warn({ orderId, error: status.error.message }, "Could not check order status");
		}
	}

	private buildResult(
		position: Position,
		state: OrderChunk,
		priceSource: PriceSource,
		aborted: boolean,
	): ExecutionResult {
		const totalSizeOrdered = state.orders.reduce((sum, o) => sum.add(o.size), Decimal.zero());
		const success = state.orders.length > 0;
		let status: LiquidationStatus;
		if (!success) {
			status = LiquidationStatus.Failed;
		} else if (state.remaining.lte(this.policy.dustThreshold)) {
			status = LiquidationStatus.Done;
		} else {
			status = LiquidationStatus.PartiallyFilled;
		}

		let error: string | null = null;
		if (aborted) error = ABORTED;
		else if (!success) error = NO_ORDERS_PLACED;

		return {
			success,
			status,
			ordersPlaced: state.orders.length,
			totalSizeOrdered,
			remainingSize: position.size.sub(totalSizeOrdered),
			originalSize: position.size,
			orders: state.orders,
			attempts: state.attempts,
			priceSource,
			error,
			dryRun: false,
		};
	}
}

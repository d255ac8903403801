/**
 * ClobClient: wraps venue providers behind Result error handling and a
 * per-call deadline.
 */

import { TimeoutError, classifyError } from "../../shared/errors.js";
import type { TradingError } from "../../shared/errors.js";
import type { ExchangeOrderId, MarketTokenId } from "../../shared/identifiers.js";
import { type Result, err, ok } from "../../shared/result.js";
import type {
	ClobProviders,
	OrderBookSnapshot,
	OrderStatusReport,
	SellOrderAck,
	SellOrderRequest,
} from "./types.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export class ClobClient {
	private readonly providers: ClobProviders;
	private readonly requestTimeoutMs: number;

	constructor(providers: ClobProviders, requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS) {
		this.providers = providers;
		this.requestTimeoutMs = requestTimeoutMs;
	}

	getOrderBook(tokenId: MarketTokenId): Promise<Result<OrderBookSnapshot, TradingError>> {
		return this.call("getOrderBook", () => this.providers.getOrderBook(tokenId));
	}

	/**
	 * A clean venue rejection is still `ok` with `accepted: false`. A
	 * TimeoutError means the outcome is unknown: the request is not
	 * cancelled and the order may still be placed.
	 */
	postSellOrder(req: SellOrderRequest): Promise<Result<SellOrderAck, TradingError>> {
		return this.call("postSellOrder", () => this.providers.postSellOrder(req));
	}

	getOrderStatus(orderId: ExchangeOrderId): Promise<Result<OrderStatusReport, TradingError>> {
		return this.call("getOrderStatus", () => this.providers.getOrderStatus(orderId));
	}

	private async call<T>(
		operationName: string,
		fn: () => Promise<T>,
	): Promise<Result<T, TradingError>> {
		try {
			return ok(await this.withTimeout(fn(), operationName));
		} catch (error) {
			return err(classifyError(error));
		}
	}

	private async withTimeout<T>(promise: Promise<T>, operationName: string): Promise<T> {
		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeoutPromise = new Promise<never>((_, reject) => {
			timer = setTimeout(
				() =>
					reject(
						new TimeoutError(`${operationName} timed out after ${this.requestTimeoutMs}ms`, {
							timeoutMs: this.requestTimeoutMs,
						}),
					),
				this.requestTimeoutMs,
			);
		});
		try {
			return await Promise.race([promise, timeoutPromise]);
		} finally {
			clearTimeout(timer);
		}
	}
}

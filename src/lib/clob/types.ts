/**
 * Venue types: the narrow surface of the Polymarket CLOB the liquidation
 * engine uses. Wire formats are parsed into these shapes by the provider
 * adapter; nothing above lib/clob sees a raw CLOB response.
 */

import type { Decimal } from "../../shared/decimal.js";
import type { ExchangeOrderId, MarketTokenId } from "../../shared/identifiers.js";

/** One price level of the book. */
export interface BookLevel {
	readonly price: Decimal;
	readonly size: Decimal;
}

/** Bids and asks for one outcome token, in no guaranteed order. */
export interface OrderBookSnapshot {
	readonly tokenId: MarketTokenId;
	readonly bids: readonly BookLevel[];
	readonly asks: readonly BookLevel[];
}

/** A resting sell order. The engine only ever sells. */
export interface SellOrderRequest {
	readonly tokenId: MarketTokenId;
	readonly price: Decimal;
	readonly size: Decimal;
	readonly orderType: "GTC";
}

/**
 * Venue answer to an order post. `accepted: false` is a clean rejection;
 * transport failures surface as errors instead.
 */
export interface SellOrderAck {
	readonly accepted: boolean;
	readonly orderId: ExchangeOrderId | null;
	readonly errorMsg: string | null;
}

/** Fill state as reported by the venue (LIVE, MATCHED, CANCELED, ...). */
export interface OrderStatusReport {
	readonly orderId: ExchangeOrderId;
	readonly status: string;
	readonly sizeMatched: Decimal | null;
}

/** Venue operations, implemented over @polymarket/clob-client or a test fake. */
export interface ClobProviders {
	getOrderBook(tokenId: MarketTokenId): Promise<OrderBookSnapshot>;
	postSellOrder(req: SellOrderRequest): Promise<SellOrderAck>;
	getOrderStatus(orderId: ExchangeOrderId): Promise<OrderStatusReport>;
}

/** Connection settings for the live venue. */
export interface ClobConfig {
	readonly host: string;
	readonly chainId: number;
	/** 1 = Polymarket proxy wallet (email / Magic login). */
	readonly signatureType: number;
	/** Proxy address holding the positions; orders are placed on its behalf. */
	readonly funderAddress: string;
}

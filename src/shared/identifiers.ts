/**
 * Branded identifiers: a token id can never be passed where an order id
 * or wallet address is expected.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Outcome token of a Polymarket market (the Data API's `asset`). */
export type MarketTokenId = Brand<string, "MarketTokenId">;
/** Order identifier assigned by the CLOB. */
export type ExchangeOrderId = Brand<string, "ExchangeOrderId">;
/** Polygon wallet or proxy address (0x...). */
export type EthAddress = Brand<string, "EthAddress">;

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** @throws Error if empty */
export function marketTokenId(value: string): MarketTokenId {
	return createBrandedId(value, "MarketTokenId");
}

/** @throws Error if empty */
export function exchangeOrderId(value: string): ExchangeOrderId {
	return createBrandedId(value, "ExchangeOrderId");
}

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

/** @throws Error if not a 20-byte hex address */
export function ethAddress(value: string): EthAddress {
	const trimmed = value.trim();
	if (!ADDRESS_RE.test(trimmed)) {
		throw new Error(`EthAddress must be a 0x-prefixed 20-byte hex string, got: "${trimmed}"`);
	}
	return trimmed as EthAddress;
}

/** Raw string of any branded identifier. */
export function idToString(id: MarketTokenId | ExchangeOrderId | EthAddress): string {
	return id as string;
}

/**
 * ClobProviders over @polymarket/clob-client.
 *
 * The SDK returns loosely typed JSON (and sometimes `{ error }` objects instead
 * of throwing), so every response is validated here before it becomes a
 * domain value.
 */

import { Wallet } from "@ethersproject/wallet";
import {
	type ApiKeyCreds,
	ClobClient as PolymarketClient,
	OrderType,
	Side,
} from "@polymarket/clob-client";
import { type Secret, createCredentials, unwrapCredentials } from "../../auth/credentials.js";
import type { Decimal } from "../../shared/decimal.js";
import { AuthError, classifyError } from "../../shared/errors.js";
import { exchangeOrderId, idToString } from "../../shared/identifiers.js";
import type { Logger } from "../logger/index.js";
import { decimalSchema, validate, z } from "../validation/index.js";
import type {
	BookLevel,
	ClobConfig,
	ClobProviders,
	OrderBookSnapshot,
	OrderStatusReport,
	SellOrderAck,
} from "./types.js";

export const POLYMARKET_CLOB_HOST = "https://clob.polymarket.com";
export const POLYGON_CHAIN_ID = 137;
export const PROXY_SIGNATURE_TYPE = 1;

/**
 * The part of the SDK client the engine calls. The real `ClobClient`
 * satisfies it; tests pass a fake without building signed orders.
 */
export interface PolymarketClobApi<TSigned> {
	getOrderBook(tokenID: string): Promise<unknown>;
	createOrder(order: {
		tokenID: string;
		price: number;
		size: number;
		side: Side;
	}): Promise<TSigned>;
	postOrder(order: TSigned, orderType: OrderType.GTC): Promise<unknown>;
	getOrder(orderID: string): Promise<unknown>;
}

// ── Wire schemas ─────────────────────────────────────────────────────

const levelSchema = z.object({ price: decimalSchema, size: decimalSchema });

const bookSchema = z.object({
	bids: z.array(levelSchema).nullish(),
	asks: z.array(levelSchema).nullish(),
});

const postResponseSchema = z.object({
	success: z.boolean().optional(),
	orderID: z.string().optional(),
	errorMsg: z.string().optional(),
	error: z.unknown().optional(),
});

const orderSchema = z.object({
	status: z.string(),
	size_matched: decimalSchema.optional(),
});

/** The SDK reports HTTP failures as `{ error, status }` instead of throwing. */
function sdkError(operation: string, response: unknown): Error | null {
	if (typeof response !== "object" || response === null || !("error" in response)) return null;
	const status = "status" in response && typeof response.status === "number" ? response.status : 0;
	const error = new Error(`${operation} failed: ${String(response.error)}`);
	return status > 0 ? Object.assign(error, { status }) : error;
}

function toLevels(
	levels: readonly { price: Decimal; size: Decimal }[] | null | undefined,
): BookLevel[] {
	return (levels ?? []).map((l) => ({ price: l.price, size: l.size }));
}

/** Adapts an SDK client to the engine's venue interface. */
export function createPolymarketProviders<TSigned>(api: PolymarketClobApi<TSigned>): ClobProviders {
	return {
		async getOrderBook(tokenId): Promise<OrderBookSnapshot> {
			const raw = await api.getOrderBook(idToString(tokenId));
			const failure = sdkError("getOrderBook", raw);
			if (failure) throw failure;
			const parsed = validate(bookSchema, raw, "Malformed order book");
			if (!parsed.ok) throw parsed.error;
			return {
				tokenId,
				bids: toLevels(parsed.value.bids),
				asks: toLevels(parsed.value.asks),
			};
		},

		async postSellOrder(req): Promise<SellOrderAck> {
			const signed = await api.createOrder({
				tokenID: idToString(req.tokenId),
				price: req.price.toNumber(),
				size: req.size.toNumber(),
				side: Side.SELL,
			});
			const raw = await api.postOrder(signed, OrderType.GTC);
			const parsed = validate(postResponseSchema, raw, "Malformed order response");
			if (!parsed.ok) throw parsed.error;
			const { success, orderID, errorMsg, error } = parsed.value;
			const orderId =
				orderID !== undefined && orderID.trim() !== "" ? exchangeOrderId(orderID) : null;
			const message =
				errorMsg !== undefined && errorMsg !== ""
					? errorMsg
					: error !== undefined
						? String(error)
						: null;
			return { accepted: success === true, orderId, errorMsg: message };
		},

		async getOrderStatus(orderId): Promise<OrderStatusReport> {
			const raw = await api.getOrder(idToString(orderId));
			const failure = sdkError("getOrder", raw);
			if (failure) throw failure;
			const parsed = validate(orderSchema, raw, "Malformed order status");
			if (!parsed.ok) throw parsed.error;
			return {
				orderId,
				status: parsed.value.status,
				sizeMatched: parsed.value.size_matched ?? null,
			};
		},
	};
}

// ── Live connection ──────────────────────────────────────────────────

const apiKeySchema = z.object({
	key: z.string().min(1),
	secret: z.string().min(1),
	passphrase: z.string().min(1),
});

export interface ConnectOptions {
	readonly config: ClobConfig;
	readonly privateKey: Secret<string>;
	readonly logger: Logger;
}

/**
 * Derives (or creates) the L2 API key for the wallet and returns providers
 * bound to the proxy funder address.
 * @throws AuthError when the wallet or key derivation fails
 */
export async function connectPolymarket(options: ConnectOptions): Promise<ClobProviders> {
	const { config, logger } = options;
	let wallet: Wallet;
	try {
		wallet = new Wallet(options.privateKey.reveal());
	} catch (error) {
		throw new AuthError("PRIVATE_KEY is not a valid wallet key", { cause: error });
	}

	const bootstrap = new PolymarketClient(config.host, config.chainId, wallet);
	let derived: unknown;
	try {
		derived = await bootstrap.createOrDeriveApiKey();
	} catch (error) {
		const classified = classifyError(error);
		throw new AuthError(`API key derivation failed: ${classified.message}`, { cause: error });
	}
	const parsed = validate(apiKeySchema, derived, "API key derivation returned no key");
	if (!parsed.ok) {
		throw new AuthError(parsed.error.message, {
			hint: "Check that the wallet has traded on Polymarket at least once",
		});
	}

	const credentials = createCredentials({
		apiKey: parsed.value.key,
		secret: parsed.value.secret,
		passphrase: parsed.value.passphrase,
	});
	const keys = unwrapCredentials(credentials);
	const creds: ApiKeyCreds = { key: keys.apiKey, secret: keys.secret, passphrase: keys.passphrase };

	logger.info(
		{ host: config.host, funder: config.funderAddress, signer: wallet.address, credentials },
		"CLOB client initialized",
	);

	const client = new PolymarketClient(
		config.host,
		config.chainId,
		wallet,
		creds,
		config.signatureType,
		config.funderAddress,
	);
	return createPolymarketProviders(client);
}


/**
 * Providers over an unauthenticated client. Order books are public, so a
 * dry run prices its chunks without a wallet; posting through these
 * providers fails at the venue.
 */
export function connectPolymarketPublic(
	host: string,
	chainId: number,
	logger: Logger,
): ClobProviders {
	logger.info({ host }, "CLOB client initialized without credentials");
	return createPolymarketProviders(new PolymarketClient(host, chainId));
}

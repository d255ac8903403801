import { OrderType, Side } from "@polymarket/clob-client";
import { describe, expect, it, vi } from "vitest";
import { Decimal } from "../../shared/decimal.js";
import { exchangeOrderId, marketTokenId } from "../../shared/identifiers.js";
import { createLogger } from "../logger/index.js";
import { ValidationError } from "../validation/index.js";
import {
	POLYGON_CHAIN_ID,
	type PolymarketClobApi,
	connectPolymarketPublic,
	createPolymarketProviders,
} from "./polymarket-providers.js";

interface FakeSigned {
	readonly tokenID: string;
	readonly price: number;
	readonly size: number;
}

function fakeApi(
	overrides: Partial<PolymarketClobApi<FakeSigned>> = {},
): PolymarketClobApi<FakeSigned> {
	return {
		getOrderBook: overrides.getOrderBook ?? (() => Promise.resolve({ bids: [], asks: [] })),
		createOrder:
			overrides.createOrder ??
			((o) => Promise.resolve({ tokenID: o.tokenID, price: o.price, size: o.size })),
		postOrder:
			overrides.postOrder ??
			(() => Promise.resolve({ success: true, orderID: "0xabc", errorMsg: "" })),
		getOrder: overrides.getOrder ?? (() => Promise.resolve({ status: "LIVE", size_matched: "0" })),
	};
}

const TOKEN = marketTokenId("tok-1");

describe("createPolymarketProviders", () => {
	describe("getOrderBook", () => {
		it("parses string levels into decimals", async () => {
			const providers = createPolymarketProviders(
				fakeApi({
					getOrderBook: () =>
						Promise.resolve({
							bids: [
								{ price: "0.36", size: "100" },
								{ price: "0.38", size: "20" },
							],
							asks: [{ price: "0.41", size: "5" }],
						}),
				}),
			);

			const book = await providers.getOrderBook(TOKEN);

			expect(book.tokenId).toBe(TOKEN);
			expect(book.bids.map((l) => l.price.toString())).toEqual(["0.36", "0.38"]);
			expect(book.asks[0]?.size.toString()).toBe("5");
		});

		it("treats missing sides as empty", async () => {
			const providers = createPolymarketProviders(
				fakeApi({ getOrderBook: () => Promise.resolve({ bids: null }) }),
			);

			const book = await providers.getOrderBook(TOKEN);

			expect(book.bids).toEqual([]);
			expect(book.asks).toEqual([]);
		});

		it("throws when the SDK returns an error object", async () => {
			const providers = createPolymarketProviders(
				fakeApi({
					getOrderBook: () => Promise.resolve({ error: "No orderbook exists", status: 404 }),
				}),
			);

			await expect(providers.getOrderBook(TOKEN)).rejects.toThrow(
				"getOrderBook failed: No orderbook exists",
			);
		});

		it("throws ValidationError on a malformed price", async () => {
			const providers = createPolymarketProviders(
				fakeApi({
					getOrderBook: () => Promise.resolve({ bids: [{ price: "n/a", size: "1" }] }),
				}),
			);

			await expect(providers.getOrderBook(TOKEN)).rejects.toBeInstanceOf(ValidationError);
		});
	});

	describe("postSellOrder", () => {
		it("signs a SELL and posts it as GTC", async () => {
			const createOrder = vi.fn((o: { tokenID: string; price: number; size: number; side: Side }) =>
				Promise.resolve({ tokenID: o.tokenID, price: o.price, size: o.size }),
			);
			const postOrder = vi.fn((_signed: FakeSigned, _type: OrderType.GTC) =>
				Promise.resolve({ success: true, orderID: "0xabc", errorMsg: "" }),
			);
			const providers = createPolymarketProviders(fakeApi({ createOrder, postOrder }));

			const ack = await providers.postSellOrder({
				tokenId: TOKEN,
				price: Decimal.from("0.38"),
				size: Decimal.from("50"),
				orderType: "GTC",
			});

			expect(createOrder).toHaveBeenCalledWith({
				tokenID: "tok-1",
				price: 0.38,
				size: 50,
				side: Side.SELL,
			});
			expect(postOrder).toHaveBeenCalledWith(
				{ tokenID: "tok-1", price: 0.38, size: 50 },
				OrderType.GTC,
			);
			expect(ack).toEqual({ accepted: true, orderId: exchangeOrderId("0xabc"), errorMsg: null });
		});

		it("maps success=false to a rejection with the venue message", async () => {
			const providers = createPolymarketProviders(
				fakeApi({
					postOrder: () =>
						Promise.resolve({ success: false, orderID: "", errorMsg: "not enough balance" }),
				}),
			);

			const ack = await providers.postSellOrder({
				tokenId: TOKEN,
				price: Decimal.from("0.2"),
				size: Decimal.from("10"),
				orderType: "GTC",
			});

			expect(ack).toEqual({ accepted: false, orderId: null, errorMsg: "not enough balance" });
		});

		it("maps an SDK error object to a rejection", async () => {
			const providers = createPolymarketProviders(
				fakeApi({ postOrder: () => Promise.resolve({ error: "invalid tick size" }) }),
			);

			const ack = await providers.postSellOrder({
				tokenId: TOKEN,
				price: Decimal.from("0.2"),
				size: Decimal.from("10"),
				orderType: "GTC",
			});

			expect(ack).toEqual({ accepted: false, orderId: null, errorMsg: "invalid tick size" });
		});

		it("propagates signing failures", async () => {
			const providers = createPolymarketProviders(
				fakeApi({ createOrder: () => Promise.reject(new Error("invalid price (0.0001)")) }),
			);

			await expect(
				providers.postSellOrder({
					tokenId: TOKEN,
					price: Decimal.from("0.0001"),
					size: Decimal.from("10"),
					orderType: "GTC",
				}),
			).rejects.toThrow("invalid price (0.0001)");
		});
	});

	describe("getOrderStatus", () => {
		it("returns status and matched size", async () => {
			const providers = createPolymarketProviders(
				fakeApi({ getOrder: () => Promise.resolve({ status: "MATCHED", size_matched: "50" }) }),
			);

			const report = await providers.getOrderStatus(exchangeOrderId("0xabc"));

			expect(report.status).toBe("MATCHED");
			expect(report.sizeMatched?.toString()).toBe("50");
		});
	});
});

describe("connectPolymarketPublic", () => {
	it("builds providers without a wallet or key derivation", () => {
		const lines: string[] = [];
		const logger = createLogger({
			level: "info",
			destination: { write: (msg: string) => lines.push(msg) },
		});

		const providers = connectPolymarketPublic("http://127.0.0.1:9", POLYGON_CHAIN_ID, logger);

		expect(typeof providers.getOrderBook).toBe("function");
		expect(lines).toHaveLength(1);
		expect(JSON.parse(lines[0] ?? "")).toMatchObject({
			host: "http://127.0.0.1:9",
			msg: "CLOB client initialized without credentials",
		});
	});
});

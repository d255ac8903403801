/**
 * ClobClient: wraps venue providers with Result error handling.
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { Decimal } from "../../shared/decimal.js";
import { NetworkError, RateLimitError, SystemError, TimeoutError } from "../../shared/errors.js";
import { exchangeOrderId, marketTokenId } from "../../shared/identifiers.js";
import { ClobClient } from "./client.js";
import type { ClobProviders, SellOrderRequest } from "./types.js";

const TOKEN = marketTokenId("tok-1");

function stubProviders(overrides: Partial<ClobProviders> = {}): ClobProviders {
	return {
		getOrderBook: overrides.getOrderBook ?? (() => Promise.reject(new Error("not implemented"))),
		postSellOrder: overrides.postSellOrder ?? (() => Promise.reject(new Error("not implemented"))),
		getOrderStatus:
			overrides.getOrderStatus ?? (() => Promise.reject(new Error("not implemented"))),
	};
}

const SELL: SellOrderRequest = {
	tokenId: TOKEN,
	price: Decimal.from("0.38"),
	size: Decimal.from("50"),
	orderType: "GTC",
};

describe("ClobClient", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	describe("postSellOrder", () => {
		it("returns ok for an accepted order", async () => {
			const ack = { accepted: true, orderId: exchangeOrderId("ord-1"), errorMsg: null };
			const client = new ClobClient(stubProviders({ postSellOrder: () => Promise.resolve(ack) }));

			const result = await client.postSellOrder(SELL);

			expect(result).toEqual({ ok: true, value: ack });
		});

		it("keeps a clean rejection as ok with accepted=false", async () => {
			const ack = { accepted: false, orderId: null, errorMsg: "not enough balance" };
			const client = new ClobClient(stubProviders({ postSellOrder: () => Promise.resolve(ack) }));

			const result = await client.postSellOrder(SELL);

			expect(result.ok && result.value.accepted).toBe(false);
		});

		it("classifies connection failures as NetworkError", async () => {
			const client = new ClobClient(
				stubProviders({ postSellOrder: () => Promise.reject(new Error("connect ECONNREFUSED")) }),
			);

			const result = await client.postSellOrder(SELL);

			expect(!result.ok && result.error).toBeInstanceOf(NetworkError);
		});

		it("classifies HTTP 429 as RateLimitError", async () => {
			const limited = Object.assign(new Error("Too Many Requests"), { status: 429 });
			const client = new ClobClient(
				stubProviders({ postSellOrder: () => Promise.reject(limited) }),
			);

			const result = await client.postSellOrder(SELL);

			expect(!result.ok && result.error).toBeInstanceOf(RateLimitError);
		});

		it("classifies unknown errors as SystemError", async () => {
			const client = new ClobClient(
				stubProviders({ postSellOrder: () => Promise.reject(new Error("something unexpected")) }),
			);

			const result = await client.postSellOrder(SELL);

			expect(!result.ok && result.error).toBeInstanceOf(SystemError);
		});
	});

	describe("getOrderBook", () => {
		it("times out a hung call", async () => {
			vi.useFakeTimers();
			const client = new ClobClient(
				stubProviders({ getOrderBook: () => new Promise(() => undefined) }),
				10_000,
			);

			const pending = client.getOrderBook(TOKEN);
			await vi.advanceTimersByTimeAsync(10_000);
			const result = await pending;

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(TimeoutError);
				expect(result.error.message).toBe("getOrderBook timed out after 10000ms");
			}
		});
	});

	describe("getOrderStatus", () => {
		it("returns the venue report", async () => {
			const report = { orderId: exchangeOrderId("ord-1"), status: "LIVE", sizeMatched: null };
			const client = new ClobClient(
				stubProviders({ getOrderStatus: () => Promise.resolve(report) }),
			);

			const result = await client.getOrderStatus(exchangeOrderId("ord-1"));

			expect(result).toEqual({ ok: true, value: report });
		});
	});
});

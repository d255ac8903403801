import { describe, expect, it } from "vitest";
import { ethAddress, exchangeOrderId, idToString, marketTokenId } from "./identifiers.js";

describe("branded identifiers", () => {
	it("trims and keeps the raw value", () => {
		expect(idToString(marketTokenId(" 7152...901 "))).toBe("7152...901");
		expect(idToString(exchangeOrderId("0xabc"))).toBe("0xabc");
	});

	it("rejects empty ids", () => {
		expect(() => marketTokenId("  ")).toThrow("MarketTokenId cannot be empty");
		expect(() => exchangeOrderId("")).toThrow("ExchangeOrderId cannot be empty");
	});

	describe("ethAddress", () => {
		it("accepts a 20-byte hex address", () => {
			const raw = "0x8F87964fB57640A6fc09964123C6212C2c5C07b9";
			expect(idToString(ethAddress(raw))).toBe(raw);
		});

		it.each(["", "0x123", "8F87964fB57640A6fc09964123C6212C2c5C07b9", `0x${"g".repeat(40)}`])(
			"rejects %j",
			(raw) => {
				expect(() => ethAddress(raw)).toThrow("EthAddress must be a 0x-prefixed");
			},
		);
	});
});

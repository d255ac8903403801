import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { DEFAULT_LIQUIDATION_POLICY, validatePolicy } from "./types.js";

describe("validatePolicy", () => {
	it("accepts the defaults", () => {
		expect(validatePolicy(DEFAULT_LIQUIDATION_POLICY).ok).toBe(true);
	});

	it("rejects a zero retry bound", () => {
		const result = validatePolicy({ ...DEFAULT_LIQUIDATION_POLICY, maxRejectionsPerChunk: 0 });

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("maxRejectionsPerChunk must be a positive integer, got 0");
		}
	});

	it("rejects a step that would raise the price", () => {
		const result = validatePolicy({
			...DEFAULT_LIQUIDATION_POLICY,
			rejectionStep: Decimal.from("1.05"),
		});

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("rejectionStep must be in (0, 1], got 1.05");
		}
	});

	it("rejects a non-positive price floor", () => {
		const result = validatePolicy({ ...DEFAULT_LIQUIDATION_POLICY, priceFloor: Decimal.zero() });

		expect(result.ok).toBe(false);
	});
});

import { describe, expect, it } from "vitest";
import { Decimal } from "./decimal.js";

describe("Decimal", () => {
	describe("factory methods", () => {
		it("creates from strings and numbers", () => {
			expect(Decimal.from("0.38").toString()).toBe("0.38");
			expect(Decimal.from(" 50 ").toString()).toBe("50");
			expect(Decimal.from(0.001).toString()).toBe("0.001");
			expect(Decimal.from(-42).toString()).toBe("-42");
		});

		it("rejects invalid inputs", () => {
			expect(() => Decimal.from("")).toThrow("empty string");
			expect(() => Decimal.from(Number.NaN)).toThrow("invalid number");
			expect(() => Decimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid number");
			expect(() => Decimal.from("abc")).toThrow();
		});

		it("min and max pick the right operand", () => {
			const a = Decimal.from("0.2");
			const b = Decimal.from("0.3");

			expect(Decimal.min(a, b)).toBe(a);
			expect(Decimal.max(a, b)).toBe(b);
		});
	});

	describe("arithmetic", () => {
		it("is exact where binary floats are not", () => {
			expect(Decimal.from("0.1").add(Decimal.from("0.2")).toString()).toBe("0.3");
			expect(Decimal.from("0.4").mul(Decimal.from("0.95")).toString()).toBe("0.38");
			expect(Decimal.from("100").sub(Decimal.from("50")).sub(Decimal.from("50")).isZero()).toBe(
				true,
			);
		});

		it("divides and rounds on request", () => {
			expect(Decimal.from("10").div(Decimal.from("4")).toString()).toBe("2.5");
			expect(Decimal.from("1").div(Decimal.from("3")).toFixed(6)).toBe("0.333333");
		});

		it("throws on division by zero", () => {
			expect(() => Decimal.from("1").div(Decimal.zero())).toThrow("division by zero");
		});

		it("negates and takes absolute values", () => {
			expect(Decimal.from("2.5").neg().toString()).toBe("-2.5");
			expect(Decimal.from("-2.5").abs().toString()).toBe("2.5");
		});
	});

	describe("comparison", () => {
		it("orders values", () => {
			const low = Decimal.from("0.1");
			const high = Decimal.from("0.10000001");

			expect(low.lt(high)).toBe(true);
			expect(high.gt(low)).toBe(true);
			expect(low.lte(Decimal.from("0.100"))).toBe(true);
			expect(low.gte(Decimal.from("0.100"))).toBe(true);
			expect(low.eq(Decimal.from("0.100"))).toBe(true);
		});

		it("reports sign", () => {
			expect(Decimal.from("0.5").isPositive()).toBe(true);
			expect(Decimal.from("-0.5").isNegative()).toBe(true);
			expect(Decimal.zero().isPositive()).toBe(false);
		});
	});

	describe("conversion", () => {
		it("never uses exponential notation", () => {
			expect(Decimal.from("0.0000001").toString()).toBe("0.0000001");
			expect(JSON.stringify({ price: Decimal.from("0.38") })).toBe('{"price":"0.38"}');
		});

		it("converts to number", () => {
			expect(Decimal.from("0.38").toNumber()).toBe(0.38);
		});
	});
});

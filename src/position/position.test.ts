import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { marketTokenId } from "../shared/identifiers.js";
import { Position } from "./position.js";

function position(currentValue: string, initialValue: string): Position {
	return Position.create({
		tokenId: marketTokenId("tok-1"),
		marketName: "Will it rain?",
		outcome: "Yes",
		size: Decimal.from("100"),
		currentPrice: Decimal.from("0.4"),
		currentValue: Decimal.from(currentValue),
		initialValue: Decimal.from(initialValue),
	});
}

describe("Position", () => {
	it("derives pnl and pnlPct from values", () => {
		const pos = position("40", "50");

		expect(pos.pnl.toString()).toBe("-10");
		expect(pos.pnlPct.toString()).toBe("-20");
	});

	it("reports gains as positive percentages", () => {
		expect(position("75", "50").pnlPct.toString()).toBe("50");
	});

	it("defines pnlPct as 0 when initial value is zero", () => {
		const pos = position("12", "0");

		expect(pos.pnl.toString()).toBe("12");
		expect(pos.pnlPct.isZero()).toBe(true);
	});

	it("labels with market and outcome", () => {
		expect(position("1", "1").label()).toBe("Will it rain? [Yes]");
	});

	it("summarizes as plain numbers", () => {
		expect(position("40", "50").toSummary()).toEqual({
			tokenId: "tok-1",
			market: "Will it rain?",
			outcome: "Yes",
			size: 100,
			price: 0.4,
			value: 40,
			pnl: -10,
			pnlPct: -20,
		});
	});
});

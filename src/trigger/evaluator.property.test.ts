import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { makeConfig, makePosition } from "../testing/fixtures.js";
import { evaluateTrigger } from "./evaluator.js";

const centAmount = fc.integer({ min: 1, max: 1_000_000 });
const toUnits = (cents: number): string => (cents / 100).toFixed(2);

describe("evaluateTrigger properties", () => {
	it("reports a percentage reason exactly when P&L% <= -threshold", () => {
		fc.assert(
			fc.property(centAmount, centAmount, fc.integer({ min: 1, max: 100 }), (cur, init, pct) => {
				const position = makePosition({ currentValue: toUnits(cur), initialValue: toUnits(init) });
				const decision = evaluateTrigger(position, makeConfig({ stopLossPercentage: pct }));

				// (cur - init) / init * 100 <= -pct, in integer cents
				const expected = (cur - init) * 100 + pct * init <= 0;
				expect(decision.reasons.some((r) => r.type === "percentage")).toBe(expected);
				expect(decision.triggered).toBe(decision.reasons.length > 0);
			}),
		);
	});

	it("reports a price reason exactly when price <= stop price, whatever the P&L", () => {
		const thousandths = fc.integer({ min: 1, max: 1000 });
		fc.assert(
			fc.property(thousandths, thousandths, centAmount, (price, stop, cur) => {
				const position = makePosition({
					currentPrice: (price / 1000).toFixed(3),
					currentValue: toUnits(cur),
					initialValue: "50",
				});
				const decision = evaluateTrigger(
					position,
					makeConfig({ stopLossPercentage: 100, stopLossPrice: stop / 1000 }),
				);

				expect(decision.reasons.some((r) => r.type === "price")).toBe(price <= stop);
			}),
		);
	});
});

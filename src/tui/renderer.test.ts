import { describe, expect, it } from "vitest";
import type { CycleReport } from "../monitor/types.js";
import { NetworkError } from "../shared/errors.js";
import { marketTokenId } from "../shared/identifiers.js";
import { makeConfig, makePosition } from "../testing/fixtures.js";
import { RED, RESET } from "./ansi.js";
import {
	NO_POSITIONS,
	describeMode,
	renderCycleSummary,
	renderPositionsTable,
	rowsFromReport,
} from "./renderer.js";

const losing = makePosition();
const winning = makePosition({
	tokenId: "tok-2",
	marketName: "Will the ferry run on Sunday?",
	outcome: "No",
	currentPrice: "0.6",
	currentValue: "60",
});

function row(cells: readonly string[]): string {
	const [market, outcome, price, size, value, pnl, pct, monitor, status] = cells;
	return [
		(market ?? "").padEnd(35),
		(outcome ?? "").padEnd(10),
		(price ?? "").padStart(8),
		(size ?? "").padStart(10),
		(value ?? "").padStart(10),
		(pnl ?? "").padStart(10),
		(pct ?? "").padStart(9),
		(monitor ?? "").padEnd(7),
		(status ?? "").padEnd(8),
	]
		.join(" ")
		.trimEnd();
}

function makeReport(overrides: Partial<CycleReport> = {}): CycleReport {
	return {
		cycle: 3,
		status: "completed",
		ok: true,
		startedAt: 0,
		durationMs: 0,
		positions: [losing, winning],
		monitored: [losing, winning],
		triggered: [{ position: losing, reasons: [] }],
		outcomes: [],
		missingTokenIds: [],
		skippedRecords: 0,
		error: null,
		...overrides,
	};
}

const NOW = Date.UTC(2026, 0, 2, 3, 4, 5);

describe("renderPositionsTable", () => {
	it("prints the empty-snapshot notice", () => {
		expect(renderPositionsTable([], makeConfig())).toBe(NO_POSITIONS);
	});

	it("renders one fixed-width line per position", () => {
		const lines = renderPositionsTable(
			[
				{ position: losing, monitored: true, triggered: true },
				{ position: winning, monitored: false, triggered: false },
			],
			makeConfig(),
		).split("\n");

		expect(lines[0]).toBe(
			row(["Market", "Outcome", "Price", "Size", "Value", "P&L", "P&L%", "Monitor", "Status"]),
		);
		expect(lines[2]).toBe(
			row([
				"Will it rain in Lisbon?",
				"Yes",
				"0.4000",
				"100.00",
				"$40.00",
				"-$10.00",
				"-20.00%",
				"yes",
				"TRIGGER",
			]),
		);
		expect(lines[3]).toBe(
			row([
				"Will the ferry run on Sunday?",
				"No",
				"0.6000",
				"100.00",
				"$60.00",
				"+$10.00",
				"+20.00%",
				"no",
				"-",
			]),
		);
	});

	it("totals value and P&L against the summed initial value", () => {
		const lines = renderPositionsTable(
			[
				{ position: losing, monitored: true, triggered: false },
				{ position: winning, monitored: true, triggered: false },
			],
			makeConfig(),
		).split("\n");

		expect(lines[5]).toBe(row(["TOTAL", "", "", "", "$100.00", "+$0.00", "+0.00%"]));
		expect(lines[6]).toBe("MONITORING MODE: ALL POSITIONS");
	});

	it("truncates long market names", () => {
		const name = "Will the regional transit authority extend night service?";
		const position = makePosition({ marketName: name });

		const lines = renderPositionsTable(
			[{ position, monitored: true, triggered: false }],
			makeConfig(),
		).split("\n");

		expect(lines[2]?.slice(0, 35)).toBe(`${name.slice(0, 32)}...`);
	});

	it("colors losses red when asked", () => {
		const table = renderPositionsTable(
			[{ position: losing, monitored: true, triggered: false }],
			makeConfig(),
			{ color: true },
		);

		expect(table).toContain(`${RED}${"-$10.00".padStart(10)}${RESET}`);
	});
});

describe("describeMode", () => {
	it("names the effective selection mode", () => {
		const ids = new Set([marketTokenId("tok-1"), marketTokenId("tok-2")]);
		expect(describeMode(makeConfig())).toBe("ALL POSITIONS");
		expect(describeMode(makeConfig({ selectionMode: "selected", selectedTokenIds: ids }))).toBe(
			"SELECTED (2 positions)",
		);
		expect(describeMode(makeConfig({ selectionMode: "selected" }))).toBe("NONE");
	});
});

describe("rowsFromReport", () => {
	it("flags monitored and triggered positions", () => {
		const rows = rowsFromReport(makeReport({ monitored: [losing] }));

		expect(rows.map((r) => [r.position.tokenId, r.monitored, r.triggered])).toEqual([
			["tok-1", true, true],
			["tok-2", false, false],
		]);
	});
});

describe("renderCycleSummary", () => {
	it("prints the table and cycle counts for a completed cycle", () => {
		const lines = renderCycleSummary(
			makeReport({ missingTokenIds: [marketTokenId("tok-9")] }),
			makeConfig(),
			NOW,
		).split("\n");

		expect(lines[0]).toBe("=== Cycle 3 @ 03:04:05 UTC ===");
		expect(lines.at(-2)).toBe("Monitored: 2 | Triggered: 1 | Liquidated: 0");
		expect(lines.at(-1)).toBe("Selected but not found: tok-9");
	});

	it("reports a failed cycle with its error", () => {
		const report = makeReport({
			status: "failed",
			ok: false,
			error: new NetworkError("Data API returned 503"),
		});

		expect(renderCycleSummary(report, makeConfig(), NOW)).toBe(
			"=== Cycle 3 @ 03:04:05 UTC ===\nCycle failed: Data API returned 503",
		);
	});

	it("reports a skipped cycle", () => {
		const report = makeReport({ status: "skipped", ok: false });

		expect(renderCycleSummary(report, makeConfig(), NOW)).toBe(
			"=== Cycle 3 @ 03:04:05 UTC ===\nCycle skipped: previous cycle still running",
		);
	});
});

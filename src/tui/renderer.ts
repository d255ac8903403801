import type { CycleReport } from "../monitor/types.js";
import { SelectionMode, type StopLossConfig, effectiveSelectionMode } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { CYAN, YELLOW, bold, colorize, pnlColor } from "./ansi.js";
import type { PositionRow, RenderOptions } from "./types.js";

export const NO_POSITIONS = "No positions found above minimum threshold";

const MARKET_WIDTH = 35;
const OUTCOME_WIDTH = 10;

interface Column {
	readonly title: string;
	readonly width: number;
	readonly align: "left" | "right";
}

const COLUMNS: readonly Column[] = [
	{ title: "Market", width: MARKET_WIDTH, align: "left" },
	{ title: "Outcome", width: OUTCOME_WIDTH, align: "left" },
	{ title: "Price", width: 8, align: "right" },
	{ title: "Size", width: 10, align: "right" },
	{ title: "Value", width: 10, align: "right" },
	{ title: "P&L", width: 10, align: "right" },
	{ title: "P&L%", width: 9, align: "right" },
	{ title: "Monitor", width: 7, align: "left" },
	{ title: "Status", width: 8, align: "left" },
];

const TABLE_WIDTH = COLUMNS.reduce((sum, c) => sum + c.width, 0) + COLUMNS.length - 1;

function truncate(text: string, width: number): string {
	return text.length <= width ? text : `${text.slice(0, width - 3)}...`;
}

function pad(text: string, column: Column): string {
	const cell = truncate(text, column.width);
	return column.align === "left" ? cell.padEnd(column.width) : cell.padStart(column.width);
}

function formatMoney(value: Decimal): string {
	return `$${value.toFixed(2)}`;
}

function formatPnl(value: Decimal): string {
	const abs = value.abs().toFixed(2);
	return value.isNegative() ? `-$${abs}` : `+$${abs}`;
}

function formatPct(value: Decimal): string {
	const abs = value.abs().toFixed(2);
	return value.isNegative() ? `-${abs}%` : `+${abs}%`;
}

/** Cells are padded before coloring so escape codes never skew the widths. */
function renderLine(cells: readonly string[], colors: readonly (string | null)[]): string {
	return COLUMNS.map((column, i) => {
		const padded = pad(cells[i] ?? "", column);
		const color = colors[i] ?? null;
		return color === null ? padded : colorize(padded, color);
	})
		.join(" ")
		.trimEnd();
}

function statusOf(row: PositionRow): string {
	if (row.triggered) return "TRIGGER";
	return row.monitored ? "OK" : "-";
}

export function describeMode(config: StopLossConfig): string {
	switch (effectiveSelectionMode(config)) {
		case SelectionMode.All:
			return "ALL POSITIONS";
		case SelectionMode.Selected:
			return `SELECTED (${config.selectedTokenIds.size} positions)`;
		case SelectionMode.None:
			return "NONE";
	}
}

/** Builds table rows from a completed cycle, in snapshot order. */
export function rowsFromReport(report: CycleReport): PositionRow[] {
	const monitored = new Set(report.monitored.map((p) => p.tokenId));
	const triggered = new Set(report.triggered.map((t) => t.position.tokenId));
	return report.positions.map((position) => ({
		position,
		monitored: monitored.has(position.tokenId),
		triggered: triggered.has(position.tokenId),
	}));
}

/**
 * Fixed-width table of the snapshot with a TOTAL row and the monitoring
 * mode. The total P&L% is relative to the summed initial value.
 */
export function renderPositionsTable(
	rows: readonly PositionRow[],
	config: StopLossConfig,
	options: RenderOptions = {},
): string {
	if (rows.length === 0) return NO_POSITIONS;
	const color = options.color ?? false;
	const rule = "-".repeat(TABLE_WIDTH);

	const header = renderLine(
		COLUMNS.map((c) => c.title),
		[],
	);
	const lines: string[] = [color ? bold(header) : header, rule];

	let totalValue = Decimal.zero();
	let totalInitial = Decimal.zero();
	for (const row of rows) {
		const p = row.position;
		totalValue = totalValue.add(p.currentValue);
		totalInitial = totalInitial.add(p.initialValue);
		const tint = color ? pnlColor(p.pnl) : null;
		lines.push(
			renderLine(
				[
					p.marketName,
					p.outcome,
					p.currentPrice.toFixed(4),
					p.size.toFixed(2),
					formatMoney(p.currentValue),
					formatPnl(p.pnl),
					formatPct(p.pnlPct),
					row.monitored ? "yes" : "no",
					statusOf(row),
				],
				[null, null, null, null, null, tint, tint, null, color && row.triggered ? YELLOW : null],
			),
		);
	}

	const totalPnl = totalValue.sub(totalInitial);
	const totalPct = totalInitial.isPositive()
		? totalPnl.div(totalInitial).mul(Decimal.from(100))
		: Decimal.zero();
	const totalTint = color ? pnlColor(totalPnl) : null;
	lines.push(rule);
	lines.push(
		renderLine(
			["TOTAL", "", "", "", formatMoney(totalValue), formatPnl(totalPnl), formatPct(totalPct)],
			[null, null, null, null, null, totalTint, totalTint],
		),
	);
	lines.push(`MONITORING MODE: ${describeMode(config)}`);
	return lines.join("\n");
}

function formatTime(ms: number): string {
	return new Date(ms).toISOString().slice(11, 19);
}

/** Console block printed after every cycle. */
export function renderCycleSummary(
	report: CycleReport,
	config: StopLossConfig,
	nowMs: number,
	options: RenderOptions = {},
): string {
	const color = options.color ?? false;
	const title = `=== Cycle ${report.cycle} @ ${formatTime(nowMs)} UTC ===`;
	const lines: string[] = [color ? colorize(title, CYAN) : title];

	switch (report.status) {
		case "skipped":
			lines.push("Cycle skipped: previous cycle still running");
			return lines.join("\n");
		case "failed":
			lines.push(`Cycle failed: ${report.error?.message ?? "unknown error"}`);
			return lines.join("\n");
		case "completed":
			break;
	}

	lines.push(renderPositionsTable(rowsFromReport(report), config, options));
	const liquidated = report.outcomes.filter((o) => o.ok && o.result.success).length;
	const counts = [
		`Monitored: ${report.monitored.length}`,
		`Triggered: ${report.triggered.length}`,
		`Liquidated: ${liquidated}`,
	];
	lines.push(counts.join(" | "));
	if (report.missingTokenIds.length > 0) {
		lines.push(`Selected but not found: ${report.missingTokenIds.join(", ")}`);
	}
	if (report.skippedRecords > 0) {
		lines.push(`Malformed records skipped: ${report.skippedRecords}`);
	}
	return lines.join("\n");
}

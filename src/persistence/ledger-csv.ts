/**
 * CSV export of the execution ledger, one row per liquidation.
 */

import type { LedgerRecord } from "./types.js";

export const LEDGER_CSV_COLUMNS = [
	"timestamp",
	"market",
	"outcome",
	"size",
	"value",
	"pnl",
	"pnl_percentage",
	"orders_placed",
	"total_size_ordered",
	"remaining_size",
	"order_success",
	"avg_sale_price",
	"min_sale_price",
	"max_sale_price",
] as const;

export interface SalePrices {
	/** Size-weighted; simple mean when sizes sum to zero. */
	readonly avg: number;
	readonly min: number;
	readonly max: number;
}

export function salePrices(record: LedgerRecord): SalePrices | null {
	const orders = record.result.orders;
	if (orders.length === 0) return null;

	const prices = orders.map((o) => o.price);
	const totalSize = orders.reduce((sum, o) => sum + o.size, 0);
	const avg =
		totalSize > 0
			? orders.reduce((sum, o) => sum + o.price * o.size, 0) / totalSize
			: prices.reduce((sum, p) => sum + p, 0) / prices.length;
	return { avg, min: Math.min(...prices), max: Math.max(...prices) };
}

export function csvField(value: string): string {
	return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function toRow(record: LedgerRecord): string {
	const prices = salePrices(record);
	const fields = [
		record.timestamp,
		record.position.market,
		record.position.outcome,
		String(record.position.size),
		String(record.position.value),
		String(record.position.pnl),
		String(record.position.pnlPct),
		String(record.result.ordersPlaced),
		String(record.result.totalSizeOrdered),
		String(record.result.remainingSize),
		record.result.success ? "True" : "False",
		prices ? prices.avg.toFixed(6) : "",
		prices ? prices.min.toFixed(6) : "",
		prices ? prices.max.toFixed(6) : "",
	];
	return fields.map(csvField).join(",");
}

/** Header plus one line per record, newline-terminated. */
export function ledgerToCsv(records: readonly LedgerRecord[]): string {
	const lines = [LEDGER_CSV_COLUMNS.join(","), ...records.map(toRow)];
	return `${lines.join("\n")}\n`;
}

export interface LedgerTotals {
	readonly executions: number;
	readonly successful: number;
	readonly dryRuns: number;
	readonly ordersPlaced: number;
	readonly totalSizeOrdered: number;
}

export function summarizeLedger(records: readonly LedgerRecord[]): LedgerTotals {
	return records.reduce<LedgerTotals>(
		(acc, r) => ({
			executions: acc.executions + 1,
			successful: acc.successful + (r.result.success ? 1 : 0),
			dryRuns: acc.dryRuns + (r.result.dryRun ? 1 : 0),
			ordersPlaced: acc.ordersPlaced + r.result.ordersPlaced,
			totalSizeOrdered: acc.totalSizeOrdered + r.result.totalSizeOrdered,
		}),
		{ executions: 0, successful: 0, dryRuns: 0, ordersPlaced: 0, totalSizeOrdered: 0 },
	);
}

import { z } from "../lib/validation/index.js";
import type { LedgerRecord } from "./types.js";

const orderSchema = z.object({
	orderId: z.string().nullable(),
	price: z.number(),
	size: z.number(),
	phase: z.enum(["chunk", "final_sweep"]),
});

/** Shape of one ledger line as written by FileLedger. */
export const ledgerRecordSchema: z.ZodType<LedgerRecord, z.ZodTypeDef, unknown> = z.object({
	timestamp: z.string().datetime(),
	position: z.object({
		tokenId: z.string(),
		market: z.string(),
		outcome: z.string(),
		size: z.number(),
		value: z.number(),
		pnl: z.number(),
		pnlPct: z.number(),
	}),
	result: z.object({
		success: z.boolean(),
		status: z.enum(["done", "partially_filled", "failed"]),
		ordersPlaced: z.number().int().nonnegative(),
		totalSizeOrdered: z.number(),
		remainingSize: z.number(),
		originalSize: z.number(),
		orders: z.array(orderSchema),
		attemptCount: z.number().int().nonnegative(),
		priceSource: z.enum(["best_bid", "no_bids", "book_error"]),
		error: z.string().nullable(),
		dryRun: z.boolean(),
	}),
});

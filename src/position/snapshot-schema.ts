/**
 * Data API position record: the boundary schema.
 *
 * Default rules, stated once:
 * - `title` → "Unknown Market", `outcome` → "Unknown"
 * - `size`, `curPrice`, `currentValue` → 0
 * - `initialValue` → `currentValue`
 * Numbers may arrive as JSON numbers or numeric strings. `asset` is required.
 */

import { decimalSchema, validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { marketTokenId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { map } from "../shared/result.js";
import { Position } from "./position.js";

const nonNegative = decimalSchema.refine((d) => !d.isNegative(), "must not be negative");

export const positionRecordSchema = z.object({
	asset: z.string().trim().min(1, "asset is required"),
	title: z.string().nullish(),
	outcome: z.string().nullish(),
	size: nonNegative.nullish(),
	curPrice: nonNegative.nullish(),
	currentValue: decimalSchema.nullish(),
	initialValue: decimalSchema.nullish(),
});

export type PositionRecord = z.infer<typeof positionRecordSchema>;

function nonBlank(value: string | null | undefined, fallback: string): string {
	return value !== null && value !== undefined && value.trim() !== "" ? value : fallback;
}

/** Applies the default rules to a validated record. */
export function recordToPosition(record: PositionRecord): Position {
	const currentValue = record.currentValue ?? Decimal.zero();
	return Position.create({
		tokenId: marketTokenId(record.asset),
		marketName: nonBlank(record.title, "Unknown Market"),
		outcome: nonBlank(record.outcome, "Unknown"),
		size: record.size ?? Decimal.zero(),
		currentPrice: record.curPrice ?? Decimal.zero(),
		currentValue,
		initialValue: record.initialValue ?? currentValue,
	});
}

export function parsePositionRecord(raw: unknown): Result<Position, ValidationError> {
	return map(validate(positionRecordSchema, raw, "Malformed position record"), recordToPosition);
}

/**
 * Position snapshot types.
 */

import type { ValidationError } from "../lib/validation/index.js";
import type { TradingError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import type { Position } from "./position.js";

/** A Data API record that failed the boundary schema. */
export interface SkippedRecord {
	readonly index: number;
	readonly error: ValidationError;
}

export interface PositionSnapshot {
	readonly positions: readonly Position[];
	readonly skipped: readonly SkippedRecord[];
	/** Valid records below the minimum position value. */
	readonly belowMinValue: number;
}

/** Source of the account's current positions. */
export interface PositionSnapshotProvider {
	fetchPositions(minPositionValue: number): Promise<Result<PositionSnapshot, TradingError>>;
}

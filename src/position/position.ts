/**
 * Position: immutable value for one outcome token held by the account,
 * refreshed wholesale every cycle.
 */

import { Decimal } from "../shared/decimal.js";
import type { MarketTokenId } from "../shared/identifiers.js";

const HUNDRED = Decimal.from(100);

export interface PositionParams {
	readonly tokenId: MarketTokenId;
	readonly marketName: string;
	readonly outcome: string;
	readonly size: Decimal;
	readonly currentPrice: Decimal;
	readonly currentValue: Decimal;
	readonly initialValue: Decimal;
}

export class Position {
	readonly tokenId: MarketTokenId;
	readonly marketName: string;
	readonly outcome: string;
	readonly size: Decimal;
	readonly currentPrice: Decimal;
	readonly currentValue: Decimal;
	readonly initialValue: Decimal;
	/** currentValue − initialValue */
	readonly pnl: Decimal;
	/** pnl / initialValue × 100, or 0 when initialValue ≤ 0. */
	readonly pnlPct: Decimal;

	private constructor(params: PositionParams) {
		this.tokenId = params.tokenId;
		this.marketName = params.marketName;
		this.outcome = params.outcome;
		this.size = params.size;
		this.currentPrice = params.currentPrice;
		this.currentValue = params.currentValue;
		this.initialValue = params.initialValue;
		this.pnl = params.currentValue.sub(params.initialValue);
		this.pnlPct = params.initialValue.isPositive()
			? this.pnl.div(params.initialValue).mul(HUNDRED)
			: Decimal.zero();
	}

	static create(params: PositionParams): Position {
		return new Position(params);
	}

	/** Short label for logs and notifications: `Market name [Outcome]`. */
	label(): string {
		return `${this.marketName} [${this.outcome}]`;
	}

	/** Plain-number view for ledgers and event payloads. */
	toSummary(): PositionSummary {
		return {
			tokenId: this.tokenId,
			market: this.marketName,
			outcome: this.outcome,
			size: this.size.toNumber(),
			price: this.currentPrice.toNumber(),
			value: this.currentValue.toNumber(),
			pnl: this.pnl.toNumber(),
			pnlPct: this.pnlPct.toNumber(),
		};
	}
}

/** JSON-friendly projection of a Position. */
export interface PositionSummary {
	readonly tokenId: string;
	readonly market: string;
	readonly outcome: string;
	readonly size: number;
	readonly price: number;
	readonly value: number;
	readonly pnl: number;
	readonly pnlPct: number;
}

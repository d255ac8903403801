/**
 * Decimal: immutable financial math backed by decimal.js-light.
 *
 * Prices and sizes flow through the liquidation loop as Decimal so that
 * `ordered + remaining === size` holds exactly after any number of chunks.
 * Domain code imports this module, never decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class Decimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * @throws Error for non-finite numbers and blank or malformed strings
	 * @example Decimal.from("0.38")
	 */
	static from(value: string | number): Decimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			return new Decimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}
		return new Decimal(new DecimalLight(trimmed));
	}

	static zero(): Decimal {
		return new Decimal(new DecimalLight(0));
	}

	static min(a: Decimal, b: Decimal): Decimal {
		return a.lte(b) ? a : b;
	}

	static max(a: Decimal, b: Decimal): Decimal {
		return a.gte(b) ? a : b;
	}

	// ── Arithmetic ─────────────────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.raw.plus(other.raw));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.raw.minus(other.raw));
	}

	mul(other: Decimal): Decimal {
		return new Decimal(this.raw.times(other.raw));
	}

	/** @throws Error on division by zero */
	div(other: Decimal): Decimal {
		if (other.isZero()) {
			throw new Error("Decimal.div: division by zero");
		}
		return new Decimal(this.raw.dividedBy(other.raw));
	}

	neg(): Decimal {
		return new Decimal(this.raw.negated());
	}

	abs(): Decimal {
		return new Decimal(this.raw.absoluteValue());
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: Decimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: Decimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: Decimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: Decimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: Decimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	toNumber(): number {
		return this.raw.toNumber();
	}

	/** Plain notation, never exponential. */
	toString(): string {
		return this.raw.toFixed();
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	toJSON(): string {
		return this.toString();
	}
}

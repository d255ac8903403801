/**
 * In-flight guard: prevents a second liquidation of a token while one is
 * still running.
 *
 * Entries expire after `ttlMs` so a crashed attempt cannot pin a token
 * forever.
 */
import type { MarketTokenId } from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";

export interface InFlightGuardConfig {
	readonly ttlMs: number;
}

/** Long enough to cover a full chunk loop with settle delays. */
export const DEFAULT_IN_FLIGHT_TTL_MS = 10 * 60_000;

export class InFlightGuard {
	private readonly entries = new Map<string, number>();
	private readonly ttlMs: number;
	private readonly clock: Clock;

	private constructor(config: InFlightGuardConfig, clock: Clock) {
		this.ttlMs = config.ttlMs;
		this.clock = clock;
	}

	static create(
		clock: Clock,
		config: InFlightGuardConfig = { ttlMs: DEFAULT_IN_FLIGHT_TTL_MS },
	): InFlightGuard {
		return new InFlightGuard(config, clock);
	}

	/**
	 * Claims the token. Returns false when another attempt already holds it.
	 */
	tryAcquire(tokenId: MarketTokenId): boolean {
		this.evict();
		if (this.entries.has(tokenId)) return false;
		this.entries.set(tokenId, this.clock.now() + this.ttlMs);
		return true;
	}

	release(tokenId: MarketTokenId): void {
		this.entries.delete(tokenId);
	}

	isInFlight(tokenId: MarketTokenId): boolean {
		this.evict();
		return this.entries.has(tokenId);
	}

	/** Number of tokens currently claimed. */
	get size(): number {
		this.evict();
		return this.entries.size;
	}

	private evict(): void {
		const now = this.clock.now();
		for (const [key, expiresMs] of this.entries) {
			if (expiresMs <= now) {
				this.entries.delete(key);
			}
		}
	}
}

/**
 * MemoryLedger: in-memory execution ledger for tests and one-off runs.
 * Not persisted across restarts.
 */

import type { ExecutionLedger, LedgerRecord } from "./types.js";

export interface MemoryLedgerConfig {
	readonly maxEntries?: number;
}

export class MemoryLedger implements ExecutionLedger {
	private readonly store: LedgerRecord[] = [];
	private readonly maxEntries: number;

	constructor(config?: MemoryLedgerConfig) {
		this.maxEntries = config?.maxEntries ?? Number.POSITIVE_INFINITY;
	}

	async append(record: LedgerRecord): Promise<void> {
		this.store.push(record);
		const excess = this.store.length - this.maxEntries;
		if (excess > 0) {
			this.store.splice(0, excess);
		}
	}

	/** Returns a shallow copy of all records. */
	records(): LedgerRecord[] {
		return [...this.store];
	}

	clear(): void {
		this.store.length = 0;
	}

	/** No-op: writes are synchronous. */
	async flush(): Promise<void> {}

	get size(): number {
		return this.store.length;
	}
}

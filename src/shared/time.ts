/**
 * Time utilities: injectable clock and sleep for deterministic testing.
 *
 * Code that timestamps or waits takes a Clock and a Sleep instead of
 * calling Date.now() or setTimeout directly.
 */

/** Injectable time source. */
export interface Clock {
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Manually advanced clock for tests. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	/** @throws Error on negative ms */
	advance(ms: number): void {
		if (ms < 0) {
			throw new Error(`FakeClock.advance requires non-negative ms, got ${ms}`);
		}
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

/**
 * Waits `ms` milliseconds. Resolves early (without throwing) when the
 * signal aborts, so loops can check the signal right after waking up.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) => {
	if (ms <= 0 || signal?.aborted) return Promise.resolve();
	return new Promise<void>((resolve) => {
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
};

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
} as const;

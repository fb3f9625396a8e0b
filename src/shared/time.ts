/**
 * Time utilities — injectable clock and sleep for deterministic testing.
 *
 * Backoff and retry code depends on `Clock` and `Sleep` instead of
 * `Date.now()` and `setTimeout`, so tests can drive retry loops without
 * real pauses.
 */

/** Injectable time source. */
export interface Clock {
	now(): number;
}

/** Suspends the caller for `ms` milliseconds. */
export type Sleep = (ms: number) => Promise<void>;

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Production sleep backed by `setTimeout`. */
export const realSleep: Sleep = (ms) =>
	new Promise<void>((resolve) => {
		setTimeout(resolve, ms);
	});

/**
 * Controllable clock for deterministic testing.
 *
 * `sleep` resolves immediately and advances the clock by the requested
 * interval, so a deadline-bounded retry loop sees time pass.
 */
export class FakeClock implements Clock {
	private time: number;
	readonly sleeps: number[] = [];

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	readonly sleep: Sleep = (ms) => {
		this.sleeps.push(ms);
		this.time += ms;
		return Promise.resolve();
	};
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
} as const;

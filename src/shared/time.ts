/**
 * Time utilities — injectable clock and sleep for deterministic testing.
 *
 * Runtime code reads time through `Clock.now()` and waits through a `Sleep`,
 * so tests drive both without fake timers or patched globals.
 */

/** Injectable time source. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		if (ms < 0) {
			throw new RangeError(`FakeClock.advance expects non-negative ms, got ${ms}`);
		}
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Waiting ─────────────────────────────────────────────────────────

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) => {
	if (ms <= 0 || signal?.aborted) return Promise.resolve();
	return new Promise((resolve) => {
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

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
} as const;

/**
 * Time utilities: injectable clock for deterministic testing.
 *
 * Engine code uses Clock.now() instead of Date.now() directly,
 * so entry windows and lock staleness can be tested without real waits.
 */

/** Injectable time source -- all engine code depends on this instead of `Date.now()`. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
	days: (n: number) => n * 86_400_000,
} as const;

/** UTC ISO-8601 rendering used in persisted records and the lock marker. */
export function toIso(ms: number): string {
	return new Date(ms).toISOString();
}

/** Parse an ISO-8601 timestamp, returning null for missing or malformed input. */
export function parseIso(value: string | null | undefined): number | null {
	if (value === null || value === undefined || value.trim().length === 0) return null;
	const ms = Date.parse(value);
	return Number.isFinite(ms) ? ms : null;
}

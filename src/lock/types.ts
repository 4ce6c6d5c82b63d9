/**
 * Run lock types: exclusivity for one orchestrated run at a time.
 */

import type { LockError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

/** Contents of the marker file. */
export interface LockMarker {
	readonly owner: string;
	readonly token: string;
	readonly pid: number;
	readonly host: string;
	/** UTC ISO-8601 */
	readonly acquiredAt: string;
}

/** Held by the run that owns the lock; required to release it. */
export interface RunGuard {
	readonly owner: string;
	readonly token: string;
	readonly acquiredAtMs: number;
	readonly path: string;
	/** Set when this acquisition had to reclaim an abandoned marker */
	readonly reclaimed: StaleLockReclaimed | null;
}

/** Contention is a normal outcome, not an error. */
export interface LockBusy {
	readonly kind: "busy";
	/** `held`: a live, readable marker. `contested`: unreadable or racing. */
	readonly reason: "held" | "contested";
	readonly holder: LockMarker | null;
	readonly ageMs: number | null;
}

/** Warning event: an abandoned marker older than the staleness threshold was removed. */
export interface StaleLockReclaimed {
	readonly path: string;
	readonly previousOwner: string | null;
	readonly previousAcquiredAt: string | null;
	readonly ageMs: number;
	readonly stalenessMs: number;
}

export type ReleaseOutcome = "released" | "not_owner";

export type LockState =
	| { readonly state: "free" }
	| { readonly state: "held"; readonly marker: LockMarker; readonly ageMs: number }
	| { readonly state: "unreadable"; readonly ageMs: number };

/** What a run needs from a lock. FileRunLock is the production implementation. */
export interface RunLock {
	acquire(ownerId: string, stalenessMs: number): Promise<Result<RunGuard, LockBusy | LockError>>;
	release(guard: RunGuard): Promise<Result<ReleaseOutcome, LockError>>;
}

export type RunLockEvents = {
	stale_reclaimed: (event: StaleLockReclaimed) => void;
};

export function isLockBusy(value: unknown): value is LockBusy {
	return typeof value === "object" && value !== null && "kind" in value && value.kind === "busy";
}

/**
 * FileRunLock: exclusive-create marker file guarding one run at a time.
 *
 * The marker is created with O_CREAT|O_EXCL, so of two simultaneous acquires
 * exactly one wins. A marker older than the staleness threshold belongs to a
 * crashed run and is reclaimed: it is renamed to a private tombstone, the
 * tombstone is compared with what was judged stale, and only then deleted.
 * If the tombstone turns out to be a newer marker it is put back and the
 * caller sees Busy. Unreadable or half-written markers count as contested
 * until their mtime is itself stale.
 */

import EventEmitter from "eventemitter3";
import { randomBytes, randomUUID } from "node:crypto";
import { link, open, readFile, rename, stat, unlink } from "node:fs/promises";
import { hostname } from "node:os";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { LockError, isNodeError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, parseIso, toIso } from "../shared/time.js";
import type {
	LockBusy,
	LockMarker,
	LockState,
	ReleaseOutcome,
	RunGuard,
	RunLock,
	RunLockEvents,
	StaleLockReclaimed,
} from "./types.js";

const MAX_ATTEMPTS = 3;

const markerSchema = z
	.object({
		owner: z.string().min(1),
		token: z.string().min(1),
		pid: z.number().int(),
		host: z.string(),
		acquiredAt: z.string(),
	})
	.strict();

export interface FileRunLockConfig {
	readonly path: string;
	readonly clock?: Clock;
	readonly logger?: Logger;
	readonly host?: string;
	readonly pid?: number;
}

/** What was found at the marker path. */
type Observed =
	| { readonly kind: "missing" }
	| { readonly kind: "marker"; readonly raw: string; readonly marker: LockMarker; readonly ageMs: number }
	| { readonly kind: "unreadable"; readonly raw: string | null; readonly ageMs: number };

export class FileRunLock implements RunLock {
	readonly events = new EventEmitter<RunLockEvents>();
	private readonly path: string;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly host: string;
	private readonly pid: number;

	constructor(config: FileRunLockConfig) {
		this.path = config.path;
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? silentLogger()).child({ component: "run-lock" });
		this.host = config.host ?? hostname();
		this.pid = config.pid ?? process.pid;
	}

	/**
	 * Try to become the single active run.
	 * Busy is an expected outcome; LockError means the marker could not be handled at all.
	 */
	async acquire(
		ownerId: string,
		stalenessMs: number,
	): Promise<Result<RunGuard, LockBusy | LockError>> {
		let reclaimed: StaleLockReclaimed | null = null;

		for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
			const created = await this.tryCreate(ownerId);
			if (!created.ok) return created;
			if (created.value !== null) {
				const guard: RunGuard = { ...created.value, reclaimed };
				this.logger.info({ owner: ownerId, attempt }, "run lock acquired");
				return ok(guard);
			}

			const observed = await this.observe();
			if (!observed.ok) return observed;
			const found = observed.value;

			if (found.kind === "missing") continue;
			if (found.ageMs < stalenessMs) {
				return err(busy(found));
			}

			const reclaim = await this.reclaim(found, stalenessMs);
			if (!reclaim.ok) return reclaim;
			if (reclaim.value === null) {
				return err(busy(found, "contested"));
			}
			reclaimed = reclaim.value;
		}

		return err({ kind: "busy", reason: "contested", holder: null, ageMs: null });
	}

	/** Remove the marker if it is still ours; a foreign marker is left in place. */
	async release(guard: RunGuard): Promise<Result<ReleaseOutcome, LockError>> {
		const tomb = this.tombPath("release");
		try {
			await rename(this.path, tomb);
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") {
				this.logger.warn({ owner: guard.owner }, "run lock already gone at release");
				return ok("not_owner");
			}
			return err(new LockError(`Cannot release run lock ${this.path}`, { cause: e }));
		}

		const raw = await readFile(tomb, "utf-8").catch((e: unknown) => {
			this.logger.warn({ error: e, tomb }, "released marker unreadable");
			return null;
		});
		const marker = raw === null ? null : parseMarker(raw);
		if (marker !== null && marker.owner === guard.owner && marker.token === guard.token) {
			const removed = await this.removeTomb(tomb);
			if (!removed.ok) return removed;
			this.logger.info({ owner: guard.owner }, "run lock released");
			return ok("released");
		}

		const restored = await this.restoreTomb(tomb);
		if (!restored.ok) return restored;
		this.logger.warn(
			{ owner: guard.owner, holder: marker?.owner ?? null },
			"run lock held by another owner; left in place",
		);
		return ok("not_owner");
	}

	/** Read-only view for status reporting. */
	async inspect(): Promise<Result<LockState, LockError>> {
		const observed = await this.observe();
		if (!observed.ok) return observed;
		const found = observed.value;
		switch (found.kind) {
			case "missing":
				return ok({ state: "free" });
			case "marker":
				return ok({ state: "held", marker: found.marker, ageMs: found.ageMs });
			case "unreadable":
				return ok({ state: "unreadable", ageMs: found.ageMs });
		}
	}

	// ── Internals ──────────────────────────────────────────────────

	/** ok(null) when the marker already exists. */
	private async tryCreate(
		ownerId: string,
	): Promise<Result<Omit<RunGuard, "reclaimed"> | null, LockError>> {
		const acquiredAtMs = this.clock.now();
		const marker: LockMarker = {
			owner: ownerId,
			token: randomUUID(),
			pid: this.pid,
			host: this.host,
			acquiredAt: toIso(acquiredAtMs),
		};

		let handle: Awaited<ReturnType<typeof open>>;
		try {
			handle = await open(this.path, "wx");
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "EEXIST") return ok(null);
			return err(new LockError(`Cannot create run lock ${this.path}`, { cause: e }));
		}
		try {
			await handle.writeFile(`${JSON.stringify(marker)}\n`, "utf-8");
			await handle.sync();
		} catch (e: unknown) {
			await handle.close();
			// A half-written marker would read as contested until it went stale.
			const removed = await unlink(this.path).then(
				() => true,
				(cleanup: unknown) => {
					this.logger.error({ error: cleanup, path: this.path }, "half-written run lock left behind");
					return false;
				},
			);
			return err(
				new LockError(`Cannot write run lock ${this.path}`, { cause: e, markerRemoved: removed }),
			);
		}
		await handle.close();
		return ok({ owner: ownerId, token: marker.token, acquiredAtMs, path: this.path });
	}

	private async observe(): Promise<Result<Observed, LockError>> {
		let raw: string;
		let mtimeMs: number;
		try {
			const info = await stat(this.path);
			mtimeMs = info.mtimeMs;
			raw = await readFile(this.path, "utf-8");
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") return ok({ kind: "missing" });
			return err(new LockError(`Cannot read run lock ${this.path}`, { cause: e }));
		}

		const now = this.clock.now();
		const marker = parseMarker(raw);
		const acquiredAtMs = marker === null ? null : parseIso(marker.acquiredAt);
		if (marker === null || acquiredAtMs === null) {
			return ok({ kind: "unreadable", raw, ageMs: Math.max(0, now - mtimeMs) });
		}
		return ok({ kind: "marker", raw, marker, ageMs: Math.max(0, now - acquiredAtMs) });
	}

	/**
	 * Move the stale marker aside and confirm it is the one judged stale.
	 * ok(null) means another process got there first.
	 */
	private async reclaim(
		stale: Exclude<Observed, { kind: "missing" }>,
		stalenessMs: number,
	): Promise<Result<StaleLockReclaimed | null, LockError>> {
		const tomb = this.tombPath("stale");
		try {
			await rename(this.path, tomb);
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") return ok(null);
			return err(new LockError(`Cannot reclaim run lock ${this.path}`, { cause: e }));
		}

		const moved = await readFile(tomb, "utf-8").catch((e: unknown) => {
			this.logger.warn({ error: e, tomb }, "reclaimed marker unreadable");
			return null;
		});
		if (moved !== stale.raw) {
			const restored = await this.restoreTomb(tomb);
			return restored.ok ? ok(null) : restored;
		}

		const removed = await this.removeTomb(tomb);
		if (!removed.ok) return removed;

		const event: StaleLockReclaimed = {
			path: this.path,
			previousOwner: stale.kind === "marker" ? stale.marker.owner : null,
			previousAcquiredAt: stale.kind === "marker" ? stale.marker.acquiredAt : null,
			ageMs: stale.ageMs,
			stalenessMs,
		};
		this.logger.warn({ ...event }, "stale run lock reclaimed");
		this.events.emit("stale_reclaimed", event);
		return ok(event);
	}

	/** Put a moved marker back without clobbering one created meanwhile. */
	private async restoreTomb(tomb: string): Promise<Result<void, LockError>> {
		try {
			await link(tomb, this.path);
		} catch (e: unknown) {
			if (!isNodeError(e) || e.code !== "EEXIST") {
				return err(new LockError(`Cannot restore run lock ${this.path}`, { cause: e }));
			}
			this.logger.error({ tomb }, "run lock recreated while a marker was moved aside; dropping it");
		}
		return this.removeTomb(tomb);
	}

	private async removeTomb(tomb: string): Promise<Result<void, LockError>> {
		try {
			await unlink(tomb);
			return ok(undefined);
		} catch (e: unknown) {
			return err(new LockError(`Cannot remove ${tomb}`, { cause: e }));
		}
	}

	private tombPath(label: string): string {
		return `${this.path}.${label}-${this.pid}-${randomBytes(4).toString("hex")}`;
	}
}

function parseMarker(raw: string): LockMarker | null {
	let data: unknown;
	try {
		data = JSON.parse(raw);
	} catch {
		return null;
	}
	const result = validate(markerSchema, data);
	return result.ok ? result.value : null;
}

function busy(found: Exclude<Observed, { kind: "missing" }>, reason?: LockBusy["reason"]): LockBusy {
	return {
		kind: "busy",
		reason: reason ?? (found.kind === "marker" ? "held" : "contested"),
		holder: found.kind === "marker" ? found.marker : null,
		ageMs: found.ageMs,
	};
}

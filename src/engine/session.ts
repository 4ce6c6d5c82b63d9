/**
 * GuardedSession: the skeleton every state-changing command runs inside.
 *
 *   acquire guard → load snapshot → work → archive finished positions →
 *   save → release guard → dispatch notifications
 *
 * `work` receives the loaded snapshot and an outbox; it returns the snapshot
 * to persist, or null to leave the stored one untouched.
 */

import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { LockBusy, RunGuard, RunLock, StaleLockReclaimed } from "../lock/types.js";
import { isLockBusy } from "../lock/types.js";
import type { DispatchSummary } from "../notify/outbox.js";
import { NotificationOutbox } from "../notify/outbox.js";
import type { Notifier } from "../notify/types.js";
import { NotificationKind } from "../notify/types.js";
import type { PositionStore } from "../persistence/types.js";
import { isTerminal } from "../position/lifecycle.js";
import type { PortfolioSnapshot } from "../position/types.js";
import type { CorruptStateError, LockError } from "../shared/errors.js";
import { SystemError } from "../shared/errors.js";
import type { PositionId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, toIso } from "../shared/time.js";

export interface SessionWork<T> {
	/** Null leaves the stored snapshot as it was */
	readonly snapshot: PortfolioSnapshot | null;
	readonly value: T;
}

export type SessionOutcome<T> =
	| { readonly type: "busy"; readonly busy: LockBusy }
	| {
			readonly type: "completed";
			readonly value: T;
			readonly saved: boolean;
			readonly archived: readonly PositionId[];
			readonly reclaimed: StaleLockReclaimed | null;
			readonly notifications: DispatchSummary;
	  };

export type SessionError = LockError | CorruptStateError | SystemError;

export interface GuardedSessionDeps {
	readonly store: PositionStore;
	readonly lock: RunLock;
	readonly notifier: Notifier;
	readonly lockStaleMs: number;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export class GuardedSession {
	private readonly store: PositionStore;
	private readonly lock: RunLock;
	private readonly notifier: Notifier;
	private readonly lockStaleMs: number;
	private readonly clock: Clock;
	private readonly logger: Logger;

	constructor(deps: GuardedSessionDeps) {
		this.store = deps.store;
		this.lock = deps.lock;
		this.notifier = deps.notifier;
		this.lockStaleMs = deps.lockStaleMs;
		this.clock = deps.clock ?? SystemClock;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "session" });
	}

	async run<T>(
		ownerId: string,
		work: (snapshot: PortfolioSnapshot, outbox: NotificationOutbox) => Promise<SessionWork<T>>,
	): Promise<Result<SessionOutcome<T>, SessionError>> {
		const acquired = await this.lock.acquire(ownerId, this.lockStaleMs);
		if (!acquired.ok) {
			if (isLockBusy(acquired.error)) {
				this.logger.info(
					{ reason: acquired.error.reason, holder: acquired.error.holder?.owner ?? null },
					"another run holds the guard; nothing to do",
				);
				return ok({ type: "busy", busy: acquired.error });
			}
			return err(acquired.error);
		}

		const guard = acquired.value;
		const outbox = new NotificationOutbox(() => this.clock.now());
		if (guard.reclaimed !== null) {
			outbox.add(NotificationKind.Error, "stale run lock reclaimed", {
				payload: {
					previousOwner: guard.reclaimed.previousOwner,
					previousAcquiredAt: guard.reclaimed.previousAcquiredAt,
					ageMs: guard.reclaimed.ageMs,
				},
			});
		}

		const result = await this.underGuard(work, outbox);
		await this.release(guard, outbox);
		const notifications = await outbox.dispatch(this.notifier, this.logger);

		if (!result.ok) return result;
		return ok({ type: "completed", ...result.value, reclaimed: guard.reclaimed, notifications });
	}

	private async underGuard<T>(
		work: (snapshot: PortfolioSnapshot, outbox: NotificationOutbox) => Promise<SessionWork<T>>,
		outbox: NotificationOutbox,
	): Promise<
		Result<
			{ value: T; saved: boolean; archived: readonly PositionId[] },
			CorruptStateError | SystemError
		>
	> {
		const loaded = await this.store.load();
		if (!loaded.ok) {
			this.logger.error({ error: loaded.error }, "snapshot is corrupt; aborting before any change");
			outbox.add(NotificationKind.Error, "position snapshot is corrupt", {
				payload: { error: loaded.error.message, hint: loaded.error.hint },
			});
			return loaded;
		}

		let done: SessionWork<T>;
		try {
			done = await work(loaded.value, outbox);
		} catch (e: unknown) {
			const error = new SystemError(
				`Run failed unexpectedly: ${e instanceof Error ? e.message : String(e)}`,
				{ cause: e },
			);
			this.logger.error({ error }, "run aborted; snapshot left unchanged");
			outbox.add(NotificationKind.Error, "run aborted", { payload: { error: error.message } });
			return err(error);
		}

		if (done.snapshot === null) {
			return ok({ value: done.value, saved: false, archived: [] });
		}

		const finished = done.snapshot.positions.filter((p) => isTerminal(p.status));
		for (const position of finished) {
			const archived = await this.store.appendArchive(position);
			if (!archived.ok) {
				outbox.add(NotificationKind.Error, "archiving a finished position failed", {
					symbol: position.symbol,
					positionId: position.id,
					payload: { error: archived.error.message },
				});
				return archived;
			}
		}

		const nowMs = this.clock.now();
		const saved = await this.store.save({
			...done.snapshot,
			savedAtMs: nowMs,
			positions: done.snapshot.positions.filter((p) => !isTerminal(p.status)),
		});
		if (!saved.ok) {
			outbox.add(NotificationKind.Error, "saving the position snapshot failed", {
				payload: { error: saved.error.message },
			});
			return saved;
		}
		this.logger.info(
			{ savedAt: toIso(nowMs), archived: finished.length },
			"snapshot saved",
		);
		return ok({ value: done.value, saved: true, archived: finished.map((p) => p.id) });
	}

	private async release(guard: RunGuard, outbox: NotificationOutbox): Promise<void> {
		const released = await this.lock.release(guard);
		if (!released.ok) {
			this.logger.error({ error: released.error }, "run lock could not be released");
			outbox.add(NotificationKind.Error, "run lock could not be released", {
				payload: { error: released.error.message, path: guard.path },
			});
			return;
		}
		if (released.value === "not_owner") {
			outbox.add(NotificationKind.Error, "run lock was taken over during the run", {
				payload: { path: guard.path },
			});
		}
	}
}

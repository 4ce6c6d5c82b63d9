import type { Logger } from "../lib/logger/index.js";
import type { Notification, NotificationKind, Notifier } from "./types.js";

export interface DispatchSummary {
	readonly delivered: number;
	readonly failed: number;
}

/**
 * Collects notifications during a run. They are dispatched only after the
 * snapshot is saved, so a notification never describes unsaved state.
 */
export class NotificationOutbox {
	private readonly pending: Notification[] = [];
	private readonly nowMs: () => number;

	constructor(nowMs: () => number) {
		this.nowMs = nowMs;
	}

	add(
		kind: NotificationKind,
		title: string,
		details: {
			symbol?: string | null;
			positionId?: string | null;
			payload?: Readonly<Record<string, unknown>>;
		} = {},
	): void {
		this.pending.push({
			kind,
			title,
			symbol: details.symbol ?? null,
			positionId: details.positionId ?? null,
			payload: details.payload ?? {},
			atMs: this.nowMs(),
		});
	}

	/** Deliver and empty the outbox. Failures are logged and counted, never thrown. */
	async dispatch(notifier: Notifier, logger: Logger): Promise<DispatchSummary> {
		const batch = this.pending.splice(0, this.pending.length);
		let failed = 0;
		for (const notification of batch) {
			try {
				await notifier.notify(notification);
			} catch (e: unknown) {
				failed++;
				logger.warn(
					{ error: e, notifier: notifier.name, kind: notification.kind, title: notification.title },
					"notification delivery failed",
				);
			}
		}
		return { delivered: batch.length - failed, failed };
	}
}

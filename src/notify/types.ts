/**
 * Notifications: what a run reports to humans.
 *
 * Every skip or rejection is reported as `risk` or `error`; fills and
 * state changes as `trade`; new entry signals as `signal`.
 */

export const NotificationKind = {
	Signal: "signal",
	Trade: "trade",
	Error: "error",
	Risk: "risk",
} as const;

export type NotificationKind = (typeof NotificationKind)[keyof typeof NotificationKind];

export interface Notification {
	readonly kind: NotificationKind;
	readonly title: string;
	readonly symbol: string | null;
	readonly positionId: string | null;
	readonly payload: Readonly<Record<string, unknown>>;
	readonly atMs: number;
}

/** Best-effort delivery channel. A rejection is logged and never reverts state. */
export interface Notifier {
	readonly name: string;
	notify(notification: Notification): Promise<void>;
}

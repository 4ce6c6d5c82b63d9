import type { Notification, Notifier } from "./types.js";

/** Keeps every notification; optionally fails every delivery instead. */
export class RecordingNotifier implements Notifier {
	readonly name: string;
	readonly received: Notification[] = [];
	private readonly failWith: string | null;

	constructor(name = "recording", failWith: string | null = null) {
		this.name = name;
		this.failWith = failWith;
	}

	async notify(notification: Notification): Promise<void> {
		if (this.failWith !== null) throw new Error(this.failWith);
		this.received.push(notification);
	}

	titles(): string[] {
		return this.received.map((n) => n.title);
	}
}

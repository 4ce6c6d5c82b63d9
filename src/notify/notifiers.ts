import type { Logger } from "../lib/logger/index.js";
import { toIso } from "../shared/time.js";
import type { Notification, Notifier } from "./types.js";
import { NotificationKind } from "./types.js";

/** Writes notifications to the structured log; the default channel. */
export class LoggerNotifier implements Notifier {
	readonly name = "logger";
	private readonly logger: Logger;

	constructor(logger: Logger) {
		this.logger = logger.child({ component: "notifier" });
	}

	async notify(notification: Notification): Promise<void> {
		const fields = {
			notification: notification.kind,
			symbol: notification.symbol,
			positionId: notification.positionId,
			at: toIso(notification.atMs),
			...notification.payload,
		};
		switch (notification.kind) {
			case NotificationKind.Error:
				this.logger.error(fields, notification.title);
				break;
			case NotificationKind.Risk:
				this.logger.warn(fields, notification.title);
				break;
			case NotificationKind.Trade:
			case NotificationKind.Signal:
				this.logger.info(fields, notification.title);
				break;
		}
	}
}

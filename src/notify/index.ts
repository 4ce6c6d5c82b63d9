export { LoggerNotifier } from "./notifiers.js";
export { NotificationOutbox, type DispatchSummary } from "./outbox.js";
export { NotificationKind, type Notification, type Notifier } from "./types.js";

export { EmailNotifier } from "./notifier.js";
export type { Notifier, SmtpSettings } from "./notifier.js";
export { DestinationResolver } from "./destinations.js";
export { PunchNotifications } from "./messages.js";
export type { NotificationCategory, SentNotice } from "./messages.js";

export { loadNotificationConfig, DEFAULT_CONFIG } from './config.js';
export type { NotificationConfig } from './config.js';
export { sendSlackNotification } from './slack.js';
export { createAlertNotifier } from './dispatcher.js';
export type { AlertNotifier } from './dispatcher.js';

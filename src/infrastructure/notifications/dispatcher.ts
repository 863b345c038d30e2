import type { Logger } from 'pino';
import type { Alert } from '../../domain/index.js';
import type { NotificationConfig } from './config.js';
import { sendSlackNotification } from './slack.js';

export type AlertNotifier = (alert: Alert) => void;

/**
 * Fans a newly created alert out to every configured channel,
 * fire-and-forget. A channel failure is logged and never reaches the
 * caller.
 */
export function createAlertNotifier(config: NotificationConfig, log: Logger): AlertNotifier {
  return (alert: Alert): void => {
    void sendSlackNotification(config.slack, log, alert).catch((err: unknown) => {
      log.warn({ err, alert_id: alert.id }, 'Slack dispatch failed');
    });
  };
}

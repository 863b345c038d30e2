import type { Logger } from 'pino';
import type { Alert } from '../../domain/index.js';
import { severityRank } from '../../domain/index.js';
import type { NotificationConfig } from './config.js';

/**
 * Sends (or skips) a Slack notification for a new alert.
 *
 * Skipped when Slack is disabled or the alert is below `min_severity`.
 * Otherwise POSTs a formatted message to the configured webhook.
 */
export async function sendSlackNotification(
  config: NotificationConfig['slack'],
  log: Logger,
  alert: Alert,
): Promise<void> {
  if (!config.enabled) {
    log.debug({ alert_id: alert.id, severity: alert.severity }, 'Slack notification skipped (disabled)');
    return;
  }

  if (severityRank(alert.severity) < severityRank(config.min_severity)) {
    log.debug(
      { alert_id: alert.id, severity: alert.severity, min_severity: config.min_severity },
      'Slack notification skipped (below min severity)',
    );
    return;
  }

  if (!config.webhook_url) {
    log.warn('Slack enabled but webhook_url is empty, skipping');
    return;
  }

  try {
    const body = JSON.stringify({
      text: `*[${alert.severity.toUpperCase()}]* ${alert.title}\n>${alert.message}\nCategory: \`${alert.category}\` | Source: ${alert.sourceEvent.sourceModule} | Raised: ${alert.createdAt}`,
    });

    const response = await fetch(config.webhook_url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });

    if (response.ok) {
      log.info({ alert_id: alert.id, severity: alert.severity }, 'Slack notification sent');
    } else {
      log.warn({ status: response.status, alert_id: alert.id }, 'Slack webhook returned non-OK status');
    }
  } catch (err: unknown) {
    log.warn({ err, alert_id: alert.id }, 'Failed to send Slack notification');
  }
}

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/infrastructure/notifications/slack.js', () => ({
  sendSlackNotification: vi.fn().mockResolvedValue(undefined),
}));

import { createAlertNotifier } from '../../src/infrastructure/notifications/dispatcher.js';
import { sendSlackNotification } from '../../src/infrastructure/notifications/slack.js';
import type { NotificationConfig } from '../../src/infrastructure/notifications/config.js';
import type { Alert } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

const mockSlack = vi.mocked(sendSlackNotification);

const sampleAlert: Alert = {
  id: 'a-001',
  severity: 'high',
  category: 'validation',
  title: 'Validation Timed Out: margin_check',
  message: 'No verdict from finance',
  sourceEvent: { id: 'e-001', type: 'validation_timed_out', sourceModule: 'design', correlationId: 'c-1' },
  status: 'open',
  createdAt: '2026-02-19T12:00:00.000Z',
  resolvedAt: null,
  resolvedBy: null,
};

const config: NotificationConfig = {
  slack: { enabled: true, webhook_url: 'https://hooks.example.test/alerts', min_severity: 'high' },
};

describe('createAlertNotifier', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    vi.clearAllMocks();
    log = fakeLogger();
  });

  it('hands the alert to the Slack channel', () => {
    const notify = createAlertNotifier(config, log);

    notify(sampleAlert);

    expect(mockSlack).toHaveBeenCalledWith(config.slack, log, sampleAlert);
  });

  it('does not throw when the channel rejects', async () => {
    mockSlack.mockRejectedValueOnce(new Error('Slack down'));
    const notify = createAlertNotifier(config, log);

    expect(() => notify(sampleAlert)).not.toThrow();

    await vi.waitFor(() => {
      expect(log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ alert_id: 'a-001' }),
        'Slack dispatch failed',
      );
    });
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { sendSlackNotification } from '../../src/infrastructure/notifications/slack.js';
import type { Alert } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

const sampleAlert: Alert = {
  id: 'a-001',
  severity: 'critical',
  category: 'delivery',
  title: 'Delivery Failed: margin_check_request',
  message: 'Envelope for finance could not be delivered on any path',
  sourceEvent: { id: 'e-001', type: 'delivery_failed', sourceModule: 'design', correlationId: null },
  status: 'open',
  createdAt: '2026-02-19T12:00:00.000Z',
  resolvedAt: null,
  resolvedBy: null,
};

const enabled = { enabled: true, webhook_url: 'https://hooks.example.test/alerts', min_severity: 'high' } as const;

describe('sendSlackNotification', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('logs skip when disabled', async () => {
    await sendSlackNotification({ ...enabled, enabled: false }, log, sampleAlert);
    expect(log.debug).toHaveBeenCalledWith(
      expect.objectContaining({ alert_id: 'a-001' }),
      'Slack notification skipped (disabled)',
    );
  });

  it('skips alerts below the minimum severity', async () => {
    const mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);

    await sendSlackNotification(enabled, log, { ...sampleAlert, severity: 'medium' });

    expect(mockFetch).not.toHaveBeenCalled();
    expect(log.debug).toHaveBeenCalledWith(
      expect.objectContaining({ severity: 'medium', min_severity: 'high' }),
      'Slack notification skipped (below min severity)',
    );
  });

  it('logs warning when enabled but webhook_url empty', async () => {
    await sendSlackNotification({ ...enabled, webhook_url: '' }, log, sampleAlert);
    expect(log.warn).toHaveBeenCalledWith('Slack enabled but webhook_url is empty, skipping');
  });

  it('posts the formatted alert to the webhook', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: true });
    vi.stubGlobal('fetch', mockFetch);

    await sendSlackNotification(enabled, log, sampleAlert);

    expect(mockFetch).toHaveBeenCalledOnce();
    expect(mockFetch).toHaveBeenCalledWith('https://hooks.example.test/alerts', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        text:
          '*[CRITICAL]* Delivery Failed: margin_check_request\n' +
          '>Envelope for finance could not be delivered on any path\n' +
          'Category: `delivery` | Source: design | Raised: 2026-02-19T12:00:00.000Z',
      }),
    });
    expect(log.info).toHaveBeenCalledWith(
      expect.objectContaining({ alert_id: 'a-001' }),
      'Slack notification sent',
    );
  });

  it('logs non-OK webhook responses', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: false, status: 500 }));

    await sendSlackNotification(enabled, log, sampleAlert);

    expect(log.warn).toHaveBeenCalledWith(
      { status: 500, alert_id: 'a-001' },
      'Slack webhook returned non-OK status',
    );
  });

  it('logs fetch failures', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('Network error')));

    await sendSlackNotification(enabled, log, sampleAlert);

    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Failed to send Slack notification',
    );
  });
});

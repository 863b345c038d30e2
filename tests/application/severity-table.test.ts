import { describe, it, expect } from 'vitest';
import { classify } from '../../src/application/severity-table.js';
import { ALERT_MESSAGE_MAX, ALERT_TITLE_MAX } from '../../src/domain/index.js';
import { makeEnvelope } from '../helpers.js';

describe('classify', () => {
  it('classifies inventory notices as medium', () => {
    const result = classify(
      makeEnvelope({ type: 'inventory_updated', payload: { item_name: 'Canvas tote', sku: 'TOTE-1', quantity: 12 } }),
    );

    expect(result).toEqual({
      severity: 'medium',
      category: 'inventory',
      title: 'Inventory Updated',
      message: 'Operations reports inventory change: Canvas tote (TOTE-1) now at 12 units',
    });
  });

  it('formats campaign ROAS with two decimals', () => {
    const result = classify(
      makeEnvelope({ type: 'campaign_performance', sourceModule: 'marketing', payload: { campaign_name: 'Spring', roas: '2.5' } }),
    );

    expect(result.category).toBe('analytics');
    expect(result.message).toBe("Marketing campaign 'Spring' ROAS: 2.50x");
  });

  it('falls back when notice fields are missing', () => {
    expect(classify(makeEnvelope({ type: 'sales_data_updated' })).message).toBe(
      'New sales data received, analytics may need refresh. Period: unknown',
    );
    expect(classify(makeEnvelope({ type: 'financial_report', sourceModule: 'finance' }))).toEqual({
      severity: 'medium',
      category: 'finance',
      title: 'Financial Report: general',
      message: 'Financial report received from finance',
    });
  });

  it('classifies validation responses as low', () => {
    const rejected = classify(
      makeEnvelope({ type: 'margin_check_response', sourceModule: 'finance', payload: { approved: false } }),
    );
    expect(rejected).toEqual({
      severity: 'low',
      category: 'validation',
      title: 'Margin Check Rejected',
      message: 'Finance has rejected the margin check',
    });

    const approved = classify(
      makeEnvelope({ type: 'capacity_check_response', payload: { verdict: 'approved', summary: 'Line 3 is free' } }),
    );
    expect(approved.title).toBe('Capacity Check Approved');
    expect(approved.message).toBe('Line 3 is free');

    expect(classify(makeEnvelope({ type: 'approval_decided', payload: { status: 'approved' } })).message).toBe(
      'Executive has approved the request',
    );
  });

  it('raises timeouts as high and delivery failures as critical', () => {
    const timeout = classify(
      makeEnvelope({
        type: 'validation_timed_out',
        payload: { request_type: 'margin_check', target_module: 'finance', pipeline_item_id: 'p-1', deadline: '2026-01-01T00:00:00.000Z' },
      }),
    );
    expect(timeout).toEqual({
      severity: 'high',
      category: 'validation',
      title: 'Validation Timed Out: margin_check',
      message: 'No verdict from finance for pipeline item p-1 before 2026-01-01T00:00:00.000Z',
    });

    const failed = classify(
      makeEnvelope({
        type: 'delivery_failed',
        payload: { envelope: { type: 'margin_check_request', targetModule: 'finance' }, reasons: ['no listener', 'HTTP 503'] },
      }),
    );
    expect(failed).toEqual({
      severity: 'critical',
      category: 'delivery',
      title: 'Delivery Failed: margin_check_request',
      message: 'Envelope for finance could not be delivered on any path: no listener; HTTP 503',
    });
  });

  it('keeps unknown kinds as low unclassified alerts', () => {
    expect(classify(makeEnvelope({ type: 'supplier_onboarded', sourceModule: 'operations' }))).toEqual({
      severity: 'low',
      category: 'unclassified',
      title: 'Unrecognized Event: supplier_onboarded',
      message: 'Event supplier_onboarded from operations has no handler',
    });
    expect(classify(makeEnvelope({ type: 'malformed_event', payload: { path: 'broadcast' } })).title).toBe(
      'Malformed Event Dropped',
    );
    expect(classify(makeEnvelope({ type: 'toString' })).category).toBe('unclassified');
  });

  // ─── column widths ────────────────────────────────────────────────

  it('shortens a title built from a maximal event type', () => {
    const type = 'x'.repeat(255);

    const result = classify(makeEnvelope({ type }));

    expect(result.title).toHaveLength(ALERT_TITLE_MAX);
    expect(result.title).toBe(`Unrecognized Event: ${'x'.repeat(234)}…`);
  });

  it('shortens an oversized report summary', () => {
    const result = classify(makeEnvelope({ type: 'financial_report', payload: { summary: 'y'.repeat(3000) } }));

    expect(result.message).toBe(`${'y'.repeat(2047)}…`);
  });

  it('shortens a long list of delivery failure reasons', () => {
    const reasons = Array.from({ length: 40 }, (_, i) => `endpoint ${i}: ${'z'.repeat(90)}`);

    const result = classify(
      makeEnvelope({ type: 'delivery_failed', payload: { envelope: { type: 'margin_check_request', targetModule: 'finance' }, reasons } }),
    );

    expect(result.message).toHaveLength(ALERT_MESSAGE_MAX);
    expect(result.message.startsWith('Envelope for finance could not be delivered on any path: endpoint 0: ')).toBe(true);
    expect(result.message.endsWith('…')).toBe(true);
  });

  it('does not split a surrogate pair when shortening', () => {
    const summary = `${'a'.repeat(2046)}\u{1F600}${'b'.repeat(10)}`;

    const result = classify(makeEnvelope({ type: 'financial_report', payload: { summary } }));

    expect(result.message).toBe(`${'a'.repeat(2046)}…`);
  });
});

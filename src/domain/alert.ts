/** Severity levels, lowest first. */
export const SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export type Severity = (typeof SEVERITIES)[number];

/** Column widths of the stored alert text. */
export const ALERT_TITLE_MAX = 255;
export const ALERT_MESSAGE_MAX = 2048;

export type AlertStatus = 'open' | 'resolved';

/** Reference to the envelope that triggered an alert. */
export interface AlertSource {
  readonly id: string;
  readonly type: string;
  readonly sourceModule: string;
  readonly correlationId: string | null;
}

/**
 * Severity-classified alert awaiting human review.
 *
 * Append-only except for resolve, which sets status, resolvedAt and
 * resolvedBy once.
 */
export interface Alert {
  readonly id: string;
  readonly severity: Severity;
  readonly category: string;
  readonly title: string;
  readonly message: string;
  readonly sourceEvent: AlertSource;
  readonly status: AlertStatus;
  readonly createdAt: string;
  readonly resolvedAt: string | null;
  readonly resolvedBy: string | null;
}

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function isSeverity(value: string): value is Severity {
  return (SEVERITIES as readonly string[]).includes(value);
}

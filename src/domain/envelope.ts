/**
 * Envelope model shared by every module on the event substrate.
 *
 * The wire shape is identical on the broadcast channel and on the
 * direct-delivery path. It carries no framework dependencies.
 */

/** Organizational modules reachable over the event substrate. */
export const MODULES = ['design', 'executive', 'finance', 'operations', 'marketing'] as const;

export type ModuleName = (typeof MODULES)[number];

/** Structured payload; its schema depends on the envelope type. */
export type EnvelopePayload = Record<string, unknown>;

/**
 * Atomic unit of inter-module communication.
 *
 * `id` is assigned at publish time. `targetModule === null` means
 * broadcast. Envelopes are frozen on creation.
 */
export interface EventEnvelope {
  readonly id: string;
  readonly type: string;
  readonly sourceModule: string;
  readonly targetModule: string | null;
  readonly payload: EnvelopePayload;
  readonly correlationId: string | null;
  readonly timestamp: string; // ISO-8601
}

/** What a producer supplies; the transport fills in the rest. */
export interface EnvelopeDraft {
  readonly type: string;
  readonly targetModule?: string | null;
  readonly payload?: EnvelopePayload;
  readonly correlationId?: string | null;
}

/** Event kinds this module publishes to other modules. */
export const OUTBOUND_KINDS = [
  'margin_check_request',
  'capacity_check_request',
  'product_approval_request',
  'product_pipeline_updated',
  'product_approved_for_production',
  'product_budget_allocated',
  'product_launch_scheduled',
] as const;

/** Validation verdicts arriving from other modules. */
export const RESPONSE_KINDS = [
  'margin_check_response',
  'capacity_check_response',
  'approval_decided',
] as const;

/** Operational, financial and marketing notices that become alerts. */
export const NOTICE_KINDS = [
  'sales_data_updated',
  'inventory_updated',
  'campaign_performance',
  'financial_report',
] as const;

/** Raised in-process only, never sent over the wire. */
export const SYNTHETIC_KINDS = [
  'delivery_failed',
  'validation_timed_out',
  'malformed_event',
] as const;

export type OutboundKind = (typeof OUTBOUND_KINDS)[number];
export type ResponseKind = (typeof RESPONSE_KINDS)[number];
export type NoticeKind = (typeof NOTICE_KINDS)[number];
export type SyntheticKind = (typeof SYNTHETIC_KINDS)[number];

/** Every kind this core knows by name. */
export type EventKind = OutboundKind | ResponseKind | NoticeKind | SyntheticKind;

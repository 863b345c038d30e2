import type { EventEnvelope } from '../../domain/index.js';

export type AuditDirection = 'inbound' | 'outbound';

/** `fallback` marks outbound direct delivery; `direct` marks inbound. */
export type AuditPath = 'broadcast' | 'fallback' | 'direct';

/** Audit trail of every envelope crossing the module boundary. */
export interface EnvelopeAuditSink {
  record(envelope: EventEnvelope, direction: AuditDirection, path: AuditPath): Promise<void>;
}

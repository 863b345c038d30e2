import type { EventEnvelope } from '../../domain/index.js';
import type { AuditDirection, AuditPath, EnvelopeAuditSink } from '../transport/audit.js';
import type { Database } from './client.js';
import { eventLog } from './schema.js';

/** Writes every envelope crossing the module boundary to `event_log`. */
export class DrizzleEventLog implements EnvelopeAuditSink {
  constructor(private readonly db: Database) {}

  async record(envelope: EventEnvelope, direction: AuditDirection, path: AuditPath): Promise<void> {
    await this.db.insert(eventLog).values({
      envelope_id: envelope.id,
      direction,
      path,
      type: envelope.type,
      source_module: envelope.sourceModule,
      target_module: envelope.targetModule,
      correlation_id: envelope.correlationId,
      payload: { ...envelope.payload },
    });
  }
}

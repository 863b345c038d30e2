import type { Logger } from 'pino';
import { ALERT_MESSAGE_MAX, ALERT_TITLE_MAX } from '../../domain/index.js';
import type { SqlClient } from './client.js';

/**
 * Creates tables and indexes when missing.
 *
 * Deployments may run drizzle-kit migrations instead; every statement
 * here is IF NOT EXISTS, so both can coexist.
 */
export async function ensureSchema(sql: SqlClient, log: Logger): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS pipeline_items (
      id                     UUID PRIMARY KEY,
      title                  VARCHAR(255) NOT NULL,
      category               VARCHAR(255),
      current_stage          VARCHAR(32)  NOT NULL,
      stage_history          JSONB        NOT NULL DEFAULT '[]',
      pending_validation_ids JSONB        NOT NULL DEFAULT '[]',
      validations            JSONB        NOT NULL DEFAULT '[]',
      blocked                BOOLEAN      NOT NULL DEFAULT false,
      created_at             TIMESTAMPTZ  NOT NULL,
      updated_at             TIMESTAMPTZ  NOT NULL
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS alerts (
      id                UUID PRIMARY KEY,
      severity          VARCHAR(16)   NOT NULL,
      category          VARCHAR(64)   NOT NULL,
      title             VARCHAR(${ALERT_TITLE_MAX})  NOT NULL,
      message           VARCHAR(${ALERT_MESSAGE_MAX}) NOT NULL,
      source_event_id   VARCHAR(255)  NOT NULL,
      source_event_type VARCHAR(255)  NOT NULL,
      source_module     VARCHAR(64)   NOT NULL,
      correlation_id    VARCHAR(255),
      status            VARCHAR(16)   NOT NULL DEFAULT 'open',
      created_at        TIMESTAMPTZ   NOT NULL,
      resolved_at       TIMESTAMPTZ,
      resolved_by       VARCHAR(255)
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS event_log (
      id             BIGSERIAL PRIMARY KEY,
      envelope_id    VARCHAR(255) NOT NULL,
      direction      VARCHAR(8)   NOT NULL,
      path           VARCHAR(16)  NOT NULL,
      type           VARCHAR(255) NOT NULL,
      source_module  VARCHAR(64)  NOT NULL,
      target_module  VARCHAR(64),
      correlation_id VARCHAR(255),
      payload        JSONB        NOT NULL DEFAULT '{}',
      recorded_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_pipeline_items_current_stage ON pipeline_items (current_stage)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_pipeline_items_created_at ON pipeline_items (created_at)`);
  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS uq_alerts_source_event_id ON alerts (source_event_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_alerts_status ON alerts (status)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_alerts_severity ON alerts (severity)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_alerts_created_at ON alerts (created_at)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_event_log_envelope_id ON event_log (envelope_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_event_log_type ON event_log (type)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_event_log_recorded_at ON event_log (recorded_at)`);

  log.info('Database ready (pipeline_items + alerts + event_log tables)');
}

import { pgTable, uuid, varchar, timestamp, jsonb, boolean, bigserial, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { ALERT_MESSAGE_MAX, ALERT_TITLE_MAX, SEVERITIES, STAGES } from '../../domain/index.js';
import type { StageHistoryEntry, StageValidation } from '../../domain/index.js';

/**
 * Drizzle schema for the `pipeline_items` table.
 *
 * History and validation bookkeeping are small, always read with the
 * item, and stored as JSONB.
 */
export const pipelineItems = pgTable('pipeline_items', {
  id: uuid('id').primaryKey(),
  title: varchar('title', { length: 255 }).notNull(),
  category: varchar('category', { length: 255 }),
  current_stage: varchar('current_stage', { length: 32, enum: [...STAGES, 'cancelled'] }).notNull(),
  stage_history: jsonb('stage_history').$type<StageHistoryEntry[]>().notNull().default([]),
  pending_validation_ids: jsonb('pending_validation_ids').$type<string[]>().notNull().default([]),
  validations: jsonb('validations').$type<StageValidation[]>().notNull().default([]),
  blocked: boolean('blocked').notNull().default(false),
  created_at: timestamp('created_at', { withTimezone: true }).notNull(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_pipeline_items_current_stage').on(table.current_stage),
  index('idx_pipeline_items_created_at').on(table.created_at),
]);

/**
 * Drizzle schema for the `alerts` table.
 *
 * The unique index on `source_event_id` makes alert creation idempotent
 * via ON CONFLICT DO NOTHING.
 */
export const alerts = pgTable('alerts', {
  id: uuid('id').primaryKey(),
  severity: varchar('severity', { length: 16, enum: SEVERITIES }).notNull(),
  category: varchar('category', { length: 64 }).notNull(),
  title: varchar('title', { length: ALERT_TITLE_MAX }).notNull(),
  message: varchar('message', { length: ALERT_MESSAGE_MAX }).notNull(),
  source_event_id: varchar('source_event_id', { length: 255 }).notNull(),
  source_event_type: varchar('source_event_type', { length: 255 }).notNull(),
  source_module: varchar('source_module', { length: 64 }).notNull(),
  correlation_id: varchar('correlation_id', { length: 255 }),
  status: varchar('status', { length: 16, enum: ['open', 'resolved'] }).notNull().default('open'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull(),
  resolved_at: timestamp('resolved_at', { withTimezone: true }),
  resolved_by: varchar('resolved_by', { length: 255 }),
}, (table) => [
  uniqueIndex('uq_alerts_source_event_id').on(table.source_event_id),
  index('idx_alerts_status').on(table.status),
  index('idx_alerts_severity').on(table.severity),
  index('idx_alerts_created_at').on(table.created_at),
]);

/**
 * Drizzle schema for the `event_log` table: one row per envelope sent
 * or received, with the path it travelled.
 */
export const eventLog = pgTable('event_log', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  envelope_id: varchar('envelope_id', { length: 255 }).notNull(),
  direction: varchar('direction', { length: 8, enum: ['inbound', 'outbound'] }).notNull(),
  path: varchar('path', { length: 16, enum: ['broadcast', 'fallback', 'direct'] }).notNull(),
  type: varchar('type', { length: 255 }).notNull(),
  source_module: varchar('source_module', { length: 64 }).notNull(),
  target_module: varchar('target_module', { length: 64 }),
  correlation_id: varchar('correlation_id', { length: 255 }),
  payload: jsonb('payload').$type<Record<string, unknown>>().notNull().default({}),
  recorded_at: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_event_log_envelope_id').on(table.envelope_id),
  index('idx_event_log_type').on(table.type),
  index('idx_event_log_recorded_at').on(table.recorded_at),
]);

import { and, desc, eq, type SQL } from 'drizzle-orm';
import type { Alert } from '../../domain/index.js';
import type { AlertFilters, AlertRepository, Page } from '../../application/ports.js';
import type { Database } from './client.js';
import { alerts } from './schema.js';

type AlertRow = typeof alerts.$inferSelect;

function toAlert(row: AlertRow): Alert {
  return {
    id: row.id,
    severity: row.severity,
    category: row.category,
    title: row.title,
    message: row.message,
    sourceEvent: {
      id: row.source_event_id,
      type: row.source_event_type,
      sourceModule: row.source_module,
      correlationId: row.correlation_id,
    },
    status: row.status,
    createdAt: row.created_at.toISOString(),
    resolvedAt: row.resolved_at ? row.resolved_at.toISOString() : null,
    resolvedBy: row.resolved_by,
  };
}

/**
 * PostgreSQL-backed alert storage.
 *
 * Idempotent on the source envelope id: the unique index plus
 * ON CONFLICT DO NOTHING keeps one alert per envelope even when two
 * processes see the same delivery.
 */
export class DrizzleAlertRepository implements AlertRepository {
  constructor(private readonly db: Database) {}

  async insertIfAbsent(alert: Alert): Promise<{ alert: Alert; created: boolean }> {
    const inserted = await this.db
      .insert(alerts)
      .values({
        id: alert.id,
        severity: alert.severity,
        category: alert.category,
        title: alert.title,
        message: alert.message,
        source_event_id: alert.sourceEvent.id,
        source_event_type: alert.sourceEvent.type,
        source_module: alert.sourceEvent.sourceModule,
        correlation_id: alert.sourceEvent.correlationId,
        status: alert.status,
        created_at: new Date(alert.createdAt),
        resolved_at: alert.resolvedAt ? new Date(alert.resolvedAt) : null,
        resolved_by: alert.resolvedBy,
      })
      .onConflictDoNothing({ target: alerts.source_event_id })
      .returning();

    const row = inserted[0];
    if (row) return { alert: toAlert(row), created: true };

    const existing = await this.findBySourceEventId(alert.sourceEvent.id);
    return { alert: existing ?? alert, created: false };
  }

  async save(alert: Alert): Promise<void> {
    await this.db
      .update(alerts)
      .set({
        status: alert.status,
        resolved_at: alert.resolvedAt ? new Date(alert.resolvedAt) : null,
        resolved_by: alert.resolvedBy,
      })
      .where(eq(alerts.id, alert.id));
  }

  async findById(id: string): Promise<Alert | undefined> {
    const rows = await this.db.select().from(alerts).where(eq(alerts.id, id)).limit(1);
    const row = rows[0];
    return row ? toAlert(row) : undefined;
  }

  async findBySourceEventId(sourceEventId: string): Promise<Alert | undefined> {
    const rows = await this.db.select().from(alerts).where(eq(alerts.source_event_id, sourceEventId)).limit(1);
    const row = rows[0];
    return row ? toAlert(row) : undefined;
  }

  /** Newest first. */
  async list(filters: AlertFilters, page: Page): Promise<Alert[]> {
    const conditions: SQL[] = [];

    if (filters.status !== undefined) {
      conditions.push(eq(alerts.status, filters.status));
    }
    if (filters.severity !== undefined) {
      conditions.push(eq(alerts.severity, filters.severity));
    }
    if (filters.category !== undefined) {
      conditions.push(eq(alerts.category, filters.category));
    }

    const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

    const rows = await this.db
      .select()
      .from(alerts)
      .where(whereClause)
      .orderBy(desc(alerts.created_at))
      .limit(page.limit)
      .offset(page.offset);

    return rows.map(toAlert);
  }
}

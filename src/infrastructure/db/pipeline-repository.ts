import { asc, eq } from 'drizzle-orm';
import type { PipelineItem } from '../../domain/index.js';
import type { PipelineItemFilters, PipelineRepository } from '../../application/ports.js';
import type { Database } from './client.js';
import { pipelineItems } from './schema.js';

type PipelineItemRow = typeof pipelineItems.$inferSelect;

function toItem(row: PipelineItemRow): PipelineItem {
  return {
    id: row.id,
    title: row.title,
    category: row.category,
    currentStage: row.current_stage,
    stageHistory: row.stage_history,
    pendingValidationIds: row.pending_validation_ids,
    validations: row.validations,
    blocked: row.blocked,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

/**
 * PostgreSQL-backed pipeline item storage.
 *
 * `save` is an upsert keyed by item id; items are never deleted.
 */
export class DrizzlePipelineRepository implements PipelineRepository {
  constructor(private readonly db: Database) {}

  async save(item: PipelineItem): Promise<void> {
    const values = {
      title: item.title,
      category: item.category,
      current_stage: item.currentStage,
      stage_history: [...item.stageHistory],
      pending_validation_ids: [...item.pendingValidationIds],
      validations: [...item.validations],
      blocked: item.blocked,
      updated_at: new Date(item.updatedAt),
    };

    await this.db
      .insert(pipelineItems)
      .values({ id: item.id, created_at: new Date(item.createdAt), ...values })
      .onConflictDoUpdate({ target: pipelineItems.id, set: values });
  }

  async findById(id: string): Promise<PipelineItem | undefined> {
    const rows = await this.db.select().from(pipelineItems).where(eq(pipelineItems.id, id)).limit(1);
    const row = rows[0];
    return row ? toItem(row) : undefined;
  }

  async list(filters: PipelineItemFilters = {}): Promise<PipelineItem[]> {
    const whereClause = filters.stage !== undefined ? eq(pipelineItems.current_stage, filters.stage) : undefined;

    const rows = await this.db
      .select()
      .from(pipelineItems)
      .where(whereClause)
      .orderBy(asc(pipelineItems.created_at));

    return rows.map(toItem);
  }
}

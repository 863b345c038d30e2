import type { PipelineItem } from '../../domain/index.js';
import type { PipelineItemFilters, PipelineRepository } from '../../application/ports.js';

/**
 * Process-local pipeline item storage for tests and `PERSISTENCE=memory`.
 * Items are stored and returned as copies.
 */
export class InMemoryPipelineRepository implements PipelineRepository {
  private readonly items = new Map<string, PipelineItem>();

  async save(item: PipelineItem): Promise<void> {
    this.items.set(item.id, structuredClone(item));
  }

  async findById(id: string): Promise<PipelineItem | undefined> {
    const item = this.items.get(id);
    return item ? structuredClone(item) : undefined;
  }

  async list(filters: PipelineItemFilters = {}): Promise<PipelineItem[]> {
    return [...this.items.values()]
      .filter((item) => filters.stage === undefined || item.currentStage === filters.stage)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((item) => structuredClone(item));
  }
}

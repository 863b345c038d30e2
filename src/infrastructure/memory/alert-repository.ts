import type { Alert } from '../../domain/index.js';
import type { AlertFilters, AlertRepository, Page } from '../../application/ports.js';

export class InMemoryAlertRepository implements AlertRepository {
  private readonly alerts = new Map<string, Alert>();
  private readonly bySource = new Map<string, string>();

  async insertIfAbsent(alert: Alert): Promise<{ alert: Alert; created: boolean }> {
    const existingId = this.bySource.get(alert.sourceEvent.id);
    const existing = existingId !== undefined ? this.alerts.get(existingId) : undefined;
    if (existing) return { alert: structuredClone(existing), created: false };

    this.alerts.set(alert.id, structuredClone(alert));
    this.bySource.set(alert.sourceEvent.id, alert.id);
    return { alert: structuredClone(alert), created: true };
  }

  async save(alert: Alert): Promise<void> {
    this.alerts.set(alert.id, structuredClone(alert));
    this.bySource.set(alert.sourceEvent.id, alert.id);
  }

  async findById(id: string): Promise<Alert | undefined> {
    const alert = this.alerts.get(id);
    return alert ? structuredClone(alert) : undefined;
  }

  async findBySourceEventId(sourceEventId: string): Promise<Alert | undefined> {
    const id = this.bySource.get(sourceEventId);
    return id !== undefined ? this.findById(id) : undefined;
  }

  /** Newest first; ties keep insertion order reversed. */
  async list(filters: AlertFilters, page: Page): Promise<Alert[]> {
    return [...this.alerts.values()]
      .reverse()
      .filter((alert) => filters.status === undefined || alert.status === filters.status)
      .filter((alert) => filters.severity === undefined || alert.severity === filters.severity)
      .filter((alert) => filters.category === undefined || alert.category === filters.category)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(page.offset, page.offset + page.limit)
      .map((alert) => structuredClone(alert));
  }
}

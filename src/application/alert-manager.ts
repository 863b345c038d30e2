import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { Alert, EventEnvelope } from '../domain/index.js';
import { AlreadyResolvedError, NotFoundError } from '../domain/index.js';
import { KeyedLock } from './keyed-lock.js';
import type { AlertFilters, AlertRepository } from './ports.js';
import { classify } from './severity-table.js';

export const DEFAULT_ALERT_LIMIT = 50;
export const MAX_ALERT_LIMIT = 500;

export interface AlertListOptions extends AlertFilters {
  limit?: number | undefined;
  offset?: number | undefined;
}

export interface AlertManagerDeps {
  readonly repository: AlertRepository;
  readonly log: Logger;
  /** Called once for every newly created alert. */
  readonly notify?: ((alert: Alert) => void) | undefined;
}

/**
 * Turns inbound notices and synthetic failure signals into
 * severity-classified alerts. One alert exists per source envelope.
 */
export class AlertManager {
  private readonly repository: AlertRepository;
  private readonly log: Logger;
  private readonly notify: ((alert: Alert) => void) | undefined;
  private readonly locks = new KeyedLock();

  constructor(deps: AlertManagerDeps) {
    this.repository = deps.repository;
    this.log = deps.log;
    this.notify = deps.notify;
  }

  async onEvent(envelope: EventEnvelope): Promise<Alert> {
    const { severity, category, title, message } = classify(envelope);
    const candidate: Alert = {
      id: randomUUID(),
      severity,
      category,
      title,
      message,
      sourceEvent: {
        id: envelope.id,
        type: envelope.type,
        sourceModule: envelope.sourceModule,
        correlationId: envelope.correlationId,
      },
      status: 'open',
      createdAt: new Date().toISOString(),
      resolvedAt: null,
      resolvedBy: null,
    };

    const { alert, created } = await this.repository.insertIfAbsent(candidate);
    if (!created) {
      this.log.debug({ alert_id: alert.id, envelope_id: envelope.id }, 'Alert already exists for envelope');
      return alert;
    }

    this.log.info(
      { alert_id: alert.id, envelope_id: envelope.id, type: envelope.type, severity, category },
      'Alert raised',
    );
    this.notify?.(alert);
    return alert;
  }

  async get(id: string): Promise<Alert> {
    const alert = await this.repository.findById(id);
    if (!alert) throw new NotFoundError('Alert', id);
    return alert;
  }

  list(options: AlertListOptions = {}): Promise<Alert[]> {
    const { limit, offset, ...filters } = options;
    return this.repository.list(filters, {
      limit: clampLimit(limit),
      offset: Math.max(0, Math.floor(offset ?? 0)),
    });
  }

  async resolve(id: string, resolvedBy = 'system'): Promise<Alert> {
    return this.locks.runExclusive(id, async () => {
      const alert = await this.get(id);
      if (alert.status === 'resolved') throw new AlreadyResolvedError('Alert', id);

      const resolved: Alert = {
        ...alert,
        status: 'resolved',
        resolvedAt: new Date().toISOString(),
        resolvedBy,
      };
      await this.repository.save(resolved);

      this.log.info({ alert_id: id, resolved_by: resolvedBy }, 'Alert resolved');
      return resolved;
    });
  }
}

export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_ALERT_LIMIT;
  return Math.min(MAX_ALERT_LIMIT, Math.max(1, Math.floor(limit)));
}

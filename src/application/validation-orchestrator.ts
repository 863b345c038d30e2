import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  EnvelopePayload,
  EventEnvelope,
  PendingValidation,
  SettledState,
  ValidationOutcome,
  ValidationRequestType,
  ValidationState,
} from '../domain/index.js';
import { AlreadyResolvedError, MAX_TIMER_MS, NotFoundError, VALIDATION_ROUTES } from '../domain/index.js';
import { createEnvelope, readVerdict } from './envelope-schema.js';
import type { EventPublisher } from './ports.js';

export interface ValidationHandle {
  readonly correlationId: string;
  readonly deadline: string;
  /** Resolves once a verdict, the deadline or a cancellation ends the wait. */
  readonly outcome: Promise<ValidationOutcome>;
}

export type ResponseDisposition = 'applied' | 'unknown' | 'settled' | 'malformed';

export type SettlementListener = (record: Readonly<PendingValidation>) => void | Promise<void>;

/** A waiting validation read back from storage after a restart. */
export interface StoredValidation {
  readonly correlationId: string;
  readonly pipelineItemId: string;
  readonly requestType: ValidationRequestType;
  readonly deadline: string | null;
}

export interface ValidationFilters {
  state?: ValidationState;
  pipelineItemId?: string;
}

export interface ValidationOrchestratorDeps {
  readonly transport: EventPublisher;
  readonly log: Logger;
  readonly defaultTimeoutMs: number;
  /** How long a settled record stays queryable before removal. */
  readonly graceMs: number;
}

interface Entry {
  readonly record: PendingValidation;
  readonly resolve: (outcome: ValidationOutcome) => void;
  deadlineTimer: ReturnType<typeof setTimeout> | null;
  graceTimer: ReturnType<typeof setTimeout> | null;
}

/**
 * Issues cross-module validation requests and correlates their
 * responses.
 *
 * The pending table is the only state here. Every transition out of
 * `waiting` happens in one synchronous step that re-checks the state, so
 * a deadline and a late response racing each other resolve as
 * first-write-wins. Timeouts are fail-closed: they never count as an
 * approval.
 */
export class ValidationOrchestrator {
  private readonly transport: EventPublisher;
  private readonly log: Logger;
  private readonly defaultTimeoutMs: number;
  private readonly graceMs: number;
  private readonly table = new Map<string, Entry>();
  private readonly listeners: SettlementListener[] = [];

  constructor(deps: ValidationOrchestratorDeps) {
    this.transport = deps.transport;
    this.log = deps.log;
    this.defaultTimeoutMs = deps.defaultTimeoutMs;
    this.graceMs = deps.graceMs;
  }

  /** Registers a callback invoked after every settlement. */
  onSettled(listener: SettlementListener): void {
    this.listeners.push(listener);
  }

  /**
   * Records a waiting validation, publishes the request envelope and
   * returns a handle the caller can await.
   *
   * When publishing fails the record is dropped and the delivery error
   * propagates. `timeoutMs` must be a whole number of milliseconds
   * between 1 and `MAX_TIMER_MS`.
   */
  async requestValidation(
    pipelineItemId: string,
    requestType: ValidationRequestType,
    payload: EnvelopePayload = {},
    timeoutMs: number = this.defaultTimeoutMs,
  ): Promise<ValidationHandle> {
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMER_MS) {
      throw new RangeError(`Validation timeout must be an integer between 1 and ${MAX_TIMER_MS}ms, got ${timeoutMs}`);
    }

    const route = VALIDATION_ROUTES[requestType];
    const correlationId = randomUUID();
    const issuedAt = new Date();
    const deadline = new Date(issuedAt.getTime() + timeoutMs).toISOString();

    const record: PendingValidation = {
      correlationId,
      pipelineItemId,
      requestType,
      targetModule: route.targetModule,
      issuedAt: issuedAt.toISOString(),
      deadline,
      state: 'waiting',
      resolvedAt: null,
      summary: null,
    };

    let resolveOutcome: (outcome: ValidationOutcome) => void = () => undefined;
    const outcome = new Promise<ValidationOutcome>((resolve) => {
      resolveOutcome = resolve;
    });

    const entry: Entry = { record, resolve: resolveOutcome, deadlineTimer: null, graceTimer: null };
    this.table.set(correlationId, entry);
    const summary = `No verdict from ${route.targetModule} within ${timeoutMs}ms`;
    entry.deadlineTimer = unrefTimer(setTimeout(() => this.expire(correlationId, summary), timeoutMs));

    try {
      await this.transport.publish({
        type: route.requestKind,
        targetModule: route.targetModule,
        correlationId,
        payload: {
          ...payload,
          pipeline_item_id: pipelineItemId,
          request_type: requestType,
          deadline,
        },
      });
    } catch (err: unknown) {
      this.forget(entry);
      this.log.error(
        { err, correlation_id: correlationId, pipeline_item_id: pipelineItemId, request_type: requestType },
        'Validation request could not be delivered',
      );
      throw err;
    }

    this.log.info(
      { correlation_id: correlationId, pipeline_item_id: pipelineItemId, request_type: requestType, deadline },
      'Validation requested',
    );

    return { correlationId, deadline, outcome };
  }

  /**
   * Re-registers a validation that was waiting when the process last
   * stopped, so its deadline fires again. A deadline already in the past,
   * or one that was never stored, expires on the next tick.
   *
   * Returns false when the correlation id is already tracked.
   */
  resume(stored: StoredValidation): boolean {
    if (this.table.has(stored.correlationId)) return false;

    const route = VALIDATION_ROUTES[stored.requestType];
    const now = Date.now();
    const parsed = stored.deadline === null ? Number.NaN : Date.parse(stored.deadline);
    const deadlineMs = Number.isNaN(parsed) ? now : parsed;

    const record: PendingValidation = {
      correlationId: stored.correlationId,
      pipelineItemId: stored.pipelineItemId,
      requestType: stored.requestType,
      targetModule: route.targetModule,
      issuedAt: new Date(now).toISOString(),
      deadline: new Date(deadlineMs).toISOString(),
      state: 'waiting',
      resolvedAt: null,
      summary: null,
    };

    const entry: Entry = { record, resolve: () => undefined, deadlineTimer: null, graceTimer: null };
    this.table.set(stored.correlationId, entry);

    const delay = Math.min(Math.max(deadlineMs - now, 0), MAX_TIMER_MS);
    const summary = `No verdict from ${route.targetModule} by ${record.deadline}`;
    entry.deadlineTimer = unrefTimer(setTimeout(() => this.expire(stored.correlationId, summary), delay));

    this.log.info(
      { correlation_id: stored.correlationId, pipeline_item_id: stored.pipelineItemId, deadline: record.deadline, delay_ms: delay },
      'Validation deadline re-armed',
    );
    return true;
  }

  /**
   * Applies a response envelope to its pending record.
   *
   * Responses for unknown, expired or already settled correlation ids
   * are discarded; only the first verdict moves a record out of
   * `waiting`.
   */
  async onResponseEvent(envelope: EventEnvelope): Promise<ResponseDisposition> {
    const { correlationId } = envelope;
    if (correlationId === null) {
      this.log.warn({ envelope_id: envelope.id, type: envelope.type }, 'Response envelope without correlation id dropped');
      return 'malformed';
    }

    const entry = this.table.get(correlationId);
    if (!entry) {
      this.log.info({ envelope_id: envelope.id, correlation_id: correlationId }, 'Response for unknown correlation id discarded');
      return 'unknown';
    }

    if (entry.record.state !== 'waiting') {
      this.log.info(
        { envelope_id: envelope.id, correlation_id: correlationId, state: entry.record.state },
        'Response for settled validation discarded',
      );
      return 'settled';
    }

    const expectedKind = VALIDATION_ROUTES[entry.record.requestType].responseKind;
    if (envelope.type !== expectedKind) {
      this.log.warn(
        { envelope_id: envelope.id, correlation_id: correlationId, type: envelope.type, expected: expectedKind },
        'Response kind does not match request type, dropped',
      );
      return 'malformed';
    }

    const verdict = readVerdict(envelope.payload);
    if (verdict === null) {
      this.log.warn({ envelope_id: envelope.id, correlation_id: correlationId }, 'Response without a readable verdict dropped');
      return 'malformed';
    }

    await this.settle(entry, verdict.state, verdict.summary);
    return 'applied';
  }

  /**
   * Boundary operation for modules that answer over HTTP instead of the
   * event substrate.
   */
  async submitResponse(
    correlationId: string,
    response: { verdict: 'approved' | 'rejected'; summary?: string | undefined; respondingModule?: string | undefined },
  ): Promise<PendingValidation> {
    const entry = this.table.get(correlationId);
    if (!entry) throw new NotFoundError('Validation', correlationId);
    if (entry.record.state !== 'waiting') throw new AlreadyResolvedError('Validation', correlationId);

    const route = VALIDATION_ROUTES[entry.record.requestType];
    const envelope = createEnvelope(
      {
        type: route.responseKind,
        targetModule: this.transport.moduleName,
        correlationId,
        payload: { verdict: response.verdict, ...(response.summary !== undefined && { summary: response.summary }) },
      },
      response.respondingModule ?? route.targetModule,
    );

    const disposition = await this.onResponseEvent(envelope);
    if (disposition === 'settled') throw new AlreadyResolvedError('Validation', correlationId);
    return { ...entry.record };
  }

  /**
   * Unregisters every waiting record of a pipeline item so a late
   * response cannot resurrect it. Returns the number cancelled.
   */
  cancelForItem(pipelineItemId: string): number {
    let cancelled = 0;
    for (const entry of [...this.table.values()]) {
      if (entry.record.pipelineItemId !== pipelineItemId || entry.record.state !== 'waiting') continue;

      this.forget(entry);
      entry.resolve({
        correlationId: entry.record.correlationId,
        pipelineItemId,
        requestType: entry.record.requestType,
        state: 'cancelled',
        summary: null,
      });
      cancelled++;
    }

    if (cancelled > 0) {
      this.log.info({ pipeline_item_id: pipelineItemId, cancelled }, 'Pending validations cancelled');
    }
    return cancelled;
  }

  get(correlationId: string): PendingValidation | undefined {
    const entry = this.table.get(correlationId);
    return entry ? { ...entry.record } : undefined;
  }

  list(filters: ValidationFilters = {}): PendingValidation[] {
    return [...this.table.values()]
      .map((entry) => entry.record)
      .filter((record) => filters.state === undefined || record.state === filters.state)
      .filter((record) => filters.pipelineItemId === undefined || record.pipelineItemId === filters.pipelineItemId)
      .map((record) => ({ ...record }));
  }

  /** Clears every timer and empties the table. */
  shutdown(): void {
    for (const entry of this.table.values()) {
      clearTimer(entry.deadlineTimer);
      clearTimer(entry.graceTimer);
    }
    this.table.clear();
  }

  private expire(correlationId: string, summary: string): void {
    const entry = this.table.get(correlationId);
    if (!entry || entry.record.state !== 'waiting') return;

    const { record } = entry;
    this.log.warn(
      { correlation_id: correlationId, pipeline_item_id: record.pipelineItemId, request_type: record.requestType },
      'Validation timed out',
    );

    const settled = this.settle(entry, 'timed_out', summary);
    const raised = this.transport.emitLocal({
      type: 'validation_timed_out',
      correlationId,
      payload: {
        pipeline_item_id: record.pipelineItemId,
        request_type: record.requestType,
        target_module: record.targetModule,
        deadline: record.deadline,
      },
    });

    Promise.all([settled, raised]).catch((err: unknown) => {
      this.log.error({ err, correlation_id: correlationId }, 'Timeout handling failed');
    });
  }

  /**
   * Moves a record out of `waiting`. The state check and write are
   * synchronous, so whichever caller gets here first wins.
   */
  private async settle(entry: Entry, state: SettledState, summary: string | null): Promise<void> {
    const { record } = entry;
    if (record.state !== 'waiting') return;

    record.state = state;
    record.resolvedAt = new Date().toISOString();
    record.summary = summary;

    clearTimer(entry.deadlineTimer);
    entry.deadlineTimer = null;
    entry.graceTimer = unrefTimer(setTimeout(() => this.table.delete(record.correlationId), this.graceMs));

    entry.resolve({
      correlationId: record.correlationId,
      pipelineItemId: record.pipelineItemId,
      requestType: record.requestType,
      state,
      summary,
    });

    this.log.info(
      { correlation_id: record.correlationId, pipeline_item_id: record.pipelineItemId, state },
      'Validation settled',
    );

    const snapshot = { ...record };
    for (const listener of this.listeners) {
      try {
        await listener(snapshot);
      } catch (err: unknown) {
        this.log.error({ err, correlation_id: record.correlationId }, 'Settlement listener failed');
      }
    }
  }

  private forget(entry: Entry): void {
    clearTimer(entry.deadlineTimer);
    clearTimer(entry.graceTimer);
    this.table.delete(entry.record.correlationId);
  }
}

function unrefTimer(timer: ReturnType<typeof setTimeout>): ReturnType<typeof setTimeout> {
  timer.unref();
  return timer;
}

function clearTimer(timer: ReturnType<typeof setTimeout> | null): void {
  if (timer !== null) clearTimeout(timer);
}

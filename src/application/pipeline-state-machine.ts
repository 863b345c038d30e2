import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  EnvelopeDraft,
  HistoryKind,
  OrderedStage,
  PendingValidation,
  PipelineItem,
  Stage,
  StageValidation,
  ValidationRequestType,
  ValidationState,
} from '../domain/index.js';
import {
  InvalidTransitionError,
  NotFoundError,
  STAGES,
  TransitionConflictError,
  ValidationRejectedError,
  ValidationTimeoutError,
  gatesFor,
  isNegative,
  isTerminal,
  nextStage,
} from '../domain/index.js';
import { KeyedLock } from './keyed-lock.js';
import type { EventPublisher, PipelineItemFilters, PipelineRepository } from './ports.js';
import type { ValidationHandle, ValidationOrchestrator } from './validation-orchestrator.js';

export interface PipelineStateMachineDeps {
  readonly repository: PipelineRepository;
  readonly orchestrator: ValidationOrchestrator;
  readonly transport: EventPublisher;
  readonly log: Logger;
}

export interface CreatePipelineItemInput {
  title: string;
  category?: string | null | undefined;
  actor: string;
}

export interface StageOverride {
  targetStage: OrderedStage;
  reason: string;
}

export interface AdvanceOptions {
  /** Stage the caller believes the item is at. */
  expectedStage?: Stage | undefined;
  override?: StageOverride | undefined;
}

export interface ValidateResult {
  item: PipelineItem;
  requested: ValidationHandle[];
}

/** Hand-off notices published when an item reaches `complete`. */
const COMPLETION_NOTICES: readonly { type: string; targetModule: string }[] = [
  { type: 'product_approved_for_production', targetModule: 'operations' },
  { type: 'product_budget_allocated', targetModule: 'finance' },
  { type: 'product_launch_scheduled', targetModule: 'marketing' },
];

/**
 * Owns the stage progression of pipeline items.
 *
 * Every mutation of one item runs under that item's lock, so two
 * concurrent `advance` calls can never both succeed from the same
 * stage. Nothing here waits for a remote verdict: verdicts arrive
 * through the orchestrator's settlement hook.
 */
export class PipelineStateMachine {
  private readonly repository: PipelineRepository;
  private readonly orchestrator: ValidationOrchestrator;
  private readonly transport: EventPublisher;
  private readonly log: Logger;
  private readonly locks = new KeyedLock();
  private readonly notices = new Set<Promise<void>>();

  constructor(deps: PipelineStateMachineDeps) {
    this.repository = deps.repository;
    this.orchestrator = deps.orchestrator;
    this.transport = deps.transport;
    this.log = deps.log;

    this.orchestrator.onSettled((record: Readonly<PendingValidation>) =>
      this.recordValidationResult(record.pipelineItemId, record.correlationId, record.state),
    );
  }

  async createPipelineItem(input: CreatePipelineItemInput): Promise<PipelineItem> {
    const now = new Date().toISOString();
    const item: PipelineItem = {
      id: randomUUID(),
      title: input.title,
      category: input.category ?? null,
      currentStage: 'discovery',
      stageHistory: [{ stage: 'discovery', enteredAt: now, actor: input.actor, kind: 'created', reason: null }],
      pendingValidationIds: [],
      validations: [],
      blocked: false,
      createdAt: now,
      updatedAt: now,
    };

    await this.repository.save(item);
    this.log.info({ pipeline_item_id: item.id, actor: input.actor }, 'Pipeline item created');
    return item;
  }

  async get(id: string): Promise<PipelineItem> {
    const item = await this.repository.findById(id);
    if (!item) throw new NotFoundError('PipelineItem', id);
    return item;
  }

  list(filters: PipelineItemFilters = {}): Promise<PipelineItem[]> {
    return this.repository.list(filters);
  }

  /**
   * Moves an item to its next stage, or to the override target.
   *
   * The stage observed when the call is issued is compared with the
   * stage found under the lock; a difference means another caller won
   * and this one fails with a conflict instead of advancing twice.
   */
  async advance(id: string, actor: string, options: AdvanceOptions = {}): Promise<PipelineItem> {
    const observed = await this.get(id);

    const { item, from } = await this.locks.runExclusive(id, async () => {
      const current = await this.get(id);

      if (isTerminal(current.currentStage)) {
        throw new InvalidTransitionError(`Item ${id} is ${current.currentStage} and cannot advance`);
      }
      const expected = options.expectedStage ?? observed.currentStage;
      if (current.currentStage !== expected) {
        throw new TransitionConflictError(expected, current.currentStage);
      }

      const target = options.override
        ? this.overrideTarget(current, options.override)
        : this.gatedTarget(current);

      if (options.override) {
        this.orchestrator.cancelForItem(id);
      }

      const updated = this.enterStage(
        current,
        target,
        actor,
        options.override ? 'override' : 'advanced',
        options.override?.reason ?? null,
      );
      await this.repository.save(updated);
      return { item: updated, from: current.currentStage };
    });

    this.log.info(
      { pipeline_item_id: id, from, to: item.currentStage, actor, override: options.override !== undefined },
      'Pipeline item advanced',
    );
    this.announce(item, from, actor);
    return item;
  }

  /**
   * Requests the validations the current stage still needs. Already
   * waiting or approved ones are not requested again.
   */
  async validate(id: string, requestType?: ValidationRequestType): Promise<ValidateResult> {
    return this.locks.runExclusive(id, async () => {
      const current = await this.get(id);

      if (isTerminal(current.currentStage)) {
        throw new InvalidTransitionError(`Item ${id} is ${current.currentStage}`);
      }
      const gates = gatesFor(current.currentStage);
      if (gates.length === 0) {
        throw new InvalidTransitionError(`Stage ${current.currentStage} requires no validation`);
      }
      if (requestType !== undefined && !gates.includes(requestType)) {
        throw new InvalidTransitionError(`Stage ${current.currentStage} does not require ${requestType}`);
      }

      const wanted = requestType === undefined ? gates : [requestType];
      const refusal = negativeVerdict(current, wanted);
      if (refusal) throw refusal;

      const missing = wanted.filter((type) => findValidation(current, type) === undefined);

      let item = current;
      const requested: ValidationHandle[] = [];
      try {
        for (const type of missing) {
          const handle = await this.orchestrator.requestValidation(id, type, {
            title: current.title,
            category: current.category,
            stage: current.currentStage,
          });
          requested.push(handle);
          item = withValidation(item, {
            requestType: type,
            correlationId: handle.correlationId,
            state: 'waiting',
            deadline: handle.deadline,
          });
        }
      } finally {
        if (item !== current) await this.repository.save(item);
      }

      return { item, requested };
    });
  }

  /**
   * Applies a settled verdict. Unknown correlation ids and terminal
   * items are ignored.
   */
  async recordValidationResult(id: string, correlationId: string, state: ValidationState): Promise<void> {
    await this.locks.runExclusive(id, async () => {
      const current = await this.repository.findById(id);
      if (!current || isTerminal(current.currentStage)) return;

      const entry = current.validations.find((v) => v.correlationId === correlationId);
      if (!entry) {
        this.log.debug({ pipeline_item_id: id, correlation_id: correlationId }, 'Verdict for untracked validation ignored');
        return;
      }

      const validations = current.validations.map((v) => (v.correlationId === correlationId ? { ...v, state } : v));
      const updated: PipelineItem = {
        ...current,
        validations,
        pendingValidationIds: current.pendingValidationIds.filter((cid) => cid !== correlationId),
        blocked: validations.some((v) => isNegative(v.state)),
        updatedAt: new Date().toISOString(),
      };
      await this.repository.save(updated);

      const log = isNegative(state) ? this.log.warn.bind(this.log) : this.log.info.bind(this.log);
      log({ pipeline_item_id: id, correlation_id: correlationId, request_type: entry.requestType, state }, 'Validation result recorded');
    });
  }

  /** Drops a negative verdict so the validation can be requested again. */
  async clearRejection(id: string, requestType: ValidationRequestType, actor: string): Promise<PipelineItem> {
    return this.locks.runExclusive(id, async () => {
      const current = await this.get(id);
      const entry = findValidation(current, requestType);
      if (!entry || !isNegative(entry.state)) {
        throw new NotFoundError('Rejected validation', `${id}/${requestType}`);
      }

      const validations = current.validations.filter((v) => v !== entry);
      const updated: PipelineItem = {
        ...current,
        validations,
        blocked: validations.some((v) => isNegative(v.state)),
        updatedAt: new Date().toISOString(),
      };
      await this.repository.save(updated);

      this.log.info({ pipeline_item_id: id, request_type: requestType, actor }, 'Validation rejection cleared');
      return updated;
    });
  }

  async cancel(id: string, actor: string, reason: string): Promise<PipelineItem> {
    const { item, from } = await this.locks.runExclusive(id, async () => {
      const current = await this.get(id);
      if (isTerminal(current.currentStage)) {
        throw new InvalidTransitionError(`Item ${id} is already ${current.currentStage}`);
      }

      this.orchestrator.cancelForItem(id);
      const updated = this.enterStage(current, 'cancelled', actor, 'cancelled', reason);
      await this.repository.save(updated);
      return { item: updated, from: current.currentStage };
    });

    this.log.info({ pipeline_item_id: id, from, actor, reason }, 'Pipeline item cancelled');
    this.announce(item, from, actor);
    return item;
  }

  /**
   * Hands every stored `waiting` validation back to the orchestrator so
   * its deadline runs again. Call once at startup, after event routes
   * are registered; validations whose deadline passed while the process
   * was down time out immediately.
   */
  async resumePendingValidations(): Promise<number> {
    let resumed = 0;
    for (const item of await this.repository.list()) {
      if (isTerminal(item.currentStage)) continue;

      for (const validation of item.validations) {
        if (validation.state !== 'waiting') continue;
        const armed = this.orchestrator.resume({
          correlationId: validation.correlationId,
          pipelineItemId: item.id,
          requestType: validation.requestType,
          deadline: validation.deadline ?? null,
        });
        if (armed) resumed++;
      }
    }

    if (resumed > 0) this.log.info({ resumed }, 'Pending validations resumed');
    return resumed;
  }

  /** Resolves once every notice published so far has settled. */
  async flushNotices(): Promise<void> {
    await Promise.all([...this.notices]);
  }

  private gatedTarget(item: PipelineItem): OrderedStage {
    const gates = gatesFor(item.currentStage);

    const refusal = negativeVerdict(item, gates);
    if (refusal) throw refusal;

    const outstanding = gates.filter((type) => findValidation(item, type)?.state !== 'approved');
    if (outstanding.length > 0) {
      throw new InvalidTransitionError(
        `Stage ${item.currentStage} requires approved ${outstanding.join(', ')} before advancing`,
      );
    }

    const target = nextStage(item.currentStage);
    if (target === null) throw new InvalidTransitionError(`Stage ${item.currentStage} has no successor`);
    return target;
  }

  private overrideTarget(item: PipelineItem, override: StageOverride): OrderedStage {
    if (!STAGES.includes(override.targetStage)) {
      throw new InvalidTransitionError(`Unknown stage ${override.targetStage}`);
    }
    if (override.targetStage === item.currentStage) {
      throw new InvalidTransitionError(`Item ${item.id} is already at ${item.currentStage}`);
    }
    if (override.reason.trim() === '') {
      throw new InvalidTransitionError('An override needs a reason');
    }
    return override.targetStage;
  }

  private enterStage(item: PipelineItem, stage: Stage, actor: string, kind: HistoryKind, reason: string | null): PipelineItem {
    const now = new Date().toISOString();
    return {
      ...item,
      currentStage: stage,
      stageHistory: [...item.stageHistory, { stage, enteredAt: now, actor, kind, reason }],
      pendingValidationIds: [],
      validations: [],
      blocked: false,
      updatedAt: now,
    };
  }

  /** Publishes stage notices without holding up the caller. */
  private announce(item: PipelineItem, from: Stage, actor: string): void {
    const drafts: EnvelopeDraft[] = [
      {
        type: 'product_pipeline_updated',
        targetModule: 'executive',
        payload: {
          pipeline_item_id: item.id,
          title: item.title,
          previous_stage: from,
          current_stage: item.currentStage,
          actor,
        },
      },
    ];

    if (item.currentStage === 'complete') {
      for (const notice of COMPLETION_NOTICES) {
        drafts.push({
          type: notice.type,
          targetModule: notice.targetModule,
          payload: { pipeline_item_id: item.id, title: item.title, category: item.category },
        });
      }
    }

    for (const draft of drafts) {
      const pending = this.transport.publish(draft).then(
        () => undefined,
        (err: unknown) => {
          this.log.warn({ err, pipeline_item_id: item.id, type: draft.type }, 'Pipeline notice not delivered');
        },
      );
      this.notices.add(pending);
      void pending.finally(() => this.notices.delete(pending));
    }
  }
}

function findValidation(item: PipelineItem, requestType: ValidationRequestType): StageValidation | undefined {
  return item.validations.find((v) => v.requestType === requestType);
}

/** Timeouts alone yield `ValidationTimeoutError`; any refusal makes it a rejection. */
function negativeVerdict(item: PipelineItem, types: readonly ValidationRequestType[]): ValidationRejectedError | null {
  const negative = types
    .map((type) => findValidation(item, type))
    .filter((entry): entry is StageValidation => entry !== undefined && isNegative(entry.state));
  if (negative.length === 0) return null;

  const requestTypes = negative.map((entry) => entry.requestType);
  return negative.every((entry) => entry.state === 'timed_out')
    ? new ValidationTimeoutError(requestTypes)
    : new ValidationRejectedError(requestTypes);
}

function withValidation(item: PipelineItem, validation: StageValidation): PipelineItem {
  return {
    ...item,
    validations: [...item.validations, validation],
    pendingValidationIds: [...item.pendingValidationIds, validation.correlationId],
    updatedAt: new Date().toISOString(),
  };
}

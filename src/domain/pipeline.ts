import type { ValidationRequestType, ValidationState } from './validation.js';

/** Fixed, totally ordered stage progression. */
export const STAGES = [
  'discovery',
  'ideation',
  'design',
  'sourcing',
  'sampling',
  'production',
  'complete',
] as const;

export type OrderedStage = (typeof STAGES)[number];

export type Stage = OrderedStage | 'cancelled';

export const TERMINAL_STAGES: readonly Stage[] = ['complete', 'cancelled'];

/** Validations that must be approved before an item may leave a stage. */
export const STAGE_GATES: Readonly<Record<OrderedStage, readonly ValidationRequestType[]>> = {
  discovery: [],
  ideation: [],
  design: [],
  sourcing: ['margin_check'],
  sampling: ['capacity_check', 'executive_approval'],
  production: [],
  complete: [],
};

export type HistoryKind = 'created' | 'advanced' | 'override' | 'cancelled';

export interface StageHistoryEntry {
  readonly stage: Stage;
  readonly enteredAt: string;
  readonly actor: string;
  readonly kind: HistoryKind;
  readonly reason: string | null;
}

/** Verdict bookkeeping for one gating validation of the current stage. */
export interface StageValidation {
  readonly requestType: ValidationRequestType;
  readonly correlationId: string;
  readonly state: ValidationState;
  /** ISO deadline of the request; absent on rows written before it was stored. */
  readonly deadline?: string;
}

export interface PipelineItem {
  readonly id: string;
  readonly title: string;
  readonly category: string | null;
  readonly currentStage: Stage;
  readonly stageHistory: readonly StageHistoryEntry[];
  readonly pendingValidationIds: readonly string[];
  readonly validations: readonly StageValidation[];
  readonly blocked: boolean;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export function isTerminal(stage: Stage): boolean {
  return TERMINAL_STAGES.includes(stage);
}

/** Position in the ordered progression; `cancelled` has none. */
export function stageIndex(stage: Stage): number {
  return stage === 'cancelled' ? -1 : STAGES.indexOf(stage);
}

/** The only legal successor of a non-terminal stage, or null. */
export function nextStage(stage: Stage): OrderedStage | null {
  if (isTerminal(stage)) return null;
  return STAGES[stageIndex(stage) + 1] ?? null;
}

export function gatesFor(stage: Stage): readonly ValidationRequestType[] {
  return stage === 'cancelled' ? [] : STAGE_GATES[stage];
}

export function isNegative(state: ValidationState): state is 'rejected' | 'timed_out' {
  return state === 'rejected' || state === 'timed_out';
}

import type { ModuleName, OutboundKind, ResponseKind } from './envelope.js';

/** Lifecycle of a cross-module validation request. */
export type ValidationState = 'waiting' | 'approved' | 'rejected' | 'timed_out';

/** A verdict that ends the `waiting` state. */
export type SettledState = Exclude<ValidationState, 'waiting'>;

export type ValidationRequestType = 'margin_check' | 'capacity_check' | 'executive_approval';

export const VALIDATION_REQUEST_TYPES: readonly ValidationRequestType[] = [
  'margin_check',
  'capacity_check',
  'executive_approval',
];

/** Which module answers a request type, and over which event kinds. */
export interface ValidationRoute {
  readonly targetModule: ModuleName;
  readonly requestKind: OutboundKind;
  readonly responseKind: ResponseKind;
}

export const VALIDATION_ROUTES: Readonly<Record<ValidationRequestType, ValidationRoute>> = {
  margin_check: {
    targetModule: 'finance',
    requestKind: 'margin_check_request',
    responseKind: 'margin_check_response',
  },
  capacity_check: {
    targetModule: 'operations',
    requestKind: 'capacity_check_request',
    responseKind: 'capacity_check_response',
  },
  executive_approval: {
    targetModule: 'executive',
    requestKind: 'product_approval_request',
    responseKind: 'approval_decided',
  },
};

/** Longest delay `setTimeout` honours; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export function isValidationRequestType(value: string): value is ValidationRequestType {
  return (VALIDATION_REQUEST_TYPES as readonly string[]).includes(value);
}

/**
 * Pending validation record.
 *
 * Owned exclusively by the validation orchestrator. `state` leaves
 * `waiting` exactly once; the first verdict (response or deadline) wins.
 */
export interface PendingValidation {
  readonly correlationId: string;
  readonly pipelineItemId: string;
  readonly requestType: ValidationRequestType;
  readonly targetModule: ModuleName;
  readonly issuedAt: string;
  readonly deadline: string;
  state: ValidationState;
  resolvedAt: string | null;
  summary: string | null;
}

/** What an awaiting caller eventually observes. */
export interface ValidationOutcome {
  readonly correlationId: string;
  readonly pipelineItemId: string;
  readonly requestType: ValidationRequestType;
  readonly state: SettledState | 'cancelled';
  readonly summary: string | null;
}

/**
 * Error taxonomy of the orchestration core.
 *
 * Every error carries a stable `code` so the HTTP boundary can map it
 * without `instanceof` chains.
 */

export type ErrorCode =
  | 'INVALID_TRANSITION'
  | 'TRANSITION_CONFLICT'
  | 'VALIDATION_REJECTED'
  | 'VALIDATION_TIMEOUT'
  | 'DELIVERY_FAILED'
  | 'NOT_FOUND'
  | 'ALREADY_RESOLVED'
  | 'TRANSPORT_STATE';

export abstract class OrchestratorError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Illegal stage change. Nothing was mutated. */
export class InvalidTransitionError extends OrchestratorError {
  readonly code = 'INVALID_TRANSITION';
}

/** The item moved while the caller waited for it. */
export class TransitionConflictError extends OrchestratorError {
  readonly code = 'TRANSITION_CONFLICT';

  constructor(
    readonly expectedStage: string,
    readonly actualStage: string,
  ) {
    super(`Item is at ${actualStage}, expected ${expectedStage}`);
  }
}

/** A gating validation came back negative (rejected or timed out). */
export class ValidationRejectedError extends OrchestratorError {
  readonly code: 'VALIDATION_REJECTED' | 'VALIDATION_TIMEOUT' = 'VALIDATION_REJECTED';

  constructor(
    readonly requestTypes: readonly string[],
    message = `Validation not approved: ${requestTypes.join(', ')}`,
  ) {
    super(message);
  }
}

/** Every negative gate timed out; no module actually said no. */
export class ValidationTimeoutError extends ValidationRejectedError {
  override readonly code = 'VALIDATION_TIMEOUT';

  constructor(requestTypes: readonly string[]) {
    super(requestTypes, `Validation timed out: ${requestTypes.join(', ')}`);
  }
}

/** Broadcast and every direct endpoint failed. */
export class DeliveryFailedError extends OrchestratorError {
  readonly code = 'DELIVERY_FAILED';

  constructor(
    readonly envelopeId: string,
    readonly reasons: readonly string[],
  ) {
    super(`Delivery failed for envelope ${envelopeId}: ${reasons.join('; ')}`);
  }
}

export class NotFoundError extends OrchestratorError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly entity: string,
    readonly id: string,
  ) {
    super(`${entity} ${id} not found`);
  }
}

export class AlreadyResolvedError extends OrchestratorError {
  readonly code = 'ALREADY_RESOLVED';

  constructor(
    readonly entity: string,
    readonly id: string,
  ) {
    super(`${entity} ${id} already resolved`);
  }
}

/** Transport used outside its start/stop lifecycle. */
export class TransportStateError extends OrchestratorError {
  readonly code = 'TRANSPORT_STATE';
}

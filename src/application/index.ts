export { envelopeSchema, parseEnvelope, createEnvelope, readVerdict } from './envelope-schema.js';
export type { EnvelopeInput, EnvelopeParseResult, Verdict } from './envelope-schema.js';
export {
  createPipelineItemSchema,
  advanceSchema,
  validateSchema,
  clearRejectionSchema,
  cancelSchema,
  pipelineQuerySchema,
  requestTypeParamSchema,
  validationResponseSchema,
  validationQuerySchema,
  alertQuerySchema,
  resolveAlertSchema,
} from './pipeline-schema.js';
export type { CreatePipelineItemBody, AdvanceBody } from './pipeline-schema.js';
export { KeyedLock } from './keyed-lock.js';
export { ValidationOrchestrator } from './validation-orchestrator.js';
export type {
  ValidationHandle,
  ResponseDisposition,
  SettlementListener,
  ValidationFilters,
  ValidationOrchestratorDeps,
  StoredValidation,
} from './validation-orchestrator.js';
export { PipelineStateMachine } from './pipeline-state-machine.js';
export type {
  PipelineStateMachineDeps,
  CreatePipelineItemInput,
  StageOverride,
  AdvanceOptions,
  ValidateResult,
} from './pipeline-state-machine.js';
export { AlertManager, clampLimit, DEFAULT_ALERT_LIMIT, MAX_ALERT_LIMIT } from './alert-manager.js';
export type { AlertListOptions, AlertManagerDeps } from './alert-manager.js';
export { classify } from './severity-table.js';
export type { AlertClassification } from './severity-table.js';
export { registerEventRoutes } from './event-router.js';
export { stopServices } from './lifecycle.js';
export type { StoppableServices } from './lifecycle.js';
export type { EventRouterDeps } from './event-router.js';
export { UNMATCHED_TOPIC } from './ports.js';
export type {
  EventPublisher,
  EventSubscriber,
  EnvelopeHandler,
  DeliveryMode,
  InboundPath,
  Subscription,
  PipelineRepository,
  PipelineItemFilters,
  AlertRepository,
  AlertFilters,
  Page,
} from './ports.js';

export type {
  EventEnvelope,
  EnvelopeDraft,
  EnvelopePayload,
  EventKind,
  ModuleName,
  OutboundKind,
  ResponseKind,
  NoticeKind,
  SyntheticKind,
} from './envelope.js';
export {
  MODULES,
  OUTBOUND_KINDS,
  RESPONSE_KINDS,
  NOTICE_KINDS,
  SYNTHETIC_KINDS,
} from './envelope.js';
export type {
  PendingValidation,
  SettledState,
  ValidationOutcome,
  ValidationRequestType,
  ValidationRoute,
  ValidationState,
} from './validation.js';
export { MAX_TIMER_MS, VALIDATION_REQUEST_TYPES, VALIDATION_ROUTES, isValidationRequestType } from './validation.js';
export type {
  HistoryKind,
  OrderedStage,
  PipelineItem,
  Stage,
  StageHistoryEntry,
  StageValidation,
} from './pipeline.js';
export {
  STAGES,
  STAGE_GATES,
  TERMINAL_STAGES,
  gatesFor,
  isNegative,
  isTerminal,
  nextStage,
  stageIndex,
} from './pipeline.js';
export type { Alert, AlertSource, AlertStatus, Severity } from './alert.js';
export { ALERT_MESSAGE_MAX, ALERT_TITLE_MAX, SEVERITIES, isSeverity, severityRank } from './alert.js';
export * from './errors.js';

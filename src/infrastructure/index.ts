export { loadSettings } from './config/index.js';
export type { Settings, TransportSettings } from './config/index.js';
export {
  EventTransport,
  RedisBroadcastChannel,
  TopicDispatcher,
} from './transport/index.js';
export { UNMATCHED_TOPIC } from '../application/ports.js';
export type {
  BroadcastChannel,
  DeliveryReceipt,
  EnvelopeAuditSink,
  ReceiveResult,
} from './transport/index.js';
export type { Subscription } from '../application/ports.js';
export {
  createDbClient,
  ensureSchema,
  DrizzlePipelineRepository,
  DrizzleAlertRepository,
  DrizzleEventLog,
} from './db/index.js';
export type { Database, SqlClient } from './db/index.js';
export { InMemoryPipelineRepository, InMemoryAlertRepository } from './memory/index.js';
export { loadNotificationConfig, createAlertNotifier } from './notifications/index.js';
export type { NotificationConfig, AlertNotifier } from './notifications/index.js';

export { EventTransport } from './event-transport.js';
export type {
  DeliveryReceipt,
  EventTransportDeps,
  ReceiveResult,
  ReceiveStatus,
  TransportState,
} from './event-transport.js';
export { RedisBroadcastChannel } from './broadcast-channel.js';
export type { BroadcastChannel, ChannelMessageHandler } from './broadcast-channel.js';
export { TopicDispatcher } from './topic-dispatcher.js';
export { deliverDirect, backoffDelay } from './direct-delivery.js';
export type { BackoffPolicy, DirectDeliveryResult } from './direct-delivery.js';
export { PublishPool } from './publish-pool.js';
export { SeenEnvelopeWindow } from './seen-window.js';
export type { AuditDirection, AuditPath, EnvelopeAuditSink } from './audit.js';

import type {
  Alert,
  AlertStatus,
  EnvelopeDraft,
  EventEnvelope,
  PipelineItem,
  Severity,
  Stage,
} from '../domain/index.js';

/** Catch-all topic: receives envelopes no other subscriber matches. */
export const UNMATCHED_TOPIC = '*';

export type EnvelopeHandler = (envelope: EventEnvelope) => void | Promise<void>;

/**
 * `broadcast-only` subscribers ignore envelopes that arrived over the
 * direct-delivery path.
 */
export type DeliveryMode = 'broadcast-only' | 'broadcast-with-fallback';

/** How an inbound envelope reached this process. */
export type InboundPath = 'broadcast' | 'direct' | 'local';

export interface Subscription {
  readonly id: string;
  readonly topic: string;
  readonly mode: DeliveryMode;
}

/** Outbound side of the transport, as the application services see it. */
export interface EventPublisher {
  readonly moduleName: string;
  publish(draft: EnvelopeDraft): Promise<{ readonly envelope: EventEnvelope }>;
  emitLocal(draft: EnvelopeDraft): Promise<number>;
}

/** Inbound side of the transport. */
export interface EventSubscriber {
  subscribe(topic: string, handler: EnvelopeHandler, mode?: DeliveryMode): Subscription;
  unsubscribe(subscription: Subscription): Promise<void>;
}

export interface PipelineItemFilters {
  stage?: Stage;
}

/** Storage for pipeline items. Items are never deleted. */
export interface PipelineRepository {
  save(item: PipelineItem): Promise<void>;
  findById(id: string): Promise<PipelineItem | undefined>;
  list(filters?: PipelineItemFilters): Promise<PipelineItem[]>;
}

export interface AlertFilters {
  status?: AlertStatus;
  severity?: Severity;
  category?: string;
}

export interface Page {
  limit: number;
  offset: number;
}

/** Storage for alerts; at most one alert exists per source envelope id. */
export interface AlertRepository {
  save(alert: Alert): Promise<void>;
  findById(id: string): Promise<Alert | undefined>;
  findBySourceEventId(sourceEventId: string): Promise<Alert | undefined>;
  list(filters: AlertFilters, page: Page): Promise<Alert[]>;
  /**
   * Inserts unless an alert for the same source envelope exists.
   * Returns the stored alert and whether it was created by this call.
   */
  insertIfAbsent(alert: Alert): Promise<{ alert: Alert; created: boolean }>;
}

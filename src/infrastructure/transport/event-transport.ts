import type { Logger } from 'pino';
import type { EnvelopeDraft, EventEnvelope } from '../../domain/index.js';
import { DeliveryFailedError, TransportStateError } from '../../domain/index.js';
import { createEnvelope, parseEnvelope } from '../../application/envelope-schema.js';
import type { TransportSettings } from '../config/index.js';
import type { BroadcastChannel } from './broadcast-channel.js';
import type { AuditDirection, AuditPath, EnvelopeAuditSink } from './audit.js';
import { deliverDirect } from './direct-delivery.js';
import type { BackoffPolicy } from './direct-delivery.js';
import { PublishPool } from './publish-pool.js';
import { SeenEnvelopeWindow } from './seen-window.js';
import { TopicDispatcher } from './topic-dispatcher.js';
import type { DeliveryMode, EnvelopeHandler, InboundPath, Subscription } from '../../application/ports.js';

const BROADCAST_SUFFIX = 'broadcast';

export type TransportState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface DeliveryReceipt {
  readonly envelope: EventEnvelope;
  readonly path: 'broadcast' | 'fallback';
  /** Listeners reached on the broadcast channel (0 on the fallback path). */
  readonly receivers: number;
  /** Endpoints that accepted the envelope, one per module; empty on broadcast. */
  readonly endpoints: readonly string[];
  readonly attempts: number;
}

export type ReceiveStatus = 'accepted' | 'duplicate' | 'echo' | 'malformed';

export interface ReceiveResult {
  readonly status: ReceiveStatus;
  readonly envelopeId: string | null;
  /** Resolves with the number of handlers that processed the envelope. */
  readonly delivered: Promise<number>;
}

export interface EventTransportDeps {
  readonly channel: BroadcastChannel;
  readonly settings: TransportSettings;
  readonly log: Logger;
  readonly audit?: EnvelopeAuditSink | undefined;
}

/**
 * Event transport between modules.
 *
 * Outbound: Redis Pub/Sub first; when no listener acknowledges within
 * the liveness window (or the channel is down) the envelope is POSTed to
 * the target module's direct endpoints with bounded backoff. An untargeted
 * envelope goes to one endpoint of every module that has any. When every
 * path fails the caller gets `DeliveryFailedError` and a local
 * `delivery_failed` envelope is raised for the alert manager.
 *
 * Inbound: both paths funnel into `receive()`, which validates, drops
 * our own echoes, de-duplicates by envelope id and dispatches through the
 * per-topic FIFO chains. Delivery is at-least-once.
 *
 * Lifecycle is explicit: `start()` once, `stop()` once. A stopped
 * transport is never re-initialized.
 */
export class EventTransport {
  private readonly channel: BroadcastChannel;
  private readonly settings: TransportSettings;
  private readonly log: Logger;
  private readonly audit: EnvelopeAuditSink | undefined;
  private readonly dispatcher: TopicDispatcher;
  private readonly pool: PublishPool;
  private readonly seen: SeenEnvelopeWindow;
  private readonly backoff: BackoffPolicy;
  private current: TransportState = 'idle';

  constructor(deps: EventTransportDeps) {
    this.channel = deps.channel;
    this.settings = deps.settings;
    this.log = deps.log;
    this.audit = deps.audit;
    this.dispatcher = new TopicDispatcher(deps.log);
    this.pool = new PublishPool(deps.settings.publishConcurrency);
    this.seen = new SeenEnvelopeWindow(deps.settings.dedupTtlMs);
    this.backoff = {
      maxAttempts: deps.settings.fallbackMaxAttempts,
      baseDelayMs: deps.settings.fallbackBaseDelayMs,
      maxDelayMs: deps.settings.fallbackMaxDelayMs,
      requestTimeoutMs: deps.settings.fallbackRequestTimeoutMs,
    };
  }

  get state(): TransportState {
    return this.current;
  }

  get moduleName(): string {
    return this.settings.moduleName;
  }

  /** Channel an envelope for `targetModule` is published on. */
  channelFor(targetModule: string | null): string {
    return `${this.settings.channelPrefix}:${targetModule ?? BROADCAST_SUFFIX}`;
  }

  /** Channels this module listens on. */
  inboundChannels(): string[] {
    return [this.channelFor(this.settings.moduleName), this.channelFor(null)];
  }

  async start(): Promise<void> {
    if (this.current !== 'idle') {
      throw new TransportStateError(`Transport cannot start from state ${this.current}`);
    }

    await this.channel.connect();
    await this.channel.subscribe(this.inboundChannels(), (channel, message) => {
      if (!this.inboundChannels().includes(channel)) return;
      const result = this.receive(message, 'broadcast');
      result.delivered.catch((err: unknown) => {
        this.log.error({ err, channel }, 'Inbound broadcast dispatch failed');
      });
    });

    this.current = 'running';
    this.log.info(
      { module: this.settings.moduleName, channels: this.inboundChannels() },
      'Event transport started',
    );
  }

  /**
   * Stops accepting publishes, waits for outbound attempts and queued
   * deliveries, then releases the channel.
   */
  async stop(): Promise<void> {
    if (this.current !== 'running') {
      throw new TransportStateError(`Transport cannot stop from state ${this.current}`);
    }
    this.current = 'stopping';
    this.log.info({ inFlight: this.pool.size }, 'Event transport stopping, draining in-flight deliveries');

    await this.pool.idle();
    await this.dispatcher.drainAll();

    try {
      await this.channel.unsubscribe(this.inboundChannels());
    } catch (err: unknown) {
      this.log.warn({ err }, 'Failed to unsubscribe broadcast channels');
    }
    await this.channel.close();

    this.dispatcher.clear();
    this.current = 'stopped';
    this.log.info('Event transport stopped');
  }

  subscribe(topic: string, handler: EnvelopeHandler, mode: DeliveryMode = 'broadcast-with-fallback'): Subscription {
    if (this.current === 'stopping' || this.current === 'stopped') {
      throw new TransportStateError(`Cannot subscribe while transport is ${this.current}`);
    }
    return this.dispatcher.add(topic, handler, mode);
  }

  async unsubscribe(subscription: Subscription): Promise<void> {
    await this.dispatcher.remove(subscription);
  }

  /**
   * Publishes an envelope built from `draft`.
   *
   * Resolves with how it was delivered; rejects with
   * `DeliveryFailedError` once every path is exhausted.
   */
  async publish(draft: EnvelopeDraft): Promise<DeliveryReceipt> {
    if (this.current !== 'running') {
      throw new TransportStateError(`Cannot publish while transport is ${this.current}`);
    }

    const envelope = createEnvelope(draft, this.settings.moduleName);
    return this.pool.run(() => this.deliver(envelope));
  }

  /** Dispatches a synthetic envelope to local subscribers only. */
  emitLocal(draft: EnvelopeDraft): Promise<number> {
    const envelope = createEnvelope(draft, this.settings.moduleName);
    this.log.debug({ envelope_id: envelope.id, type: envelope.type }, 'Emitting local envelope');
    return this.dispatcher.dispatch(envelope, 'local');
  }

  /**
   * Single entry point for inbound envelopes from either path.
   *
   * Enqueueing happens synchronously so per-topic order matches arrival
   * order. Malformed input is dropped and reported as a low-severity
   * `malformed_event` signal.
   */
  receive(raw: unknown, path: Exclude<InboundPath, 'local'>): ReceiveResult {
    const parsed = parseEnvelope(raw);
    if (!parsed.ok) {
      this.log.warn({ path, issues: parsed.issues }, 'Malformed envelope dropped');
      const delivered = this.emitLocal({
        type: 'malformed_event',
        payload: { path, issues: parsed.issues, raw: excerpt(raw) },
      });
      return { status: 'malformed', envelopeId: null, delivered: delivered.then(() => 0) };
    }

    const { envelope } = parsed;

    if (envelope.sourceModule === this.settings.moduleName) {
      return { status: 'echo', envelopeId: envelope.id, delivered: Promise.resolve(0) };
    }

    if (!this.seen.markSeen(envelope.id)) {
      this.log.debug({ envelope_id: envelope.id, type: envelope.type, path }, 'Duplicate envelope discarded');
      return { status: 'duplicate', envelopeId: envelope.id, delivered: Promise.resolve(0) };
    }

    const delivered = this.dispatcher.dispatch(envelope, path);
    void this.record(envelope, 'inbound', path);

    this.log.debug(
      { envelope_id: envelope.id, type: envelope.type, source: envelope.sourceModule, path },
      'Envelope received',
    );
    return { status: 'accepted', envelopeId: envelope.id, delivered };
  }

  /** Reachability of the broadcast channel, for health reporting. */
  async isBroadcastReachable(): Promise<boolean> {
    return this.channel.ping();
  }

  private async deliver(envelope: EventEnvelope): Promise<DeliveryReceipt> {
    const reasons: string[] = [];
    const channelName = this.channelFor(envelope.targetModule);

    try {
      const receivers = await withTimeout(
        this.channel.publish(channelName, JSON.stringify(envelope)),
        this.settings.broadcastLivenessMs,
      );
      const others = receivers - this.selfListeners(envelope.targetModule);

      if (others > 0) {
        void this.record(envelope, 'outbound', 'broadcast');
        this.log.debug(
          { envelope_id: envelope.id, type: envelope.type, channel: channelName, receivers: others },
          'Envelope published on broadcast channel',
        );
        return { envelope, path: 'broadcast', receivers: others, endpoints: [], attempts: 1 };
      }

      reasons.push(`no listener on ${channelName}`);
    } catch (err: unknown) {
      reasons.push(`broadcast: ${err instanceof Error ? err.message : String(err)}`);
      this.log.warn({ err, envelope_id: envelope.id, channel: channelName }, 'Broadcast publish failed');
    }

    const targets = this.fallbackTargets(envelope.targetModule);
    if (targets.length === 0) {
      reasons.push(`no direct endpoint configured for ${envelope.targetModule ?? BROADCAST_SUFFIX}`);
    }

    const reached: string[] = [];
    let attempts = 0;
    let unreached = 0;
    for (const [module, endpoints] of targets) {
      const endpoint = await this.deliverToModule(envelope, module, endpoints, reasons);
      if (endpoint === null) {
        unreached++;
        continue;
      }
      reached.push(endpoint.url);
      attempts += endpoint.attempts;
    }

    if (targets.length > 0 && unreached === 0) {
      void this.record(envelope, 'outbound', 'fallback');
      this.log.info(
        { envelope_id: envelope.id, type: envelope.type, endpoints: reached, attempts },
        'Envelope delivered via fallback path',
      );
      return { envelope, path: 'fallback', receivers: 0, endpoints: reached, attempts };
    }

    this.log.error(
      { envelope_id: envelope.id, type: envelope.type, target: envelope.targetModule, reached, reasons },
      'Envelope not delivered to every target',
    );

    await this.emitLocal({
      type: 'delivery_failed',
      correlationId: envelope.correlationId,
      payload: { envelope, reasons },
    });

    throw new DeliveryFailedError(envelope.id, reasons);
  }

  /** This process counts as a listener on its own inbound channels. */
  private selfListeners(targetModule: string | null): number {
    if (this.current !== 'running' && this.current !== 'stopping') return 0;
    return targetModule === null || targetModule === this.settings.moduleName ? 1 : 0;
  }

  /** Tries a module's endpoints in order until one accepts. */
  private async deliverToModule(
    envelope: EventEnvelope,
    module: string,
    endpoints: readonly string[],
    reasons: string[],
  ): Promise<{ url: string; attempts: number } | null> {
    for (const endpoint of endpoints) {
      const result = await deliverDirect(endpoint, envelope, this.backoff, this.log);
      if (result.ok) return { url: endpoint, attempts: result.attempts };
      reasons.push(`${endpoint}: ${result.error} after ${result.attempts} attempt(s)`);
    }
    this.log.warn({ envelope_id: envelope.id, module }, 'No direct endpoint of module accepted envelope');
    return null;
  }

  /**
   * Modules to reach directly, with their endpoints. An untargeted
   * envelope fans out to every other module that has endpoints.
   */
  private fallbackTargets(targetModule: string | null): [string, readonly string[]][] {
    if (targetModule !== null) {
      const endpoints = this.settings.fallbackEndpoints[targetModule] ?? [];
      return endpoints.length > 0 ? [[targetModule, endpoints]] : [];
    }
    return Object.entries(this.settings.fallbackEndpoints).filter(
      ([module, urls]) => module !== this.settings.moduleName && urls.length > 0,
    );
  }

  /** Best-effort audit: failures are logged and never block delivery. */
  private async record(envelope: EventEnvelope, direction: AuditDirection, path: AuditPath): Promise<void> {
    if (!this.audit) return;
    try {
      await this.audit.record(envelope, direction, path);
    } catch (err: unknown) {
      this.log.warn({ err, envelope_id: envelope.id, direction }, 'Failed to record envelope audit entry');
    }
  }
}

/** Rejects when `promise` has not settled within `ms`. */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`no acknowledgment within ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function excerpt(raw: unknown): string {
  const text = typeof raw === 'string' ? raw : JSON.stringify(raw) ?? String(raw);
  return text.length > 500 ? `${text.slice(0, 500)}…` : text;
}

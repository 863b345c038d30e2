import { randomUUID } from 'node:crypto';
import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { EnvelopeDraft, EventEnvelope } from '../src/domain/index.js';
import { createEnvelope } from '../src/application/envelope-schema.js';
import type { EventPublisher } from '../src/application/ports.js';
import type { TransportSettings } from '../src/infrastructure/config/index.js';
import type {
  AuditDirection,
  AuditPath,
  BroadcastChannel,
  ChannelMessageHandler,
  EnvelopeAuditSink,
} from '../src/infrastructure/transport/index.js';

export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

export function testSettings(overrides: Partial<TransportSettings> = {}): TransportSettings {
  return {
    moduleName: 'design',
    channelPrefix: 'test',
    broadcastLivenessMs: 200,
    fallbackMaxAttempts: 2,
    fallbackBaseDelayMs: 1,
    fallbackMaxDelayMs: 2,
    fallbackRequestTimeoutMs: 100,
    publishConcurrency: 4,
    dedupTtlMs: 60_000,
    fallbackEndpoints: {},
    ...overrides,
  };
}

export function makeEnvelope(overrides: Partial<EventEnvelope> = {}): EventEnvelope {
  return {
    id: randomUUID(),
    type: 'inventory_updated',
    sourceModule: 'operations',
    targetModule: null,
    payload: {},
    correlationId: null,
    timestamp: new Date().toISOString(),
    ...overrides,
  };
}

/**
 * In-process stand-in for Redis Pub/Sub. `publish` reports the number
 * of listeners and delivers on a later microtask, like a real broker.
 */
export class InProcessBus {
  reachable = true;
  readonly published: { channel: string; message: string }[] = [];
  private readonly listeners = new Map<string, Set<ChannelMessageHandler>>();

  listen(channel: string, handler: ChannelMessageHandler): void {
    const set = this.listeners.get(channel) ?? new Set<ChannelMessageHandler>();
    set.add(handler);
    this.listeners.set(channel, set);
  }

  unlisten(channel: string, handler: ChannelMessageHandler): void {
    this.listeners.get(channel)?.delete(handler);
  }

  deliver(channel: string, message: string): number {
    if (!this.reachable) throw new Error('Connection is closed.');
    this.published.push({ channel, message });
    const handlers = [...(this.listeners.get(channel) ?? [])];
    for (const handler of handlers) {
      queueMicrotask(() => handler(channel, message));
    }
    return handlers.length;
  }
}

export class FakeBroadcastChannel implements BroadcastChannel {
  closed = false;
  private handler: ChannelMessageHandler | null = null;

  constructor(private readonly bus: InProcessBus) {}

  async connect(): Promise<void> {
    if (!this.bus.reachable) throw new Error('connect ECONNREFUSED');
  }

  async publish(channel: string, message: string): Promise<number> {
    return this.bus.deliver(channel, message);
  }

  async subscribe(channels: readonly string[], onMessage: ChannelMessageHandler): Promise<void> {
    this.handler = onMessage;
    for (const channel of channels) this.bus.listen(channel, onMessage);
  }

  async unsubscribe(channels: readonly string[]): Promise<void> {
    const handler = this.handler;
    if (!handler) return;
    for (const channel of channels) this.bus.unlisten(channel, handler);
  }

  async ping(): Promise<boolean> {
    return this.bus.reachable;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Publisher that records envelopes instead of sending them. */
export class RecordingPublisher implements EventPublisher {
  readonly moduleName = 'design';
  readonly published: EventEnvelope[] = [];
  readonly local: EventEnvelope[] = [];
  failWith: Error | null = null;

  async publish(draft: EnvelopeDraft): Promise<{ envelope: EventEnvelope }> {
    if (this.failWith) throw this.failWith;
    const envelope = createEnvelope(draft, this.moduleName);
    this.published.push(envelope);
    return { envelope };
  }

  async emitLocal(draft: EnvelopeDraft): Promise<number> {
    this.local.push(createEnvelope(draft, this.moduleName));
    return 1;
  }
}

export class RecordingAudit implements EnvelopeAuditSink {
  readonly entries: { envelopeId: string; type: string; direction: AuditDirection; path: AuditPath }[] = [];

  async record(envelope: EventEnvelope, direction: AuditDirection, path: AuditPath): Promise<void> {
    this.entries.push({ envelopeId: envelope.id, type: envelope.type, direction, path });
  }
}

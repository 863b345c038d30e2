import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { EventEnvelope } from '../../domain/index.js';
import { UNMATCHED_TOPIC } from '../../application/ports.js';
import type { DeliveryMode, EnvelopeHandler, InboundPath, Subscription } from '../../application/ports.js';

interface RegisteredSubscription extends Subscription {
  readonly handler: EnvelopeHandler;
}

/**
 * Serial chain for one topic. Tasks run strictly in enqueue order.
 * Tasks must not reject; `deliver` catches handler failures itself.
 */
class TopicQueue {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  enqueue(task: () => Promise<void>): Promise<void> {
    this.depth++;
    const run = this.tail.then(task).finally(() => {
      this.depth--;
    });
    this.tail = run;
    return run;
  }

  drain(): Promise<void> {
    return this.tail;
  }

  get pending(): number {
    return this.depth;
  }
}

/**
 * Topic-indexed subscriber registry with one ordered consumer chain per
 * topic.
 *
 * Envelopes of the same topic are handled FIFO; different topics run
 * concurrently. A throwing handler is logged and does not stop the
 * other subscribers of that topic.
 */
export class TopicDispatcher {
  private readonly subscriptions = new Map<string, RegisteredSubscription[]>();
  private readonly queues = new Map<string, TopicQueue>();

  constructor(private readonly log: Logger) {}

  add(topic: string, handler: EnvelopeHandler, mode: DeliveryMode): Subscription {
    const subscription: RegisteredSubscription = { id: randomUUID(), topic, mode, handler };
    const list = this.subscriptions.get(topic) ?? [];
    this.subscriptions.set(topic, [...list, subscription]);

    this.log.debug({ topic, subscription_id: subscription.id, mode }, 'Subscriber registered');
    return { id: subscription.id, topic, mode };
  }

  /** Drains the topic's in-flight deliveries, then removes the handler. */
  async remove(subscription: Subscription): Promise<boolean> {
    const queue = this.queues.get(subscription.topic);
    if (queue) await queue.drain();

    const list = this.subscriptions.get(subscription.topic) ?? [];
    const remaining = list.filter((s) => s.id !== subscription.id);
    if (remaining.length === list.length) return false;

    if (remaining.length === 0) {
      this.subscriptions.delete(subscription.topic);
      if (queue && queue.pending === 0) this.queues.delete(subscription.topic);
    } else {
      this.subscriptions.set(subscription.topic, remaining);
    }

    this.log.debug({ topic: subscription.topic, subscription_id: subscription.id }, 'Subscriber removed');
    return true;
  }

  /**
   * Enqueues the envelope on its topic's chain synchronously, so
   * publish order on a topic is preserved. Resolves with the number of
   * handlers that completed without throwing.
   */
  dispatch(envelope: EventEnvelope, path: InboundPath): Promise<number> {
    const topic = this.topicFor(envelope.type);
    if (topic === null) {
      this.log.debug({ envelope_id: envelope.id, type: envelope.type }, 'No subscriber for envelope type');
      return Promise.resolve(0);
    }

    let queue = this.queues.get(topic);
    if (!queue) {
      queue = new TopicQueue();
      this.queues.set(topic, queue);
    }

    let delivered = 0;
    return queue
      .enqueue(async () => {
        delivered = await this.deliver(topic, envelope, path);
      })
      .then(() => delivered);
  }

  async drainAll(): Promise<void> {
    await Promise.all([...this.queues.values()].map((queue) => queue.drain()));
  }

  topics(): string[] {
    return [...this.subscriptions.keys()];
  }

  clear(): void {
    this.subscriptions.clear();
    this.queues.clear();
  }

  private topicFor(type: string): string | null {
    if ((this.subscriptions.get(type)?.length ?? 0) > 0) return type;
    if ((this.subscriptions.get(UNMATCHED_TOPIC)?.length ?? 0) > 0) return UNMATCHED_TOPIC;
    return null;
  }

  private async deliver(topic: string, envelope: EventEnvelope, path: InboundPath): Promise<number> {
    // Snapshot at execution time: handlers removed while queued are skipped.
    const handlers = this.subscriptions.get(topic) ?? [];
    let delivered = 0;

    for (const subscription of handlers) {
      if (path === 'direct' && subscription.mode === 'broadcast-only') continue;

      try {
        await subscription.handler(envelope);
        delivered++;
      } catch (err: unknown) {
        this.log.error(
          { err, topic, subscription_id: subscription.id, envelope_id: envelope.id },
          'Subscriber handler failed',
        );
      }
    }

    return delivered;
  }
}

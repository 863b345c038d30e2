import { describe, it, expect, vi } from 'vitest';
import { UNMATCHED_TOPIC } from '../../src/application/index.js';
import { TopicDispatcher } from '../../src/infrastructure/transport/index.js';
import { fakeLogger, makeEnvelope } from '../helpers.js';

describe('TopicDispatcher', () => {
  it('resolves with zero when nothing subscribes to the type', async () => {
    const dispatcher = new TopicDispatcher(fakeLogger());

    expect(await dispatcher.dispatch(makeEnvelope(), 'broadcast')).toBe(0);
  });

  it('prefers an exact topic over the catch-all', async () => {
    const dispatcher = new TopicDispatcher(fakeLogger());
    const exact = vi.fn();
    const catchAll = vi.fn();
    dispatcher.add('inventory_updated', exact, 'broadcast-with-fallback');
    dispatcher.add(UNMATCHED_TOPIC, catchAll, 'broadcast-with-fallback');

    await dispatcher.dispatch(makeEnvelope(), 'broadcast');

    expect(exact).toHaveBeenCalledOnce();
    expect(catchAll).not.toHaveBeenCalled();
  });

  it('runs different topics concurrently', async () => {
    const dispatcher = new TopicDispatcher(fakeLogger());
    const events: string[] = [];
    let releaseSlow: () => void = () => undefined;
    const slowGate = new Promise<void>((resolve) => {
      releaseSlow = resolve;
    });

    dispatcher.add('sales_data_updated', async () => {
      await slowGate;
      events.push('slow');
    }, 'broadcast-with-fallback');
    dispatcher.add('inventory_updated', () => {
      events.push('fast');
    }, 'broadcast-with-fallback');

    const slow = dispatcher.dispatch(makeEnvelope({ type: 'sales_data_updated' }), 'broadcast');
    await dispatcher.dispatch(makeEnvelope({ type: 'inventory_updated' }), 'broadcast');
    releaseSlow();
    await slow;

    expect(events).toEqual(['fast', 'slow']);
  });

  it('waits for in-flight deliveries before removing a subscriber', async () => {
    const dispatcher = new TopicDispatcher(fakeLogger());
    const handled: string[] = [];
    const subscription = dispatcher.add('inventory_updated', async (envelope) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      handled.push(envelope.id);
    }, 'broadcast-with-fallback');

    const envelope = makeEnvelope();
    const delivered = dispatcher.dispatch(envelope, 'broadcast');

    expect(await dispatcher.remove(subscription)).toBe(true);
    expect(handled).toEqual([envelope.id]);
    expect(await delivered).toBe(1);
    expect(dispatcher.topics()).toEqual([]);
    expect(await dispatcher.remove(subscription)).toBe(false);
  });

  it('logs a failing handler with its topic', async () => {
    const log = fakeLogger();
    const dispatcher = new TopicDispatcher(log);
    dispatcher.add('inventory_updated', () => {
      throw new Error('boom');
    }, 'broadcast-with-fallback');

    const envelope = makeEnvelope();
    expect(await dispatcher.dispatch(envelope, 'broadcast')).toBe(0);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ topic: 'inventory_updated', envelope_id: envelope.id }),
      'Subscriber handler failed',
    );
  });
});

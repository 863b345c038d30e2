import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  AlertManager,
  PipelineStateMachine,
  ValidationOrchestrator,
  registerEventRoutes,
  stopServices,
} from '../../src/application/index.js';
import { InMemoryAlertRepository, InMemoryPipelineRepository } from '../../src/infrastructure/memory/index.js';
import { EventTransport } from '../../src/infrastructure/transport/index.js';
import { FakeBroadcastChannel, InProcessBus, fakeLogger, testSettings } from '../helpers.js';

const EXECUTIVE_ENDPOINT = 'http://executive.test/api/v1/events/receive';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('stopServices', () => {
  it('keeps routes until a retrying notice has raised its delivery alert', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const fetchMock = vi.fn(async () => {
      await gate;
      return { ok: false, status: 503 };
    });
    vi.stubGlobal('fetch', fetchMock);

    const log = fakeLogger();
    const transport = new EventTransport({
      channel: new FakeBroadcastChannel(new InProcessBus()),
      settings: testSettings({ fallbackEndpoints: { executive: [EXECUTIVE_ENDPOINT] } }),
      log,
    });
    const orchestrator = new ValidationOrchestrator({ transport, log, defaultTimeoutMs: 60_000, graceMs: 1_000 });
    const pipeline = new PipelineStateMachine({
      repository: new InMemoryPipelineRepository(),
      orchestrator,
      transport,
      log,
    });
    const alerts = new AlertManager({ repository: new InMemoryAlertRepository(), log });
    const unregisterRoutes = registerEventRoutes({ transport, orchestrator, alerts, log });
    await transport.start();

    const item = await pipeline.createPipelineItem({ title: 'Linen shirt', actor: 'alice' });
    await pipeline.advance(item.id, 'alice');
    await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledOnce());

    const stopping = stopServices({ pipeline, orchestrator, transport, unregisterRoutes, log });
    release();
    await stopping;

    const critical = await alerts.list({ severity: 'critical' });
    expect(critical).toHaveLength(1);
    expect(critical[0]?.title).toBe('Delivery Failed: product_pipeline_updated');
    expect(critical[0]?.message).toBe(
      `Envelope for executive could not be delivered on any path: no listener on test:executive; ${EXECUTIVE_ENDPOINT}: HTTP 503 after 2 attempt(s)`,
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('drains notices and the transport before removing routes', async () => {
    const calls: string[] = [];

    await stopServices({
      pipeline: {
        flushNotices: async () => {
          calls.push('flushNotices');
        },
      },
      transport: {
        stop: async () => {
          calls.push('transport.stop');
        },
      },
      unregisterRoutes: async () => {
        calls.push('unregisterRoutes');
      },
      orchestrator: {
        shutdown: () => {
          calls.push('orchestrator.shutdown');
        },
      },
      log: fakeLogger(),
    });

    expect(calls).toEqual(['flushNotices', 'transport.stop', 'unregisterRoutes', 'orchestrator.shutdown']);
  });
});

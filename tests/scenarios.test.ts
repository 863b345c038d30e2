import { describe, it, expect, vi, afterEach } from 'vitest';
import pino from 'pino';
import {
  AlertManager,
  PipelineStateMachine,
  ValidationOrchestrator,
  createEnvelope,
  registerEventRoutes,
} from '../src/application/index.js';
import { DeliveryFailedError, ValidationRejectedError } from '../src/domain/index.js';
import type { PipelineItem } from '../src/domain/index.js';
import { EventTransport } from '../src/infrastructure/transport/index.js';
import { InMemoryAlertRepository, InMemoryPipelineRepository } from '../src/infrastructure/memory/index.js';
import { FakeBroadcastChannel, InProcessBus, RecordingAudit, testSettings } from './helpers.js';

const FINANCE_ENDPOINT = 'http://finance.test/api/v1/events/receive';
const log = pino({ level: 'silent' });
const noop = (): void => undefined;

interface World {
  bus: InProcessBus;
  audit: RecordingAudit;
  design: EventTransport;
  finance: EventTransport;
  orchestrator: ValidationOrchestrator;
  pipeline: PipelineStateMachine;
  alerts: AlertManager;
  teardown: () => Promise<void>;
}

/**
 * Design module wired end to end, plus a finance peer on the same
 * in-process bus. Executive, operations and marketing are bare
 * listeners so stage notices reach someone.
 */
async function world(options: { timeoutMs?: number; financeAnswers?: boolean } = {}): Promise<World> {
  const bus = new InProcessBus();
  for (const peer of ['executive', 'operations', 'marketing']) bus.listen(`test:${peer}`, noop);

  const audit = new RecordingAudit();
  const design = new EventTransport({
    channel: new FakeBroadcastChannel(bus),
    settings: testSettings({ fallbackEndpoints: { finance: [FINANCE_ENDPOINT] } }),
    log,
    audit,
  });
  const finance = new EventTransport({
    channel: new FakeBroadcastChannel(bus),
    settings: testSettings({ moduleName: 'finance' }),
    log,
  });

  if (options.financeAnswers ?? true) {
    finance.subscribe('margin_check_request', async (request) => {
      await finance.publish({
        type: 'margin_check_response',
        targetModule: request.sourceModule,
        correlationId: request.correlationId,
        payload: { approved: true, summary: 'Margin 44%' },
      });
    });
  }

  const orchestrator = new ValidationOrchestrator({
    transport: design,
    log,
    defaultTimeoutMs: options.timeoutMs ?? 60_000,
    graceMs: 60_000,
  });
  const pipeline = new PipelineStateMachine({
    repository: new InMemoryPipelineRepository(),
    orchestrator,
    transport: design,
    log,
  });
  const alerts = new AlertManager({ repository: new InMemoryAlertRepository(), log });
  const unregister = registerEventRoutes({ transport: design, orchestrator, alerts, log });

  await design.start();
  await finance.start();

  return {
    bus,
    audit,
    design,
    finance,
    orchestrator,
    pipeline,
    alerts,
    teardown: async () => {
      await pipeline.flushNotices();
      await unregister();
      orchestrator.shutdown();
      await design.stop();
      await finance.stop();
    },
  };
}

async function itemAtSourcing(w: World): Promise<PipelineItem> {
  const item = await w.pipeline.createPipelineItem({ title: 'Linen shirt', category: 'apparel', actor: 'alice' });
  for (let i = 0; i < 3; i++) await w.pipeline.advance(item.id, 'alice');
  await w.pipeline.flushNotices();
  return w.pipeline.get(item.id);
}

describe('pipeline orchestration across modules', () => {
  let current: World | undefined;

  afterEach(async () => {
    vi.unstubAllGlobals();
    await current?.teardown();
    current = undefined;
  });

  it('advances an ungated item from discovery to ideation', async () => {
    current = await world();
    const item = await current.pipeline.createPipelineItem({ title: 'Linen shirt', actor: 'alice' });

    const advanced = await current.pipeline.advance(item.id, 'alice');

    expect(advanced.currentStage).toBe('ideation');
    expect(advanced.stageHistory).toHaveLength(2);
  });

  it('advances past sourcing once finance approves the margin check', async () => {
    current = await world();
    const w = current;
    const item = await itemAtSourcing(w);

    const { requested } = await w.pipeline.validate(item.id, 'margin_check');
    const correlationId = requested[0]?.correlationId ?? '';

    await expect(requested[0]?.outcome).resolves.toMatchObject({ state: 'approved', summary: 'Margin 44%' });
    await vi.waitFor(async () => {
      expect((await w.pipeline.get(item.id)).validations[0]?.state).toBe('approved');
    });

    expect(w.orchestrator.get(correlationId)?.state).toBe('approved');
    expect((await w.pipeline.advance(item.id, 'alice')).currentStage).toBe('sampling');
  });

  it('fails closed when finance never answers', async () => {
    current = await world({ timeoutMs: 30, financeAnswers: false });
    const w = current;
    const item = await itemAtSourcing(w);

    const { requested } = await w.pipeline.validate(item.id);
    const correlationId = requested[0]?.correlationId ?? '';

    await vi.waitFor(async () => {
      expect(await w.alerts.list({ severity: 'high' })).toHaveLength(1);
    });
    const [alert] = await w.alerts.list({ severity: 'high' });
    expect(alert?.title).toBe('Validation Timed Out: margin_check');
    expect(alert?.sourceEvent.correlationId).toBe(correlationId);
    expect(w.orchestrator.get(correlationId)?.state).toBe('timed_out');

    await vi.waitFor(async () => {
      expect((await w.pipeline.get(item.id)).blocked).toBe(true);
    });
    await expect(w.pipeline.advance(item.id, 'alice')).rejects.toBeInstanceOf(ValidationRejectedError);
    expect((await w.pipeline.get(item.id)).currentStage).toBe('sourcing');
  });

  it('falls back to direct delivery when the broadcast channel is down', async () => {
    current = await world({ financeAnswers: false });
    const w = current;
    const received: string[] = [];
    w.finance.subscribe('margin_check_request', async (envelope) => {
      received.push(envelope.id);
    });
    const item = await itemAtSourcing(w);

    vi.stubGlobal(
      'fetch',
      vi.fn(async (url: string, init: RequestInit) => {
        if (url !== FINANCE_ENDPOINT) return new Response(null, { status: 404 });
        const result = w.finance.receive(String(init.body), 'direct');
        return new Response(null, { status: result.status === 'malformed' ? 400 : 202 });
      }),
    );
    w.bus.reachable = false;

    const { requested } = await w.pipeline.validate(item.id);

    const request = w.audit.entries.find((e) => e.type === 'margin_check_request');
    expect(request).toMatchObject({ direction: 'outbound', path: 'fallback' });
    await vi.waitFor(() => {
      expect(received).toEqual([request?.envelopeId]);
    });
    expect(requested).toHaveLength(1);
    expect(await w.alerts.list()).toEqual([]);

    w.bus.reachable = true;
  });

  it('raises a critical alert when every delivery path fails', async () => {
    current = await world({ financeAnswers: false });
    const w = current;
    const item = await itemAtSourcing(w);

    vi.stubGlobal('fetch', vi.fn(async () => new Response(null, { status: 503 })));
    w.bus.reachable = false;

    await expect(w.pipeline.validate(item.id)).rejects.toBeInstanceOf(DeliveryFailedError);

    await vi.waitFor(async () => {
      expect(await w.alerts.list({ severity: 'critical' })).toHaveLength(1);
    });
    const [alert] = await w.alerts.list({ severity: 'critical' });
    expect(alert?.category).toBe('delivery');
    expect(alert?.title).toBe('Delivery Failed: margin_check_request');
    expect(alert?.message).toBe(
      `Envelope for finance could not be delivered on any path: broadcast: Connection is closed.; ${FINANCE_ENDPOINT}: HTTP 503 after 2 attempt(s)`,
    );
    expect(w.orchestrator.list()).toEqual([]);
    expect((await w.pipeline.get(item.id)).validations).toEqual([]);

    w.bus.reachable = true;
  });

  it('applies a duplicated verdict only once', async () => {
    current = await world({ financeAnswers: false });
    const w = current;
    const settled = vi.fn();
    w.orchestrator.onSettled(settled);
    const item = await itemAtSourcing(w);
    const { requested } = await w.pipeline.validate(item.id);

    const response = createEnvelope(
      {
        type: 'margin_check_response',
        targetModule: 'design',
        correlationId: requested[0]?.correlationId ?? null,
        payload: { approved: true },
      },
      'finance',
    );

    const first = w.design.receive(JSON.stringify(response), 'direct');
    const second = w.design.receive(JSON.stringify(response), 'direct');
    w.bus.deliver('test:design', JSON.stringify(response));
    await first.delivered;

    expect(first.status).toBe('accepted');
    expect(second.status).toBe('duplicate');
    await vi.waitFor(async () => {
      expect(await w.alerts.list({ category: 'validation' })).toHaveLength(1);
    });
    expect(settled).toHaveBeenCalledOnce();
    expect((await w.pipeline.get(item.id)).validations[0]?.state).toBe('approved');
  });
});

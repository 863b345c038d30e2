import pino from 'pino';
import type { Logger } from 'pino';
import {
  AlertManager,
  PipelineStateMachine,
  ValidationOrchestrator,
  registerEventRoutes,
  stopServices,
} from './application/index.js';
import type { AlertRepository, PipelineRepository } from './application/index.js';
import {
  DrizzleAlertRepository,
  DrizzleEventLog,
  DrizzlePipelineRepository,
  EventTransport,
  InMemoryAlertRepository,
  InMemoryPipelineRepository,
  RedisBroadcastChannel,
  createAlertNotifier,
  createDbClient,
  ensureSchema,
  loadNotificationConfig,
  loadSettings,
} from './infrastructure/index.js';
import type { EnvelopeAuditSink, Settings, SqlClient } from './infrastructure/index.js';
import { buildApp } from './interfaces/http/index.js';

interface Persistence {
  pipelines: PipelineRepository;
  alerts: AlertRepository;
  audit: EnvelopeAuditSink | undefined;
  checkDatabase: (() => Promise<boolean>) | undefined;
  sql: SqlClient | null;
}

async function openPersistence(settings: Settings, log: Logger): Promise<Persistence> {
  if (settings.persistence === 'memory') {
    log.warn('Persistence is in memory; pipeline items and alerts are lost on restart');
    return {
      pipelines: new InMemoryPipelineRepository(),
      alerts: new InMemoryAlertRepository(),
      audit: undefined,
      checkDatabase: undefined,
      sql: null,
    };
  }

  const { sql, db } = createDbClient(settings.databaseUrl, log.child({ component: 'db' }), {
    max: settings.databasePoolMax,
  });
  await ensureSchema(sql, log);

  return {
    pipelines: new DrizzlePipelineRepository(db),
    alerts: new DrizzleAlertRepository(db),
    audit: new DrizzleEventLog(db),
    checkDatabase: async () => {
      await sql`SELECT 1`;
      return true;
    },
    sql,
  };
}

/**
 * Bootstrap.
 *
 * Order:
 * 1) Settings + logger
 * 2) Persistence
 * 3) Transport + core services + event routes
 * 4) Re-arm validations left waiting by the previous run
 * 5) HTTP routes, listen()
 * 6) Shutdown hooks: HTTP, notices, transport, routes, orchestrator, DB pool
 */
async function main(): Promise<void> {
  const settings = loadSettings();
  const log = pino({ level: settings.logLevel });

  const persistence = await openPersistence(settings, log);

  const transport = new EventTransport({
    channel: new RedisBroadcastChannel(settings.redisUrl, log.child({ component: 'broadcast' })),
    settings: settings.transport,
    log: log.child({ component: 'transport' }),
    audit: persistence.audit,
  });

  const orchestrator = new ValidationOrchestrator({
    transport,
    log: log.child({ component: 'validation' }),
    defaultTimeoutMs: settings.validationTimeoutMs,
    graceMs: settings.validationGraceMs,
  });

  const pipeline = new PipelineStateMachine({
    repository: persistence.pipelines,
    orchestrator,
    transport,
    log: log.child({ component: 'pipeline' }),
  });

  const notifConfig = loadNotificationConfig();
  log.info({ slack: { enabled: notifConfig.slack.enabled, min_severity: notifConfig.slack.min_severity } }, 'Notification config loaded');

  const alerts = new AlertManager({
    repository: persistence.alerts,
    log: log.child({ component: 'alerts' }),
    notify: createAlertNotifier(notifConfig, log.child({ component: 'notifications' })),
  });

  const unregisterRoutes = registerEventRoutes({ transport, orchestrator, alerts, log });
  await transport.start();
  await pipeline.resumePendingValidations();

  const fastify = await buildApp(
    { pipeline, validations: orchestrator, alerts, transport, checkDatabase: persistence.checkDatabase },
    log,
  );

  // onClose MUST be registered before listen()
  fastify.addHook('onClose', async () => {
    await stopServices({ pipeline, orchestrator, transport, unregisterRoutes, log });
    if (persistence.sql) {
      await persistence.sql.end();
      log.info('Database disconnected');
    }
  });

  await fastify.listen({ host: settings.host, port: settings.port });

  let closing = false;
  const shutdown = (signal: string): void => {
    if (closing) return;
    closing = true;
    log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});

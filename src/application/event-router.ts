import type { Logger } from 'pino';
import type { EventEnvelope } from '../domain/index.js';
import { NOTICE_KINDS, RESPONSE_KINDS, SYNTHETIC_KINDS } from '../domain/index.js';
import type { AlertManager } from './alert-manager.js';
import { UNMATCHED_TOPIC } from './ports.js';
import type { EventSubscriber, Subscription } from './ports.js';
import type { ValidationOrchestrator } from './validation-orchestrator.js';

export interface EventRouterDeps {
  readonly transport: EventSubscriber;
  readonly orchestrator: ValidationOrchestrator;
  readonly alerts: AlertManager;
  readonly log: Logger;
}

/**
 * Wires inbound event kinds to the services that consume them.
 *
 * Verdicts carrying a correlation id go to the orchestrator first and
 * are then recorded as low-severity alerts. Notices, synthetic failure
 * signals and anything unrecognized become alerts. Returns a function
 * that removes every subscription it made.
 */
export function registerEventRoutes(deps: EventRouterDeps): () => Promise<void> {
  const { transport, orchestrator, alerts, log } = deps;
  const subscriptions: Subscription[] = [];

  const raise = async (envelope: EventEnvelope): Promise<void> => {
    await alerts.onEvent(envelope);
  };

  for (const kind of RESPONSE_KINDS) {
    subscriptions.push(
      transport.subscribe(kind, async (envelope) => {
        if (envelope.correlationId !== null) {
          const disposition = await orchestrator.onResponseEvent(envelope);
          log.debug({ envelope_id: envelope.id, type: envelope.type, disposition }, 'Verdict routed');
        }
        await raise(envelope);
      }),
    );
  }

  for (const kind of [...NOTICE_KINDS, ...SYNTHETIC_KINDS, UNMATCHED_TOPIC]) {
    subscriptions.push(transport.subscribe(kind, raise));
  }

  log.info({ topics: subscriptions.map((s) => s.topic) }, 'Event routes registered');

  return async () => {
    for (const subscription of subscriptions) {
      await transport.unsubscribe(subscription);
    }
  };
}

import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { AlertManager, PipelineStateMachine, ValidationOrchestrator } from '../../application/index.js';
import type { EventTransport } from '../../infrastructure/transport/index.js';

/** Core services the HTTP boundary calls into. */
export interface AppServices {
  pipeline: PipelineStateMachine;
  validations: ValidationOrchestrator;
  alerts: AlertManager;
  transport: EventTransport;
  /** Database reachability; absent when persistence is in memory. */
  checkDatabase?: (() => Promise<boolean>) | undefined;
}

/**
 * Decorates `fastify.services` so route plugins reach the application
 * layer without importing process-level singletons.
 */
async function servicesPlugin(fastify: FastifyInstance, services: AppServices): Promise<void> {
  fastify.decorate('services', services);
}

export default fp(servicesPlugin, {
  name: 'services',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}

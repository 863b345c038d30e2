import Fastify from 'fastify';
import type { FastifyInstance, RawServerDefault } from 'fastify';
import type { Logger } from 'pino';
import servicesPlugin from './services-plugin.js';
import type { AppServices } from './services-plugin.js';
import errorHandler from './error-handler.js';
import pipelineRoutes from './pipeline-routes.js';
import validationRoutes from './validation-routes.js';
import eventRoutes from './event-routes.js';
import alertRoutes from './alert-routes.js';
import healthRoutes from './health-routes.js';

/**
 * Builds the Fastify instance with every route registered, without
 * listening. Tests drive it through `inject`.
 */
export async function buildApp(services: AppServices, log: Logger): Promise<FastifyInstance> {
  const fastify = Fastify<RawServerDefault>({ loggerInstance: log });

  await fastify.register(servicesPlugin, services);
  await fastify.register(errorHandler);

  await fastify.register(pipelineRoutes);
  await fastify.register(validationRoutes);
  await fastify.register(eventRoutes);
  await fastify.register(alertRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}

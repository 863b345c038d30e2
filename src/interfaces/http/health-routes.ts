import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

type Probe = 'ok' | 'unreachable' | 'disabled';

async function probe(check: (() => Promise<boolean>) | undefined, onError: (err: unknown) => void): Promise<Probe> {
  if (!check) return 'disabled';
  try {
    return (await check()) ? 'ok' : 'unreachable';
  } catch (err: unknown) {
    onError(err);
    return 'unreachable';
  }
}

/**
 * GET /api/v1/health — transport state plus Redis and database
 * reachability. An unreachable broadcast channel only degrades the
 * service: publishing falls back to direct delivery.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  const { transport, checkDatabase } = fastify.services;

  fastify.get('/api/v1/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const redis = await probe(
      () => transport.isBroadcastReachable(),
      (err) => fastify.log.warn({ err }, 'Redis health check failed'),
    );
    const database = await probe(checkDatabase, (err) => fastify.log.warn({ err }, 'Database health check failed'));

    const running = transport.state === 'running';
    const healthy = running && redis === 'ok' && database !== 'unreachable';

    return reply.status(running && database !== 'unreachable' ? 200 : 503).send({
      status: healthy ? 'ok' : 'degraded',
      transport: transport.state,
      module: transport.moduleName,
      redis,
      database,
    });
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['services'],
  fastify: '5.x',
});

import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * Direct-delivery inbound endpoint.
 *
 * POST /api/v1/events/receive — other modules POST envelopes here when
 * the broadcast channel has no listener. Acknowledged with 202 once the
 * envelope is queued; handlers run afterwards.
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {
  const { transport } = fastify.services;

  fastify.post('/api/v1/events/receive', async (request: FastifyRequest, reply: FastifyReply) => {
    const result = transport.receive(request.body, 'direct');

    // Handlers run after the acknowledgment; their failures are logged.
    result.delivered.catch((err: unknown) => {
      request.log.error({ err, envelope_id: result.envelopeId }, 'Direct envelope dispatch failed');
    });

    if (result.status === 'malformed') {
      return reply.status(400).send({ error: 'Validation failed', status: result.status });
    }

    return reply.status(202).send({ status: result.status, envelope_id: result.envelopeId });
  });
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['services'],
  fastify: '5.x',
});

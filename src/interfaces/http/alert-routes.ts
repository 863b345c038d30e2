import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { alertQuerySchema, resolveAlertSchema } from '../../application/index.js';
import { UUID_RE } from './params.js';

type AlertParams = { Params: { id: string }; Body: unknown };

/**
 * Alert routes.
 *
 * GET  /api/v1/alerts              — list (?status&severity&category&limit&offset)
 * GET  /api/v1/alerts/:id          — get one
 * POST /api/v1/alerts/:id/resolve  — mark resolved
 */
async function alertRoutes(fastify: FastifyInstance): Promise<void> {
  const { alerts } = fastify.services;

  fastify.get('/api/v1/alerts', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = alertQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
    }

    const rows = await alerts.list(parsed.data);
    return reply.status(200).send(rows);
  });

  fastify.get('/api/v1/alerts/:id', async (request: FastifyRequest<AlertParams>, reply: FastifyReply) => {
    const { id } = request.params;
    if (!UUID_RE.test(id)) {
      return reply.status(400).send({ error: 'id must be a valid UUID' });
    }

    return reply.status(200).send(await alerts.get(id));
  });

  fastify.post('/api/v1/alerts/:id/resolve', async (request: FastifyRequest<AlertParams>, reply: FastifyReply) => {
    const { id } = request.params;
    if (!UUID_RE.test(id)) {
      return reply.status(400).send({ error: 'id must be a valid UUID' });
    }

    const parsed = resolveAlertSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
    }

    const alert = await alerts.resolve(id, parsed.data.resolved_by);
    return reply.status(200).send(alert);
  });
}

export default fp(alertRoutes, {
  name: 'alert-routes',
  dependencies: ['services', 'error-handler'],
  fastify: '5.x',
});

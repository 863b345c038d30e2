import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { validationQuerySchema, validationResponseSchema } from '../../application/index.js';
import { NotFoundError } from '../../domain/index.js';

type CorrelationParams = { Params: { correlationId: string }; Body: unknown };

/**
 * Pending validation routes.
 *
 * GET  /api/v1/validations                               — list (?state&pipeline_item_id)
 * GET  /api/v1/validations/:correlationId                — get one
 * POST /api/v1/validations/:correlationId/response       — submit a verdict over HTTP
 */
async function validationRoutes(fastify: FastifyInstance): Promise<void> {
  const { validations } = fastify.services;

  fastify.get('/api/v1/validations', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = validationQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
    }

    const { state, pipeline_item_id } = parsed.data;
    return reply.status(200).send(validations.list({
      ...(state !== undefined && { state }),
      ...(pipeline_item_id !== undefined && { pipelineItemId: pipeline_item_id }),
    }));
  });

  fastify.get('/api/v1/validations/:correlationId', async (request: FastifyRequest<CorrelationParams>, reply: FastifyReply) => {
    const { correlationId } = request.params;
    const record = validations.get(correlationId);
    if (!record) throw new NotFoundError('Validation', correlationId);

    return reply.status(200).send(record);
  });

  fastify.post(
    '/api/v1/validations/:correlationId/response',
    async (request: FastifyRequest<CorrelationParams>, reply: FastifyReply) => {
      const parsed = validationResponseSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const record = await validations.submitResponse(request.params.correlationId, {
        verdict: parsed.data.verdict,
        summary: parsed.data.summary,
        respondingModule: parsed.data.responding_module,
      });
      return reply.status(200).send(record);
    },
  );
}

export default fp(validationRoutes, {
  name: 'validation-routes',
  dependencies: ['services', 'error-handler'],
  fastify: '5.x',
});

import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  advanceSchema,
  cancelSchema,
  clearRejectionSchema,
  createPipelineItemSchema,
  pipelineQuerySchema,
  requestTypeParamSchema,
  validateSchema,
} from '../../application/index.js';
import { UUID_RE } from './params.js';

type ItemParams = { Params: { id: string }; Body: unknown };

/**
 * Pipeline item routes.
 *
 * POST /api/v1/pipeline-items                                      — create item
 * GET  /api/v1/pipeline-items                                      — list (?stage)
 * GET  /api/v1/pipeline-items/:id                                  — get item
 * POST /api/v1/pipeline-items/:id/advance                          — advance / override
 * POST /api/v1/pipeline-items/:id/validations                      — request validations
 * POST /api/v1/pipeline-items/:id/validations/:requestType/clear   — clear a rejection
 * POST /api/v1/pipeline-items/:id/cancel                           — cancel
 */
async function pipelineRoutes(fastify: FastifyInstance): Promise<void> {
  const { pipeline } = fastify.services;

  const invalidId = (id: string, reply: FastifyReply) =>
    UUID_RE.test(id) ? null : reply.status(400).send({ error: 'id must be a valid UUID' });

  fastify.post('/api/v1/pipeline-items', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = createPipelineItemSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
    }

    const item = await pipeline.createPipelineItem(parsed.data);
    return reply.status(201).send(item);
  });

  fastify.get('/api/v1/pipeline-items', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = pipelineQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
    }

    const items = await pipeline.list(parsed.data.stage !== undefined ? { stage: parsed.data.stage } : {});
    return reply.status(200).send(items);
  });

  fastify.get('/api/v1/pipeline-items/:id', async (request: FastifyRequest<ItemParams>, reply: FastifyReply) => {
    const { id } = request.params;
    const bad = invalidId(id, reply);
    if (bad) return bad;

    return reply.status(200).send(await pipeline.get(id));
  });

  fastify.post('/api/v1/pipeline-items/:id/advance', async (request: FastifyRequest<ItemParams>, reply: FastifyReply) => {
    const { id } = request.params;
    const bad = invalidId(id, reply);
    if (bad) return bad;

    const parsed = advanceSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
    }

    const { actor, expected_stage, override } = parsed.data;
    const item = await pipeline.advance(id, actor, {
      expectedStage: expected_stage,
      override: override ? { targetStage: override.target_stage, reason: override.reason } : undefined,
    });
    return reply.status(200).send(item);
  });

  fastify.post('/api/v1/pipeline-items/:id/validations', async (request: FastifyRequest<ItemParams>, reply: FastifyReply) => {
    const { id } = request.params;
    const bad = invalidId(id, reply);
    if (bad) return bad;

    const parsed = validateSchema.safeParse(request.body ?? undefined);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
    }

    const { item, requested } = await pipeline.validate(id, parsed.data.request_type);
    return reply.status(202).send({
      item,
      requested: requested.map(({ correlationId, deadline }) => ({ correlationId, deadline })),
    });
  });

  fastify.post(
    '/api/v1/pipeline-items/:id/validations/:requestType/clear',
    async (request: FastifyRequest<{ Params: { id: string; requestType: string }; Body: unknown }>, reply: FastifyReply) => {
      const { id, requestType } = request.params;
      const bad = invalidId(id, reply);
      if (bad) return bad;

      const type = requestTypeParamSchema.safeParse(requestType);
      if (!type.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: type.error.issues });
      }
      const parsed = clearRejectionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const item = await pipeline.clearRejection(id, type.data, parsed.data.actor);
      return reply.status(200).send(item);
    },
  );

  fastify.post('/api/v1/pipeline-items/:id/cancel', async (request: FastifyRequest<ItemParams>, reply: FastifyReply) => {
    const { id } = request.params;
    const bad = invalidId(id, reply);
    if (bad) return bad;

    const parsed = cancelSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
    }

    const item = await pipeline.cancel(id, parsed.data.actor, parsed.data.reason);
    return reply.status(200).send(item);
  });
}

export default fp(pipelineRoutes, {
  name: 'pipeline-routes',
  dependencies: ['services', 'error-handler'],
  fastify: '5.x',
});

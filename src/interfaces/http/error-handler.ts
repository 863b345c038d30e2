import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { OrchestratorError } from '../../domain/index.js';
import type { ErrorCode } from '../../domain/index.js';

const STATUS_BY_CODE: Readonly<Record<ErrorCode, number>> = {
  INVALID_TRANSITION: 409,
  TRANSITION_CONFLICT: 409,
  VALIDATION_REJECTED: 409,
  VALIDATION_TIMEOUT: 409,
  DELIVERY_FAILED: 502,
  NOT_FOUND: 404,
  ALREADY_RESOLVED: 409,
  TRANSPORT_STATE: 503,
};

export function httpStatusFor(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

/**
 * Maps the orchestrator error taxonomy onto HTTP statuses. Anything else
 * is logged and reported as a 500 without internals.
 */
async function errorHandler(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((err: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (err instanceof OrchestratorError) {
      const status = httpStatusFor(err.code);
      if (status >= 500) {
        request.log.warn({ err, code: err.code }, 'Request failed');
      }
      return reply.status(status).send({ error: err.message, code: err.code });
    }

    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }

    request.log.error({ err }, 'Unhandled request error');
    return reply.status(500).send({ error: 'Internal Server Error' });
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});

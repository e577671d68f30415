import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { CallerContext } from '../../application/index.js';
import { sendKnownError } from './error-response.js';

const invokeBodySchema = z.object({
  arguments: z.record(z.string(), z.unknown()).default({}),
});

/** First value of a caller-identity header, or null when absent or blank. */
function headerValue(request: FastifyRequest, name: string): string | null {
  const raw = request.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

/**
 * Gateway routes.
 *
 * GET  /api/v1/operations        — catalog of invocable operations
 * POST /api/v1/operations/:name  — invoke one operation
 *
 * Caller identity comes from `x-session-id`, `x-client-name` and
 * `x-client-version`. Every audited call is recorded by the dispatcher.
 */
async function operationRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/operations',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({ operations: fastify.dispatcher.list() });
    },
  );

  fastify.post(
    '/api/v1/operations/:name',
    async (
      request: FastifyRequest<{ Params: { name: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = invokeBodySchema.safeParse(request.body ?? {});

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const caller: CallerContext = {
        request_id: request.id,
        session_id: headerValue(request, 'x-session-id'),
        client_name: headerValue(request, 'x-client-name'),
        client_version: headerValue(request, 'x-client-version'),
      };

      try {
        const result = await fastify.dispatcher.invoke(
          request.params.name,
          parsed.data.arguments,
          caller,
        );
        return reply.status(200).send({ operation: request.params.name, result });
      } catch (err: unknown) {
        return sendKnownError(fastify, reply, err);
      }
    },
  );
}

export default fp(operationRoutes, {
  name: 'operation-routes',
  dependencies: ['gateway'],
  fastify: '5.x',
});

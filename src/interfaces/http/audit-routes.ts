import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  listRecentInvocations,
  searchInvocations,
  summarizeInvocations,
} from '../../application/index.js';
import { sendKnownError } from './error-response.js';

/**
 * Read-only audit log API.
 *
 * GET /api/v1/audit/recent       — most recent invocations
 * GET /api/v1/audit/invocations  — filtered invocation list
 * GET /api/v1/audit/summary      — totals, error rate, per-operation latency
 */
async function auditRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * GET /api/v1/audit/recent
   *
   * Query params: limit (default 50, max 1000)
   */
  fastify.get(
    '/api/v1/audit/recent',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      try {
        const result = await listRecentInvocations(fastify.auditStore, request.query);
        return reply.status(200).send(result);
      } catch (err: unknown) {
        return sendKnownError(fastify, reply, err);
      }
    },
  );

  /**
   * GET /api/v1/audit/invocations
   *
   * Query params: operation_name, session_id, client_name, since, until,
   * errors_only, limit (default 100, max 1000)
   */
  fastify.get(
    '/api/v1/audit/invocations',
    async (
      request: FastifyRequest<{
        Querystring: {
          operation_name?: string;
          session_id?: string;
          client_name?: string;
          since?: string;
          until?: string;
          errors_only?: string;
          limit?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      try {
        const result = await searchInvocations(fastify.auditStore, request.query);
        return reply.status(200).send(result);
      } catch (err: unknown) {
        return sendKnownError(fastify, reply, err);
      }
    },
  );

  /**
   * GET /api/v1/audit/summary
   */
  fastify.get(
    '/api/v1/audit/summary',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        const summary = await summarizeInvocations(fastify.auditStore);
        return reply.status(200).send(summary);
      } catch (err: unknown) {
        return sendKnownError(fastify, reply, err);
      }
    },
  );
}

export default fp(auditRoutes, {
  name: 'audit-routes',
  dependencies: ['db'],
  fastify: '5.x',
});

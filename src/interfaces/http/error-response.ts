import type { FastifyInstance, FastifyReply } from 'fastify';
import {
  AuditInitError,
  AuditReadError,
  QueryValidationError,
} from '../../domain/index.js';
import { OperationInputError, UnknownOperationError } from '../../application/index.js';
import { UpstreamError } from '../../infrastructure/upstream/index.js';

/**
 * Maps known failures to client-facing responses.
 *
 * Validation problems are 400s. Audit storage failures are 503 so the
 * caller can retry. Anything unrecognized is rethrown to Fastify's
 * default handler (500).
 */
export function sendKnownError(
  fastify: FastifyInstance,
  reply: FastifyReply,
  err: unknown,
): FastifyReply {
  if (err instanceof QueryValidationError) {
    return reply.status(400).send({ error: 'Invalid query parameters', issues: err.issues });
  }
  if (err instanceof OperationInputError) {
    return reply.status(400).send({ error: err.message, issues: err.issues });
  }
  if (err instanceof UnknownOperationError) {
    return reply.status(404).send({ error: err.message });
  }
  if (err instanceof UpstreamError) {
    fastify.log.warn({ status: err.status, path: err.path }, 'Upstream request failed');
    return reply.status(502).send({ error: err.message, upstream_status: err.status });
  }
  if (err instanceof AuditInitError || err instanceof AuditReadError) {
    fastify.log.error({ err }, 'Audit store unavailable');
    return reply.status(503).send({ error: err.message, code: err.code });
  }
  throw err;
}

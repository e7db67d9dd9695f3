/**
 * Request authentication
 *
 * Front ends share CORE_API_SECRET with the core API and send it as
 * x-core-api-secret. The acting identity travels in x-actor-id.
 */
import { timingSafeEqual } from 'crypto';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { logger } from 'ledger-core';
import { HttpError } from '../errors';

const OPEN_PATHS = new Set(['/health']);

function secretsMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function registerAuth(fastify: FastifyInstance, secret: string | undefined): void {
  if (!secret) return;

  fastify.addHook('onRequest', async (request, reply) => {
    const path = request.url.split('?')[0];
    if (OPEN_PATHS.has(path)) return;

    const provided = request.headers['x-core-api-secret'];
    if (typeof provided !== 'string' || !secretsMatch(provided, secret)) {
      logger.auth.unauthorized(path, 'missing or invalid x-core-api-secret');
      return reply.status(401).send({ success: false, error: 'Unauthorized' });
    }
  });
}

/** Identity the request acts as. Throws 401 when the header is absent. */
export function requireActor(request: FastifyRequest): string {
  const actor = request.headers['x-actor-id'];
  if (typeof actor !== 'string' || actor.trim() === '') {
    throw new HttpError(401, 'x-actor-id header required');
  }
  logger.api.request(request.method, request.url, actor.trim());
  return actor.trim();
}

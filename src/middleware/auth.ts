import { timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { apiError } from '../errors.js';

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** No-op when no key is configured. */
export function requireApiKey(expectedKey: string | undefined) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!expectedKey) return;

    const header = request.headers['x-api-key'];
    const apiKey = Array.isArray(header) ? header[0] : header;

    if (!apiKey || !sameKey(apiKey, expectedKey)) {
      return reply.code(401).send(apiError('Unauthorized', 'Valid X-API-Key header required', 'INVALID_API_KEY'));
    }
  };
}

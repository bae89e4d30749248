import type { FastifyReply } from 'fastify';
import type { z } from 'zod';
import { apiError } from '../errors.js';

export type RequestPart = 'body' | 'query' | 'params';

const MESSAGES: Record<RequestPart, string> = {
  body: 'Invalid request body',
  query: 'Invalid query parameters',
  params: 'Invalid path parameters',
};

/**
 * Parse one part of a request. On failure a 400 is sent and undefined is
 * returned, so handlers just return early.
 */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  part: RequestPart,
  reply: FastifyReply
): z.infer<S> | undefined {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  reply.code(400).send(apiError('Validation Error', MESSAGES[part], 'VALIDATION_ERROR', result.error.issues));
  return undefined;
}

import { pino } from 'pino';
import type { FastifyBaseLogger } from 'fastify';

// Same surface as `app.log`, so core modules accept either.
export type Logger = FastifyBaseLogger;

// Never log raw uploads or credentials
export const REDACT_PATHS = ['req.body', 'reply.body', 'text', 'identifiers', 'token', 'headers.authorization'];

export function createLogger(level = 'info'): Logger {
  return pino({
    level,
    redact: REDACT_PATHS,
  });
}

import type { FastifyReply, FastifyRequest } from 'fastify';
import { apiError } from '../errors.js';

interface TokenBucket {
  tokens: number;
  lastRefill: number;
}

export interface EnqueueLimitOptions {
  burst: number;
  sustainedPerMin: number;
  now?: () => number;
}

/**
 * Token bucket per caller for job submission. This limits how fast jobs are
 * created; lookups inside a job are paced separately.
 */
export class EnqueueRateLimiter {
  private buckets = new Map<string, TokenBucket>();
  private now: () => number;

  constructor(private options: EnqueueLimitOptions) {
    this.now = options.now ?? Date.now;
  }

  private getBucket(key: string): TokenBucket {
    const now = this.now();
    let bucket = this.buckets.get(key);

    if (!bucket) {
      bucket = { tokens: this.options.burst, lastRefill: now };
      this.buckets.set(key, bucket);
    }

    const minutesPassed = (now - bucket.lastRefill) / 60000;
    const tokensToAdd = Math.floor(minutesPassed * this.options.sustainedPerMin);

    if (tokensToAdd > 0) {
      bucket.tokens = Math.min(this.options.burst, bucket.tokens + tokensToAdd);
      bucket.lastRefill = now;
    }

    return bucket;
  }

  tryConsume(key: string): { allowed: boolean; retryAfter?: number; remaining: number } {
    const bucket = this.getBucket(key);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, remaining: bucket.tokens };
    }

    return { allowed: false, retryAfter: Math.ceil(60 / this.options.sustainedPerMin), remaining: 0 };
  }

  get limit(): number {
    return this.options.burst;
  }
}

export function callerKey(request: FastifyRequest): string {
  const header = request.headers['x-api-key'];
  const apiKey = Array.isArray(header) ? header[0] : header;
  return apiKey ? `key:${apiKey.slice(0, 8)}` : `ip:${request.ip}`;
}

export function enqueueRateLimit(limiter: EnqueueRateLimiter | null) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!limiter) return;

    const result = limiter.tryConsume(callerKey(request));

    reply.header('X-RateLimit-Limit', String(limiter.limit));
    reply.header('X-RateLimit-Remaining', String(result.remaining));

    if (!result.allowed) {
      reply.header('Retry-After', String(result.retryAfter ?? 1));
      return reply.code(429).send({
        ...apiError('Too Many Requests', 'Rate limit exceeded', 'RATE_LIMIT_EXCEEDED'),
        retryAfter: result.retryAfter,
      });
    }
  };
}

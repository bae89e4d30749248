import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter } from './concurrency.js';
import { CancelledError } from '../errors.js';

describe('ConcurrencyLimiter', () => {
  it('should reject an invalid maximum', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
    expect(() => new ConcurrencyLimiter(1.5)).toThrow(RangeError);
  });

  it('should grant slots up to the maximum', async () => {
    const limiter = new ConcurrencyLimiter(2);

    await limiter.acquire();
    await limiter.acquire();

    expect(limiter.running).toBe(2);
    expect(limiter.queued).toBe(0);
  });

  it('should queue beyond the maximum and serve waiters in order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: string[] = [];

    await limiter.acquire();
    const first = limiter.acquire().then(() => order.push('first'));
    const second = limiter.acquire().then(() => order.push('second'));
    expect(limiter.queued).toBe(2);

    limiter.release();
    await first;
    expect(order).toEqual(['first']);
    expect(limiter.running).toBe(1);

    limiter.release();
    await second;
    expect(order).toEqual(['first', 'second']);

    limiter.release();
    expect(limiter.running).toBe(0);
  });

  it('should drop an aborted waiter from the queue', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const controller = new AbortController();

    await limiter.acquire();
    const waiting = limiter.acquire(controller.signal);
    expect(limiter.queued).toBe(1);

    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
    expect(limiter.queued).toBe(0);

    limiter.release();
    expect(limiter.running).toBe(0);
  });

  it('should refuse an already aborted caller', async () => {
    const limiter = new ConcurrencyLimiter(3);
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(limiter.running).toBe(0);
  });
});

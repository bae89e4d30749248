import { CancelledError, errorMessage } from '../errors.js';
import { sleep as defaultSleep, type Sleep } from './sleep.js';

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
}

export interface RetryOptions extends RetryPolicy {
  sleep?: Sleep;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export type RetryOutcome<T> =
  | { status: 'success'; value: T; attempts: number }
  | { status: 'exhausted'; reason: string; attempts: number; lastError: unknown };

/** Linear backoff: 1x, 2x, 3x ... the base delay after each failed attempt. */
export function backoffDelay(failedAttempts: number, baseDelayMs: number): number {
  return failedAttempts * baseDelayMs;
}

/**
 * Run `task` until it succeeds or `maxRetries` retries have failed, so at
 * most `maxRetries + 1` attempts. Cancellation is not a task failure: an
 * aborted signal ends the loop with CancelledError.
 */
export async function runWithRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const wait = options.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    if (options.signal?.aborted) throw new CancelledError();

    try {
      const value = await task(attempt);
      return { status: 'success', value, attempts: attempt + 1 };
    } catch (error) {
      if (error instanceof CancelledError || options.signal?.aborted) {
        throw error instanceof CancelledError ? error : new CancelledError();
      }
      lastError = error;
    }

    if (attempt < options.maxRetries) {
      const delayMs = backoffDelay(attempt + 1, options.baseDelayMs);
      options.onRetry?.({ attempt: attempt + 1, delayMs, error: lastError });
      await wait(delayMs, options.signal);
    }
  }

  return {
    status: 'exhausted',
    reason: `${errorMessage(lastError)} (after ${options.maxRetries} retries)`,
    attempts: options.maxRetries + 1,
    lastError,
  };
}

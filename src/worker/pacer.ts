import { sleep as defaultSleep, type Sleep } from './sleep.js';

/**
 * Fixed spacing between consecutive lookups of one job. The wait does not
 * subtract the time the previous lookup took, so the effective rate can
 * only fall below `requestsPerMinute`.
 */
export class RequestPacer {
  readonly intervalMs: number;
  private steps = 0;

  constructor(requestsPerMinute: number, private wait: Sleep = defaultSleep) {
    if (!(requestsPerMinute > 0)) {
      throw new RangeError('requestsPerMinute must be positive');
    }
    this.intervalMs = 60000 / requestsPerMinute;
  }

  /** Call before each step; returns immediately for the first one. */
  async pace(signal?: AbortSignal): Promise<void> {
    const first = this.steps === 0;
    this.steps++;
    if (first) return;
    await this.wait(this.intervalMs, signal);
  }
}

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { ExtractionOrchestrator, type OrchestratorConfig } from './orchestrator.js';
import { ConcurrencyLimiter } from './concurrency.js';
import { InMemoryExtractionRepository } from '../repositories/memory.js';
import { createLogger } from '../lib/logger.js';
import { DataSourceInitError, JobStateError, LookupError } from '../errors.js';
import type { CarrierDataSource, LookupOptions } from '../sources/base.js';
import type { CarrierRecord, EnrichedCarrier, RawCarrierRecord } from '../types/carrier.js';
import type { ExtractionJob } from '../types/job.js';

type Script = (mcNumber: string, attempt: number, options: LookupOptions) => Promise<RawCarrierRecord>;

/** Data source driven by a per-test script; counts attempts per MC number. */
class ScriptedSource implements CarrierDataSource {
  readonly name = 'scripted';
  attempts = new Map<string, number>();
  opened = 0;
  closed = 0;

  constructor(private script: Script, private failOpen = false) {}

  async open(): Promise<void> {
    this.opened++;
    if (this.failOpen) throw new DataSourceInitError('no credentials');
  }

  async close(): Promise<void> {
    this.closed++;
  }

  async lookup(mcNumber: string, options: LookupOptions): Promise<RawCarrierRecord> {
    const attempt = this.attempts.get(mcNumber) ?? 0;
    this.attempts.set(mcNumber, attempt + 1);
    return this.script(mcNumber, attempt, options);
  }
}

/** Store whose first write of one MC number fails. */
class FlakyStore extends InMemoryExtractionRepository {
  private failed = false;

  constructor(private failOn: string) {
    super();
  }

  override async saveRecord(jobId: string, record: EnrichedCarrier): Promise<CarrierRecord> {
    if (record.mcNumber === this.failOn && !this.failed) {
      this.failed = true;
      throw new Error('store hiccup');
    }
    return super.saveRecord(jobId, record);
  }
}

const found: Script = async (mcNumber) => ({
  mcNumber,
  companyName: `Carrier ${mcNumber}`,
  authorityStatus: 'Active',
  violations12mo: 0,
  accidents12mo: 0,
});

const CONFIG: OrchestratorConfig = {
  requestsPerMinute: 600,
  maxRetries: 3,
  retryBaseDelayMs: 2000,
  requestTimeoutMs: 1000,
  maxConcurrentJobs: 2,
};

async function waitForStatus(repo: InMemoryExtractionRepository, jobId: string, status: ExtractionJob['status']) {
  for (let attempts = 0; attempts < 100; attempts++) {
    const job = await repo.getJob(jobId);
    if (job?.status === status) return job;
    await new Promise(resolve => setTimeout(resolve, 10));
  }
  throw new Error(`Job ${jobId} never reached ${status}`);
}

describe('ExtractionOrchestrator', () => {
  let repo: InMemoryExtractionRepository;
  let sleep: Mock<[number, AbortSignal?], Promise<void>>;
  let orchestrator: ExtractionOrchestrator;
  let source: ScriptedSource;

  function build(script: Script, options: { failOpen?: boolean; config?: Partial<OrchestratorConfig> } = {}) {
    source = new ScriptedSource(script, options.failOpen);
    orchestrator = new ExtractionOrchestrator({
      repo,
      createDataSource: () => source,
      config: { ...CONFIG, ...options.config },
      logger: createLogger('silent'),
      sleep,
      clock: () => new Date('2026-05-01T00:00:00.000Z'),
    });
    return orchestrator;
  }

  beforeEach(() => {
    repo = new InMemoryExtractionRepository();
    sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  });

  afterEach(async () => {
    await orchestrator?.stop(100);
  });

  describe('run', () => {
    it('should complete a job with one permanently failing identifier', async () => {
      build(async (mcNumber, attempt, options) => {
        if (mcNumber === '222') throw new LookupError('not_found', `MC ${mcNumber} not found`);
        return found(mcNumber, attempt, options);
      });

      const job = await orchestrator.run('job_e', ['111', '222', '333']);

      expect(job).toMatchObject({ total: 3, processedCount: 2, failedCount: 1, status: 'completed' });
      expect(job.completedAt).toBeInstanceOf(Date);
      expect(job.errorMessage).toBeNull();

      const failures = await repo.getFailures('job_e');
      expect(failures).toHaveLength(1);
      expect(failures[0]).toMatchObject({
        jobId: 'job_e',
        mcNumber: '222',
        errorReason: 'MC 222 not found (after 3 retries)',
        retryCount: 3,
      });

      const records = await repo.getRecords('job_e');
      expect(records.map(r => r.mcNumber)).toEqual(['111', '333']);
      expect(records[0]).toMatchObject({ jobId: 'job_e', safetyScore: 10, riskLevel: 'Low' });
    });

    it('should attempt a failing identifier at most maxRetries + 1 times', async () => {
      build(async () => {
        throw new LookupError('timeout', 'Timeout after 1000ms');
      });

      await orchestrator.run('job_retry', ['42']);

      expect(source.attempts.get('42')).toBe(4);
      // pacer never waits for a single item; only the three backoff waits remain
      expect(sleep.mock.calls.map(call => call[0])).toEqual([2000, 4000, 6000]);
    });

    it('should pace every lookup after the first', async () => {
      build(found, { config: { requestsPerMinute: 30 } });

      await orchestrator.run('job_paced', ['1', '2', '3']);

      expect(sleep.mock.calls.map(call => call[0])).toEqual([2000, 2000]);
    });

    it('should recover when a retry succeeds', async () => {
      build(async (mcNumber, attempt, options) => {
        if (attempt === 0) throw new LookupError('upstream', 'Carrier API request failed: 502 Bad Gateway');
        return found(mcNumber, attempt, options);
      });

      const job = await orchestrator.run('job_flaky', ['7']);

      expect(job).toMatchObject({ status: 'completed', processedCount: 1, failedCount: 0 });
      expect(source.attempts.get('7')).toBe(2);
      expect(await repo.getFailures('job_flaky')).toEqual([]);
    });

    it('should record a record without an MC number as a failure', async () => {
      build(async () => ({ companyName: 'Nameless' }), { config: { maxRetries: 1 } });

      const job = await orchestrator.run('job_invalid', ['5']);

      expect(job).toMatchObject({ status: 'completed', processedCount: 0, failedCount: 1 });
      const failures = await repo.getFailures('job_invalid');
      expect(failures[0]?.errorReason).toBe('Invalid carrier data returned (after 1 retries)');
    });

    it('should keep records in input order', async () => {
      build(found);

      await orchestrator.run('job_order', ['9', '3', '5', '1']);

      const records = await repo.getRecords('job_order');
      expect(records.map(r => r.mcNumber)).toEqual(['9', '3', '5', '1']);
    });

    it('should fail the job when the source cannot open', async () => {
      build(found, { failOpen: true });

      const job = await orchestrator.run('job_init', ['1', '2']);

      expect(job).toMatchObject({
        status: 'failed',
        processedCount: 0,
        failedCount: 0,
        errorMessage: 'no credentials',
      });
      expect(source.closed).toBe(1);
      expect(orchestrator.limiter.running).toBe(0);
      expect(orchestrator.getStats().failed).toBe(1);
    });

    it('should complete an empty job immediately', async () => {
      build(found);

      const job = await orchestrator.run('job_empty', []);

      expect(job).toMatchObject({ status: 'completed', total: 0, processedCount: 0, failedCount: 0 });
    });

    it('should retry an identifier whose record could not be stored', async () => {
      repo = new FlakyStore('222');
      build(found);

      const job = await orchestrator.run('job_store', ['111', '222', '333']);

      expect(job).toMatchObject({ status: 'completed', processedCount: 3, failedCount: 0, errorMessage: null });
      expect(source.attempts.get('222')).toBe(2);
      expect(source.attempts.get('333')).toBe(1);
      const records = await repo.getRecords('job_store');
      expect(records.map(r => r.mcNumber)).toEqual(['111', '222', '333']);
      expect(sleep.mock.calls.map(call => call[0])).toEqual([100, 2000, 100]);
    });

    it('should refuse a job id that already exists', async () => {
      build(found);
      await orchestrator.run('job_dup', ['1']);

      await expect(orchestrator.run('job_dup', ['1'])).rejects.toBeInstanceOf(JobStateError);
    });

    it('should end as cancelled when the signal aborts mid-job', async () => {
      const controller = new AbortController();
      build(async (mcNumber, attempt, options) => {
        if (mcNumber === '2') controller.abort();
        return found(mcNumber, attempt, options);
      });

      const job = await orchestrator.run('job_cancel', ['1', '2', '3'], controller.signal);

      expect(job.status).toBe('cancelled');
      expect(job.completedAt).toBeInstanceOf(Date);
      expect(job.processedCount + job.failedCount).toBeLessThan(3);
      expect(source.attempts.has('3')).toBe(false);
      expect(orchestrator.getStats().cancelled).toBe(1);
    });
  });

  describe('start and cancel', () => {
    it('should run a started job in the background', async () => {
      build(found);

      orchestrator.start('job_bg', ['1', '2']);
      expect(orchestrator.registry.has('job_bg')).toBe(true);

      const job = await waitForStatus(repo, 'job_bg', 'completed');
      expect(job.processedCount).toBe(2);
      await orchestrator.registry.drain(100);
      expect(orchestrator.registry.has('job_bg')).toBe(false);
    });

    it('should refuse to start the same job twice', () => {
      build(async () => new Promise<RawCarrierRecord>(() => {}));

      orchestrator.start('job_twice', ['1']);
      expect(() => orchestrator.start('job_twice', ['1'])).toThrow(JobStateError);
    });

    it('should cancel a job waiting in a lookup', async () => {
      build(async (_mcNumber, _attempt, options) => new Promise<RawCarrierRecord>((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }));

      orchestrator.start('job_wait', ['1', '2']);
      await vi.waitFor(() => expect(source.attempts.get('1')).toBe(1));

      expect(orchestrator.cancel('job_wait')).toBe(true);

      const job = await waitForStatus(repo, 'job_wait', 'cancelled');
      expect(job.processedCount).toBe(0);
      expect(job.failedCount).toBe(0);
      expect(await repo.getFailures('job_wait')).toEqual([]);
    });

    it('should return false when cancelling an unknown job', () => {
      build(found);
      expect(orchestrator.cancel('job_nope')).toBe(false);
    });

    it('should queue jobs beyond the concurrency limit', async () => {
      const release: Array<() => void> = [];
      source = new ScriptedSource(async (mcNumber) => {
        await new Promise<void>(resolve => release.push(resolve));
        return { mcNumber, companyName: 'Queued Co' };
      });
      orchestrator = new ExtractionOrchestrator({
        repo,
        createDataSource: () => source,
        config: CONFIG,
        logger: createLogger('silent'),
        sleep,
        limiter: new ConcurrencyLimiter(1),
      });

      orchestrator.start('job_first', ['1']);
      orchestrator.start('job_second', ['2']);

      await vi.waitFor(() => expect(orchestrator.getStats()).toMatchObject({ running: 1, queued: 1 }));
      const queuedJob = await repo.getJob('job_second');
      expect(queuedJob).toMatchObject({ status: 'processing', processedCount: 0 });

      release.shift()?.();
      await waitForStatus(repo, 'job_first', 'completed');
      await vi.waitFor(() => expect(release).toHaveLength(1));
      release.shift()?.();
      await waitForStatus(repo, 'job_second', 'completed');
    });

    it('should cancel running jobs on stop', async () => {
      build(async (_mcNumber, _attempt, options) => new Promise<RawCarrierRecord>((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }));

      orchestrator.start('job_stop', ['1']);
      await vi.waitFor(() => expect(source.attempts.get('1')).toBe(1));
      await orchestrator.stop(500);

      expect((await repo.getJob('job_stop'))?.status).toBe('cancelled');
    });
  });
});

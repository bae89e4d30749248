import { CancelledError, JobStateError, LookupError, errorMessage } from '../errors.js';
import { enrich, validateRawRecord } from '../lib/enrichment.js';
import type { Logger } from '../lib/logger.js';
import type { ExtractionRepository } from '../repositories/base.js';
import type { CarrierDataSource, CarrierDataSourceFactory } from '../sources/base.js';
import type { CarrierRecord } from '../types/carrier.js';
import type { ExtractionJob } from '../types/job.js';
import { ConcurrencyLimiter } from './concurrency.js';
import { RequestPacer } from './pacer.js';
import { JobRegistry } from './registry.js';
import { runWithRetry } from './retry.js';
import { sleep as defaultSleep, type Sleep } from './sleep.js';

export interface OrchestratorConfig {
  requestsPerMinute: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  requestTimeoutMs: number;
  maxConcurrentJobs: number;
}

export interface OrchestratorDeps {
  repo: ExtractionRepository;
  createDataSource: CarrierDataSourceFactory;
  config: OrchestratorConfig;
  logger: Logger;
  registry?: JobRegistry;
  limiter?: ConcurrencyLimiter;
  sleep?: Sleep;
  clock?: () => Date;
}

export interface OrchestratorStats {
  running: number;
  queued: number;
  completed: number;
  failed: number;
  cancelled: number;
}

/**
 * Drives one extraction job per task: every identifier goes through the
 * pacer, then the retry policy around lookup, validation, enrichment and
 * persistence. Item failures are recorded and never abort the job.
 */
export class ExtractionOrchestrator {
  readonly registry: JobRegistry;
  readonly limiter: ConcurrencyLimiter;
  private repo: ExtractionRepository;
  private createDataSource: CarrierDataSourceFactory;
  private config: OrchestratorConfig;
  private logger: Logger;
  private sleep: Sleep;
  private clock: () => Date;
  private stats = { completed: 0, failed: 0, cancelled: 0 };

  constructor(deps: OrchestratorDeps) {
    this.repo = deps.repo;
    this.createDataSource = deps.createDataSource;
    this.config = deps.config;
    this.logger = deps.logger;
    this.registry = deps.registry ?? new JobRegistry();
    this.limiter = deps.limiter ?? new ConcurrencyLimiter(deps.config.maxConcurrentJobs);
    this.sleep = deps.sleep ?? defaultSleep;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Fire-and-forget: progress is only observable through the repository. */
  start(jobId: string, identifiers: readonly string[]): void {
    if (this.registry.has(jobId)) {
      throw new JobStateError(`Job ${jobId} is already running`);
    }

    const controller = new AbortController();
    const task = this.run(jobId, identifiers, controller.signal)
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error({ jobId, err: error }, 'Extraction job ended with an unrecorded error');
        }
      )
      .finally(() => {
        this.registry.remove(jobId);
      });

    this.registry.register({ jobId, controller, task, startedAt: this.clock() });
  }

  cancel(jobId: string): boolean {
    return this.registry.cancel(jobId);
  }

  getStats(): OrchestratorStats {
    return {
      running: this.limiter.running,
      queued: this.limiter.queued,
      ...this.stats,
    };
  }

  /** Cancel everything still running and wait up to `gracePeriodMs` for it to settle. */
  async stop(gracePeriodMs = 5000): Promise<void> {
    this.registry.cancelAll();
    const drained = await this.registry.drain(gracePeriodMs);
    if (!drained) {
      this.logger.warn({ running: this.registry.ids() }, 'Jobs still running after grace period');
    }
  }

  async run(jobId: string, identifiers: readonly string[], signal?: AbortSignal): Promise<ExtractionJob> {
    const log = this.logger.child({ jobId });
    log.info({ total: identifiers.length }, 'Starting extraction job');

    await this.repo.createJob(jobId, identifiers.length);

    let slotHeld = false;
    let source: CarrierDataSource | null = null;
    const counts = { processed: 0, failed: 0 };

    try {
      await this.limiter.acquire(signal);
      slotHeld = true;

      source = this.createDataSource();
      await source.open();

      const pacer = new RequestPacer(this.config.requestsPerMinute, this.sleep);

      for (const mcNumber of identifiers) {
        if (signal?.aborted) throw new CancelledError();
        await pacer.pace(signal);

        const outcome = await this.processIdentifier(source, jobId, mcNumber, signal, log);
        counts[outcome]++;

        await this.repo.updateJob(jobId, {
          status: 'processing',
          processed: counts.processed,
          failed: counts.failed,
        });
      }

      const job = await this.finish(jobId, { status: 'completed', ...counts });
      this.stats.completed++;
      log.info({ processed: counts.processed, failed: counts.failed }, 'Extraction job completed');
      return job;
    } catch (error) {
      if (error instanceof CancelledError) {
        this.stats.cancelled++;
        log.warn({ processed: counts.processed, failed: counts.failed }, 'Extraction job cancelled');
        return this.finish(jobId, { status: 'cancelled', ...counts });
      }

      this.stats.failed++;
      const message = errorMessage(error);
      log.error({ err: error }, 'Extraction job failed');
      return this.finish(jobId, { status: 'failed', ...counts, errorMessage: message });
    } finally {
      if (source) {
        await source.close().catch((error: unknown) => {
          log.warn({ err: error }, 'Failed to close carrier data source');
        });
      }
      if (slotHeld) this.limiter.release();
    }
  }

  private async processIdentifier(
    source: CarrierDataSource,
    jobId: string,
    mcNumber: string,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<'processed' | 'failed'> {
    const outcome = await runWithRetry<CarrierRecord>(
      async () => {
        const raw = await source.lookup(mcNumber, {
          timeoutMs: this.config.requestTimeoutMs,
          signal,
        });
        if (!validateRawRecord(raw, log)) {
          throw new LookupError('invalid_record', 'Invalid carrier data returned');
        }
        return this.repo.saveRecord(jobId, enrich(raw, this.clock()));
      },
      {
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
        sleep: this.sleep,
        signal,
        onRetry: ({ attempt, delayMs, error }) => {
          log.warn(
            { mcNumber, attempt, maxRetries: this.config.maxRetries, delayMs, reason: errorMessage(error) },
            'Retrying MC number'
          );
        },
      }
    );

    if (outcome.status === 'success') {
      log.info({ mcNumber, attempts: outcome.attempts }, 'Extracted MC number');
      return 'processed';
    }

    await this.repo.saveFailure(jobId, mcNumber, outcome.reason, this.config.maxRetries);
    log.error({ mcNumber, reason: outcome.reason }, 'Failed to extract MC number');
    return 'failed';
  }

  private async finish(
    jobId: string,
    final: { status: 'completed' | 'failed' | 'cancelled'; processed: number; failed: number; errorMessage?: string }
  ): Promise<ExtractionJob> {
    const job = await this.repo.updateJob(jobId, final);
    if (!job) {
      throw new Error(`Job ${jobId} disappeared before it could be finalized`);
    }
    return job;
  }
}

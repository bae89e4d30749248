import { z } from 'zod';
import { JobStateError } from '../errors.js';
import { StoredFailureSchema, StoredJobSchema, StoredRecordSchema } from '../schemas/stored.js';
import type { ExtractionJob, JobStats, JobUpdate } from '../types/job.js';
import type { CarrierRecord, EnrichedCarrier, FailedExtraction } from '../types/carrier.js';
import type { ExtractionRepository } from './base.js';
import { applyJobUpdate, newJob } from './transitions.js';

const UpstashResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z.string().optional(),
});

const StringList = z.array(z.string());
const NullableStringList = z.array(z.string().nullable());

/**
 * Repository backed by Upstash Redis over its REST API. Each write is a
 * single command, so writes from different jobs never interleave on a key.
 */
export class RedisExtractionRepository implements ExtractionRepository {
  private baseUrl: string;
  private token: string;

  constructor(url: string, token: string, private prefix = 'extraction') {
    this.baseUrl = url.replace(/\/$/, '');
    this.token = token;
  }

  private async redis(command: string[]): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}/`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.token}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(command),
    });

    if (!response.ok) {
      throw new Error(`Redis request failed: ${response.status} ${response.statusText}`);
    }

    const data = UpstashResponseSchema.parse(await response.json());
    if (data.error) {
      throw new Error(`Redis error: ${data.error}`);
    }

    return data.result ?? null;
  }

  private jobKey(jobId: string): string {
    return `${this.prefix}:job:${jobId}`;
  }

  private recordsKey(jobId: string): string {
    return `${this.prefix}:job:${jobId}:records`;
  }

  private failuresKey(jobId: string): string {
    return `${this.prefix}:job:${jobId}:failures`;
  }

  private indexKey(): string {
    return `${this.prefix}:jobs`;
  }

  private serializeJob(job: ExtractionJob): string {
    return JSON.stringify({
      ...job,
      createdAt: job.createdAt.toISOString(),
      completedAt: job.completedAt?.toISOString() ?? null,
    });
  }

  private deserializeJob(data: string): ExtractionJob {
    return StoredJobSchema.parse(JSON.parse(data));
  }

  async createJob(jobId: string, total: number): Promise<ExtractionJob> {
    const job = newJob(jobId, total, new Date());

    const created = await this.redis(['SET', this.jobKey(jobId), this.serializeJob(job), 'NX']);
    if (created !== 'OK') {
      throw new JobStateError(`Job ${jobId} already exists`);
    }

    await this.redis(['ZADD', this.indexKey(), job.createdAt.getTime().toString(), jobId]);
    return job;
  }

  async getJob(jobId: string): Promise<ExtractionJob | null> {
    const data = z.string().nullable().parse(await this.redis(['GET', this.jobKey(jobId)]));
    return data ? this.deserializeJob(data) : null;
  }

  async updateJob(jobId: string, update: JobUpdate): Promise<ExtractionJob | null> {
    const existing = await this.getJob(jobId);
    if (!existing) return null;

    const updated = applyJobUpdate(existing, update, new Date());
    await this.redis(['SET', this.jobKey(jobId), this.serializeJob(updated)]);
    return updated;
  }

  async listJobs(options: { limit?: number } = {}): Promise<ExtractionJob[]> {
    const limit = options.limit ?? 100;
    const ids = StringList.parse(await this.redis(['ZREVRANGE', this.indexKey(), '0', String(limit - 1)]));
    return this.loadJobs(ids);
  }

  private async loadJobs(ids: string[]): Promise<ExtractionJob[]> {
    if (ids.length === 0) return [];

    const rows = NullableStringList.parse(await this.redis(['MGET', ...ids.map(id => this.jobKey(id))]));
    return rows
      .filter((row): row is string => row !== null)
      .map(row => this.deserializeJob(row));
  }

  async saveRecord(jobId: string, record: EnrichedCarrier): Promise<CarrierRecord> {
    const stored: CarrierRecord = { ...record, jobId };
    await this.redis(['RPUSH', this.recordsKey(jobId), JSON.stringify(stored)]);
    return stored;
  }

  async getRecords(jobId: string): Promise<CarrierRecord[]> {
    const rows = StringList.parse(await this.redis(['LRANGE', this.recordsKey(jobId), '0', '-1']));
    return rows.map(row => StoredRecordSchema.parse(JSON.parse(row)));
  }

  async saveFailure(jobId: string, mcNumber: string, reason: string, retryCount: number): Promise<FailedExtraction> {
    const failure: FailedExtraction = {
      jobId,
      mcNumber,
      errorReason: reason,
      retryCount,
      failedAt: new Date(),
    };
    await this.redis(['RPUSH', this.failuresKey(jobId), JSON.stringify(failure)]);
    return failure;
  }

  async getFailures(jobId: string): Promise<FailedExtraction[]> {
    const rows = StringList.parse(await this.redis(['LRANGE', this.failuresKey(jobId), '0', '-1']));
    return rows.map(row => StoredFailureSchema.parse(JSON.parse(row)));
  }

  async getStats(): Promise<JobStats> {
    // Full scan of the index; fine for the job volumes this service sees
    const ids = StringList.parse(await this.redis(['ZRANGE', this.indexKey(), '0', '-1']));
    const jobs = await this.loadJobs(ids);

    const stats: JobStats = { processing: 0, completed: 0, failed: 0, cancelled: 0 };
    for (const job of jobs) {
      stats[job.status]++;
    }
    return stats;
  }
}

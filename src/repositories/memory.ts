import { JobStateError } from '../errors.js';
import type { ExtractionJob, JobStats, JobUpdate } from '../types/job.js';
import type { CarrierRecord, EnrichedCarrier, FailedExtraction } from '../types/carrier.js';
import type { ExtractionRepository } from './base.js';
import { applyJobUpdate, newJob } from './transitions.js';

export class InMemoryExtractionRepository implements ExtractionRepository {
  private jobs = new Map<string, ExtractionJob>();
  private records = new Map<string, CarrierRecord[]>();
  private failures = new Map<string, FailedExtraction[]>();

  async createJob(jobId: string, total: number): Promise<ExtractionJob> {
    if (this.jobs.has(jobId)) {
      throw new JobStateError(`Job ${jobId} already exists`);
    }

    const job = newJob(jobId, total, new Date());
    this.jobs.set(jobId, job);
    this.records.set(jobId, []);
    this.failures.set(jobId, []);
    return { ...job };
  }

  async getJob(jobId: string): Promise<ExtractionJob | null> {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : null;
  }

  async updateJob(jobId: string, update: JobUpdate): Promise<ExtractionJob | null> {
    const job = this.jobs.get(jobId);
    if (!job) return null;

    const updated = applyJobUpdate(job, update, new Date());
    this.jobs.set(jobId, updated);
    return { ...updated };
  }

  async listJobs(options: { limit?: number } = {}): Promise<ExtractionJob[]> {
    const limit = options.limit ?? 100;
    return Array.from(this.jobs.values())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id))
      .slice(0, limit)
      .map(job => ({ ...job }));
  }

  async saveRecord(jobId: string, record: EnrichedCarrier): Promise<CarrierRecord> {
    const list = this.records.get(jobId);
    if (!list) throw new JobStateError(`Job ${jobId} does not exist`);

    const stored: CarrierRecord = { ...record, jobId };
    list.push(stored);
    return { ...stored };
  }

  async getRecords(jobId: string): Promise<CarrierRecord[]> {
    return (this.records.get(jobId) ?? []).map(record => ({ ...record }));
  }

  async saveFailure(jobId: string, mcNumber: string, reason: string, retryCount: number): Promise<FailedExtraction> {
    const list = this.failures.get(jobId);
    if (!list) throw new JobStateError(`Job ${jobId} does not exist`);

    const failure: FailedExtraction = {
      jobId,
      mcNumber,
      errorReason: reason,
      retryCount,
      failedAt: new Date(),
    };
    list.push(failure);
    return { ...failure };
  }

  async getFailures(jobId: string): Promise<FailedExtraction[]> {
    return (this.failures.get(jobId) ?? []).map(failure => ({ ...failure }));
  }

  async getStats(): Promise<JobStats> {
    const stats: JobStats = { processing: 0, completed: 0, failed: 0, cancelled: 0 };
    for (const job of this.jobs.values()) {
      stats[job.status]++;
    }
    return stats;
  }
}

import type { ExtractionJob, JobStats, JobUpdate } from '../types/job.js';
import type { CarrierRecord, EnrichedCarrier, FailedExtraction } from '../types/carrier.js';

export interface ExtractionRepository {
  createJob(jobId: string, total: number): Promise<ExtractionJob>;
  getJob(jobId: string): Promise<ExtractionJob | null>;
  /** Sets `completedAt` on a terminal status; throws JobStateError if the job is already terminal. */
  updateJob(jobId: string, update: JobUpdate): Promise<ExtractionJob | null>;
  listJobs(options?: { limit?: number }): Promise<ExtractionJob[]>;

  saveRecord(jobId: string, record: EnrichedCarrier): Promise<CarrierRecord>;
  getRecords(jobId: string): Promise<CarrierRecord[]>;

  saveFailure(jobId: string, mcNumber: string, reason: string, retryCount: number): Promise<FailedExtraction>;
  getFailures(jobId: string): Promise<FailedExtraction[]>;

  getStats(): Promise<JobStats>;
}

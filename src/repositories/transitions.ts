import { JobStateError } from '../errors.js';
import { isTerminal, type ExtractionJob, type JobUpdate } from '../types/job.js';

/** Shared by every repository so the status rules cannot drift apart. */
export function applyJobUpdate(job: ExtractionJob, update: JobUpdate, now: Date): ExtractionJob {
  if (isTerminal(job.status)) {
    throw new JobStateError(`Job ${job.id} is already ${job.status}`);
  }

  const processedCount = update.processed ?? job.processedCount;
  const failedCount = update.failed ?? job.failedCount;

  if (processedCount < job.processedCount || failedCount < job.failedCount) {
    throw new JobStateError(`Job ${job.id} counters cannot decrease`);
  }
  if (processedCount + failedCount > job.total) {
    throw new JobStateError(`Job ${job.id} counters exceed total of ${job.total}`);
  }

  return {
    ...job,
    status: update.status,
    processedCount,
    failedCount,
    errorMessage: update.errorMessage ?? job.errorMessage,
    completedAt: isTerminal(update.status) ? now : null,
  };
}

export function newJob(jobId: string, total: number, now: Date): ExtractionJob {
  if (!Number.isInteger(total) || total < 0) {
    throw new JobStateError(`Invalid total for job ${jobId}: ${total}`);
  }
  return {
    id: jobId,
    status: 'processing',
    total,
    processedCount: 0,
    failedCount: 0,
    createdAt: now,
    completedAt: null,
    errorMessage: null,
  };
}

export type JobStatus = 'processing' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface ExtractionJob {
  id: string; // job_<ULID>
  status: JobStatus;
  total: number;
  processedCount: number;
  failedCount: number;
  createdAt: Date;
  completedAt: Date | null;
  errorMessage: string | null;
}

export interface JobUpdate {
  status: JobStatus;
  processed?: number;
  failed?: number;
  errorMessage?: string;
}

export interface JobStats {
  processing: number;
  completed: number;
  failed: number;
  cancelled: number;
}

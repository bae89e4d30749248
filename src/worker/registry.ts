export interface JobHandle {
  jobId: string;
  controller: AbortController;
  task: Promise<unknown>;
  startedAt: Date;
}

/**
 * Liveness bookkeeping for running extraction tasks. One instance per
 * service; the repository stays the source of truth for job status.
 */
export class JobRegistry {
  private handles = new Map<string, JobHandle>();

  register(handle: JobHandle): void {
    if (this.handles.has(handle.jobId)) {
      throw new Error(`Job ${handle.jobId} is already registered`);
    }
    this.handles.set(handle.jobId, handle);
  }

  get(jobId: string): JobHandle | undefined {
    return this.handles.get(jobId);
  }

  has(jobId: string): boolean {
    return this.handles.has(jobId);
  }

  remove(jobId: string): boolean {
    return this.handles.delete(jobId);
  }

  cancel(jobId: string): boolean {
    const handle = this.handles.get(jobId);
    if (!handle) return false;
    handle.controller.abort();
    return true;
  }

  cancelAll(): number {
    for (const handle of this.handles.values()) {
      handle.controller.abort();
    }
    return this.handles.size;
  }

  get size(): number {
    return this.handles.size;
  }

  ids(): string[] {
    return Array.from(this.handles.keys());
  }

  /** Wait for running tasks to settle; false if some are still running after `timeoutMs`. */
  async drain(timeoutMs: number): Promise<boolean> {
    if (this.handles.size === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = Promise.allSettled(Array.from(this.handles.values(), h => h.task)).then(() => true);

    try {
      return await Promise.race([settled, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

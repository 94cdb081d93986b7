import type { HealthStatus, Job, NewJob, QueueStats } from './job.types';

/** Injection token for the active {@link JobStore}. */
export const JOB_STORE = Symbol('JOB_STORE');

/**
 * Durable job table. The single source of truth for job state:
 * `claimBatch` is the only place where workers contend.
 */
export interface JobStore {
  /** Inserts a pending job and returns its id (the existing id for a repeated idempotency key). */
  enqueue(job: NewJob): Promise<number>;

  /**
   * Moves up to `limit` eligible jobs to processing in one atomic step.
   * Jobs held by a concurrent claim are skipped, never waited on.
   */
  claimBatch(limit: number): Promise<Job[]>;

  markSent(jobId: number, sentAt: Date): Promise<void>;

  markScheduled(
    jobId: number,
    error: string,
    nextRetryAt: Date,
    retryCount: number,
  ): Promise<void>;

  markFailed(jobId: number, error: string): Promise<void>;

  getById(jobId: number): Promise<Job | null>;

  stats(): Promise<QueueStats>;

  health(): Promise<HealthStatus>;

  close(): Promise<void>;
}

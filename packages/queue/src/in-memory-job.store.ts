import {
  JobInvalidStateError,
  JobNotFoundError,
  StoreError,
  systemClock,
} from '@mailq/shared';
import type { Clock } from '@mailq/shared';
import type { JobStore } from './job.store';
import { bySelectionOrder, DEFAULT_PRIORITY, emptyStats } from './job.types';
import type {
  HealthStatus,
  Job,
  JobStatus,
  NewJob,
  QueueStats,
} from './job.types';
import { assertValidNewJob } from './job.validation';

export type StatusTransition = {
  jobId: number;
  from: JobStatus | null;
  to: JobStatus;
  retryCount: number;
};

/**
 * Process-local JobStore. Every operation runs through one promise chain, so
 * claims are serialised the way a single-writer arbiter would serialise them.
 * Backs the tests and single-process local runs; not shared across processes.
 */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<number, Job>();
  private readonly idempotencyIndex = new Map<string, number>();
  private nextId = 1;
  private tail: Promise<unknown> = Promise.resolve();
  private closed = false;

  /** Every status change, in order. */
  readonly transitions: StatusTransition[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  enqueue(job: NewJob): Promise<number> {
    return this.exclusive(() => {
      assertValidNewJob(job);

      if (job.idempotencyKey !== undefined) {
        const existing = this.idempotencyIndex.get(job.idempotencyKey);
        if (existing !== undefined) {
          return existing;
        }
      }

      const now = this.clock();
      const id = this.nextId++;
      this.jobs.set(id, {
        id,
        idempotency_key: job.idempotencyKey ?? null,
        recipients: [...job.recipients],
        cc: [...(job.cc ?? [])],
        bcc: [...(job.bcc ?? [])],
        subject: job.subject,
        body_html: job.bodyHtml ?? null,
        body_text: job.bodyText ?? null,
        template_id: job.templateId ?? null,
        template_vars: job.templateVars ? { ...job.templateVars } : null,
        metadata: { ...(job.metadata ?? {}) },
        priority: job.priority ?? DEFAULT_PRIORITY,
        scheduled_for: job.scheduledFor ?? now,
        status: 'pending',
        retry_count: 0,
        max_retries: job.maxRetries,
        last_error: null,
        next_retry_at: null,
        sent_at: null,
        created_at: now,
        updated_at: now,
      });
      if (job.idempotencyKey !== undefined) {
        this.idempotencyIndex.set(job.idempotencyKey, id);
      }
      this.transitions.push({ jobId: id, from: null, to: 'pending', retryCount: 0 });
      return id;
    });
  }

  claimBatch(limit: number): Promise<Job[]> {
    return this.exclusive(() => {
      if (!Number.isInteger(limit) || limit < 1) {
        return [];
      }
      const now = this.clock().getTime();
      const selected = [...this.jobs.values()]
        .filter(
          (job) =>
            (job.status === 'pending' || job.status === 'scheduled') &&
            job.scheduled_for.getTime() <= now,
        )
        .sort(bySelectionOrder)
        .slice(0, limit);

      for (const job of selected) {
        this.transition(job, 'processing');
      }
      return selected.map(snapshot);
    });
  }

  markSent(jobId: number, sentAt: Date): Promise<void> {
    return this.exclusive(() => {
      const job = this.settle(jobId, ['sent']);
      if (!job) {
        return;
      }
      job.sent_at = sentAt;
      this.transition(job, 'sent');
    });
  }

  markScheduled(
    jobId: number,
    error: string,
    nextRetryAt: Date,
    retryCount: number,
  ): Promise<void> {
    return this.exclusive(() => {
      if (!Number.isInteger(retryCount) || retryCount < 0) {
        throw new StoreError(
          `markScheduled rejected: retry_count ${retryCount} is not a non-negative integer`,
          'constraint',
          jobId,
        );
      }
      const job = this.settle(jobId, ['scheduled', 'failed']);
      if (!job) {
        return;
      }
      job.last_error = error;
      job.retry_count = Math.min(retryCount, job.max_retries);
      if (retryCount > job.max_retries) {
        this.transition(job, 'failed');
        return;
      }
      job.next_retry_at = nextRetryAt;
      job.scheduled_for = nextRetryAt;
      this.transition(job, 'scheduled');
    });
  }

  markFailed(jobId: number, error: string): Promise<void> {
    return this.exclusive(() => {
      const job = this.settle(jobId, ['failed']);
      if (!job) {
        return;
      }
      job.last_error = error;
      this.transition(job, 'failed');
    });
  }

  getById(jobId: number): Promise<Job | null> {
    return this.exclusive(() => {
      const job = this.jobs.get(jobId);
      return job ? snapshot(job) : null;
    });
  }

  stats(): Promise<QueueStats> {
    return this.exclusive(() => {
      const stats = emptyStats();
      for (const job of this.jobs.values()) {
        stats[job.status] += 1;
      }
      return stats;
    });
  }

  async health(): Promise<HealthStatus> {
    return this.closed ? { ok: false, error: 'store closed' } : { ok: true };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private exclusive<T>(operation: () => T): Promise<T> {
    if (this.closed) {
      return Promise.reject(
        new StoreError('store is closed', 'connectivity'),
      );
    }
    const result = this.tail.then(operation);
    // Keep the chain alive after a failed operation; the caller still sees the rejection.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /**
   * Returns the job when it is in processing, null when it already sits in
   * one of the `accepted` states (idempotent replay), throws otherwise.
   */
  private settle(jobId: number, accepted: JobStatus[]): Job | null {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    if (job.status === 'processing') {
      return job;
    }
    if (accepted.includes(job.status)) {
      return null;
    }
    throw new JobInvalidStateError(jobId, job.status, 'processing');
  }

  private transition(job: Job, to: JobStatus): void {
    const from = job.status;
    job.status = to;
    job.updated_at = new Date(
      Math.max(this.clock().getTime(), job.updated_at.getTime() + 1),
    );
    this.transitions.push({
      jobId: job.id,
      from,
      to,
      retryCount: job.retry_count,
    });
  }
}

function snapshot(job: Job): Job {
  return structuredClone(job);
}

import { Inject, Injectable } from '@nestjs/common';
import { JOB_STORE } from '@mailq/queue';
import type { Job, JobStore, QueueStats } from '@mailq/queue';
import { CLOCK, JobNotFoundError } from '@mailq/shared';
import type { Clock } from '@mailq/shared';
import { toHttpException } from '../errors';

@Injectable()
export class QueueService {
  constructor(
    @Inject(JOB_STORE) private readonly store: JobStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async getStatus(): Promise<QueueStats & { timestamp: string }> {
    try {
      const stats = await this.store.stats();
      return { ...stats, timestamp: this.clock().toISOString() };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  async getJob(jobId: number): Promise<Job> {
    let job: Job | null;
    try {
      job = await this.store.getById(jobId);
    } catch (error) {
      throw toHttpException(error);
    }
    if (!job) {
      throw toHttpException(new JobNotFoundError(jobId));
    }
    return job;
  }
}

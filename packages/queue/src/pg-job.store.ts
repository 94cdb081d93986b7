import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Pool, PoolClient } from 'pg';
import {
  JobInvalidStateError,
  JobNotFoundError,
  StoreError,
  errorMessage,
  logger,
} from '@mailq/shared';
import type { JobStore } from './job.store';
import { bySelectionOrder, emptyStats, JOB_STATUSES } from './job.types';
import type {
  HealthStatus,
  Job,
  JobStatus,
  NewJob,
  QueueStats,
} from './job.types';
import { assertValidNewJob } from './job.validation';
import { isConstraintViolation, isTransientDbError } from './pg-errors';

const JOB_COLUMNS = `
  id, idempotency_key, recipients, cc, bcc, subject, body_html, body_text,
  template_id, template_vars, metadata, priority, scheduled_for, status,
  retry_count, max_retries, last_error, next_retry_at, sent_at, created_at, updated_at
`;

// updated_at must move forward even if two mutations share a clock tick.
const TOUCH = `updated_at = GREATEST(clock_timestamp(), updated_at + interval '1 microsecond')`;

export const SCHEMA_FILE = path.join(__dirname, '..', 'sql', 'schema.sql');

export type PgJobStoreOptions = {
  /** Attempts per operation when the connection fails transiently. */
  retryAttempts?: number;
};

export class PgJobStore implements JobStore {
  private readonly retryAttempts: number;
  private closed = false;

  constructor(
    private readonly db: Pool,
    options: PgJobStoreOptions = {},
  ) {
    this.retryAttempts = Math.max(1, options.retryAttempts ?? 3);
  }

  /**
   * Applies the idempotent DDL shipped in sql/schema.sql.
   */
  async ensureSchema(): Promise<void> {
    const ddl = await readFile(SCHEMA_FILE, 'utf8');
    await this.run('ensureSchema', undefined, true, async (client) => {
      await client.query(ddl);
    });
    logger.info({ service: 'queue' }, 'schema ensured');
  }

  async enqueue(job: NewJob): Promise<number> {
    assertValidNewJob(job);

    return this.run('enqueue', undefined, true, async (client) => {
      const inserted = await client.query<{ id: number }>(
        `
        INSERT INTO email_jobs (
          idempotency_key, recipients, cc, bcc, subject, body_html, body_text,
          template_id, template_vars, metadata, priority, scheduled_for, max_retries
        )
        VALUES (
          $1, $2, $3, $4, $5, $6, $7,
          $8, $9::jsonb, $10::jsonb, $11, COALESCE($12::timestamptz, clock_timestamp()), $13
        )
        ON CONFLICT (idempotency_key) DO NOTHING
        RETURNING id
        `,
        [
          job.idempotencyKey ?? null,
          job.recipients,
          job.cc ?? [],
          job.bcc ?? [],
          job.subject,
          job.bodyHtml ?? null,
          job.bodyText ?? null,
          job.templateId ?? null,
          job.templateVars ? JSON.stringify(job.templateVars) : null,
          JSON.stringify(job.metadata ?? {}),
          job.priority ?? 5,
          job.scheduledFor ?? null,
          job.maxRetries,
        ],
      );

      if (inserted.rows.length > 0) {
        const id = inserted.rows[0].id;
        logger.info(
          { service: 'queue', job_id: id, recipients: job.recipients.length },
          'job enqueued',
        );
        return id;
      }

      // Conflict: the idempotency key is already stored.
      const existing = await client.query<{ id: number }>(
        'SELECT id FROM email_jobs WHERE idempotency_key = $1',
        [job.idempotencyKey ?? null],
      );
      if (existing.rows.length === 0) {
        throw new StoreError('enqueue did not return an id', 'query');
      }

      const id = existing.rows[0].id;
      logger.info(
        { service: 'queue', job_id: id, idempotency_key: job.idempotencyKey },
        'duplicate enqueue',
      );
      return id;
    });
  }

  /**
   * Claims a batch atomically using UPDATE ... WHERE id IN (SELECT ... FOR UPDATE SKIP LOCKED).
   * Filters for pending/scheduled jobs with scheduled_for <= now().
   */
  async claimBatch(limit: number): Promise<Job[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      return [];
    }

    return this.run('claimBatch', undefined, true, async (client) => {
      const result = await client.query<Job>(
        `
        UPDATE email_jobs
        SET status = 'processing', ${TOUCH}
        WHERE id IN (
          SELECT id
          FROM email_jobs
          WHERE status IN ('pending', 'scheduled') AND scheduled_for <= NOW()
          ORDER BY priority ASC, created_at ASC, id ASC
          FOR UPDATE SKIP LOCKED
          LIMIT $1
        )
        RETURNING ${JOB_COLUMNS}
        `,
        [limit],
      );

      // RETURNING does not preserve the subquery order.
      const jobs = result.rows.sort(bySelectionOrder);
      if (jobs.length > 0) {
        logger.info(
          {
            service: 'queue',
            count: jobs.length,
            job_ids: jobs.map((job) => job.id),
          },
          'jobs claimed',
        );
      }
      return jobs;
    });
  }

  async markSent(jobId: number, sentAt: Date): Promise<void> {
    await this.run('markSent', jobId, true, async (client) => {
      const result = await client.query(
        `
        UPDATE email_jobs
        SET status = 'sent', sent_at = $2, ${TOUCH}
        WHERE id = $1 AND status = 'processing'
        RETURNING id
        `,
        [jobId, sentAt],
      );
      if (result.rows.length === 0) {
        await assertSettled(client, jobId, ['sent']);
      }
    });
  }

  /**
   * Schedules a retry. A retry count above max_retries forces the job to failed.
   */
  async markScheduled(
    jobId: number,
    error: string,
    nextRetryAt: Date,
    retryCount: number,
  ): Promise<void> {
    if (!Number.isInteger(retryCount) || retryCount < 0) {
      throw new StoreError(
        `markScheduled rejected: retry_count ${retryCount} is not a non-negative integer`,
        'constraint',
        jobId,
      );
    }

    await this.run('markScheduled', jobId, true, async (client) => {
      const result = await client.query<{ status: JobStatus }>(
        `
        UPDATE email_jobs
        SET status = CASE WHEN $4::int > max_retries THEN 'failed' ELSE 'scheduled' END,
            retry_count = LEAST($4::int, max_retries),
            last_error = $2,
            next_retry_at = CASE WHEN $4::int > max_retries THEN next_retry_at ELSE $3 END,
            scheduled_for = CASE WHEN $4::int > max_retries THEN scheduled_for ELSE $3 END,
            ${TOUCH}
        WHERE id = $1 AND status = 'processing'
        RETURNING status
        `,
        [jobId, error, nextRetryAt, retryCount],
      );

      if (result.rows.length === 0) {
        await assertSettled(client, jobId, ['scheduled', 'failed']);
        return;
      }
      if (result.rows[0].status === 'failed') {
        logger.warn(
          { service: 'queue', job_id: jobId, retry_count: retryCount },
          'retry budget exceeded, job failed',
        );
      }
    });
  }

  async markFailed(jobId: number, error: string): Promise<void> {
    await this.run('markFailed', jobId, true, async (client) => {
      const result = await client.query(
        `
        UPDATE email_jobs
        SET status = 'failed', last_error = $2, ${TOUCH}
        WHERE id = $1 AND status = 'processing'
        RETURNING id
        `,
        [jobId, error],
      );
      if (result.rows.length === 0) {
        await assertSettled(client, jobId, ['failed']);
      }
    });
  }

  async getById(jobId: number): Promise<Job | null> {
    return this.run('getById', jobId, false, async (client) => {
      const result = await client.query<Job>(
        `SELECT ${JOB_COLUMNS} FROM email_jobs WHERE id = $1`,
        [jobId],
      );
      return result.rows.length > 0 ? result.rows[0] : null;
    });
  }

  async stats(): Promise<QueueStats> {
    return this.run('stats', undefined, false, async (client) => {
      const result = await client.query<{ status: string; count: number }>(
        'SELECT status, COUNT(*)::int AS count FROM email_jobs GROUP BY status',
      );
      const stats = emptyStats();
      for (const row of result.rows) {
        if (isJobStatus(row.status)) {
          stats[row.status] = Number(row.count);
        }
      }
      return stats;
    });
  }

  async health(): Promise<HealthStatus> {
    let client: PoolClient | undefined;
    try {
      client = await this.db.connect();
      await client.query('SELECT 1');
      return { ok: true };
    } catch (error) {
      logger.warn(
        { service: 'queue', error: errorMessage(error) },
        'health check failed',
      );
      return { ok: false, error: errorMessage(error) };
    } finally {
      client?.release();
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.db.end();
    logger.info({ service: 'queue' }, 'connection pool closed');
  }

  /**
   * Runs `fn` on a pooled connection, inside a transaction when asked.
   * Transient connectivity failures roll back, drop the connection and try
   * again; everything else surfaces as StoreError.
   */
  private async run<T>(
    operation: string,
    jobId: number | undefined,
    transactional: boolean,
    fn: (client: PoolClient) => Promise<T>,
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      let client: PoolClient | undefined;
      let discard = false;
      try {
        client = await this.db.connect();
        if (transactional) {
          await client.query('BEGIN');
        }
        const result = await fn(client);
        if (transactional) {
          await client.query('COMMIT');
        }
        return result;
      } catch (error) {
        if (client && transactional) {
          await rollback(client, operation);
        }
        if (
          error instanceof StoreError ||
          error instanceof JobNotFoundError ||
          error instanceof JobInvalidStateError
        ) {
          throw error;
        }
        if (!isTransientDbError(error)) {
          throw new StoreError(
            `${operation} failed: ${errorMessage(error)}`,
            isConstraintViolation(error) ? 'constraint' : 'query',
            jobId,
            { cause: error },
          );
        }

        discard = true;
        lastError = error;
        if (attempt < this.retryAttempts) {
          logger.warn(
            {
              service: 'queue',
              operation,
              job_id: jobId,
              attempt,
              max_attempts: this.retryAttempts,
              error: errorMessage(error),
            },
            'transient store error, retrying',
          );
        }
      } finally {
        client?.release(discard);
      }
    }

    logger.error(
      {
        service: 'queue',
        operation,
        job_id: jobId,
        error: errorMessage(lastError),
      },
      'store retries exhausted',
    );
    throw new StoreError(
      `${operation} failed after ${this.retryAttempts} attempts: ${errorMessage(lastError)}`,
      'connectivity',
      jobId,
      { cause: lastError },
    );
  }
}

async function rollback(client: PoolClient, operation: string): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (rollbackError) {
    logger.debug(
      { service: 'queue', operation, error: errorMessage(rollbackError) },
      'rollback failed',
    );
  }
}

/**
 * Called when a transition out of processing matched no row: a repeated call
 * on a job already in the target state is a no-op, anything else is an error.
 */
async function assertSettled(
  client: PoolClient,
  jobId: number,
  accepted: JobStatus[],
): Promise<void> {
  const result = await client.query<{ status: JobStatus }>(
    'SELECT status FROM email_jobs WHERE id = $1',
    [jobId],
  );
  if (result.rows.length === 0) {
    throw new JobNotFoundError(jobId);
  }
  const status = result.rows[0].status;
  if (!accepted.includes(status)) {
    throw new JobInvalidStateError(jobId, status, 'processing');
  }
}

function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

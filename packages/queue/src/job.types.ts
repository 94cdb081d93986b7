export const JOB_STATUSES = [
  'pending',
  'scheduled',
  'processing',
  'sent',
  'failed',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const DEFAULT_PRIORITY = 5;
export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 10;
export const MIN_MAX_RETRIES = 1;
export const MAX_MAX_RETRIES = 10;

export type Job = {
  id: number;
  idempotency_key: string | null;
  recipients: string[];
  cc: string[];
  bcc: string[];
  subject: string;
  body_html: string | null;
  body_text: string | null;
  template_id: string | null;
  template_vars: Record<string, unknown> | null;
  metadata: Record<string, unknown>;
  priority: number;
  scheduled_for: Date;
  status: JobStatus;
  retry_count: number;
  max_retries: number;
  last_error: string | null;
  next_retry_at: Date | null;
  sent_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

/**
 * What the submission boundary hands to the store.
 * Either `bodyHtml`/`bodyText` or `templateId` carries the content.
 */
export type NewJob = {
  idempotencyKey?: string;
  recipients: string[];
  cc?: string[];
  bcc?: string[];
  subject: string;
  bodyHtml?: string;
  bodyText?: string;
  templateId?: string;
  templateVars?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  priority?: number;
  scheduledFor?: Date;
  maxRetries: number;
};

export type QueueStats = Record<JobStatus, number>;

export type HealthStatus = { ok: true } | { ok: false; error: string };

export function emptyStats(): QueueStats {
  return { pending: 0, scheduled: 0, processing: 0, sent: 0, failed: 0 };
}

/** Claim order: priority, then age, then id. */
export function bySelectionOrder(a: Job, b: Job): number {
  return (
    a.priority - b.priority ||
    a.created_at.getTime() - b.created_at.getTime() ||
    a.id - b.id
  );
}

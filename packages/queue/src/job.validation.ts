import { StoreError } from '@mailq/shared';
import {
  MAX_MAX_RETRIES,
  MAX_PRIORITY,
  MIN_MAX_RETRIES,
  MIN_PRIORITY,
} from './job.types';
import type { NewJob } from './job.types';

/**
 * Rejects jobs the table constraints would reject anyway, without a round trip.
 */
export function assertValidNewJob(job: NewJob): void {
  const violation = findViolation(job);
  if (violation) {
    throw new StoreError(`enqueue rejected: ${violation}`, 'constraint');
  }
}

function findViolation(job: NewJob): string | null {
  if (job.recipients.length === 0) {
    return 'recipient set is empty';
  }
  if (job.recipients.some((recipient) => recipient.trim() === '')) {
    return 'recipient address is blank';
  }
  if (!job.bodyHtml && !job.bodyText && !job.templateId) {
    return 'either inline content or a template reference is required';
  }
  const priority = job.priority;
  if (
    priority !== undefined &&
    (!Number.isInteger(priority) ||
      priority < MIN_PRIORITY ||
      priority > MAX_PRIORITY)
  ) {
    return `priority must be an integer between ${MIN_PRIORITY} and ${MAX_PRIORITY}`;
  }
  if (
    !Number.isInteger(job.maxRetries) ||
    job.maxRetries < MIN_MAX_RETRIES ||
    job.maxRetries > MAX_MAX_RETRIES
  ) {
    return `max_retries must be an integer between ${MIN_MAX_RETRIES} and ${MAX_MAX_RETRIES}`;
  }
  return null;
}

export type FailureType = 'transient' | 'permanent';

export type RetryInput = {
  failureType: FailureType;
  retryCount: number;
  maxRetries: number;
  baseBackoffSeconds: number;
  now: Date;
};

export type RetryDecision =
  | { kind: 'retry'; retryCount: number; nextRetryAt: Date; delayMs: number }
  | { kind: 'terminal' };

/**
 * Determines if a job should be retried based on its retry budget and failure type.
 * Permanent failures never consume the budget.
 */
export function shouldRetry(
  retryCount: number,
  maxRetries: number,
  failureType: FailureType,
): boolean {
  return failureType === 'transient' && retryCount < maxRetries;
}

/** base × 2^retryCount, in milliseconds. No jitter. */
export function backoffDelayMs(
  baseBackoffSeconds: number,
  retryCount: number,
): number {
  return baseBackoffSeconds * 1000 * 2 ** retryCount;
}

/**
 * Pure retry decision: retry while the budget lasts, terminal otherwise or
 * when the failure is permanent.
 */
export function decideRetry(input: RetryInput): RetryDecision {
  if (!shouldRetry(input.retryCount, input.maxRetries, input.failureType)) {
    return { kind: 'terminal' };
  }
  const delayMs = backoffDelayMs(input.baseBackoffSeconds, input.retryCount);
  return {
    kind: 'retry',
    retryCount: input.retryCount + 1,
    nextRetryAt: new Date(input.now.getTime() + delayMs),
    delayMs,
  };
}

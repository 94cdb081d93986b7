/** Lifetime counters of one dispatcher. */
export type DispatcherStats = {
  attempted: number;
  sent: number;
  retryScheduled: number;
  permanentlyFailed: number;
};

export type DeliveryOutcome =
  | 'sent'
  | 'scheduled'
  | 'failed'
  | 'store_error'
  | 'skipped';

/** What one poll cycle did with the jobs it claimed. */
export type BatchOutcome = {
  claimed: number;
  sent: number;
  retryScheduled: number;
  permanentlyFailed: number;
  storeErrors: number;
  /** Claimed but never started because the worker had already released its resources. */
  skipped: number;
};

export function emptyOutcome(claimed = 0): BatchOutcome {
  return {
    claimed,
    sent: 0,
    retryScheduled: 0,
    permanentlyFailed: 0,
    storeErrors: 0,
    skipped: 0,
  };
}

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60_000;
const SWEEP_INTERVAL_MS = 1_000;

/** Injection token for the process-wide {@link SlidingWindowLimiter}. */
export const RATE_LIMITER = Symbol('RATE_LIMITER');

export type RateLimits = {
  perSecond: number;
  perMinute: number;
};

export type RateWindowName = 'second' | 'minute';

export type AdmissionDecision =
  | { allowed: true }
  | { allowed: false; window: RateWindowName; retryAfterMs: number };

/**
 * Per-client sliding-window limiter over a one-second and a one-minute window.
 *
 * `check` evaluates and records in one synchronous call, so two requests from
 * the same client can never both pass the last free slot. A client's record
 * holds only timestamps inside the minute window and is removed as soon as it
 * is empty; a sweep at most once per second drops records of idle clients.
 */
export class SlidingWindowLimiter {
  private readonly windows = new Map<string, number[]>();
  private lastSweepAt = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly limits: RateLimits,
    private readonly now: () => number = Date.now,
  ) {
    for (const [name, value] of Object.entries(limits)) {
      if (!Number.isInteger(value) || value < 1) {
        throw new RangeError(`${name} must be a positive integer, got ${value}`);
      }
    }
  }

  allow(clientKey: string): boolean {
    return this.check(clientKey).allowed;
  }

  check(clientKey: string): AdmissionDecision {
    const now = this.now();
    this.sweep(now);

    const timestamps = this.windows.get(clientKey) ?? [];
    prune(timestamps, now - MINUTE_MS);

    const decision = evaluate(timestamps, now, this.limits);
    if (decision.allowed) {
      // The clock may step backwards; keep the record ascending.
      const last = timestamps.length > 0 ? timestamps[timestamps.length - 1] : now;
      timestamps.push(Math.max(now, last));
    }

    if (timestamps.length > 0) {
      this.windows.set(clientKey, timestamps);
    } else {
      this.windows.delete(clientKey);
    }
    return decision;
  }

  /** Whether the limiter currently holds a record for `clientKey`. */
  has(clientKey: string): boolean {
    return this.windows.has(clientKey);
  }

  /** Number of clients with a live record. */
  get size(): number {
    return this.windows.size;
  }

  private sweep(now: number): void {
    if (now - this.lastSweepAt < SWEEP_INTERVAL_MS) {
      return;
    }
    this.lastSweepAt = now;
    for (const [clientKey, timestamps] of this.windows) {
      prune(timestamps, now - MINUTE_MS);
      if (timestamps.length === 0) {
        this.windows.delete(clientKey);
      }
    }
  }
}

/** Drops timestamps at or before `cutoff`. Timestamps are kept ascending. */
function prune(timestamps: number[], cutoff: number): void {
  let expired = 0;
  while (expired < timestamps.length && timestamps[expired] <= cutoff) {
    expired += 1;
  }
  if (expired > 0) {
    timestamps.splice(0, expired);
  }
}

function evaluate(
  timestamps: number[],
  now: number,
  limits: RateLimits,
): AdmissionDecision {
  const secondWait = waitFor(timestamps, now, SECOND_MS, limits.perSecond);
  const minuteWait = waitFor(timestamps, now, MINUTE_MS, limits.perMinute);

  if (secondWait === null && minuteWait === null) {
    return { allowed: true };
  }
  // When both windows are full the client has to wait out the longer one.
  if (minuteWait !== null && (secondWait === null || minuteWait >= secondWait)) {
    return { allowed: false, window: 'minute', retryAfterMs: minuteWait };
  }
  return { allowed: false, window: 'second', retryAfterMs: secondWait ?? 0 };
}

/**
 * Milliseconds until the window has a free slot again, or null when it has
 * one now.
 */
function waitFor(
  timestamps: number[],
  now: number,
  windowMs: number,
  limit: number,
): number | null {
  const cutoff = now - windowMs;
  let first = timestamps.length;
  while (first > 0 && timestamps[first - 1] > cutoff) {
    first -= 1;
  }
  const inWindow = timestamps.length - first;
  if (inWindow < limit) {
    return null;
  }
  // The slot frees up when the oldest timestamp that keeps the count at the limit expires.
  const blocking = timestamps[timestamps.length - limit];
  return Math.max(0, blocking + windowMs - now);
}

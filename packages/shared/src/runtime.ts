/**
 * Registers shutdown handlers for SIGINT/SIGTERM.
 * Useful for both API and worker processes.
 */
export function onShutdown(fn: (signal: NodeJS.Signals) => Promise<void> | void) {
    const handler = async (signal: NodeJS.Signals) => {
      try {
        await fn(signal);
      } finally {
        // Ensure the process exits after cleanup
        process.exit(0);
      }
    };
  
    process.once("SIGINT", handler);
    process.once("SIGTERM", handler);
  }

/**
 * Resolves after `ms`, or as soon as `signal` aborts, whichever comes first.
 * Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type Clock = () => Date;

/** Injection token for the {@link Clock} a service should read time from. */
export const CLOCK = Symbol("CLOCK");

export const systemClock: Clock = () => new Date();

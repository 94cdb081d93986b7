import type { AppConfig } from '@mailq/shared';

/** Injection token for {@link WorkerOptions}. */
export const WORKER_OPTIONS = Symbol('WORKER_OPTIONS');

export type WorkerOptions = AppConfig['worker'] & {
  baseBackoffSeconds: number;
};

export function workerOptionsFrom(config: AppConfig): WorkerOptions {
  return {
    ...config.worker,
    baseBackoffSeconds: config.retry.baseBackoffSeconds,
  };
}

/**
 * Error variants shared by the store, the dispatcher and the API.
 * Each class carries a literal `kind` so callers can switch on it.
 */
export abstract class MailQueueError extends Error {
  abstract readonly kind: MailQueueErrorKind;
}

export type MailQueueErrorKind =
  | 'store'
  | 'job_not_found'
  | 'job_invalid_state'
  | 'delivery'
  | 'config';

export type StoreErrorReason = 'connectivity' | 'constraint' | 'query';

export class StoreError extends MailQueueError {
  readonly kind = 'store' as const;

  constructor(
    message: string,
    public readonly reason: StoreErrorReason,
    public readonly jobId?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class JobNotFoundError extends MailQueueError {
  readonly kind = 'job_not_found' as const;

  constructor(public readonly jobId: number) {
    super(`Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
  }
}

export class JobInvalidStateError extends MailQueueError {
  readonly kind = 'job_invalid_state' as const;

  constructor(
    public readonly jobId: number,
    public readonly currentStatus: string,
    public readonly expectedStatus: string,
  ) {
    super(
      `Job ${jobId} is not in ${expectedStatus} status (current status: ${currentStatus})`,
    );
    this.name = 'JobInvalidStateError';
  }
}

export class DeliveryError extends MailQueueError {
  readonly kind = 'delivery' as const;

  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DeliveryError';
  }
}

export class ConfigError extends MailQueueError {
  readonly kind = 'config' as const;

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export type KnownError =
  | StoreError
  | JobNotFoundError
  | JobInvalidStateError
  | DeliveryError
  | ConfigError;

export function isKnownError(error: unknown): error is KnownError {
  return error instanceof MailQueueError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// SQLSTATE classes/codes worth another attempt on a fresh connection.
const TRANSIENT_SQLSTATE_CLASSES = ['08'];
const TRANSIENT_SQLSTATES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '53300', // too_many_connections
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
]);
const TRANSIENT_SOCKET_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
]);

function errorCode(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

export function isTransientDbError(error: unknown): boolean {
  const code = errorCode(error);
  if (code !== undefined) {
    if (TRANSIENT_SQLSTATES.has(code) || TRANSIENT_SOCKET_CODES.has(code)) {
      return true;
    }
    if (TRANSIENT_SQLSTATE_CLASSES.includes(code.slice(0, 2)) && code.length === 5) {
      return true;
    }
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('connection terminated') ||
      message.includes('timeout exceeded when trying to connect')
    );
  }
  return false;
}

/** Class 23: integrity constraint violation. */
export function isConstraintViolation(error: unknown): boolean {
  return errorCode(error)?.startsWith('23') ?? false;
}

export * from './job.types';
export { JOB_STORE } from './job.store';
export type { JobStore } from './job.store';
export { assertValidNewJob } from './job.validation';
export { PgJobStore, SCHEMA_FILE } from './pg-job.store';
export type { PgJobStoreOptions } from './pg-job.store';
export { InMemoryJobStore } from './in-memory-job.store';
export type { StatusTransition } from './in-memory-job.store';
export { createPool } from './db';
export { isConstraintViolation, isTransientDbError } from './pg-errors';

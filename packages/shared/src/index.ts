export * from './types.js';
export * from './config.js';
export * from './logger.js';
export * from './errors.js';
export * from './status.js';
export { sleep, throwIfCancelled } from './sleep.js';
export { createDb, type Database, type DbHandle } from './db/index.js';
export { withRetry, isRetryableError, type RetryOptions } from './retry.js';

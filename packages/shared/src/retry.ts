import type { Logger } from './logger.js';
import { errorMessage, PipelineCancelledError } from './errors.js';
import { sleep } from './sleep.js';

/** Retry with exponential backoff for transient datastore/broker calls.
 * Pipeline stages are never retried here: a failed remote job is final for its caller. */

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryOn?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

const DEFAULTS = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
  retryOn: isRetryableError,
};

export async function withRetry<T>(
  fn: () => Promise<T>,
  logger: Logger,
  label: string,
  options: RetryOptions = {},
): Promise<T> {
  const opts = { ...DEFAULTS, ...options };
  let delay = opts.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof PipelineCancelledError) throw err;

      const message = errorMessage(err);
      if (attempt >= opts.maxAttempts || !opts.retryOn(err)) {
        logger.error({ attempt, label, error: message }, 'Giving up after failure');
        throw err;
      }

      logger.warn(
        { attempt, maxAttempts: opts.maxAttempts, label, error: message, nextRetryMs: delay },
        'Retrying after failure',
      );

      await sleep(delay, opts.signal);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }
}

const TRANSIENT_PG_CODES = new Set([
  '08000', // connection_exception
  '08003', // connection_does_not_exist
  '08006', // connection_failure
  '40001', // serialization_failure
  '57P01', // admin_shutdown
]);

/** Returns true for network and connection-level failures. */
export function isRetryableError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;

  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  if (code && (TRANSIENT_PG_CODES.has(code) || code === 'ECONNRESET' || code === 'ECONNREFUSED' || code === 'ETIMEDOUT')) {
    return true;
  }

  const msg = err.message.toLowerCase();
  if (msg.includes('econnreset') || msg.includes('econnrefused') || msg.includes('etimedout')) return true;
  if (msg.includes('connection terminated') || msg.includes('timeout exceeded when trying to connect')) return true;

  return false;
}

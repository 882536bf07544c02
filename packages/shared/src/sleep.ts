import { PipelineCancelledError } from './errors.js';

/** Sleep that rejects with PipelineCancelledError as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(cancelledBy(signal));
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledBy(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Poll-boundary check */
export function throwIfCancelled(signal?: AbortSignal, context: Record<string, unknown> = {}): void {
  if (signal?.aborted) {
    throw cancelledBy(signal, context);
  }
}

function cancelledBy(signal?: AbortSignal, context: Record<string, unknown> = {}): PipelineCancelledError {
  const reason: unknown = signal?.reason;
  return new PipelineCancelledError({
    ...context,
    reason: reason instanceof Error ? reason.message : String(reason),
  });
}

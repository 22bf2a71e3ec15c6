import { GenerationAbortedError, describeError, isRetryableError } from '../errors/index.js';
import logger from './logger.js';

export interface RetryOptions {
  label: string;
  maxAttempts: number;
  baseDelayMs: number;
  signal?: AbortSignal;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new GenerationAbortedError();
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new GenerationAbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new GenerationAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run a provider call, retrying only RetryableError failures.
 * Delay doubles per attempt: base, 2x base, 4x base...
 */
export async function withRetry<T>(task: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { label, maxAttempts, baseDelayMs, signal } = options;
  let delay = baseDelayMs;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal);
    try {
      return await task();
    } catch (error) {
      if (!isRetryableError(error) || attempt >= maxAttempts) {
        if (attempt > 1) {
          logger.warn('RETRY', `${label}: giving up after ${attempt} attempt(s)`, describeError(error));
        }
        throw error;
      }

      // A server-provided Retry-After wins over the backoff schedule
      const wait = error.retryAfterMs ?? delay;
      logger.warn('RETRY', `${label}: transient error (attempt ${attempt}/${maxAttempts}), retrying in ${wait}ms`, describeError(error));
      await sleep(wait, signal);
      delay *= 2;
    }
  }
}

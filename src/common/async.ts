/**
 * Timeout and retry helpers for collaborator calls.
 */

import { TimeoutError, isTransientError } from './errors.js';

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);

    work
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  isRetriable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Runs `fn` up to `attempts` times. Only retriable failures are retried,
 * with exponential backoff (base, 2x base, 4x base, ...). The last error is
 * rethrown unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const retriable = opts.isRetriable ?? isTransientError;
  const wait = opts.sleep ?? sleep;

  let attempt = 1;
  for (;;) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= opts.attempts || !retriable(err)) {
        throw err;
      }
      const delayMs = opts.baseDelayMs * 2 ** (attempt - 1);
      opts.onRetry?.(err, attempt, delayMs);
      await wait(delayMs);
      attempt++;
    }
  }
}

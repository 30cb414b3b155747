/**
 * livemark - Time Utilities
 */

import { FetchTimeoutError } from '../core/errors';

/**
 * Get current timestamp in milliseconds
 */
export function now(): number {
  return Date.now();
}

/**
 * Calculate exponential backoff delay
 */
export function backoffDelay(attempt: number, baseDelay: number, maxDelay: number = 30000): number {
  const delay = Math.min(baseDelay * Math.pow(2, attempt), maxDelay);
  // Add jitter to prevent thundering herd
  const jitter = delay * 0.1 * Math.random();
  return Math.floor(delay + jitter);
}

/**
 * Race a promise against a timer. On expiry the returned promise rejects
 * with a `FetchTimeoutError` for `key`; the original promise keeps running
 * and its outcome is dropped.
 */
export function timeout<T>(promise: Promise<T>, ms: number, key: string): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new FetchTimeoutError(key, ms));
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Sleep for a specified duration. Resolves early when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Debounce a function. The returned handle can flush or cancel the pending
 * call.
 */
export interface Debounced {
  (): void;
  /** Run the pending call now, if there is one */
  flush(): void;
  /** Drop the pending call */
  cancel(): void;
  /** Whether a call is waiting for its timer */
  pending(): boolean;
}

export interface DebounceOptions {
  /** Longest a pending call may wait, however often it is re-triggered */
  maxWait?: number;
}

export function debounce(fn: () => void, delay: number, options: DebounceOptions = {}): Debounced {
  let timer: ReturnType<typeof setTimeout> | null = null;
  let firstCall: number | null = null;

  const clear = () => {
    if (timer) clearTimeout(timer);
    timer = null;
    firstCall = null;
  };

  const fire = () => {
    clear();
    fn();
  };

  const schedule = () => {
    const at = now();
    if (firstCall === null) firstCall = at;

    let wait = delay;
    if (options.maxWait !== undefined) {
      wait = Math.max(0, Math.min(delay, firstCall + options.maxWait - at));
    }

    if (timer) clearTimeout(timer);
    timer = setTimeout(fire, wait);
  };

  return Object.assign(schedule, {
    flush: () => {
      if (timer) fire();
    },
    cancel: clear,
    pending: () => timer !== null,
  });
}

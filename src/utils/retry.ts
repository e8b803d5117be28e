import { RequestAbortedError } from '@/utils/errors.ts';
import { logger } from '@/utils/logger.ts';

export type RetryOptions = {
  attempts: number;
  delayMs: number;
  backoffMultiplier?: number;
  shouldRetry: (error: unknown) => boolean;
  signal?: AbortSignal;
  label?: string;
};

const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestAbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Runs `fn` up to `attempts` times, waiting `delayMs * backoffMultiplier^n` between
 * attempts. Errors rejected by `shouldRetry`, and the last error, are rethrown.
 */
export const withRetry = async <T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> => {
  const { attempts, delayMs, backoffMultiplier = 2, shouldRetry, signal, label = 'operation' } = options;
  const maxAttempts = Math.max(1, Math.floor(attempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error) || signal?.aborted) throw error;

      const delay = delayMs * Math.pow(backoffMultiplier, attempt - 1);
      logger.warn(`${label} failed (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms`, {
        error,
      });
      await sleep(delay, signal);
    }
  }
};

export type TimeoutOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
  onTimeout: () => Error;
};

/**
 * Bounds `fn` by a timeout and the caller's signal. `fn` receives a signal that fires on
 * either; the returned promise settles at that moment even if `fn` ignores the signal.
 */
export const withTimeout = <T>(fn: (signal: AbortSignal) => Promise<T>, options: TimeoutOptions): Promise<T> => {
  const { timeoutMs, signal, onTimeout } = options;
  if (signal?.aborted) return Promise.reject(new RequestAbortedError());

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    const onAbort = () => {
      cleanup();
      controller.abort();
      reject(new RequestAbortedError());
    };
    const timer = setTimeout(() => {
      cleanup();
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    Promise.resolve()
      .then(() => fn(controller.signal))
      .then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        },
      );
  });
};

import { createComponentLogger } from './logger';

type BackoffOptions = {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  jitter?: boolean;
  label?: string;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
};

const log = createComponentLogger('retry');

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export class TimeoutError extends Error {
  constructor(label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export const computeBackoffDelay = (
  attempt: number,
  { initialDelayMs = 500, maxDelayMs = 30_000, factor = 2, jitter = true }: BackoffOptions = {},
  random: () => number = Math.random,
): number => {
  const exponentialDelay = initialDelayMs * factor ** (attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  return jitter
    ? Math.round(cappedDelay / 2 + random() * (cappedDelay / 2))
    : Math.round(cappedDelay);
};

export const exponentialBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  options: BackoffOptions = {},
): Promise<T> => {
  const { maxAttempts = 5, label = 'operation', onRetry, shouldRetry } = options;

  let attempt = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    attempt += 1;

    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= maxAttempts) {
        throw error;
      }

      if (typeof shouldRetry === 'function' && !shouldRetry(error, attempt)) {
        throw error;
      }

      const delay = computeBackoffDelay(attempt, options);

      if (typeof onRetry === 'function') {
        try {
          onRetry(error, attempt, delay);
        } catch (hookError) {
          log.warn({ err: hookError, label }, 'Retry hook threw an error.');
        }
      }

      await wait(delay);
    }
  }
};

/**
 * Rejects with a TimeoutError when the promise does not settle in time.
 * The underlying call is not cancelled; callers treat the timeout as a failure.
 */
export const withTimeout = async <T>(promise: Promise<T>, timeoutMs: number, label = 'operation'): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
};

export type { BackoffOptions };

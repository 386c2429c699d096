import { describe, expect, it, vi } from 'vitest';

import { TimeoutError, computeBackoffDelay, exponentialBackoff, withTimeout } from '../util/retry';

describe('computeBackoffDelay', () => {
  it('doubles per attempt up to the cap', () => {
    expect(computeBackoffDelay(1, { initialDelayMs: 100, jitter: false })).toBe(100);
    expect(computeBackoffDelay(3, { initialDelayMs: 100, jitter: false })).toBe(400);
    expect(computeBackoffDelay(10, { initialDelayMs: 100, maxDelayMs: 1000, jitter: false })).toBe(1000);
  });

  it('applies jitter within the upper half of the delay', () => {
    expect(computeBackoffDelay(2, { initialDelayMs: 100 }, () => 0)).toBe(100);
    expect(computeBackoffDelay(2, { initialDelayMs: 100 }, () => 1)).toBe(200);
  });
});

describe('exponentialBackoff', () => {
  it('retries until the action succeeds', async () => {
    const action = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValueOnce('done');
    const onRetry = vi.fn();

    await expect(exponentialBackoff(action, { initialDelayMs: 1, onRetry })).resolves.toBe('done');

    expect(action).toHaveBeenCalledTimes(3);
    expect(action).toHaveBeenLastCalledWith(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('stops when shouldRetry declines', async () => {
    const action = vi.fn(async () => {
      throw new Error('bad request');
    });

    await expect(exponentialBackoff(action, { initialDelayMs: 1, shouldRetry: () => false })).rejects.toThrow(
      'bad request',
    );
    expect(action).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxAttempts', async () => {
    const action = vi.fn(async () => {
      throw new Error('still failing');
    });

    await expect(exponentialBackoff(action, { initialDelayMs: 1, maxAttempts: 2 })).rejects.toThrow('still failing');
    expect(action).toHaveBeenCalledTimes(2);
  });
});

describe('withTimeout', () => {
  it('resolves with the value when it settles in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 50)).resolves.toBe(42);
  });

  it('rejects with a TimeoutError otherwise', async () => {
    const never = new Promise<number>(() => undefined);

    await expect(withTimeout(never, 10, 'slow call')).rejects.toBeInstanceOf(TimeoutError);
    await expect(withTimeout(never, 10, 'slow call')).rejects.toThrow('slow call timed out after 10ms');
  });
});

import { describe, expect, it, vi } from 'vitest';
import {
  abortReason,
  exponentialBackoff,
  isAbortError,
  isRetryableError,
  linearBackoff,
  pollUntil,
  sleep,
  steppedBackoff,
  withRetry
} from '@/lib/retry';
import { HttpError } from '@/lib/errors';
import { withStatus } from '../support/fakes';

function recordingSleep() {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    }
  };
}

describe('backoff schedules', () => {
  it('grows linearly up to the cap', () => {
    const delay = linearBackoff(100, 250);
    expect([0, 1, 2, 3, 4].map(delay)).toEqual([100, 100, 200, 250, 250]);
  });

  it('steps from the initial delay', () => {
    const delay = steppedBackoff(1000, 500, 2500);
    expect([1, 2, 3, 4, 5].map(delay)).toEqual([1000, 1500, 2000, 2500, 2500]);
  });

  it('doubles up to the cap', () => {
    const delay = exponentialBackoff(500, 8000);
    expect([1, 2, 3, 5, 6].map(delay)).toEqual([500, 1000, 2000, 8000, 8000]);
  });
});

describe('pollUntil', () => {
  it('sleeps before every check and reports the attempt count', async () => {
    const { delays, sleep: wait } = recordingSleep();
    const check = vi.fn(async (attempt: number) => (attempt === 3 ? { done: true as const, value: 'ready' } : { done: false as const }));
    const result = await pollUntil(check, { maxAttempts: 5, delayFn: linearBackoff(10, 100) }, { sleep: wait });
    expect(result).toEqual({ value: 'ready', attempts: 3 });
    expect(delays).toEqual([10, 20, 30]);
  });

  it('resolves null when attempts run out', async () => {
    const { sleep: wait } = recordingSleep();
    const check = vi.fn(async () => ({ done: false as const }));
    await expect(pollUntil(check, { maxAttempts: 4, delayFn: () => 0 }, { sleep: wait })).resolves.toBeNull();
    expect(check).toHaveBeenCalledTimes(4);
  });
});

describe('withRetry', () => {
  it('retries transient failures with the policy delays', async () => {
    const { delays, sleep: wait } = recordingSleep();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(withStatus('unavailable', 503))
      .mockRejectedValueOnce(withStatus('slow down', 429))
      .mockResolvedValueOnce('ok');
    await expect(withRetry(fn, { maxAttempts: 3, delayFn: exponentialBackoff(500, 8000) }, { sleep: wait })).resolves.toBe('ok');
    expect(delays).toEqual([500, 1000]);
  });

  it('gives up at once on client errors', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new HttpError(404, 'https://api.example.test/x?key=test-key', 'nope'));
    await expect(withRetry(fn, { maxAttempts: 3, delayFn: () => 0 }, { sleep: async () => undefined })).rejects.toThrow(
      'HTTP 404 from https://api.example.test/x: nope'
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws the last error after the final attempt', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockImplementation(async (attempt) => {
      throw new Error(`failure ${attempt}`);
    });
    await expect(withRetry(fn, { maxAttempts: 2, delayFn: () => 0 }, { sleep: async () => undefined })).rejects.toThrow(
      'failure 2'
    );
  });
});

describe('isRetryableError', () => {
  it('retries server errors, throttling and errors without a status', () => {
    expect(isRetryableError(withStatus('x', 500))).toBe(true);
    expect(isRetryableError(withStatus('x', 429))).toBe(true);
    expect(isRetryableError(new Error('socket hang up'))).toBe(true);
    expect(isRetryableError(withStatus('x', 404))).toBe(false);
  });
});

describe('sleep', () => {
  it('rejects when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(1000, controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
  });

  it('rejects when aborted while waiting', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    const caught = await pending.catch((err: unknown) => err);
    expect(isAbortError(caught)).toBe(true);
  });

  it('turns a string reason into an AbortError', () => {
    const controller = new AbortController();
    controller.abort('shutdown');
    const error = abortReason(controller.signal);
    expect(error.name).toBe('AbortError');
    expect(error.message).toBe('shutdown');
  });
});

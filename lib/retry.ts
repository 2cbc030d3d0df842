import { errorStatus } from '@/lib/errors';

/** Delay before the next attempt; `attempt` is 1-based and refers to the attempt that just finished. */
export type DelayFn = (attempt: number) => number;

export type RetryPolicy = {
  maxAttempts: number;
  delayFn: DelayFn;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function linearBackoff(baseMs: number, maxMs: number): DelayFn {
  return (attempt) => Math.min(maxMs, baseMs * Math.max(1, attempt));
}

export function steppedBackoff(initialMs: number, stepMs: number, maxMs: number): DelayFn {
  return (attempt) => Math.min(maxMs, initialMs + stepMs * Math.max(0, attempt - 1));
}

export function exponentialBackoff(baseMs: number, maxMs: number): DelayFn {
  return (attempt) => Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));
}

export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  const error = new Error(typeof reason === 'string' ? reason : 'The operation was aborted');
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export type PollStep<T> = { done: true; value: T } | { done: false };

/**
 * Calls `check` until it reports done or `policy.maxAttempts` is reached,
 * sleeping `policy.delayFn(attempt)` between attempts. Resolves `null` when the
 * attempts run out so callers decide how a timeout surfaces.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<PollStep<T>>,
  policy: RetryPolicy,
  options: { sleep?: Sleep; signal?: AbortSignal } = {}
): Promise<{ value: T; attempts: number } | null> {
  const wait = options.sleep ?? sleep;
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    await wait(policy.delayFn(attempt), options.signal);
    const step = await check(attempt);
    if (step.done) {
      return { value: step.value, attempts: attempt };
    }
  }
  return null;
}

/** 4xx other than 429 will not succeed on retry. */
export function isRetryableError(error: unknown): boolean {
  const status = errorStatus(error);
  if (status === null) return true;
  return status >= 500 || status === 429;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: { sleep?: Sleep; signal?: AbortSignal; shouldRetry?: (error: unknown) => boolean } = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt >= maxAttempts || !shouldRetry(err)) {
        break;
      }
      await wait(policy.delayFn(attempt), options.signal);
    }
  }
  throw lastError;
}

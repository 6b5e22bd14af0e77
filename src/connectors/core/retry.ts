import { AbortError, ApiError, isNetworkError } from "./errors.js";

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryOn?: (err: unknown) => boolean;
  /** Called before each backoff sleep with the 1-based retry number. */
  onRetry?: (err: unknown, retry: number, delayMs: number) => void;
  signal?: AbortSignal;
}

export function isRetryableError(err: unknown): boolean {
  if (err instanceof ApiError) return err.retryable;
  if (err instanceof Error && err.name === "TimeoutError") return true;
  return isNetworkError(err);
}

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const delay = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
  return delay + delay * 0.1 * Math.random();
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const retryOn = opts.retryOn ?? isRetryableError;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (opts.signal?.aborted) throw new AbortError();
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === maxRetries || !retryOn(err)) {
        throw err;
      }
      // Exponential backoff with jitter
      const delay = backoffDelay(attempt, baseDelay, maxDelay);
      opts.onRetry?.(err, attempt + 1, delay);
      await sleep(delay, opts.signal);
    }
  }
  throw lastError;
}

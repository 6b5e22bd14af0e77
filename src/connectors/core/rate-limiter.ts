import { Semaphore } from "./semaphore.js";
import type { RateLimiter, RateLimiterConfig } from "./types.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly minDelayMs: number;

  // One caller at a time, so concurrent waiters cannot claim the same slot.
  private readonly gate = new Semaphore(1);
  private requestTimestamps: number[] = [];
  private backoffUntil = 0;
  private lastCallAt = 0;

  // Allow external updates from response headers
  private remainingRequests: number | null = null;
  private resetAt: number | null = null;

  constructor(config: RateLimiterConfig = {}) {
    this.maxRequests = config.maxRequests ?? Infinity;
    this.windowMs = config.windowMs ?? 60_000;
    this.minDelayMs = config.minDelayMs ?? 0;
  }

  acquire(): Promise<void> {
    return this.gate.run(() => this.waitForSlot());
  }

  private async waitForSlot(): Promise<void> {
    // Wait for backoff (429 response)
    const now = Date.now();
    if (this.backoffUntil > now) {
      await sleep(this.backoffUntil - now);
    }

    // If we have header-reported remaining counts, respect them
    if (this.remainingRequests !== null && this.remainingRequests < 1) {
      if (this.resetAt && this.resetAt > Date.now()) {
        await sleep(this.resetAt - Date.now() + 100);
      }
      this.remainingRequests = null;
    }

    // Enforce min delay between calls
    if (this.minDelayMs > 0) {
      const elapsed = Date.now() - this.lastCallAt;
      if (elapsed < this.minDelayMs) {
        await sleep(this.minDelayMs - elapsed);
      }
    }

    // Enforce request window
    if (this.maxRequests < Infinity) {
      this.requestTimestamps = this.requestTimestamps.filter(
        (ts) => Date.now() - ts < this.windowMs,
      );
      if (this.requestTimestamps.length >= this.maxRequests) {
        const oldest = this.requestTimestamps[0] ?? Date.now();
        const waitMs = this.windowMs - (Date.now() - oldest) + 50;
        await sleep(waitMs);
        this.requestTimestamps = this.requestTimestamps.filter(
          (ts) => Date.now() - ts < this.windowMs,
        );
      }
      this.requestTimestamps.push(Date.now());
    }

    this.lastCallAt = Date.now();
  }

  backoff(retryAfterMs: number): void {
    this.backoffUntil = Math.max(this.backoffUntil, Date.now() + retryAfterMs);
  }

  updateFromHeaders(headers: Record<string, string>): void {
    const remaining = headers["x-ratelimit-remaining"];
    if (remaining !== undefined) {
      const parsed = parseInt(remaining, 10);
      this.remainingRequests = Number.isNaN(parsed) ? null : parsed;
    }

    const reset = headers["x-ratelimit-reset"];
    if (reset !== undefined) {
      const resetVal = parseInt(reset, 10);
      if (!Number.isNaN(resetVal)) {
        // Could be epoch seconds or ms
        this.resetAt = resetVal < 1e12 ? resetVal * 1000 : resetVal;
      }
    }
  }
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(
  value: string | null | undefined,
  now = Date.now(),
): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(value);
  if (!Number.isNaN(date)) return Math.max(0, date - now);
  return undefined;
}

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new SlidingWindowRateLimiter(config);
}

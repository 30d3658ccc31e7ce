import { sleep } from "./retry.js";
import type { RateLimiter, RateLimiterConfig } from "./types.js";

/**
 * Sliding-window limiter shared by every request a client makes.
 * A 429 pushes the whole limiter into back-off, not just the failing call.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly minDelayMs: number;

  private requestTimestamps: number[] = [];
  private backoffUntil = 0;
  private lastCallAt = 0;

  constructor(config: RateLimiterConfig = {}) {
    this.maxRequests = config.maxRequests ?? Infinity;
    this.windowMs = config.windowMs ?? 60_000;
    this.minDelayMs = config.minDelayMs ?? 0;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    if (this.backoffUntil > now) {
      await sleep(this.backoffUntil - now, signal);
    }

    if (this.minDelayMs > 0) {
      const elapsed = Date.now() - this.lastCallAt;
      if (elapsed < this.minDelayMs) {
        await sleep(this.minDelayMs - elapsed, signal);
      }
    }

    if (this.maxRequests < Infinity) {
      this.pruneWindow();
      if (this.requestTimestamps.length >= this.maxRequests) {
        const oldest = this.requestTimestamps[0] ?? Date.now();
        const waitMs = this.windowMs - (Date.now() - oldest) + 50;
        await sleep(waitMs, signal);
        this.pruneWindow();
      }
      this.requestTimestamps.push(Date.now());
    }

    this.lastCallAt = Date.now();
  }

  backoff(retryAfterMs: number): void {
    this.backoffUntil = Math.max(this.backoffUntil, Date.now() + retryAfterMs);
  }

  updateFromHeaders(headers: Headers): void {
    const retryAfterMs = parseRetryAfter(headers.get("retry-after"));
    if (retryAfterMs !== null) this.backoff(retryAfterMs);
  }

  private pruneWindow(): void {
    const cutoff = Date.now() - this.windowMs;
    this.requestTimestamps = this.requestTimestamps.filter((ts) => ts > cutoff);
  }
}

/**
 * Parse a Retry-After header value (delta seconds or an HTTP date) into ms.
 */
export function parseRetryAfter(
  value: string | null,
  now: number = Date.now(),
): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new SlidingWindowRateLimiter(config);
}

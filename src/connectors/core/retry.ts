import {
  classifyTransientError,
  errorMessage,
  RetryExhaustedError,
  type RetryVerdict,
  SyncCancelledError,
} from "./errors.js";
import type { Logger } from "./types.js";

/** Resolve after `ms`, or reject with `SyncCancelledError` as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new SyncCancelledError());
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new SyncCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ─── Backoff ───

export interface BackoffPolicy {
  /** Delay before the next attempt. `attempt` is the 1-based attempt that just failed. */
  delayMs(attempt: number, verdict: RetryVerdict): number;
}

export interface ExponentialBackoffOptions {
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
  /** Wait used for a 429 that carries no Retry-After hint. */
  defaultRetryAfterMs?: number;
  random?: () => number;
}

export function exponentialBackoff(
  opts: ExponentialBackoffOptions = {},
): BackoffPolicy {
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 120_000;
  const jitterFactor = opts.jitterFactor ?? 0.2;
  const defaultRetryAfter = opts.defaultRetryAfterMs ?? 30_000;
  const random = opts.random ?? Math.random;

  return {
    delayMs(attempt, verdict) {
      if (verdict.kind === "rateLimited") {
        return Math.min(verdict.retryAfterMs ?? defaultRetryAfter, maxDelay);
      }
      const delay = baseDelay * 2 ** (attempt - 1);
      const jitter = random() * jitterFactor * delay;
      return Math.min(delay + jitter, maxDelay);
    },
  };
}

// ─── Retry ───

export interface RetryOptions {
  /** Total attempts including the first one. */
  maxAttempts?: number;
  classify?: (err: unknown) => RetryVerdict;
  backoff?: BackoffPolicy;
  signal?: AbortSignal;
  operation?: string;
  logger?: Logger;
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or attempts
 * run out. Non-retryable errors propagate unchanged; running out of
 * attempts throws `RetryExhaustedError` wrapping the last failure.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? 5);
  const classify = opts.classify ?? classifyTransientError;
  const backoff = opts.backoff ?? exponentialBackoff();
  const operation = opts.operation ?? "remote call";

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (opts.signal?.aborted) throw new SyncCancelledError();
    try {
      return await fn();
    } catch (err) {
      if (err instanceof SyncCancelledError) throw err;
      const verdict = classify(err);
      if (verdict.kind === "fatal") throw err;

      lastError = err;
      if (attempt === maxAttempts) break;

      const delay = backoff.delayMs(attempt, verdict);
      opts.logger?.warn(
        `${operation} failed (attempt ${attempt}/${maxAttempts}), retrying in ${Math.round(delay)}ms`,
        { error: errorMessage(err) },
      );
      await sleep(delay, opts.signal);
    }
  }

  opts.logger?.error(`${operation} failed after ${maxAttempts} attempts`, {
    error: errorMessage(lastError),
  });
  throw new RetryExhaustedError(operation, maxAttempts, lastError);
}

/** A retry strategy bound to one policy, reused at every call site. */
export type Retrier = <T>(
  operation: string,
  fn: () => Promise<T>,
  signal?: AbortSignal,
) => Promise<T>;

export function createRetrier(
  opts: Omit<RetryOptions, "operation" | "signal">,
): Retrier {
  return <T>(
    operation: string,
    fn: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> => withRetry(fn, { ...opts, operation, signal });
}

import { getConfig } from "../config.js";
import { CancellationError, TransientError } from "../errors.js";

export type RetryPolicy = {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable: (err: unknown) => boolean;
};

export type RetryOptions = Partial<RetryPolicy>;

export const isTransient = (err: unknown): boolean => err instanceof TransientError;

/** Policy built from the current config, with any field overridden. */
export function retryPolicy(opts?: RetryOptions): RetryPolicy {
  const { maxAttempts, baseDelayMs, maxDelayMs } = getConfig().retry;
  return {
    maxAttempts,
    baseDelayMs,
    maxDelayMs,
    isRetryable: isTransient,
    ...opts,
  };
}

/**
 * Delay before the attempt following `attempt` (1-indexed): doubles from the
 * base each time and never exceeds the cap. A longer collaborator hint wins,
 * and a delay is never shorter than twice the previous one, so a hint raises
 * every later delay as well.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, retryAfterMs?: number, previousMs?: number): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  const delay = Math.max(exponential, retryAfterMs ?? 0, (previousMs ?? 0) * 2);
  return Math.min(delay, policy.maxDelayMs);
}

/** Resolve after `ms`, or reject with a CancellationError when `signal` aborts first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new CancellationError());
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancellationError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

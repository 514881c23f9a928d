/**
 * Bounded retry shared by every remote call site.
 *
 * Each call site supplies its own deadline and `isRetryable` predicate.
 */

export const DEFAULT_RETRY_INTERVAL_MS = 2_000;

/** Per-call deadlines, in milliseconds. */
export const RETRY_TIMEOUTS = {
  /** Dependency lookups and escalation policy rewrites. */
  lookup: 10_000,
  /** Reading a schedule back. */
  read: 30_000,
  /** Updating or deleting a schedule. */
  write: 120_000,
} as const;

/**
 * Source of time for retry loops. Tests substitute a fake that advances
 * instantly.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RetryOptions {
  /** Overall deadline measured from the first attempt. */
  timeoutMs: number;
  /** Fixed pause between attempts. Defaults to {@link DEFAULT_RETRY_INTERVAL_MS}. */
  intervalMs?: number;
  /** Errors for which this returns false are thrown immediately. Defaults to retrying everything. */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each pause with the error and the number of the attempt that failed. */
  onRetry?: (error: unknown, attempt: number) => void;
  clock?: Clock;
}

/**
 * Runs `operation` until it succeeds, a non-retryable error occurs, or the
 * next attempt would start after the deadline. The last error is rethrown.
 *
 * @param operation - Receives the 1-based attempt number
 *
 * @example
 * ```typescript
 * const schedule = await retry(() => gateway.getSchedule(id), {
 *   timeoutMs: RETRY_TIMEOUTS.read,
 *   isRetryable: isTransientRemoteError,
 * });
 * ```
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const clock = options.clock ?? systemClock;
  const intervalMs = options.intervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
  const isRetryable = options.isRetryable ?? (() => true);
  const deadline = clock.now() + options.timeoutMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error)) throw error;
      if (clock.now() + intervalMs > deadline) throw error;

      options.onRetry?.(error, attempt);
      await clock.sleep(intervalMs);
    }
  }
}

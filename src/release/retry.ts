/**
 * Bounded retry policy for release-host calls.
 * Purpose: keep attempt count and backoff formula in one named, testable unit.
 * Assumptions: every failure is retried; callers decide what counts as failure by throwing.
 * Usage: runWithRetries(policy, (attempt) => upload(), { onRetry }).
 */

// =============================================================================
// TYPES
// =============================================================================

export type RetryPolicy = {
  readonly maxAttempts: number;
  /** Delay before the next attempt, given the 1-based attempt that just failed. */
  backoffMs(attempt: number): number;
};

export type RetryHooks = {
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: (durationMs: number) => Promise<void>;
};

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${errorText(lastError)}`);
    this.name = "RetryExhaustedError";
  }
}

// =============================================================================
// POLICY
// =============================================================================

export function linearBackoffPolicy(maxAttempts: number, baseDelayMs: number): RetryPolicy {
  return {
    maxAttempts,
    backoffMs: (attempt) => baseDelayMs * attempt,
  };
}

// Policy for asset uploads, from the `upload` section of the config.
export function uploadRetryPolicy(upload: { max_attempts: number; backoff_ms: number }): RetryPolicy {
  return linearBackoffPolicy(upload.max_attempts, upload.backoff_ms);
}

// =============================================================================
// LOOP
// =============================================================================

export async function runWithRetries<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? delay;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === policy.maxAttempts) break;

      const delayMs = policy.backoffMs(attempt);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs);
    }
  }

  throw new RetryExhaustedError(policy.maxAttempts, lastError);
}

export function delay(durationMs: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, durationMs));
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Bounded retry with exponential backoff
 *
 * Each attempt reports an explicit outcome instead of throwing, and the delay schedule
 * is a pure function, so both can be tested without real timers.
 */

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type AttemptOutcome<T> =
  | { type: 'success'; value: T }
  | { type: 'retry'; error: unknown; retryAfterMs?: number }
  | { type: 'fail'; error: unknown };

export type Sleep = (ms: number) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

export const wait: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delay before the attempt following `attempt` (1-based), or null when the budget is spent.
 * A server-provided retry-after hint wins over the schedule but is still capped.
 */
export function nextRetryDelay(
  policy: RetryPolicy,
  attempt: number,
  retryAfterMs?: number
): number | null {
  if (attempt >= policy.maxAttempts) {
    return null;
  }
  if (retryAfterMs !== undefined && retryAfterMs >= 0) {
    return Math.min(retryAfterMs, policy.maxDelayMs);
  }
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Run `operation` until it succeeds, fails for good, or the policy runs out.
 * Throws the error of the last attempt.
 */
export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<AttemptOutcome<T>>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  sleep: Sleep = wait
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    const outcome = await operation(attempt);

    if (outcome.type === 'success') {
      return outcome.value;
    }
    if (outcome.type === 'fail') {
      throw outcome.error;
    }

    const delay = nextRetryDelay(policy, attempt, outcome.retryAfterMs);
    if (delay === null) {
      throw outcome.error;
    }
    await sleep(delay);
  }
}

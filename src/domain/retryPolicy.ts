export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffCapMs: number;
}

/**
 * Exponential backoff with equal jitter: half the capped exponential delay
 * is fixed, the other half random. `attempt` is the attempt that just
 * failed, starting at 1.
 */
export function backoffDelayMs(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponent = Math.max(0, attempt - 1);
  const exp = Math.min(policy.backoffCapMs, policy.backoffBaseMs * 2 ** exponent);
  const half = exp / 2;
  return Math.round(half + random() * half);
}

export function hasAttemptsLeft(policy: RetryPolicy, attemptCount: number): boolean {
  return attemptCount < policy.maxAttempts;
}

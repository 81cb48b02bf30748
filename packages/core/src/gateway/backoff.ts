export interface BackoffPolicy {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

/**
 * Exponential backoff with additive jitter: `base * 2^attempt + random() * base`,
 * capped at `maxDelayMs`. `attempt` is zero-based.
 */
export function computeBackoffMs(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, attempt);
  const jitter = random() * policy.baseDelayMs;
  return Math.min(policy.maxDelayMs, exponential + jitter);
}

export interface BackoffPolicy {
  initialIntervalMs: number;
  multiplier: number;
  maxIntervalMs: number;
  jitterRatio: number;
}

// base-4: 1s → 4s → 16s → 64s, capped at 60s
export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialIntervalMs: 1000,
  multiplier: 4.0,
  maxIntervalMs: 60000,
  jitterRatio: 0.1,
};

// attempt is 1-indexed; attempt=1 waits initialIntervalMs, attempt=2 waits multiplier× that, etc.
export function calculateBackOff(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  let delay = policy.initialIntervalMs * Math.pow(policy.multiplier, Math.max(attempt, 1) - 1);
  delay = Math.min(delay, policy.maxIntervalMs);
  // ±jitter to avoid thundering herd
  const jitter = delay * policy.jitterRatio;
  return Math.floor(delay + (random() * jitter * 2 - jitter));
}

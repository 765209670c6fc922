import { SUBMISSION_LIMITS } from '../config/rateLimits.js';

export interface RetryPolicy {
  /** Attempts allowed before a request is marked failed */
  maxAttempts: number;
  /** Cooldown after the first failed attempt */
  baseCooldownMs: number;
  maxCooldownMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: SUBMISSION_LIMITS.maxAttempts,
  baseCooldownMs: 15 * 60_000,
  maxCooldownMs: 4 * 60 * 60_000,
};

/** Cooldown after `attemptCount` failed attempts: base × 2^(n−1), capped. */
export function cooldownAfter(policy: RetryPolicy, attemptCount: number): number {
  if (attemptCount <= 0) return 0;
  const delay = policy.baseCooldownMs * 2 ** (attemptCount - 1);
  return Math.min(delay, policy.maxCooldownMs);
}

export function attemptsExhausted(policy: RetryPolicy, attemptCount: number): boolean {
  return attemptCount >= policy.maxAttempts;
}

/**
 * Whether a request that has failed `attemptCount` times, last at
 * `lastAttemptAt`, may be tried again at `now`.
 */
export function isDueForAttempt(
  policy: RetryPolicy,
  request: { attemptCount: number; lastAttemptAt: Date | null },
  now: Date,
): boolean {
  if (attemptsExhausted(policy, request.attemptCount)) return false;
  if (request.attemptCount === 0 || request.lastAttemptAt === null) return true;
  return now.getTime() - request.lastAttemptAt.getTime() >= cooldownAfter(policy, request.attemptCount);
}

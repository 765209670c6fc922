import { describe, expect, test } from 'vitest';
import {
  DEFAULT_RETRY_POLICY,
  attemptsExhausted,
  cooldownAfter,
  isDueForAttempt,
  type RetryPolicy,
} from '../../../src/workers/retryPolicy.js';

const MINUTE = 60_000;
const POLICY: RetryPolicy = { maxAttempts: 3, baseCooldownMs: 15 * MINUTE, maxCooldownMs: 40 * MINUTE };

describe('cooldownAfter', () => {
  test('doubles per failed attempt and caps', () => {
    expect(cooldownAfter(POLICY, 0)).toBe(0);
    expect(cooldownAfter(POLICY, 1)).toBe(15 * MINUTE);
    expect(cooldownAfter(POLICY, 2)).toBe(30 * MINUTE);
    expect(cooldownAfter(POLICY, 3)).toBe(40 * MINUTE);
  });
});

describe('attemptsExhausted', () => {
  test('default policy allows three attempts', () => {
    expect(DEFAULT_RETRY_POLICY.maxAttempts).toBe(3);
    expect(attemptsExhausted(DEFAULT_RETRY_POLICY, 2)).toBe(false);
    expect(attemptsExhausted(DEFAULT_RETRY_POLICY, 3)).toBe(true);
  });
});

describe('isDueForAttempt', () => {
  const now = new Date('2025-03-01T12:00:00Z');
  const ago = (ms: number) => new Date(now.getTime() - ms);

  test('a fresh request is due immediately', () => {
    expect(isDueForAttempt(POLICY, { attemptCount: 0, lastAttemptAt: null }, now)).toBe(true);
  });

  test('waits out the cooldown after a failure', () => {
    expect(isDueForAttempt(POLICY, { attemptCount: 1, lastAttemptAt: ago(14 * MINUTE) }, now)).toBe(false);
    expect(isDueForAttempt(POLICY, { attemptCount: 1, lastAttemptAt: ago(15 * MINUTE) }, now)).toBe(true);
    expect(isDueForAttempt(POLICY, { attemptCount: 2, lastAttemptAt: ago(20 * MINUTE) }, now)).toBe(false);
  });

  test('never due once attempts are exhausted', () => {
    expect(isDueForAttempt(POLICY, { attemptCount: 3, lastAttemptAt: ago(24 * 60 * MINUTE) }, now)).toBe(false);
  });
});

import { describe, expect, test, vi } from 'vitest';
import { PACING_PROFILE, Pacing } from '../../../src/engine/pacing.js';

describe('Pacing', () => {
  test('interval spans the preset range', () => {
    expect(new Pacing({ random: () => 0 }).interval('fieldGap')).toBe(500);
    expect(new Pacing({ random: () => 0.5 }).interval('fieldGap')).toBe(1_000);
    expect(new Pacing({ random: () => 0.999 }).interval('fieldGap')).toBe(1_499);
  });

  test('interval accepts an explicit range', () => {
    expect(new Pacing({ random: () => 0.25 }).interval({ minMs: 100, maxMs: 200 })).toBe(125);
  });

  test('pause sleeps for the drawn interval and returns it', async () => {
    const sleep = vi.fn(async () => {});
    const pacing = new Pacing({ random: () => 0, sleep });

    const ms = await pacing.pause('betweenSubmissions');

    expect(ms).toBe(PACING_PROFILE.betweenSubmissions.minMs);
    expect(sleep).toHaveBeenCalledWith(30_000);
  });

  test('wait routes fixed delays through the sleeper', async () => {
    const sleep = vi.fn(async () => {});
    await new Pacing({ sleep }).wait(5_000);
    expect(sleep).toHaveBeenCalledWith(5_000);
  });

  test('submission gaps stay within 30 to 90 seconds', () => {
    const { minMs, maxMs } = PACING_PROFILE.betweenSubmissions;
    expect([minMs, maxMs]).toEqual([30_000, 90_000]);
  });
});

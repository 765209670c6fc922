import { describe, expect, test } from 'vitest';
import { utcStamp } from '../../../src/lib/timestamps.js';

describe('utcStamp', () => {
  const date = new Date('2025-03-01T07:05:09.123Z');

  test('second resolution by default', () => {
    expect(utcStamp(date)).toBe('20250301070509');
  });

  test('hour resolution for rate windows', () => {
    expect(utcStamp(date, 'hour')).toBe('2025030107');
  });
});

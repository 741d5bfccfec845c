import { describe, it, expect } from 'vitest';
import { delaySchedule, nextDelay } from './backoff.js';

const policy = { initialDelayMs: 30_000, factor: 1.5, maxDelayMs: 300_000 };

describe('backoff', () => {
  it('grows the delay by the factor', () => {
    expect(nextDelay(30_000, policy)).toBe(45_000);
  });

  it('never exceeds the cap', () => {
    expect(nextDelay(250_000, policy)).toBe(300_000);
    expect(nextDelay(300_000, policy)).toBe(300_000);
  });

  it('produces the default schedule', () => {
    expect(delaySchedule(policy, 5)).toEqual([30_000, 45_000, 67_500, 101_250, 151_875]);
  });

  it('is non-decreasing and capped over a long run', () => {
    const delays = delaySchedule(policy, 12);
    for (let i = 1; i < delays.length; i++) {
      expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1]);
    }
    expect(delays[delays.length - 1]).toBe(300_000);
  });

  it('caps an initial delay above the maximum', () => {
    expect(delaySchedule({ initialDelayMs: 500_000, factor: 2, maxDelayMs: 60_000 }, 2)).toEqual([60_000, 60_000]);
  });
});

import { describe, it, expect } from 'vitest';
import { computeBackoffMs } from './backoff.js';

const policy = { baseDelayMs: 100, maxDelayMs: 1000 };

describe('computeBackoffMs', () => {
  it('should double per attempt without jitter', () => {
    expect(computeBackoffMs(0, policy, () => 0)).toBe(100);
    expect(computeBackoffMs(1, policy, () => 0)).toBe(200);
    expect(computeBackoffMs(2, policy, () => 0)).toBe(400);
  });

  it('should add up to one base delay of jitter', () => {
    expect(computeBackoffMs(1, policy, () => 0.5)).toBe(250);
  });

  it('should cap at the maximum delay', () => {
    expect(computeBackoffMs(6, policy, () => 0.99)).toBe(1000);
  });

  it('should never decrease as attempts grow', () => {
    const delays = [0, 1, 2, 3, 4, 5].map((attempt) => computeBackoffMs(attempt, policy, () => 0.3));
    for (let i = 1; i < delays.length; i++) {
      expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1] ?? 0);
    }
  });
});

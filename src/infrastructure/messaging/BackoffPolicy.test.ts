import { describe, expect, it } from 'vitest';
import { BackoffPolicy } from './BackoffPolicy.js';

describe('BackoffPolicy', () => {
  const policy = new BackoffPolicy({ initialDelayMs: 1000, maxDelayMs: 60000, backoffFactor: 2 });

  it('doubles the delay with every attempt', () => {
    expect([1, 2, 3, 4].map(attempt => policy.delayFor(attempt))).toEqual([2000, 4000, 8000, 16000]);
  });

  it('caps the delay', () => {
    expect(policy.delayFor(5)).toBe(32000);
    expect(policy.delayFor(6)).toBe(60000);
    expect(policy.delayFor(50)).toBe(60000);
  });

  it('honours custom settings', () => {
    const fast = new BackoffPolicy({ initialDelayMs: 10, maxDelayMs: 100, backoffFactor: 3 });

    expect([1, 2, 3].map(attempt => fast.delayFor(attempt))).toEqual([30, 90, 100]);
  });
});

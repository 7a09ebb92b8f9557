import { describe, it, expect } from 'vitest';
import { ValidationError } from './errors';
import { computeBackoff, DeliveryError, isRetryable, NonRetryableError, RetryableError } from './retry';

describe('computeBackoff', () => {
  it('doubles from the base delay', () => {
    expect([0, 1, 2, 3, 4].map((n) => computeBackoff(n))).toEqual([1_000, 2_000, 4_000, 8_000, 16_000]);
  });

  it('is non-decreasing and never exceeds the ceiling', () => {
    const options = { baseDelayMs: 500, maxDelayMs: 30_000 };
    let previous = 0;
    for (let attempts = 0; attempts < 2_000; attempts++) {
      const delay = computeBackoff(attempts, options);
      expect(delay).toBeGreaterThanOrEqual(previous);
      expect(delay).toBeLessThanOrEqual(30_000);
      previous = delay;
    }
    expect(previous).toBe(30_000);
  });

  it('treats negative attempt counts as zero', () => {
    expect(computeBackoff(-3, { baseDelayMs: 250, maxDelayMs: 1_000 })).toBe(250);
  });
});

describe('isRetryable', () => {
  it('retries everything not marked non-retryable', () => {
    expect(isRetryable(new DeliveryError('HTTP 503', 503))).toBe(true);
    expect(isRetryable(new RetryableError('flaky'))).toBe(true);
    expect(isRetryable(new Error('unknown'))).toBe(true);
    expect(isRetryable(new NonRetryableError('gone'))).toBe(false);
    expect(isRetryable(new ValidationError('bad input'))).toBe(false);
  });
});

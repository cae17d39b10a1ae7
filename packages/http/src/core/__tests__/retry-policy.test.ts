import { describe, expect, it } from 'vitest';

import {
  baseDelayForAttempt,
  computeRetryDelay,
  createRetryPolicy,
  DEFAULT_RETRY_POLICY,
  delayForAttempt,
  shouldRetry,
} from '../retry-policy.js';

const noJitter = createRetryPolicy({ jitter: false });

describe('createRetryPolicy', () => {
  it('should fill in defaults', () => {
    expect(createRetryPolicy()).toEqual(DEFAULT_RETRY_POLICY);
  });

  it('should reject a multiplier of 1 or less', () => {
    expect(() => createRetryPolicy({ multiplier: 1 })).toThrow('multiplier must be greater than 1');
  });

  it('should reject a max delay below the initial delay', () => {
    expect(() => createRetryPolicy({ initialDelayMs: 500, maxDelayMs: 100 })).toThrow(
      'expected 0 <= initialDelayMs <= maxDelayMs'
    );
  });

  it('should reject a negative attempt count', () => {
    expect(() => createRetryPolicy({ maxAttempts: -1 })).toThrow('maxAttempts must be a non-negative integer');
  });
});

describe('delayForAttempt', () => {
  it('should grow 1000, 2000, 4000 without jitter', () => {
    expect(delayForAttempt(noJitter, 0)).toBe(1000);
    expect(delayForAttempt(noJitter, 1)).toBe(2000);
    expect(delayForAttempt(noJitter, 2)).toBe(4000);
  });

  it('should cap at maxDelayMs', () => {
    const policy = createRetryPolicy({ jitter: false, maxDelayMs: 5000 });
    expect(delayForAttempt(policy, 3)).toBe(5000);
    expect(delayForAttempt(policy, 30)).toBe(5000);
  });

  it('should be non-decreasing and bounded before jitter', () => {
    let previous = 0;
    for (let attempt = 0; attempt < 40; attempt++) {
      const delay = baseDelayForAttempt(DEFAULT_RETRY_POLICY, attempt);
      expect(delay).toBeGreaterThanOrEqual(previous);
      expect(delay).toBeLessThanOrEqual(DEFAULT_RETRY_POLICY.maxDelayMs);
      previous = delay;
    }
  });

  it('should scale by a factor in [0.5, 1.5] with jitter', () => {
    const policy = createRetryPolicy({ jitter: true });
    expect(delayForAttempt(policy, 1, () => 0)).toBe(1000);
    expect(delayForAttempt(policy, 1, () => 0.5)).toBe(2000);
    expect(delayForAttempt(policy, 1, () => 0.75)).toBe(2500);
  });
});

describe('shouldRetry', () => {
  it('should allow attempts strictly below maxAttempts', () => {
    expect(shouldRetry(DEFAULT_RETRY_POLICY, 2)).toBe(true);
    expect(shouldRetry(DEFAULT_RETRY_POLICY, 3)).toBe(false);
  });
});

describe('computeRetryDelay', () => {
  it('should honour a longer server retry-after', () => {
    expect(computeRetryDelay(noJitter, 0, { retryAfterMs: 7000, type: 'rate_limit' })).toBe(7000);
  });

  it('should keep the policy delay when the hint is shorter', () => {
    expect(computeRetryDelay(noJitter, 2, { message: 'busy', retryAfterMs: 10, type: 'service_unavailable' })).toBe(
      4000
    );
  });

  it('should wait at least one second after a network failure', () => {
    const policy = createRetryPolicy({ initialDelayMs: 10, jitter: false });
    expect(
      computeRetryDelay(policy, 0, { canRetry: true, isTimeout: false, message: 'reset', type: 'network' })
    ).toBe(1000);
  });
});

// Pure retry/backoff functions

import { retryAfterMs, type ApiError } from '../errors.js';

import type { RetryPolicy } from './types.js';

export const JITTER_MIN_FACTOR = 0.5;
export const JITTER_MAX_FACTOR = 1.5;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  initialDelayMs: 1000,
  jitter: true,
  maxAttempts: 3,
  maxDelayMs: 60_000,
  multiplier: 2,
};

export const createRetryPolicy = (overrides: Partial<RetryPolicy> = {}): RetryPolicy => {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };

  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 0) {
    throw new Error(`Invalid retry policy: maxAttempts must be a non-negative integer, got ${policy.maxAttempts}`);
  }
  if (!(policy.multiplier > 1)) {
    throw new Error(`Invalid retry policy: multiplier must be greater than 1, got ${policy.multiplier}`);
  }
  if (policy.initialDelayMs < 0 || policy.maxDelayMs < policy.initialDelayMs) {
    throw new Error(
      `Invalid retry policy: expected 0 <= initialDelayMs <= maxDelayMs, got ${policy.initialDelayMs} and ${policy.maxDelayMs}`
    );
  }

  return policy;
};

/**
 * Un-jittered exponential backoff for an attempt index.
 * Non-decreasing in `attempt` and never above `maxDelayMs`.
 */
export const baseDelayForAttempt = (policy: RetryPolicy, attempt: number): number => {
  if (attempt <= 0) {
    return policy.initialDelayMs;
  }
  const delay = Math.floor(policy.initialDelayMs * Math.pow(policy.multiplier, attempt));
  return Math.min(delay, policy.maxDelayMs);
};

/**
 * Delay before retrying after `attempt` failed. With jitter the base delay is
 * scaled by a fresh uniform factor in [0.5, 1.5].
 */
export const delayForAttempt = (policy: RetryPolicy, attempt: number, random: () => number = Math.random): number => {
  const base = baseDelayForAttempt(policy, attempt);
  if (!policy.jitter) {
    return base;
  }
  const factor = JITTER_MIN_FACTOR + random() * (JITTER_MAX_FACTOR - JITTER_MIN_FACTOR);
  return Math.floor(base * factor);
};

export const shouldRetry = (policy: RetryPolicy, attempt: number): boolean => attempt < policy.maxAttempts;

/**
 * Wait applied by the executor: the policy delay, stretched to honour any
 * server- or client-supplied retry-after hint.
 */
export const computeRetryDelay = (
  policy: RetryPolicy,
  attempt: number,
  error: ApiError,
  random: () => number = Math.random
): number => {
  return Math.max(delayForAttempt(policy, attempt, random), retryAfterMs(error) ?? 0);
};

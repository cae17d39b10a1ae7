// Pure rate limiting functions
// All functions are pure - they take state and return new state without side effects

import type { RateLimitState } from './types.js';

export interface RateLimitDecision {
  allowed: boolean;
  /** Time until the current window closes, set on rejection */
  retryAfterMs?: number | undefined;
  state: RateLimitState;
}

/**
 * Start a new window when the previous one has fully elapsed.
 * Fixed window: capacity is restored once per window, never continuously.
 */
export const refillWindow = (state: RateLimitState, currentTime: number): RateLimitState => {
  // Initialize window on first check
  if (state.windowStart < 0) {
    return { ...state, windowStart: currentTime };
  }

  if (currentTime - state.windowStart >= state.windowMs) {
    return { ...state, tokensRemaining: state.capacity, windowStart: currentTime };
  }

  return state;
};

export const timeUntilWindowReset = (state: RateLimitState, currentTime: number): number => {
  if (state.windowStart < 0) {
    return 0;
  }
  return Math.max(0, state.windowStart + state.windowMs - currentTime);
};

/**
 * Check the limiter and take one token when available
 */
export const tryConsume = (state: RateLimitState, currentTime: number): RateLimitDecision => {
  const refilled = refillWindow(state, currentTime);

  if (refilled.tokensRemaining > 0) {
    return {
      allowed: true,
      state: { ...refilled, tokensRemaining: refilled.tokensRemaining - 1 },
    };
  }

  return {
    allowed: false,
    retryAfterMs: timeUntilWindowReset(refilled, currentTime),
    state: refilled,
  };
};

/**
 * Return a token taken during `windowStart` (e.g. for a cancelled attempt).
 * Tokens from an already-closed window are not carried over.
 */
export const refundToken = (state: RateLimitState, windowStart: number): RateLimitState => {
  if (state.windowStart !== windowStart || state.tokensRemaining >= state.capacity) {
    return state;
  }
  return { ...state, tokensRemaining: state.tokensRemaining + 1 };
};

/**
 * Get current rate limit status (for monitoring/debugging)
 */
export const getRateLimitStatus = (state: RateLimitState, currentTime: number) => {
  const refilled = refillWindow(state, currentTime);

  return {
    capacity: refilled.capacity,
    tokensRemaining: refilled.tokensRemaining,
    windowMs: refilled.windowMs,
    windowResetInMs: timeUntilWindowReset(refilled, currentTime),
    windowStart: refilled.windowStart,
  };
};

export type RateLimitStatus = ReturnType<typeof getRateLimitStatus>;

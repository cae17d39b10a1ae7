// Pure circuit breaker functions
// All functions are pure - they take state and return new state without side effects

import type { CircuitState, CircuitStatus } from './types.js';

export interface CircuitPermission {
  allowed: boolean;
  state: CircuitState;
  /** True when this permission is the half-open trial request */
  trial: boolean;
}

/**
 * Time elapsed since the circuit last opened has reached the recovery timeout
 */
export const isRecoveryDue = (state: CircuitState, currentTime: number): boolean => {
  return currentTime - state.lastFailureTime >= state.recoveryTimeoutMs;
};

/**
 * Gate a single attempt.
 *
 * closed: allowed. open: rejected until the recovery timeout has elapsed, at
 * which point the circuit moves to half-open and this caller becomes the one
 * trial request. half-open: rejected while the trial is outstanding.
 */
export const acquirePermission = (state: CircuitState, currentTime: number): CircuitPermission => {
  switch (state.status) {
    case 'closed':
      return { allowed: true, state, trial: false };

    case 'open':
      if (!isRecoveryDue(state, currentTime)) {
        return { allowed: false, state, trial: false };
      }
      return { allowed: true, state: { ...state, status: 'half-open', trialInFlight: true }, trial: true };

    case 'half-open':
      if (state.trialInFlight) {
        return { allowed: false, state, trial: false };
      }
      return { allowed: true, state: { ...state, trialInFlight: true }, trial: true };
  }
};

/**
 * Record a failure and return new state.
 *
 * While half-open only the trial's own outcome moves the circuit; a late
 * failure from an attempt admitted before the circuit opened is ignored.
 */
export const recordFailure = (state: CircuitState, currentTime: number, fromTrial = true): CircuitState => {
  if (state.status === 'half-open' && !fromTrial) {
    return state;
  }
  const failureCount = state.failureCount + 1;

  switch (state.status) {
    case 'closed':
      if (failureCount >= state.failureThreshold) {
        return { ...state, failureCount, lastFailureTime: currentTime, status: 'open' };
      }
      return { ...state, failureCount, lastFailureTime: currentTime };

    case 'half-open':
      // Trial failed: reopen and restart the recovery clock
      return { ...state, failureCount, lastFailureTime: currentTime, status: 'open', trialInFlight: false };

    case 'open':
      // Late failure from an attempt that started before the circuit opened
      return { ...state, failureCount, lastFailureTime: currentTime };
  }
};

/**
 * Record a success and return new state. A success that is not the trial's
 * leaves a half-open circuit waiting on its trial.
 */
export const recordSuccess = (state: CircuitState, currentTime: number, fromTrial = true): CircuitState => {
  if (state.status === 'half-open' && !fromTrial) {
    return { ...state, lastSuccessTime: currentTime };
  }
  switch (state.status) {
    case 'closed':
    case 'half-open':
      return { ...state, failureCount: 0, lastSuccessTime: currentTime, status: 'closed', trialInFlight: false };

    case 'open':
      // Late success from an attempt issued before the circuit opened; recovery still goes through half-open
      return { ...state, lastSuccessTime: currentTime };
  }
};

/**
 * Give back a half-open trial that was cancelled before it produced an outcome
 */
export const releaseTrial = (state: CircuitState): CircuitState => {
  if (state.status !== 'half-open' || !state.trialInFlight) {
    return state;
  }
  return { ...state, trialInFlight: false };
};

/**
 * Reset circuit breaker to initial state
 */
export const resetCircuit = (state: CircuitState): CircuitState => {
  return {
    ...state,
    failureCount: 0,
    lastFailureTime: 0,
    lastSuccessTime: 0,
    status: 'closed',
    trialInFlight: false,
  };
};

export const getCircuitStatus = (state: CircuitState): CircuitStatus => state.status;

/**
 * Get comprehensive circuit breaker statistics
 */
export const getCircuitStatistics = (state: CircuitState, currentTime: number) => {
  const timeSinceLastFailure = state.lastFailureTime ? currentTime - state.lastFailureTime : 0;
  const timeUntilRecovery = state.status === 'open' ? state.recoveryTimeoutMs - timeSinceLastFailure : 0;

  return {
    failureCount: state.failureCount,
    failureThreshold: state.failureThreshold,
    lastFailureTime: state.lastFailureTime,
    lastSuccessTime: state.lastSuccessTime,
    recoveryTimeoutMs: state.recoveryTimeoutMs,
    state: state.status,
    timeSinceLastFailureMs: timeSinceLastFailure,
    timeUntilRecoveryMs: Math.max(0, timeUntilRecovery),
    trialInFlight: state.trialInFlight,
  };
};

export type CircuitStatistics = ReturnType<typeof getCircuitStatistics>;

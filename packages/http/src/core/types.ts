// Pure types for functional core
// No classes, only data structures

export type CircuitStatus = 'closed' | 'open' | 'half-open';

/**
 * Circuit breaker state (immutable)
 */
export interface CircuitState {
  failureCount: number;
  failureThreshold: number;
  lastFailureTime: number;
  lastSuccessTime: number;
  recoveryTimeoutMs: number;
  status: CircuitStatus;
  /** Set while the single half-open trial request is outstanding */
  trialInFlight: boolean;
}

/**
 * Fixed-window rate limiter state (immutable)
 */
export interface RateLimitState {
  capacity: number;
  tokensRemaining: number;
  windowMs: number;
  windowStart: number;
}

export interface RetryPolicy {
  initialDelayMs: number;
  jitter: boolean;
  maxAttempts: number;
  maxDelayMs: number;
  multiplier: number;
}

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  delay: (ms: number, signal?: AbortSignal) => Promise<void>;
  fetch: typeof fetch;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
  /** Uniform random number in [0, 1) */
  random: () => number;
}

const assertPositiveFinite = (fieldName: string, value: number): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid configuration: ${fieldName} must be a positive finite number, got ${value}`);
  }
};

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_RECOVERY_TIMEOUT_MS = 30_000;
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60_000;

/**
 * Factory functions for initial states
 */
export const createInitialCircuitState = (
  failureThreshold = DEFAULT_FAILURE_THRESHOLD,
  recoveryTimeoutMs = DEFAULT_RECOVERY_TIMEOUT_MS
): CircuitState => {
  assertPositiveFinite('failureThreshold', failureThreshold);
  assertPositiveFinite('recoveryTimeoutMs', recoveryTimeoutMs);

  return {
    failureCount: 0,
    failureThreshold,
    lastFailureTime: 0,
    lastSuccessTime: 0,
    recoveryTimeoutMs,
    status: 'closed',
    trialInFlight: false,
  };
};

export const createInitialRateLimitState = (capacity: number, windowMs = DEFAULT_RATE_LIMIT_WINDOW_MS): RateLimitState => {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new Error(`Invalid configuration: capacity must be a positive integer, got ${capacity}`);
  }
  assertPositiveFinite('windowMs', windowMs);

  return {
    capacity,
    tokensRemaining: capacity,
    windowMs,
    windowStart: -1, // Will be set by effects.now() on first check
  };
};

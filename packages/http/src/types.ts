import type { ZodType } from 'zod';

import type { ClientConfigInput } from './config.js';
import type { QueryParams } from './core/http-utils.js';
import type { ApiErrorType } from './errors.js';
import type { InstrumentationCollector } from './instrumentation.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Bodies are either sent as-is (strings, bytes) or serialized as JSON
 * (plain objects and arrays). Streams and async iterables are accepted by
 * the type so the executor can reject them: they cannot be replayed on retry.
 */
export type RequestBody =
  | string
  | Uint8Array
  | ReadableStream<Uint8Array>
  | AsyncIterable<Uint8Array>
  | Record<string, unknown>
  | readonly unknown[];

export interface HttpRequestOptions<T = unknown> {
  body?: RequestBody | undefined;
  headers?: Record<string, string> | undefined;
  method?: HttpMethod | undefined;
  query?: QueryParams | undefined;
  /** Validates the decoded body; a mismatch fails with validation{code:'invalid_response'} */
  schema?: ZodType<T> | undefined;
  /** Cancels the logical call, including any pending backoff */
  signal?: AbortSignal | undefined;
  /** Per-attempt timeout override */
  timeoutMs?: number | undefined;
}

export type AttemptOutcome = 'success' | 'failure' | 'circuit_open' | 'rate_limited' | 'cancelled';

export interface HttpClientHooks {
  /**
   * Called once when a logical request starts (before any retry attempts).
   * Paired with exactly one terminal event (onRequestSuccess or onRequestFailure).
   */
  onRequestStart?: (event: { endpoint: string; method: string; requestId: string; timestamp: number }) => void;

  /**
   * Called once when a logical request succeeds.
   * The durationMs includes time spent on all retry attempts.
   */
  onRequestSuccess?: (event: { attempts: number; durationMs: number; endpoint: string; method: string; status: number }) => void;

  /**
   * Called once when a logical request fails, with the error it resolved to.
   */
  onRequestFailure?: (event: {
    attempts: number;
    durationMs: number;
    endpoint: string;
    error: string;
    errorType: ApiErrorType;
    method: string;
    status?: number | undefined;
  }) => void;

  /**
   * Called after every attempt, including ones stopped by the breaker or limiter.
   */
  onAttempt?: (event: {
    attempt: number;
    elapsedMs: number;
    errorType?: ApiErrorType | undefined;
    operation: string;
    outcome: AttemptOutcome;
    status?: number | undefined;
  }) => void;

  onRateLimited?: (event: { retryAfterMs?: number | undefined; source: 'client' | 'server'; status?: number | undefined }) => void;

  onCircuitRejected?: (event: { circuit: string; endpoint: string; retryAfterMs: number }) => void;

  /**
   * Called before each backoff sleep.
   */
  onBackoff?: (event: { attemptNumber: number; delayMs: number; reason: ApiErrorType }) => void;
}

export interface HttpClientOptions {
  hooks?: HttpClientHooks | undefined;
  instrumentation?: InstrumentationCollector | undefined;
  /** Label for logs and metrics */
  name?: string | undefined;
}

export type HttpClientConfig = ClientConfigInput & HttpClientOptions;

export interface PaginateOptions<T> {
  /** What to do after an item fails schema validation */
  onItemError?: 'continue' | 'stop' | undefined;
  query?: QueryParams | undefined;
  schema?: ZodType<T> | undefined;
  signal?: AbortSignal | undefined;
}

/**
 * Structured errors produced by the request executor.
 *
 * Closed discriminated union on `type`. Every helper below is a pure
 * function of the variant's payload.
 */
export interface NotFoundError {
  type: 'not_found';
}

export interface AuthenticationError {
  message: string;
  type: 'authentication';
}

export interface AuthorizationError {
  message: string;
  type: 'authorization';
}

export interface RateLimitError {
  retryAfterMs?: number | undefined;
  type: 'rate_limit';
}

export interface ApiResponseError {
  code: number;
  details?: unknown;
  message: string;
  requestId?: string | undefined;
  type: 'api';
}

export interface ValidationError {
  code?: string | undefined;
  field?: string | undefined;
  message: string;
  type: 'validation';
}

export interface NetworkError {
  canRetry: boolean;
  isTimeout: boolean;
  message: string;
  type: 'network';
}

export interface TimeoutError {
  durationMs: number;
  operation: string;
  type: 'timeout';
}

export interface ConflictError {
  message: string;
  retryAfterMs?: number | undefined;
  type: 'conflict';
}

export interface ServiceUnavailableError {
  message: string;
  retryAfterMs?: number | undefined;
  type: 'service_unavailable';
}

export interface RetryExhaustedError {
  attempts: number;
  lastError: ApiError;
  operation: string;
  type: 'retry_exhausted';
}

export interface InvalidRequestError {
  message: string;
  type: 'invalid_request';
}

export interface QuotaExceededError {
  message: string;
  resetTime?: Date | undefined;
  type: 'quota_exceeded';
}

export interface OtherError {
  message: string;
  type: 'other';
}

export type ApiError =
  | NotFoundError
  | AuthenticationError
  | AuthorizationError
  | RateLimitError
  | ApiResponseError
  | ValidationError
  | NetworkError
  | TimeoutError
  | ConflictError
  | ServiceUnavailableError
  | RetryExhaustedError
  | InvalidRequestError
  | QuotaExceededError
  | OtherError;

export type ApiErrorType = ApiError['type'];

/** Minimum wait applied to bare network failures so retries never hot-loop. */
export const NETWORK_RETRY_FLOOR_MS = 1000;

export const CANCELLED_MESSAGE = 'Request cancelled';

export const networkError = (message: string, options: { canRetry?: boolean; isTimeout?: boolean } = {}): NetworkError => ({
  canRetry: options.canRetry ?? true,
  isTimeout: options.isTimeout ?? false,
  message,
  type: 'network',
});

export const cancelledError = (): OtherError => ({ message: CANCELLED_MESSAGE, type: 'other' });

export const isCancelledError = (error: ApiError): boolean =>
  error.type === 'other' && error.message === CANCELLED_MESSAGE;

export const isRetryable = (error: ApiError): boolean => {
  switch (error.type) {
    case 'rate_limit':
    case 'conflict':
    case 'service_unavailable':
    case 'timeout':
      return true;
    case 'network':
      return error.canRetry;
    case 'api':
      return error.code >= 500 && error.code <= 599;
    case 'not_found':
    case 'authentication':
    case 'authorization':
    case 'validation':
    case 'retry_exhausted':
    case 'invalid_request':
    case 'quota_exceeded':
    case 'other':
      return false;
  }
};

export const statusCode = (error: ApiError): number | undefined => {
  switch (error.type) {
    case 'not_found':
      return 404;
    case 'authentication':
      return 401;
    case 'authorization':
      return 403;
    case 'rate_limit':
    case 'quota_exceeded':
      return 429;
    case 'api':
      return error.code;
    case 'validation':
      return 422;
    case 'timeout':
      return 408;
    case 'conflict':
      return 409;
    case 'service_unavailable':
      return 503;
    case 'invalid_request':
      return 400;
    case 'retry_exhausted':
      return statusCode(error.lastError);
    case 'network':
    case 'other':
      return undefined;
  }
};

export const retryAfterMs = (error: ApiError): number | undefined => {
  switch (error.type) {
    case 'rate_limit':
    case 'conflict':
    case 'service_unavailable':
      return error.retryAfterMs;
    case 'network':
      return NETWORK_RETRY_FLOOR_MS;
    default:
      return undefined;
  }
};

export const describeError = (error: ApiError): string => {
  switch (error.type) {
    case 'not_found':
      return 'Resource not found';
    case 'authentication':
      return `Authentication failed: ${error.message}`;
    case 'authorization':
      return `Authorization failed: ${error.message}`;
    case 'rate_limit':
      return error.retryAfterMs === undefined
        ? 'Rate limit exceeded'
        : `Rate limit exceeded. Retry after ${error.retryAfterMs}ms`;
    case 'api':
      return `API error ${error.code}: ${error.message}`;
    case 'validation':
      return error.field ? `Validation error on ${error.field}: ${error.message}` : `Validation error: ${error.message}`;
    case 'network':
      return `Network error: ${error.message}`;
    case 'timeout':
      return `Operation ${error.operation} timed out after ${error.durationMs}ms`;
    case 'conflict':
      return `Conflict: ${error.message}`;
    case 'service_unavailable':
      return `Service unavailable: ${error.message}`;
    case 'retry_exhausted':
      return `${error.operation} failed after ${error.attempts} attempts: ${describeError(error.lastError)}`;
    case 'invalid_request':
      return `Invalid request: ${error.message}`;
    case 'quota_exceeded':
      return error.resetTime
        ? `Quota exceeded: ${error.message} (resets ${error.resetTime.toISOString()})`
        : `Quota exceeded: ${error.message}`;
    case 'other':
      return error.message;
  }
};

/**
 * Native Error carrying an ApiError, for callers that prefer to throw
 * (e.g. `result.match(ok, (e) => { throw toError(e); })`).
 */
export class ApiClientError extends Error {
  constructor(public readonly apiError: ApiError) {
    super(describeError(apiError));
    this.name = 'ApiClientError';
  }
}

export const toError = (error: ApiError): ApiClientError => new ApiClientError(error);

/**
 * Thrown at construction time for invalid client configuration.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly hint?: string
  ) {
    super(hint ? `${message} (${hint})` : message);
    this.name = 'ConfigurationError';
  }
}

// Pure classification of transport outcomes into ApiError variants

import { z } from 'zod';

import { networkError, type ApiError } from '../errors.js';

import { parseRetryAfter } from './http-utils.js';

export interface ResponseOutcome {
  bodyText: string;
  headers: Headers;
  status: number;
  statusText?: string | undefined;
}

export interface TransportFailureContext {
  operation: string;
  /** Our own per-attempt timer fired */
  timedOut: boolean;
  timeoutMs: number;
}

const errorEnvelopeSchema = z.object({ message: z.string() }).passthrough();

const validationEnvelopeSchema = z.object({
  errors: z.array(
    z
      .object({
        code: z.string().optional(),
        field: z.string().optional(),
        message: z.string().optional(),
      })
      .passthrough()
  ),
});

const CONNECT_FAILURE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EPIPE',
  'ETIMEDOUT',
  'UND_ERR_CLOSED',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const CONNECT_TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT']);

const tryParseJson = (text: string): unknown => {
  if (!text) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
};

/**
 * Map a completed, non-successful HTTP exchange to an error variant
 */
export const classifyResponse = (outcome: ResponseOutcome, currentTime: number): ApiError => {
  const { status, headers, bodyText } = outcome;
  const retryAfterMs = parseRetryAfter(headers.get('retry-after'), currentTime);
  const body = tryParseJson(bodyText);
  const envelope = errorEnvelopeSchema.safeParse(body);
  const serverMessage = envelope.success ? envelope.data.message : undefined;

  switch (status) {
    case 401:
      return { message: serverMessage ?? 'Unauthorized - check your API credentials', type: 'authentication' };
    case 403:
      return { message: serverMessage ?? 'Forbidden - insufficient permissions', type: 'authorization' };
    case 404:
      return { type: 'not_found' };
    case 409:
      return { message: serverMessage ?? 'Resource conflict', retryAfterMs, type: 'conflict' };
    case 422: {
      const validation = validationEnvelopeSchema.safeParse(body);
      const first = validation.success ? validation.data.errors[0] : undefined;
      if (first) {
        return {
          code: first.code,
          field: first.field,
          message: first.message ?? 'Validation failed',
          type: 'validation',
        };
      }
      return { message: serverMessage ?? 'Validation failed', type: 'validation' };
    }
    case 429:
      return { retryAfterMs, type: 'rate_limit' };
    case 503:
      return { message: serverMessage ?? 'Service temporarily unavailable', retryAfterMs, type: 'service_unavailable' };
    default:
      return {
        code: status,
        details: body,
        message: serverMessage ?? (bodyText || outcome.statusText || `HTTP ${status}`),
        requestId: headers.get('x-request-id') ?? undefined,
        type: 'api',
      };
  }
};

/**
 * A success status whose body is not valid JSON
 */
export const classifyParseFailure = (cause: unknown): ApiError => {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return networkError(`Failed to parse JSON response: ${reason}`, { canRetry: false });
};

/**
 * Extract a system/undici error code from an error or its cause chain
 */
export const getErrorCode = (error: unknown): string | undefined => {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
};

/**
 * Map a failure that happened before a response was received
 */
export const classifyTransportFailure = (error: unknown, context: TransportFailureContext): ApiError => {
  if (context.timedOut) {
    return { durationMs: context.timeoutMs, operation: context.operation, type: 'timeout' };
  }

  const code = getErrorCode(error);
  if (code && CONNECT_FAILURE_CODES.has(code)) {
    return networkError(`Connection failed (${code})`, { canRetry: true, isTimeout: CONNECT_TIMEOUT_CODES.has(code) });
  }

  const message = error instanceof Error ? error.message : String(error);
  return networkError(message, { canRetry: true });
};

/**
 * Outcomes that count against the circuit. Any other completed exchange is a success.
 */
export const isCircuitFailure = (error: ApiError): boolean => {
  switch (error.type) {
    case 'network':
    case 'timeout':
    case 'service_unavailable':
      return true;
    case 'api':
      return error.code >= 500;
    default:
      return false;
  }
};

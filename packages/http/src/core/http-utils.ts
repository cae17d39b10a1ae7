// Pure HTTP utility functions
// All functions are pure - no side effects

import { randomBytes } from 'node:crypto';

export type QueryValue = string | number | boolean | readonly (string | number | boolean)[] | undefined;
export type QueryParams = Record<string, QueryValue>;

const SENSITIVE_HEADERS = new Set(['authorization', 'cookie', 'set-cookie', 'x-api-key', 'x-auth-token']);

const ABSOLUTE_URL_PATTERN = /^https?:\/\//i;

export const isAbsoluteUrl = (value: string): boolean => ABSOLUTE_URL_PATTERN.test(value);

/**
 * Build URL from base URL and endpoint.
 * Absolute endpoints (e.g. server-issued pagination cursors) are used verbatim.
 */
export const buildUrl = (baseUrl: string, endpoint: string): string => {
  if (isAbsoluteUrl(endpoint)) {
    return endpoint;
  }

  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  if (!endpoint || endpoint === '/') {
    return cleanBaseUrl;
  }

  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

/**
 * Serialize query parameters onto a URL.
 * Arrays are comma-joined, undefined values are skipped, existing parameters are kept.
 */
export const appendQuery = (url: string, query: QueryParams | undefined): string => {
  if (!query) {
    return url;
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    params.append(key, Array.isArray(value) ? value.join(',') : String(value));
  }

  const serialized = params.toString();
  if (!serialized) {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${serialized}`;
};

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    // Not parseable: nothing to redact structurally
    return url;
  }
};

export const isSensitiveHeader = (name: string): boolean => SENSITIVE_HEADERS.has(name.toLowerCase());

/**
 * Copy of the headers safe to log
 */
export const redactHeaders = (headers: Record<string, string>): Record<string, string> => {
  return Object.fromEntries(
    Object.entries(headers).map(([name, value]) => [name, isSensitiveHeader(name) ? '[REDACTED]' : value])
  );
};

/**
 * Parse Retry-After header value
 * Supports both delay-seconds and HTTP-date formats
 */
export const parseRetryAfter = (value: string | null | undefined, currentTime: number): number | undefined => {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - currentTime);
  }

  return undefined;
};

/**
 * Client-generated request id: `<prefix>-<epoch millis>-<32 hex chars>`
 */
export const generateRequestId = (prefix: string, currentTime: number): string => {
  return `${prefix}-${currentTime}-${randomBytes(16).toString('hex')}`;
};

/**
 * Endpoint class used to key per-endpoint circuit breakers: the first path segment.
 */
export const endpointClass = (endpoint: string): string => {
  try {
    const { pathname } = new URL(endpoint, 'http://placeholder.invalid');
    const firstSegment = pathname.split('/').find((segment) => segment.length > 0);
    return firstSegment ? `/${firstSegment}` : '/';
  } catch {
    return endpoint;
  }
};

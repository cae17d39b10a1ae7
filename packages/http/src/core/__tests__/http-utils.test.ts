import { describe, expect, it } from 'vitest';

import {
  appendQuery,
  buildUrl,
  endpointClass,
  generateRequestId,
  parseRetryAfter,
  redactHeaders,
  sanitizeUrl,
} from '../http-utils.js';

describe('buildUrl', () => {
  it('should join base and endpoint with a single slash', () => {
    expect(buildUrl('https://api.example.com/v1/', '/orders')).toBe('https://api.example.com/v1/orders');
    expect(buildUrl('https://api.example.com/v1', 'orders')).toBe('https://api.example.com/v1/orders');
  });

  it('should use absolute endpoints verbatim', () => {
    expect(buildUrl('https://api.example.com', 'https://cdn.example.com/orders?page=2')).toBe(
      'https://cdn.example.com/orders?page=2'
    );
  });
});

describe('appendQuery', () => {
  it('should comma-join arrays and skip undefined values', () => {
    expect(appendQuery('https://api.example.com/orders', { expand: ['items', 'customer'], limit: 10, q: undefined })).toBe(
      'https://api.example.com/orders?expand=items%2Ccustomer&limit=10'
    );
  });

  it('should extend an existing query string', () => {
    expect(appendQuery('https://api.example.com/orders?page=2', { active: true })).toBe(
      'https://api.example.com/orders?page=2&active=true'
    );
  });

  it('should leave the url untouched when nothing is set', () => {
    expect(appendQuery('https://api.example.com/orders', { q: undefined })).toBe('https://api.example.com/orders');
  });
});

describe('parseRetryAfter', () => {
  it('should parse delay-seconds', () => {
    expect(parseRetryAfter('120', 0)).toBe(120_000);
  });

  it('should parse an HTTP-date relative to now', () => {
    const now = Date.parse('2024-06-01T12:00:00Z');
    expect(parseRetryAfter('Sat, 01 Jun 2024 12:00:30 GMT', now)).toBe(30_000);
  });

  it('should clamp past dates to zero', () => {
    const now = Date.parse('2024-06-01T12:00:00Z');
    expect(parseRetryAfter('Sat, 01 Jun 2024 11:00:00 GMT', now)).toBe(0);
  });

  it('should ignore missing or garbage values', () => {
    expect(parseRetryAfter(null, 0)).toBeUndefined();
    expect(parseRetryAfter('soon', 0)).toBeUndefined();
  });
});

describe('generateRequestId', () => {
  it('should combine prefix, time and 32 hex chars', () => {
    expect(generateRequestId('req', 1_700_000_000_000)).toMatch(/^req-1700000000000-[0-9a-f]{32}$/);
  });

  it('should not repeat', () => {
    expect(generateRequestId('req', 1)).not.toBe(generateRequestId('req', 1));
  });
});

describe('redactHeaders', () => {
  it('should hide credentials regardless of case', () => {
    expect(
      redactHeaders({ Accept: 'application/json', Authorization: 'Bearer test-secret', 'X-API-Key': 'test-key' })
    ).toEqual({ Accept: 'application/json', Authorization: '[REDACTED]', 'X-API-Key': '[REDACTED]' });
  });
});

describe('sanitizeUrl', () => {
  it('should mask sensitive query parameters', () => {
    expect(sanitizeUrl('https://api.example.com/orders?api_key=test-key&page=1')).toBe(
      'https://api.example.com/orders?api_key=***&page=1'
    );
  });
});

describe('endpointClass', () => {
  it('should key on the first path segment', () => {
    expect(endpointClass('/orders/123/items')).toBe('/orders');
    expect(endpointClass('https://api.example.com/returns?page=2')).toBe('/returns');
    expect(endpointClass('/')).toBe('/');
  });
});

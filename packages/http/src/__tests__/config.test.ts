import { describe, expect, it } from 'vitest';

import { CLIENT_VERSION, ClientConfigBuilder, parseClientConfig, totalTimeoutMs } from '../config.js';
import { ConfigurationError } from '../errors.js';

describe('parseClientConfig', () => {
  it('should apply defaults', () => {
    expect(parseClientConfig({ baseUrl: 'https://api.example.com' })).toEqual({
      baseUrl: 'https://api.example.com',
      clientVersion: CLIENT_VERSION,
      connectTimeoutMs: 10_000,
      defaultHeaders: {},
      jitter: true,
      maxRetryDelayMs: 60_000,
      pool: {
        idleTimeoutMs: 30_000,
        keepAliveTimeoutMs: 90_000,
        maxConnectionsPerHost: 10,
        maxTotalConnections: 100,
      },
      requestIdPrefix: 'req',
      retryAttempts: 3,
      retryDelayMs: 1000,
      retryMultiplier: 2,
      timeoutMs: 30_000,
      userAgent: `stateset-http/${CLIENT_VERSION}`,
    });
  });

  it('should fill nested defaults for rate limit and circuit breaker', () => {
    const config = parseClientConfig({
      baseUrl: 'https://api.example.com',
      circuitBreaker: { failureThreshold: 3 },
      rateLimit: { requestsPerMinute: 120 },
    });
    expect(config.rateLimit).toEqual({ requestsPerMinute: 120, windowMs: 60_000 });
    expect(config.circuitBreaker).toEqual({ failureThreshold: 3, recoveryTimeoutMs: 30_000, scope: 'client' });
  });

  it('should reject a non-http scheme with a hint', () => {
    expect(() => parseClientConfig({ baseUrl: 'ftp://files.example.com' })).toThrow(
      'baseUrl: Invalid URL scheme (Ensure the URL starts with http:// or https://)'
    );
  });

  it('should reject a connect timeout above the request timeout', () => {
    expect(() => parseClientConfig({ baseUrl: 'https://api.example.com', connectTimeoutMs: 5000, timeoutMs: 1000 })).toThrow(
      ConfigurationError
    );
  });

  it('should reject a multiplier of 1', () => {
    expect(() => parseClientConfig({ baseUrl: 'https://api.example.com', retryMultiplier: 1 })).toThrow(
      'retryMultiplier: Retry multiplier must be greater than 1.0'
    );
  });

  it('should reject a zero pool size', () => {
    expect(() =>
      parseClientConfig({ baseUrl: 'https://api.example.com', pool: { maxConnectionsPerHost: 0 } })
    ).toThrow(ConfigurationError);
  });
});

describe('totalTimeoutMs', () => {
  it('should sum timeouts and un-jittered backoff over the retry attempts', () => {
    const config = parseClientConfig({ baseUrl: 'https://api.example.com', timeoutMs: 10_000 });
    // 3 × 10s + (1s + 2s + 4s)
    expect(totalTimeoutMs(config)).toBe(37_000);
  });

  it('should cap each backoff at the max delay', () => {
    const config = parseClientConfig({
      baseUrl: 'https://api.example.com',
      connectTimeoutMs: 500,
      maxRetryDelayMs: 1500,
      retryAttempts: 3,
      timeoutMs: 1000,
    });
    // 3 × 1s + (1s + 1.5s + 1.5s)
    expect(totalTimeoutMs(config)).toBe(7000);
  });
});

describe('ClientConfigBuilder', () => {
  it('should build a validated config', () => {
    const config = new ClientConfigBuilder()
      .baseUrl('https://api.example.com')
      .timeout(5000)
      .connectTimeout(2000)
      .retryAttempts(1)
      .rateLimit(60)
      .authorization('Bearer test-token')
      .defaultHeader('X-Tenant', 'acme')
      .build();

    expect(config.timeoutMs).toBe(5000);
    expect(config.connectTimeoutMs).toBe(2000);
    expect(config.retryAttempts).toBe(1);
    expect(config.rateLimit).toEqual({ requestsPerMinute: 60, windowMs: 60_000 });
    expect(config.authorization).toBe('Bearer test-token');
    expect(config.defaultHeaders).toEqual({ 'X-Tenant': 'acme' });
  });

  it('should require a base URL', () => {
    expect(() => new ClientConfigBuilder().build()).toThrow('Base URL is required');
  });

  it('should run the same validation as parseClientConfig', () => {
    expect(() => new ClientConfigBuilder().baseUrl('https://api.example.com').timeout(0).build()).toThrow(
      ConfigurationError
    );
  });
});

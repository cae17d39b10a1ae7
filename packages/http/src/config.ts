import { z } from 'zod';

import { baseDelayForAttempt } from './core/retry-policy.js';
import { DEFAULT_FAILURE_THRESHOLD, DEFAULT_RATE_LIMIT_WINDOW_MS, DEFAULT_RECOVERY_TIMEOUT_MS } from './core/types.js';
import { ConfigurationError } from './errors.js';

export const CLIENT_VERSION = '0.1.0';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const poolSettingsSchema = z.object({
  idleTimeoutMs: nonNegativeInt.default(30_000),
  keepAliveTimeoutMs: nonNegativeInt.default(90_000),
  maxConnectionsPerHost: positiveInt.default(10),
  maxTotalConnections: positiveInt.default(100),
});

export const rateLimitSettingsSchema = z.object({
  requestsPerMinute: positiveInt,
  windowMs: positiveInt.default(DEFAULT_RATE_LIMIT_WINDOW_MS),
});

export const circuitBreakerSettingsSchema = z.object({
  failureThreshold: positiveInt.default(DEFAULT_FAILURE_THRESHOLD),
  recoveryTimeoutMs: positiveInt.default(DEFAULT_RECOVERY_TIMEOUT_MS),
  scope: z.enum(['client', 'endpoint']).default('client'),
});

/**
 * Immutable configuration bag read by the executor.
 */
export const clientConfigSchema = z
  .object({
    authorization: z.string().min(1).optional(),
    baseUrl: z
      .string()
      .url({ message: 'Invalid base URL' })
      .refine((value) => /^https?:\/\//i.test(value), { message: 'Invalid URL scheme' }),
    circuitBreaker: circuitBreakerSettingsSchema.optional(),
    clientVersion: z.string().default(CLIENT_VERSION),
    connectTimeoutMs: positiveInt.default(10_000),
    defaultHeaders: z.record(z.string()).default({}),
    jitter: z.boolean().default(true),
    maxRetryDelayMs: nonNegativeInt.default(60_000),
    pool: poolSettingsSchema.default({}),
    rateLimit: rateLimitSettingsSchema.optional(),
    requestIdPrefix: z.string().min(1).default('req'),
    retryAttempts: nonNegativeInt.default(3),
    retryDelayMs: nonNegativeInt.default(1000),
    retryMultiplier: z.number().gt(1, { message: 'Retry multiplier must be greater than 1.0' }).default(2),
    timeoutMs: positiveInt.default(30_000),
    userAgent: z.string().default(`stateset-http/${CLIENT_VERSION}`),
  })
  .superRefine((config, ctx) => {
    if (config.connectTimeoutMs > config.timeoutMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Connect timeout cannot be greater than request timeout',
        path: ['connectTimeoutMs'],
      });
    }
    if (config.maxRetryDelayMs < config.retryDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Max retry delay cannot be lower than the initial retry delay',
        path: ['maxRetryDelayMs'],
      });
    }
  });

export type ClientConfigInput = z.input<typeof clientConfigSchema>;
export type ClientConfig = Readonly<z.output<typeof clientConfigSchema>>;
export type PoolSettings = z.output<typeof poolSettingsSchema>;
export type RateLimitSettings = z.output<typeof rateLimitSettingsSchema>;
export type CircuitBreakerSettings = z.output<typeof circuitBreakerSettingsSchema>;

const HINTS: Record<string, string> = {
  baseUrl: 'Ensure the URL starts with http:// or https://',
  connectTimeoutMs: 'Ensure connectTimeoutMs <= timeoutMs',
  'pool.maxConnectionsPerHost': 'Set a reasonable value like 10',
  retryMultiplier: 'Use a value like 2.0 for exponential backoff',
  timeoutMs: 'Set a reasonable timeout like 30000',
};

/**
 * Apply defaults and validate. Throws ConfigurationError on the first violation.
 */
export function parseClientConfig(input: ClientConfigInput): ClientConfig {
  const result = clientConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const path = issue ? issue.path.join('.') : '';
  const message = issue ? `${path ? `${path}: ` : ''}${issue.message}` : 'Invalid client configuration';
  throw new ConfigurationError(message, HINTS[path]);
}

/**
 * Upper bound on the wall time of one logical call, ignoring jitter and
 * server retry-after hints.
 */
export function totalTimeoutMs(config: ClientConfig): number {
  const policy = {
    initialDelayMs: config.retryDelayMs,
    jitter: false,
    maxAttempts: config.retryAttempts,
    maxDelayMs: config.maxRetryDelayMs,
    multiplier: config.retryMultiplier,
  };

  let total = 0;
  for (let attempt = 0; attempt < config.retryAttempts; attempt++) {
    total += config.timeoutMs + baseDelayForAttempt(policy, attempt);
  }
  return total;
}

/**
 * Fluent alternative to passing a raw object to `parseClientConfig`.
 */
export class ClientConfigBuilder {
  private input: Partial<ClientConfigInput> = {};
  private readonly headers: Record<string, string> = {};

  baseUrl(url: string): this {
    this.input.baseUrl = url;
    return this;
  }

  timeout(ms: number): this {
    this.input.timeoutMs = ms;
    return this;
  }

  connectTimeout(ms: number): this {
    this.input.connectTimeoutMs = ms;
    return this;
  }

  retryAttempts(attempts: number): this {
    this.input.retryAttempts = attempts;
    return this;
  }

  retryDelay(ms: number): this {
    this.input.retryDelayMs = ms;
    return this;
  }

  maxRetryDelay(ms: number): this {
    this.input.maxRetryDelayMs = ms;
    return this;
  }

  retryMultiplier(multiplier: number): this {
    this.input.retryMultiplier = multiplier;
    return this;
  }

  jitter(enabled: boolean): this {
    this.input.jitter = enabled;
    return this;
  }

  rateLimit(requestsPerMinute: number, windowMs?: number): this {
    this.input.rateLimit = windowMs === undefined ? { requestsPerMinute } : { requestsPerMinute, windowMs };
    return this;
  }

  circuitBreaker(settings: z.input<typeof circuitBreakerSettingsSchema>): this {
    this.input.circuitBreaker = settings;
    return this;
  }

  poolSettings(settings: z.input<typeof poolSettingsSchema>): this {
    this.input.pool = settings;
    return this;
  }

  userAgent(userAgent: string): this {
    this.input.userAgent = userAgent;
    return this;
  }

  clientVersion(version: string): this {
    this.input.clientVersion = version;
    return this;
  }

  authorization(headerValue: string): this {
    this.input.authorization = headerValue;
    return this;
  }

  defaultHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  build(): ClientConfig {
    const { baseUrl } = this.input;
    if (baseUrl === undefined) {
      throw new ConfigurationError('Base URL is required', 'Call .baseUrl("https://api.example.com")');
    }
    return parseClientConfig({ ...this.input, baseUrl, defaultHeaders: { ...this.headers } });
  }
}

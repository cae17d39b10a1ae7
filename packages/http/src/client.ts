import { setTimeout as sleep } from 'node:timers/promises';

import { getLogger, type Logger } from '@stateset/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType } from 'zod';

import { CircuitBreakerRegistry, type CircuitBreaker, type CircuitPermit } from './circuit-breaker.js';
import { parseClientConfig, type ClientConfig } from './config.js';
import type { CircuitStatistics } from './core/circuit-breaker.js';
import {
  classifyParseFailure,
  classifyResponse,
  classifyTransportFailure,
  isCircuitFailure,
  type ResponseOutcome,
} from './core/error-classifier.js';
import * as HttpUtils from './core/http-utils.js';
import type { QueryParams } from './core/http-utils.js';
import type { RateLimitStatus } from './core/rate-limit.js';
import { computeRetryDelay, createRetryPolicy } from './core/retry-policy.js';
import type { HttpEffects, RetryPolicy } from './core/types.js';
import { ConnectionSlots } from './connection-slots.js';
import {
  cancelledError,
  describeError,
  isCancelledError,
  isRetryable,
  networkError,
  statusCode,
  type ApiError,
} from './errors.js';
import { sanitizeEndpoint, type InstrumentationCollector } from './instrumentation.js';
import { collectAll, count, paginate, type PageFetcher } from './pagination.js';
import { RateLimiter, type RateLimitPermit } from './rate-limiter.js';
import type {
  AttemptOutcome,
  HttpClientConfig,
  HttpClientHooks,
  HttpMethod,
  HttpRequestOptions,
  PaginateOptions,
  RequestBody,
} from './types.js';

type RequestOptions<T> = Omit<HttpRequestOptions<T>, 'method'>;
type BodylessOptions<T> = Omit<HttpRequestOptions<T>, 'method' | 'body'>;

interface PreparedBody {
  contentType?: string | undefined;
  payload?: string | Uint8Array | undefined;
}

/**
 * Everything one logical call needs across its attempts
 */
interface CallContext {
  breakerKey: string;
  endpoint: string;
  headers: Record<string, string>;
  method: HttpMethod;
  operation: string;
  payload: string | Uint8Array | undefined;
  schema: ZodType<unknown> | undefined;
  signal: AbortSignal | undefined;
  timeoutMs: number;
  url: string;
  /** Status of the most recent response, if any */
  lastStatus?: number | undefined;
}

/**
 * A breaker together with the permit this attempt got from it
 */
interface AdmittedCircuit {
  breaker: CircuitBreaker;
  permit: CircuitPermit;
}

const isStreamingBody = (body: RequestBody): body is ReadableStream<Uint8Array> | AsyncIterable<Uint8Array> =>
  typeof body === 'object' && !(body instanceof Uint8Array) && Symbol.asyncIterator in body;

export class HttpClient implements PageFetcher {
  readonly config: ClientConfig;
  private readonly name: string;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;
  private readonly hooks: HttpClientHooks | undefined;
  private readonly instrumentation: InstrumentationCollector | undefined;
  private readonly retryPolicy: RetryPolicy;

  // Shared mutable state, touched only in synchronous sections
  private readonly breakers: CircuitBreakerRegistry | undefined;
  private readonly rateLimiter: RateLimiter | undefined;
  private readonly slots: ConnectionSlots;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;
  private isClosed = false;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    const { hooks, instrumentation, name, ...input } = config;
    this.config = parseClientConfig(input);
    this.name = name ?? new URL(this.config.baseUrl).host;
    this.hooks = hooks;
    this.instrumentation = instrumentation;
    this.logger = getLogger(`HttpClient:${this.name}`);

    const { pool } = this.config;
    this.agent = new Agent({
      connect: { timeout: this.config.connectTimeoutMs },
      connections: pool.maxConnectionsPerHost,
      keepAliveMaxTimeout: pool.keepAliveTimeoutMs,
      keepAliveTimeout: pool.idleTimeoutMs,
      pipelining: 1,
    });

    // Initialize effects with production defaults
    this.effects = {
      delay: async (ms: number, signal?: AbortSignal) => {
        await sleep(ms, undefined, signal ? { signal } : undefined);
      },
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      random: Math.random,
      ...effects,
    };

    const clock = () => this.effects.now();

    this.retryPolicy = createRetryPolicy({
      initialDelayMs: this.config.retryDelayMs,
      jitter: this.config.jitter,
      maxAttempts: this.config.retryAttempts,
      maxDelayMs: this.config.maxRetryDelayMs,
      multiplier: this.config.retryMultiplier,
    });

    const { circuitBreaker, rateLimit } = this.config;
    this.breakers = circuitBreaker
      ? new CircuitBreakerRegistry(
          this.name,
          { failureThreshold: circuitBreaker.failureThreshold, recoveryTimeoutMs: circuitBreaker.recoveryTimeoutMs },
          clock
        )
      : undefined;
    this.rateLimiter = rateLimit
      ? new RateLimiter(this.name, rateLimit.requestsPerMinute, rateLimit.windowMs, clock)
      : undefined;
    this.slots = new ConnectionSlots(pool.maxTotalConnections);

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${this.config.baseUrl}, Timeout: ${this.config.timeoutMs}ms, Retries: ${this.config.retryAttempts}, RateLimit: ${JSON.stringify(rateLimit)}, CircuitBreaker: ${JSON.stringify(circuitBreaker)}`
    );
  }

  /**
   * GET with schema validation
   */
  async get<T>(endpoint: string, options: RequestOptions<T> & { schema: ZodType<T> }): Promise<Result<T, ApiError>>;
  /**
   * GET without validation; the decoded JSON is returned as `unknown`
   */
  async get(endpoint: string, options?: RequestOptions<unknown>): Promise<Result<unknown, ApiError>>;
  async get(endpoint: string, options: RequestOptions<unknown> = {}): Promise<Result<unknown, ApiError>> {
    return this.request(endpoint, { ...options, method: 'GET' });
  }

  async post<T>(
    endpoint: string,
    body: RequestBody | undefined,
    options: BodylessOptions<T> & { schema: ZodType<T> }
  ): Promise<Result<T, ApiError>>;
  async post(endpoint: string, body?: RequestBody, options?: BodylessOptions<unknown>): Promise<Result<unknown, ApiError>>;
  async post(
    endpoint: string,
    body?: RequestBody,
    options: BodylessOptions<unknown> = {}
  ): Promise<Result<unknown, ApiError>> {
    return this.request(endpoint, { ...options, body, method: 'POST' });
  }

  async put<T>(
    endpoint: string,
    body: RequestBody | undefined,
    options: BodylessOptions<T> & { schema: ZodType<T> }
  ): Promise<Result<T, ApiError>>;
  async put(endpoint: string, body?: RequestBody, options?: BodylessOptions<unknown>): Promise<Result<unknown, ApiError>>;
  async put(
    endpoint: string,
    body?: RequestBody,
    options: BodylessOptions<unknown> = {}
  ): Promise<Result<unknown, ApiError>> {
    return this.request(endpoint, { ...options, body, method: 'PUT' });
  }

  async patch<T>(
    endpoint: string,
    body: RequestBody | undefined,
    options: BodylessOptions<T> & { schema: ZodType<T> }
  ): Promise<Result<T, ApiError>>;
  async patch(endpoint: string, body?: RequestBody, options?: BodylessOptions<unknown>): Promise<Result<unknown, ApiError>>;
  async patch(
    endpoint: string,
    body?: RequestBody,
    options: BodylessOptions<unknown> = {}
  ): Promise<Result<unknown, ApiError>> {
    return this.request(endpoint, { ...options, body, method: 'PATCH' });
  }

  async delete<T>(endpoint: string, options: RequestOptions<T> & { schema: ZodType<T> }): Promise<Result<T, ApiError>>;
  async delete(endpoint: string, options?: RequestOptions<unknown>): Promise<Result<unknown, ApiError>>;
  async delete(endpoint: string, options: RequestOptions<unknown> = {}): Promise<Result<unknown, ApiError>> {
    return this.request(endpoint, { ...options, method: 'DELETE' });
  }

  /**
   * Lazily stream every item of a paginated list endpoint
   */
  stream<T>(
    endpoint: string,
    options: PaginateOptions<T> & { schema: ZodType<T> }
  ): AsyncIterableIterator<Result<T, ApiError>>;
  stream(endpoint: string, options?: PaginateOptions<unknown>): AsyncIterableIterator<Result<unknown, ApiError>>;
  stream(endpoint: string, options: PaginateOptions<unknown> = {}): AsyncIterableIterator<Result<unknown, ApiError>> {
    return paginate(this, endpoint, options);
  }

  /**
   * Fetch every page of a list endpoint into memory
   */
  async collectAll<T>(
    endpoint: string,
    options: PaginateOptions<T> & { schema: ZodType<T> }
  ): Promise<Result<T[], ApiError>>;
  async collectAll(endpoint: string, options?: PaginateOptions<unknown>): Promise<Result<unknown[], ApiError>>;
  async collectAll(endpoint: string, options: PaginateOptions<unknown> = {}): Promise<Result<unknown[], ApiError>> {
    return collectAll(paginate(this, endpoint, options));
  }

  async count(endpoint: string, query?: QueryParams, signal?: AbortSignal): Promise<Result<number, ApiError>> {
    return count(this, endpoint, query, signal);
  }

  async fetchPage(
    target: string,
    query: QueryParams | undefined,
    signal: AbortSignal | undefined
  ): Promise<Result<unknown, ApiError>> {
    return this.get(target, { query, signal });
  }

  getRateLimitStatus(): RateLimitStatus | undefined {
    return this.rateLimiter?.getStatus();
  }

  /**
   * Breaker statistics for the whole client, or for the endpoint class of
   * `endpoint` when breakers are scoped per endpoint
   */
  getCircuitStatistics(endpoint = '/'): CircuitStatistics | undefined {
    return this.breakers?.get(this.breakerKeyFor(endpoint))?.getStatistics();
  }

  /**
   * Make an HTTP request with circuit breaking, rate limiting, retries and error classification
   */
  async request<T>(endpoint: string, options: HttpRequestOptions<T> & { schema: ZodType<T> }): Promise<Result<T, ApiError>>;
  async request(endpoint: string, options?: HttpRequestOptions<unknown>): Promise<Result<unknown, ApiError>>;
  async request(endpoint: string, options: HttpRequestOptions<unknown> = {}): Promise<Result<unknown, ApiError>> {
    const method = options.method ?? 'GET';
    const sanitizedEndpoint = sanitizeEndpoint(endpoint);
    const operation = `${method} ${sanitizedEndpoint}`;

    if (this.isClosed) {
      return err({ message: 'HTTP client has been closed', type: 'other' });
    }

    const prepared = this.prepareBody(options.body);
    if (prepared.isErr()) {
      this.effects.log('warn', `Request rejected before sending - Operation: ${operation}, Error: ${describeError(prepared.error)}`);
      return err(prepared.error);
    }

    const startTime = this.effects.now();
    const requestId = HttpUtils.generateRequestId(this.config.requestIdPrefix, startTime);
    const context: CallContext = {
      breakerKey: this.breakerKeyFor(endpoint),
      endpoint: sanitizedEndpoint,
      headers: this.buildHeaders(requestId, options.headers, prepared.value.contentType),
      method,
      operation,
      payload: prepared.value.payload,
      schema: options.schema,
      signal: options.signal,
      timeoutMs: options.timeoutMs ?? this.config.timeoutMs,
      url: HttpUtils.appendQuery(HttpUtils.buildUrl(this.config.baseUrl, endpoint), options.query),
    };

    // Emit start event once before retry loop (logical request started)
    this.hooks?.onRequestStart?.({ endpoint: sanitizedEndpoint, method, requestId, timestamp: startTime });

    for (let attempt = 0; ; attempt++) {
      const result = await this.executeAttempt(context, attempt);
      if (result.isOk()) {
        this.hooks?.onRequestSuccess?.({
          attempts: attempt + 1,
          durationMs: this.effects.now() - startTime,
          endpoint: sanitizedEndpoint,
          method,
          status: context.lastStatus ?? 200,
        });
        return ok(result.value);
      }

      const error = result.error;
      if (isCancelledError(error)) {
        return this.fail(context, error, attempt + 1, startTime);
      }

      if (attempt >= this.retryPolicy.maxAttempts || !isRetryable(error)) {
        const finalError: ApiError =
          attempt === 0 ? error : { attempts: attempt + 1, lastError: error, operation, type: 'retry_exhausted' };
        return this.fail(context, finalError, attempt + 1, startTime);
      }

      const delayMs = computeRetryDelay(this.retryPolicy, attempt, error, this.effects.random);
      this.effects.log(
        'debug',
        `Retrying after delay - Operation: ${operation}, Delay: ${delayMs}ms, NextAttempt: ${attempt + 2}, Reason: ${error.type}`
      );
      this.hooks?.onBackoff?.({ attemptNumber: attempt + 1, delayMs, reason: error.type });

      const slept = await this.backoff(delayMs, context.signal);
      if (slept.isErr()) {
        return this.fail(context, slept.error, attempt + 1, startTime);
      }
    }
  }

  /**
   * Cleanup resources.
   * Closes the undici agent to terminate all keep-alive connections.
   *
   * Idempotent: safe to call multiple times. Subsequent calls return the same promise.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.isClosed = true;
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`, { cause: error });
      }
    })();

    return this.closePromise;
  }

  /**
   * One pass through breaker, limiter and transport
   */
  private async executeAttempt(context: CallContext, attempt: number): Promise<Result<unknown, ApiError>> {
    const attemptStart = this.effects.now();
    const breaker = this.breakers?.getOrCreate(context.breakerKey);
    const circuit: AdmittedCircuit | undefined = breaker ? { breaker, permit: breaker.tryAcquire() } : undefined;
    context.lastStatus = undefined;

    if (circuit && !circuit.permit.allowed) {
      const error: ApiError = {
        message: `Circuit breaker is open for ${context.breakerKey === 'default' ? this.name : context.breakerKey}`,
        retryAfterMs: circuit.breaker.recoveryTimeoutMs,
        type: 'service_unavailable',
      };
      this.hooks?.onCircuitRejected?.({
        circuit: context.breakerKey,
        endpoint: context.endpoint,
        retryAfterMs: circuit.breaker.recoveryTimeoutMs,
      });
      this.reportAttempt(context, attempt, attemptStart, 'circuit_open', error);
      return err(error);
    }

    const permit = this.rateLimiter?.tryAcquire();
    if (permit && !permit.allowed) {
      circuit?.breaker.release(circuit.permit);
      const error: ApiError = { retryAfterMs: permit.retryAfterMs, type: 'rate_limit' };
      this.hooks?.onRateLimited?.({ retryAfterMs: permit.retryAfterMs, source: 'client' });
      this.reportAttempt(context, attempt, attemptStart, 'rate_limited', error);
      return err(error);
    }

    const acquired = await this.acquireSlot(context.signal);
    if (acquired.isErr()) {
      this.abandonAttempt(circuit, permit);
      this.reportAttempt(context, attempt, attemptStart, 'cancelled', acquired.error);
      return err(acquired.error);
    }

    let exchange: Result<ResponseOutcome, ApiError>;
    try {
      this.effects.log(
        'debug',
        `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(context.url)}, Method: ${context.method}, Attempt: ${attempt + 1}/${this.retryPolicy.maxAttempts + 1}`,
        { headers: HttpUtils.redactHeaders(context.headers) }
      );
      exchange = await this.send(context);
    } finally {
      this.slots.release();
    }

    if (exchange.isErr()) {
      const error = exchange.error;
      if (isCancelledError(error)) {
        this.abandonAttempt(circuit, permit);
        this.reportAttempt(context, attempt, attemptStart, 'cancelled', error);
        return err(error);
      }
      circuit?.breaker.recordFailure(circuit.permit);
      this.effects.log(
        'warn',
        `Request failed - URL: ${HttpUtils.sanitizeUrl(context.url)}, Attempt: ${attempt + 1}, Error: ${describeError(error)}`
      );
      this.reportAttempt(context, attempt, attemptStart, 'failure', error);
      return err(error);
    }

    const response = exchange.value;
    context.lastStatus = response.status;

    if (response.status < 200 || response.status >= 300) {
      const error = classifyResponse(response, this.effects.now());
      if (isCircuitFailure(error)) {
        circuit?.breaker.recordFailure(circuit.permit);
      } else {
        circuit?.breaker.recordSuccess(circuit.permit);
      }
      if (error.type === 'rate_limit') {
        this.hooks?.onRateLimited?.({ retryAfterMs: error.retryAfterMs, source: 'server', status: response.status });
      }
      this.effects.log(
        'warn',
        `Request failed - URL: ${HttpUtils.sanitizeUrl(context.url)}, Attempt: ${attempt + 1}, Status: ${response.status}, Error: ${describeError(error)}`
      );
      this.reportAttempt(context, attempt, attemptStart, 'failure', error);
      return err(error);
    }

    circuit?.breaker.recordSuccess(circuit.permit);
    const decoded = this.decodeBody(context, response);
    if (decoded.isErr()) {
      this.reportAttempt(context, attempt, attemptStart, 'failure', decoded.error);
      return err(decoded.error);
    }

    this.reportAttempt(context, attempt, attemptStart, 'success');
    return ok(decoded.value);
  }

  /**
   * Send once with a per-attempt timeout; the caller's signal aborts the same request
   */
  private async send(context: CallContext): Promise<Result<ResponseOutcome, ApiError>> {
    const { signal, timeoutMs } = context;
    if (signal?.aborted) {
      return err(cancelledError());
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await this.effects.fetch(context.url, {
        // eslint-disable-next-line unicorn/no-null -- 'fetch' requires null for empty body, not undefined
        body: context.payload ?? null,
        headers: context.headers,
        method: context.method,
        signal: controller.signal,
      });
      const bodyText = await response.text();
      return ok({ bodyText, headers: response.headers, status: response.status, statusText: response.statusText });
    } catch (error) {
      if (signal?.aborted && !timedOut) {
        return err(cancelledError());
      }
      return err(classifyTransportFailure(error, { operation: context.operation, timedOut, timeoutMs }));
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private decodeBody(context: CallContext, response: ResponseOutcome): Result<unknown, ApiError> {
    let data: unknown;
    if (response.status !== 204 && response.bodyText.trim() !== '') {
      try {
        data = JSON.parse(response.bodyText);
      } catch (error) {
        return err(classifyParseFailure(error));
      }
    }

    if (!context.schema) {
      return ok(data);
    }

    const parseResult = context.schema.safeParse(data);
    if (parseResult.success) {
      return ok(parseResult.data);
    }

    const issues = parseResult.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    const first = parseResult.error.issues[0];
    this.effects.log(
      'error',
      `Response validation failed (showing first ${issues.length} of ${parseResult.error.issues.length} errors): ${issues.join('; ')}`,
      {
        operation: context.operation,
        status: response.status,
        truncatedPayload: response.bodyText.slice(0, 500),
      }
    );
    return err({
      code: 'invalid_response',
      field: first && first.path.length > 0 ? first.path.join('.') : undefined,
      message: `Response validation failed: ${issues.join('; ')}`,
      type: 'validation',
    });
  }

  private prepareBody(body: RequestBody | undefined): Result<PreparedBody, ApiError> {
    if (body === undefined) {
      return ok({});
    }
    if (typeof body === 'string' || body instanceof Uint8Array) {
      return ok({ payload: body });
    }
    if (isStreamingBody(body)) {
      return err(networkError('Streaming request bodies cannot be replayed on retry', { canRetry: false }));
    }

    try {
      return ok({ contentType: 'application/json', payload: JSON.stringify(body) });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err({ message: `Failed to serialize request body: ${reason}`, type: 'invalid_request' });
    }
  }

  private buildHeaders(
    requestId: string,
    headers: Record<string, string> | undefined,
    contentType: string | undefined
  ): Record<string, string> {
    const merged: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.config.userAgent,
      'X-Client-Version': this.config.clientVersion,
    };
    if (this.config.authorization) {
      merged['Authorization'] = this.config.authorization;
    }
    if (contentType) {
      merged['Content-Type'] = contentType;
    }
    return { ...merged, ...this.config.defaultHeaders, ...headers, 'X-Request-ID': requestId };
  }

  private breakerKeyFor(endpoint: string): string {
    return this.config.circuitBreaker?.scope === 'endpoint' ? HttpUtils.endpointClass(endpoint) : 'default';
  }

  private async acquireSlot(signal: AbortSignal | undefined): Promise<Result<void, ApiError>> {
    try {
      await this.slots.acquire(signal);
      return ok(undefined);
    } catch (error) {
      if (signal?.aborted) {
        return err(cancelledError());
      }
      throw error;
    }
  }

  private async backoff(delayMs: number, signal: AbortSignal | undefined): Promise<Result<void, ApiError>> {
    if (signal?.aborted) {
      return err(cancelledError());
    }
    try {
      await this.effects.delay(delayMs, signal);
    } catch (error) {
      if (signal?.aborted) {
        return err(cancelledError());
      }
      throw error;
    }
    return signal?.aborted ? err(cancelledError()) : ok(undefined);
  }

  /**
   * Undo the bookkeeping of an attempt that was cancelled before producing an outcome
   */
  private abandonAttempt(circuit: AdmittedCircuit | undefined, permit: RateLimitPermit | undefined): void {
    circuit?.breaker.release(circuit.permit);
    if (permit) {
      this.rateLimiter?.refund(permit);
    }
  }

  private fail(context: CallContext, error: ApiError, attempts: number, startTime: number): Result<never, ApiError> {
    this.hooks?.onRequestFailure?.({
      attempts,
      durationMs: this.effects.now() - startTime,
      endpoint: context.endpoint,
      error: describeError(error),
      errorType: error.type,
      method: context.method,
      status: statusCode(error),
    });
    this.effects.log('warn', `Request failed permanently - Operation: ${context.operation}, Attempts: ${attempts}, Error: ${describeError(error)}`);
    return err(error);
  }

  private reportAttempt(
    context: CallContext,
    attempt: number,
    attemptStart: number,
    outcome: AttemptOutcome,
    error?: ApiError
  ): void {
    const currentTime = this.effects.now();
    const status = outcome === 'success' || outcome === 'failure' ? context.lastStatus : undefined;

    this.hooks?.onAttempt?.({
      attempt,
      elapsedMs: currentTime - attemptStart,
      errorType: error?.type,
      operation: context.operation,
      outcome,
      status,
    });

    this.instrumentation?.record({
      attempt,
      client: this.name,
      durationMs: currentTime - attemptStart,
      endpoint: context.endpoint,
      errorType: error?.type,
      method: context.method,
      outcome,
      status: status ?? 0,
      timestamp: currentTime,
    });
  }
}

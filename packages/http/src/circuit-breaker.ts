import { getLogger, type Logger } from '@stateset/logger';

import * as CircuitCore from './core/circuit-breaker.js';
import type { CircuitStatistics } from './core/circuit-breaker.js';
import type { CircuitState, CircuitStatus } from './core/types.js';
import { createInitialCircuitState } from './core/types.js';

export interface CircuitBreakerOptions {
  failureThreshold?: number | undefined;
  recoveryTimeoutMs?: number | undefined;
}

export interface CircuitPermit {
  allowed: boolean;
  trial: boolean;
}

/**
 * Shared, mutable shell around the pure circuit functions.
 *
 * Every check-then-transition below runs synchronously between two awaits of
 * the caller, so concurrent requests on the event loop cannot interleave
 * inside a transition.
 */
export class CircuitBreaker {
  private state: CircuitState;
  private readonly logger: Logger;

  constructor(
    private readonly name: string,
    options: CircuitBreakerOptions = {},
    private readonly now: () => number = Date.now
  ) {
    this.state = createInitialCircuitState(options.failureThreshold, options.recoveryTimeoutMs);
    this.logger = getLogger(`CircuitBreaker:${name}`);
  }

  get recoveryTimeoutMs(): number {
    return this.state.recoveryTimeoutMs;
  }

  /**
   * Gate one attempt. Moves open → half-open once the recovery timeout has
   * elapsed; the caller whose permit has `trial` set is then the single trial.
   * Hand the permit back to `recordSuccess`, `recordFailure` or `release`.
   */
  tryAcquire(): CircuitPermit {
    const previous = this.state.status;
    const permission = CircuitCore.acquirePermission(this.state, this.now());
    this.state = permission.state;

    if (previous !== this.state.status) {
      this.logger.info(`Circuit transition - Name: ${this.name}, From: ${previous}, To: ${this.state.status}`);
    }
    return { allowed: permission.allowed, trial: permission.trial };
  }

  recordSuccess(permit: CircuitPermit): void {
    const previous = this.state.status;
    this.state = CircuitCore.recordSuccess(this.state, this.now(), permit.trial);

    if (previous !== this.state.status) {
      this.logger.info(`Circuit transition - Name: ${this.name}, From: ${previous}, To: ${this.state.status}`);
    }
  }

  recordFailure(permit: CircuitPermit): void {
    const previous = this.state.status;
    this.state = CircuitCore.recordFailure(this.state, this.now(), permit.trial);

    if (previous !== this.state.status) {
      this.logger.warn(
        `Circuit transition - Name: ${this.name}, From: ${previous}, To: ${this.state.status}, Failures: ${this.state.failureCount}`
      );
    }
  }

  /**
   * Undo the permission of an attempt that was cancelled before it produced an
   * outcome. Only the trial holds anything to give back.
   */
  release(permit: CircuitPermit): void {
    if (permit.trial) {
      this.state = CircuitCore.releaseTrial(this.state);
    }
  }

  reset(): void {
    this.state = CircuitCore.resetCircuit(this.state);
  }

  getState(): CircuitStatus {
    return this.state.status;
  }

  getFailureCount(): number {
    return this.state.failureCount;
  }

  getStatistics(): CircuitStatistics {
    return CircuitCore.getCircuitStatistics(this.state, this.now());
  }
}

/**
 * One breaker per key: a whole client shares `default`, or each endpoint
 * class (e.g. `/orders`) gets its own.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly name: string,
    private readonly options: CircuitBreakerOptions = {},
    private readonly now: () => number = Date.now
  ) {}

  getOrCreate(key: string): CircuitBreaker {
    let breaker = this.breakers.get(key);
    if (!breaker) {
      breaker = new CircuitBreaker(`${this.name}${key === 'default' ? '' : key}`, this.options, this.now);
      this.breakers.set(key, breaker);
    }
    return breaker;
  }

  get(key: string): CircuitBreaker | undefined {
    return this.breakers.get(key);
  }

  has(key: string): boolean {
    return this.breakers.has(key);
  }

  entries(): IterableIterator<[string, CircuitBreaker]> {
    return this.breakers.entries();
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }

  clear(): void {
    this.breakers.clear();
  }
}

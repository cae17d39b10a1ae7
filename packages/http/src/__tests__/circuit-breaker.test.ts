import { describe, expect, it } from 'vitest';

import { CircuitBreaker, CircuitBreakerRegistry } from '../circuit-breaker.js';

const manualClock = (start = 0) => {
  let current = start;
  return {
    advance: (ms: number) => {
      current += ms;
    },
    now: () => current,
  };
};

const fail = (breaker: CircuitBreaker) => breaker.recordFailure(breaker.tryAcquire());

describe('CircuitBreaker', () => {
  it('should open after the threshold and recover through a single trial', () => {
    const clock = manualClock();
    const breaker = new CircuitBreaker('orders', { failureThreshold: 3, recoveryTimeoutMs: 30_000 }, clock.now);

    fail(breaker);
    fail(breaker);
    expect(breaker.tryAcquire()).toEqual({ allowed: true, trial: false });
    fail(breaker);

    expect(breaker.getState()).toBe('open');
    expect(breaker.tryAcquire().allowed).toBe(false);

    clock.advance(30_000);
    const trial = breaker.tryAcquire();
    expect(trial).toEqual({ allowed: true, trial: true });
    expect(breaker.getState()).toBe('half-open');
    expect(breaker.tryAcquire().allowed).toBe(false);

    breaker.recordSuccess(trial);
    expect(breaker.getState()).toBe('closed');
    expect(breaker.getFailureCount()).toBe(0);
  });

  it('should let another caller take the trial after release', () => {
    const clock = manualClock();
    const breaker = new CircuitBreaker('orders', { failureThreshold: 1, recoveryTimeoutMs: 100 }, clock.now);
    fail(breaker);
    clock.advance(100);

    const trial = breaker.tryAcquire();
    expect(trial.trial).toBe(true);
    breaker.release(trial);
    expect(breaker.tryAcquire().trial).toBe(true);
  });

  it('should keep the trial outstanding when an attempt admitted while closed is released', () => {
    const clock = manualClock();
    const breaker = new CircuitBreaker('orders', { failureThreshold: 1, recoveryTimeoutMs: 100 }, clock.now);
    const stale = breaker.tryAcquire();
    fail(breaker);
    clock.advance(100);
    breaker.tryAcquire();

    breaker.release(stale);

    expect(breaker.getStatistics().trialInFlight).toBe(true);
    expect(breaker.tryAcquire().allowed).toBe(false);
  });

  it('should ignore outcomes of attempts admitted while closed during half-open', () => {
    const clock = manualClock();
    const breaker = new CircuitBreaker('orders', { failureThreshold: 1, recoveryTimeoutMs: 100 }, clock.now);
    const staleSuccess = breaker.tryAcquire();
    const staleFailure = breaker.tryAcquire();
    fail(breaker);
    clock.advance(100);
    const trial = breaker.tryAcquire();

    breaker.recordSuccess(staleSuccess);
    breaker.recordFailure(staleFailure);
    expect(breaker.getState()).toBe('half-open');
    expect(breaker.getStatistics().trialInFlight).toBe(true);

    breaker.recordFailure(trial);
    expect(breaker.getState()).toBe('open');
  });

  it('should reset to closed', () => {
    const breaker = new CircuitBreaker('orders', { failureThreshold: 1 });
    fail(breaker);
    breaker.reset();
    expect(breaker.getState()).toBe('closed');
    expect(breaker.tryAcquire().allowed).toBe(true);
  });

  it('should expose statistics', () => {
    const clock = manualClock(1000);
    const breaker = new CircuitBreaker('orders', { failureThreshold: 1, recoveryTimeoutMs: 5000 }, clock.now);
    fail(breaker);
    clock.advance(2000);

    expect(breaker.getStatistics()).toMatchObject({
      failureCount: 1,
      state: 'open',
      timeUntilRecoveryMs: 3000,
    });
    expect(breaker.recoveryTimeoutMs).toBe(5000);
  });
});

describe('CircuitBreakerRegistry', () => {
  it('should create one breaker per key and reuse it', () => {
    const registry = new CircuitBreakerRegistry('api', { failureThreshold: 1 });
    const orders = registry.getOrCreate('/orders');

    expect(registry.getOrCreate('/orders')).toBe(orders);
    expect(registry.getOrCreate('/returns')).not.toBe(orders);
    expect(registry.has('/orders')).toBe(true);
    expect(registry.get('/missing')).toBeUndefined();
  });

  it('should isolate failures between keys', () => {
    const registry = new CircuitBreakerRegistry('api', { failureThreshold: 1 });
    fail(registry.getOrCreate('/orders'));

    expect(registry.getOrCreate('/orders').getState()).toBe('open');
    expect(registry.getOrCreate('/returns').getState()).toBe('closed');
  });

  it('should reset every breaker', () => {
    const registry = new CircuitBreakerRegistry('api', { failureThreshold: 1 });
    fail(registry.getOrCreate('/orders'));
    fail(registry.getOrCreate('/returns'));
    registry.resetAll();

    expect([...registry.entries()].map(([, breaker]) => breaker.getState())).toEqual(['closed', 'closed']);
  });
});

import { getLogger, type Logger } from '@stateset/logger';

import * as RateLimitCore from './core/rate-limit.js';
import type { RateLimitStatus } from './core/rate-limit.js';
import type { RateLimitState } from './core/types.js';
import { createInitialRateLimitState } from './core/types.js';

export interface RateLimitPermit {
  allowed: boolean;
  retryAfterMs?: number | undefined;
  /** Window the token was taken from, used to refund cancelled attempts */
  windowStart: number;
}

/**
 * Fixed-window client-side rate limiter.
 *
 * Self-throttling only: a burst of up to twice the capacity can straddle a
 * window boundary.
 */
export class RateLimiter {
  private state: RateLimitState;
  private readonly logger: Logger;

  constructor(
    name: string,
    requestsPerWindow: number,
    windowMs?: number,
    private readonly now: () => number = Date.now
  ) {
    this.state = createInitialRateLimitState(requestsPerWindow, windowMs);
    this.logger = getLogger(`RateLimiter:${name}`);

    this.logger.debug(
      `Rate limiter initialized - Capacity: ${this.state.capacity}, WindowMs: ${this.state.windowMs}`
    );
  }

  tryAcquire(): RateLimitPermit {
    const currentTime = this.now();
    const decision = RateLimitCore.tryConsume(this.state, currentTime);
    this.state = decision.state;

    if (!decision.allowed) {
      this.logger.debug(
        `Rate limit reached, rejecting request - RetryAfterMs: ${decision.retryAfterMs}, Capacity: ${this.state.capacity}`
      );
    }

    return { allowed: decision.allowed, retryAfterMs: decision.retryAfterMs, windowStart: this.state.windowStart };
  }

  /**
   * Give back a token taken for an attempt that never ran to completion
   */
  refund(permit: RateLimitPermit): void {
    if (!permit.allowed) {
      return;
    }
    this.state = RateLimitCore.refundToken(this.state, permit.windowStart);
  }

  getStatus(): RateLimitStatus {
    return RateLimitCore.getRateLimitStatus(this.state, this.now());
  }
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Decision result from a rate limiter consume operation.
 *
 * When allowed=true, the tokens were taken.
 * When allowed=false, nothing was taken; retryAfterMs says when enough
 * tokens will be available (null if cost can never fit the bucket).
 */
export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | {
      allowed: false;
      remaining: number;
      retryAfterMs: number | null;
    };

/**
 * Token bucket parameters.
 */
export interface Policy {
  /** Bucket capacity (positive integer). Maximum tokens available. */
  capacity: number;

  /**
   * Refill rate in tokens per second (positive, may be fractional:
   * 0.1 = one token every ten seconds).
   */
  tokensPerSecond: number;

  /** Optional prefix for key namespacing when limiters share a store. */
  prefix?: string;
}

/**
 * Time source for refill calculations. Structurally compatible with the
 * server's Clock.
 */
export interface Clock {
  now(): number;
}

/**
 * Rate limiter contract.
 *
 * Implementations must tolerate non-monotonic clocks: negative elapsed time
 * is clamped to 0.
 */
export interface RateLimiter {
  /**
   * Take `cost` tokens from the bucket for `key`, if available.
   */
  consume(key: string, cost: number): Promise<RateLimitDecision>;

  /**
   * Whole tokens currently available for `key`, without taking any.
   */
  peek(key: string): Promise<number>;

  /**
   * Refill the bucket for `key` to capacity.
   */
  reset(key: string): Promise<void>;

  getPolicy(): Policy;

  /**
   * Release resources. Called on server shutdown.
   */
  dispose?(): void | Promise<void>;
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * In-memory rate limiter using the token bucket algorithm.
 *
 * Buckets live in a Map keyed by (prefix, key) and are created full on first
 * use. Refill is continuous: fractional tokens accumulate between calls, so
 * slow policies such as 0.1 tokens/second refill correctly. Buckets that have
 * refilled to capacity carry no state: peek drops them, and once the map
 * reaches `sweepThreshold` entries a new key triggers a sweep of all of them.
 *
 * @example
 * ```typescript
 * const limiter = memoryRateLimiter({ capacity: 5, tokensPerSecond: 0.1 });
 * const decision = await limiter.consume("rl:addr:127.0.0.1", 1);
 * ```
 */

import type { Clock, Policy, RateLimitDecision, RateLimiter } from "./types.js";

export interface MemoryRateLimiterOptions {
  clock?: Clock;
  /** Bucket count at which refilled buckets are swept (default 10,000) */
  sweepThreshold?: number;
}

export interface MemoryRateLimiter extends RateLimiter {
  /** Buckets currently held */
  readonly size: number;
}

interface BucketState {
  tokens: number;
  lastRefillTime: number;
}

const defaultClock: Clock = { now: () => Date.now() };

export function memoryRateLimiter(
  policy: Policy,
  options: MemoryRateLimiterOptions = {},
): MemoryRateLimiter {
  if (!Number.isFinite(policy.capacity) || policy.capacity < 1) {
    throw new Error("Rate limit policy: capacity must be ≥ 1");
  }
  if (!Number.isFinite(policy.tokensPerSecond) || policy.tokensPerSecond <= 0) {
    throw new Error("Rate limit policy: tokensPerSecond must be > 0");
  }

  const clock = options.clock ?? defaultClock;
  const sweepThreshold = options.sweepThreshold ?? 10_000;
  const buckets = new Map<string, BucketState>();

  function fullKey(key: string): string {
    return policy.prefix ? `${policy.prefix}:${key}` : key;
  }

  function refill(bucket: BucketState, now: number): void {
    const elapsedMs = Math.max(0, now - bucket.lastRefillTime);
    bucket.tokens = Math.min(
      policy.capacity,
      bucket.tokens + (elapsedMs / 1000) * policy.tokensPerSecond,
    );
    bucket.lastRefillTime = now;
  }

  function sweep(now: number): void {
    for (const [key, bucket] of buckets) {
      refill(bucket, now);
      if (whole(bucket.tokens) >= policy.capacity) buckets.delete(key);
    }
  }

  function bucketFor(key: string, now: number): BucketState {
    let bucket = buckets.get(key);
    if (!bucket) {
      if (buckets.size >= sweepThreshold) sweep(now);
      bucket = { tokens: policy.capacity, lastRefillTime: now };
      buckets.set(key, bucket);
      return bucket;
    }
    refill(bucket, now);
    return bucket;
  }

  // Whole tokens only; fractions stay internal
  function whole(tokens: number): number {
    return Math.floor(tokens + 1e-9);
  }

  return {
    get size() {
      return buckets.size;
    },

    async consume(key: string, cost: number): Promise<RateLimitDecision> {
      const id = fullKey(key);
      const bucket = bucketFor(id, clock.now());

      if (cost > policy.capacity) {
        return {
          allowed: false,
          remaining: whole(bucket.tokens),
          retryAfterMs: null,
        };
      }

      if (bucket.tokens + 1e-9 >= cost) {
        bucket.tokens = Math.max(0, bucket.tokens - cost);
        return { allowed: true, remaining: whole(bucket.tokens) };
      }

      const tokensNeeded = cost - bucket.tokens;
      return {
        allowed: false,
        remaining: whole(bucket.tokens),
        retryAfterMs: Math.ceil((tokensNeeded / policy.tokensPerSecond) * 1000),
      };
    },

    async peek(key: string): Promise<number> {
      const id = fullKey(key);
      const bucket = bucketFor(id, clock.now());
      const tokens = whole(bucket.tokens);
      if (tokens >= policy.capacity) buckets.delete(id);
      return tokens;
    },

    async reset(key: string): Promise<void> {
      buckets.delete(fullKey(key));
    },

    getPolicy(): Policy {
      return { ...policy };
    },

    dispose(): void {
      buckets.clear();
    },
  };
}

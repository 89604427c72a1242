// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Token bucket rate limiting for the event bridge server.
 *
 * @example
 * ```typescript
 * import { memoryRateLimiter, keyPerPeer } from "@steno-bridge/rate-limit";
 *
 * const limiter = memoryRateLimiter({ capacity: 5, tokensPerSecond: 0.1 });
 * const { allowed } = await limiter.consume(keyPerPeer({ remoteAddress }), 1);
 * ```
 */

export { memoryRateLimiter } from "./memory.js";
export type { MemoryRateLimiter, MemoryRateLimiterOptions } from "./memory.js";

export type { Clock, Policy, RateLimitDecision, RateLimiter } from "./types.js";

export { keyPerConnection, keyPerPeer } from "./keys.js";
export type { PeerInfo } from "./keys.js";

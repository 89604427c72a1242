// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Server configuration: every option the lifecycle manager consumes, with
 * its default. Callers pass a plain object; nothing is read from disk here.
 */

import { z } from "zod";
import { DEFAULTS } from "./constants.js";
import { BridgeError } from "./error/error.js";

const PolicySchema = z.object({
  capacity: z.number().int().min(1),
  tokensPerSecond: z.number().positive(),
});

const positiveMs = z.number().int().positive();

export const ServerConfigSchema = z.object({
  /** Listen address */
  host: z.string().min(1).default(DEFAULTS.HOST),
  /** Listen port; 0 picks an ephemeral port */
  port: z.number().int().min(0).max(65_535).default(DEFAULTS.PORT),
  /** Pre-shared key file, read by the Node package */
  keyPath: z.string().min(1).optional(),
  /** Close connections with no inbound frame for this long */
  idleTimeoutMs: positiveMs.default(DEFAULTS.IDLE_TIMEOUT_MS),
  /** Admitted plus handshaking connections */
  maxConnections: z.number().int().min(1).default(DEFAULTS.MAX_CONNECTIONS),
  /** Frames queued per connection before it is closed as overwhelmed */
  outboundQueueCapacity: z.number().int().min(1).default(DEFAULTS.OUTBOUND_QUEUE_CAPACITY),
  /** Socket buffered bytes above which sending pauses */
  sendHighWaterMark: z.number().int().min(0).default(DEFAULTS.SEND_HIGH_WATER_MARK),
  challengeTtlMs: positiveMs.default(DEFAULTS.CHALLENGE_TTL_MS),
  /** Events buffered in the bridge before the oldest is dropped */
  bridgeCapacity: z.number().int().min(1).default(DEFAULTS.BRIDGE_CAPACITY),
  closeGraceMs: z.number().int().min(0).default(DEFAULTS.CLOSE_GRACE_MS),
  /** Inbound frames larger than this are a protocol violation */
  maxFrameBytes: z.number().int().min(1).default(DEFAULTS.MAX_FRAME_BYTES),
  /** Failed-handshake budget per origin */
  authFailures: PolicySchema.default({
    capacity: DEFAULTS.AUTH_FAILURE_CAPACITY,
    tokensPerSecond: DEFAULTS.AUTH_FAILURE_TOKENS_PER_SECOND,
  }),
  /** Per-connection command budget; unlimited when absent */
  commandRateLimit: PolicySchema.optional(),
  /** Accepted Origin headers; any origin when absent */
  allowedOrigins: z.array(z.string().min(1)).optional(),
});

export type ServerConfigInput = z.input<typeof ServerConfigSchema>;
export type ServerConfig = z.output<typeof ServerConfigSchema>;

/**
 * Apply defaults and validate. Throws INVALID_ARGUMENT naming every
 * offending field.
 */
export function resolveServerConfig(input: ServerConfigInput = {}): ServerConfig {
  const result = ServerConfigSchema.safeParse(input);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.map(String).join("."));
    throw new BridgeError(
      "INVALID_ARGUMENT",
      `Invalid server configuration: ${z.prettifyError(result.error)}`,
      { fields },
    );
  }
  return result.data;
}

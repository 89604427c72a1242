// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Global constants: default values, wire protocol version, close codes.
 */

// Default configuration
export const DEFAULTS = {
  HOST: "127.0.0.1",
  PORT: 8086,
  IDLE_TIMEOUT_MS: 60_000,
  MAX_CONNECTIONS: 32,
  OUTBOUND_QUEUE_CAPACITY: 1024,
  SEND_HIGH_WATER_MARK: 1024 * 1024,
  CHALLENGE_TTL_MS: 10_000,
  BRIDGE_CAPACITY: 1024,
  CLOSE_GRACE_MS: 2_000,
  AUTH_FAILURE_CAPACITY: 5,
  AUTH_FAILURE_TOKENS_PER_SECOND: 0.1,
  MAX_FRAME_BYTES: 64 * 1024,
  PUMP_RETRY_MS: 25,
} as const;

// The only route that accepts WebSocket upgrades
export const WEBSOCKET_PATH = "/websocket";

export const PROTOCOL_VERSION = 1;

// Heartbeat form sent by older clients as a bare text frame
export const LEGACY_PING = "ping";

// WebSocket close codes (1xxx standard, 4xxx application)
export const CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  PROTOCOL_ERROR: 1002,
  POLICY_VIOLATION: 1008,
  INTERNAL_ERROR: 1011,
  TRY_AGAIN_LATER: 1013,
  UNAUTHORIZED: 4001,
  CHALLENGE_EXPIRED: 4002,
  CONNECTION_DENIED: 4003,
  OVERWHELMED: 4008,
  IDLE_TIMEOUT: 4010,
  RATE_LIMITED: 4029,
} as const;

export type CloseCode = (typeof CLOSE_CODES)[keyof typeof CLOSE_CODES];

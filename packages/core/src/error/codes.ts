// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Error codes: machine-readable error classification.
 * Each code has retryability metadata, a default message and, for codes
 * that can end a connection, the close code sent with it.
 */

import { CLOSE_CODES, type CloseCode } from "../constants.js";

export type ErrorCode =
  | "DECODE_ERROR"
  | "MISSING_CREDENTIAL"
  | "INVALID_PROOF"
  | "EXPIRED_CHALLENGE"
  | "CONNECTION_DENIED"
  | "UNSUPPORTED_COMMAND"
  | "INVALID_ARGUMENT"
  | "HOST_UNAVAILABLE"
  | "HOST_ERROR"
  | "OVERWHELMED"
  | "BRIDGE_OVERFLOW"
  | "RESOURCE_EXHAUSTED"
  | "IDLE_TIMEOUT"
  | "SHUTTING_DOWN"
  | "INTERNAL";

export type AuthErrorCode =
  | "MISSING_CREDENTIAL"
  | "INVALID_PROOF"
  | "EXPIRED_CHALLENGE";

export interface ErrorData {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export interface ErrorCodeMetadata {
  message: string;
  retryable: boolean;
  /** Close code sent when this error ends a connection */
  closeCode?: CloseCode;
}

export const ERROR_CODE_META: Record<ErrorCode, ErrorCodeMetadata> = {
  DECODE_ERROR: {
    message: "Malformed message",
    retryable: false,
    closeCode: CLOSE_CODES.PROTOCOL_ERROR,
  },
  MISSING_CREDENTIAL: {
    message: "Missing credential",
    retryable: false,
    closeCode: CLOSE_CODES.UNAUTHORIZED,
  },
  INVALID_PROOF: {
    message: "Invalid proof",
    retryable: false,
    closeCode: CLOSE_CODES.UNAUTHORIZED,
  },
  EXPIRED_CHALLENGE: {
    message: "Challenge expired",
    retryable: true,
    closeCode: CLOSE_CODES.CHALLENGE_EXPIRED,
  },
  CONNECTION_DENIED: {
    message: "Connection denied",
    retryable: false,
    closeCode: CLOSE_CODES.CONNECTION_DENIED,
  },
  UNSUPPORTED_COMMAND: { message: "Unsupported command", retryable: false },
  INVALID_ARGUMENT: { message: "Invalid argument", retryable: false },
  HOST_UNAVAILABLE: { message: "Host unavailable", retryable: true },
  HOST_ERROR: { message: "Host rejected the command", retryable: false },
  OVERWHELMED: {
    message: "Client cannot keep up with the event stream",
    retryable: true,
    closeCode: CLOSE_CODES.OVERWHELMED,
  },
  BRIDGE_OVERFLOW: { message: "Events dropped", retryable: false },
  RESOURCE_EXHAUSTED: {
    message: "Resource exhausted",
    retryable: true,
    closeCode: CLOSE_CODES.RATE_LIMITED,
  },
  IDLE_TIMEOUT: {
    message: "Idle timeout",
    retryable: true,
    closeCode: CLOSE_CODES.IDLE_TIMEOUT,
  },
  SHUTTING_DOWN: {
    message: "Server shutting down",
    retryable: true,
    closeCode: CLOSE_CODES.GOING_AWAY,
  },
  INTERNAL: {
    message: "Internal server error",
    retryable: false,
    closeCode: CLOSE_CODES.INTERNAL_ERROR,
  },
};

export function getErrorMetadata(code: ErrorCode): ErrorCodeMetadata {
  return ERROR_CODE_META[code];
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && Object.hasOwn(ERROR_CODE_META, value);
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * BridgeError: type-safe error wrapper.
 *
 * Semantics:
 * - wrap(err, code) preserves type safety
 * - If err is already a BridgeError, return as-is or clone with new code
 * - Never mutates
 */

import { CLOSE_CODES, type CloseCode } from "../constants.js";
import type { AuthErrorCode, ErrorCode, ErrorData } from "./codes.js";
import { getErrorMetadata } from "./codes.js";

export class BridgeError<E extends ErrorCode = ErrorCode> extends Error {
  readonly code: E;
  readonly details?: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(code: E, message?: string, details?: Record<string, unknown>) {
    super(message ?? getErrorMetadata(code).message);
    this.name = "BridgeError";
    this.code = code;
    this.details = details;
    this.retryable = getErrorMetadata(code).retryable;
  }

  /**
   * Close code to send when this error ends a connection.
   */
  get closeCode(): CloseCode {
    return getErrorMetadata(this.code).closeCode ?? CLOSE_CODES.POLICY_VIOLATION;
  }

  /**
   * Correlation id of the client message that caused the error, if any.
   */
  get correlationId(): string | undefined {
    const value = this.details?.["correlationId"];
    return typeof value === "string" ? value : undefined;
  }

  /**
   * Wrap unknown error with a code (preserves type safety).
   */
  static wrap(
    err: unknown,
    code: ErrorCode = "INTERNAL",
    details?: Record<string, unknown>,
  ): BridgeError {
    if (err instanceof BridgeError) {
      return code === err.code || code === "INTERNAL"
        ? err
        : err.with({ code, details });
    }
    return new BridgeError(
      code,
      err instanceof Error ? err.message : String(err),
      details,
    );
  }

  /**
   * Clone with new code and/or details (never mutate).
   */
  with<E2 extends ErrorCode>(opts: {
    code?: E2;
    details?: Record<string, unknown>;
  }): BridgeError<E | E2> {
    return new BridgeError<E | E2>(
      opts.code ?? this.code,
      this.message,
      opts.details ?? this.details,
    );
  }

  toJSON(): ErrorData {
    const result: ErrorData = {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    };
    if (this.details !== undefined) {
      result.details = this.details;
    }
    return result;
  }
}

/**
 * Malformed wire message. Always ends the connection it arrived on.
 */
export class DecodeError extends BridgeError<"DECODE_ERROR"> {
  constructor(message: string, details?: Record<string, unknown>) {
    super("DECODE_ERROR", message, details);
    this.name = "DecodeError";
  }
}

/**
 * Handshake failure. The connection is closed and never admitted.
 */
export class AuthError extends BridgeError<AuthErrorCode> {
  constructor(code: AuthErrorCode, message?: string) {
    super(code, message);
    this.name = "AuthError";
  }
}

/**
 * Thrown by the host engine when it refuses or fails to apply a command.
 */
export class HostError extends Error {
  constructor(
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "HostError";
  }
}

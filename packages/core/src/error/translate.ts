// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Error translation: map thrown errors → BridgeError.
 * Used at connection and dispatch boundaries so every error reaching a
 * client or the error sink is normalized.
 */

import type { ErrorCode } from "./codes.js";
import { BridgeError, HostError } from "./error.js";

export function translateError(
  err: unknown,
  defaultCode: ErrorCode = "INTERNAL",
): BridgeError {
  if (err instanceof BridgeError) {
    return err;
  }
  if (err instanceof HostError) {
    return new BridgeError("HOST_ERROR", err.message, err.details);
  }
  return new BridgeError(
    defaultCode,
    err instanceof Error ? err.message : String(err),
  );
}

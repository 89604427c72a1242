// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * ID generation: connection IDs and handshake nonces.
 */

import { randomBytes } from "node:crypto";

export function generateConnectionId(): string {
  return `conn_${randomBytes(8).toString("hex")}`;
}

/**
 * 32 random bytes, hex encoded. One per connection attempt.
 */
export function generateNonce(): string {
  return randomBytes(32).toString("hex");
}

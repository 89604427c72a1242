// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Connection registry: sole owner of admitted connections.
 *
 * Only Authenticated connections enter the registry. Connections still in
 * the handshake hold a reserved slot instead, so `maxConnections` bounds
 * both without letting an unauthenticated client appear in broadcasts.
 * A connection leaves the registry as soon as it reaches Closed.
 */

import { DEFAULTS } from "../constants.js";
import { BridgeError } from "../error/error.js";
import type { Connection } from "./connection.js";

export interface ConnectionRegistryOptions {
  maxConnections?: number;
}

export class ConnectionRegistry {
  private readonly connections = new Map<string, Connection>();
  private reserved = 0;
  readonly maxConnections: number;

  constructor(options: ConnectionRegistryOptions = {}) {
    this.maxConnections = options.maxConnections ?? DEFAULTS.MAX_CONNECTIONS;
  }

  /**
   * Hold a slot for a connection in its handshake.
   * Throws RESOURCE_EXHAUSTED when admitted plus handshaking connections
   * would exceed the limit. Returns a release function; call it once.
   */
  reserve(): () => void {
    if (this.connections.size + this.reserved >= this.maxConnections) {
      throw new BridgeError(
        "RESOURCE_EXHAUSTED",
        `Connection limit reached (${this.maxConnections})`,
        { maxConnections: this.maxConnections },
      );
    }
    this.reserved++;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.reserved--;
    };
  }

  /**
   * Admit an authenticated connection. It is removed automatically once
   * closed.
   */
  add(connection: Connection): void {
    if (connection.state !== "Authenticated") {
      throw new BridgeError(
        "INTERNAL",
        `Only authenticated connections can be registered (state: ${connection.state})`,
      );
    }
    if (this.connections.has(connection.id)) {
      throw new BridgeError("INTERNAL", `Duplicate connection id: ${connection.id}`);
    }
    this.connections.set(connection.id, connection);
    void connection.closed.then(() => this.remove(connection.id));
  }

  remove(id: string): boolean {
    return this.connections.delete(id);
  }

  get(id: string): Connection | undefined {
    return this.connections.get(id);
  }

  has(id: string): boolean {
    return this.connections.has(id);
  }

  /**
   * Stable copy of the current connections, safe to iterate while
   * connections come and go.
   */
  snapshot(): readonly Connection[] {
    return Array.from(this.connections.values());
  }

  get size(): number {
    return this.connections.size;
  }

  /**
   * Connections in their handshake.
   */
  get pending(): number {
    return this.reserved;
  }
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Transport contract.
 * Concrete implementations: @steno-bridge/node (ws + node:http) and the
 * in-memory transport under the testing entry.
 *
 * Core never touches sockets directly; the transport hands it one
 * ServerWebSocket per accepted upgrade.
 */

import type { RawFrame } from "../utils/json.js";

export type SocketReadyState = "CONNECTING" | "OPEN" | "CLOSING" | "CLOSED";

/**
 * Server side of one WebSocket, as seen by the connection layer.
 */
export interface ServerWebSocket {
  /**
   * Send one text frame. Never blocks; the platform buffers.
   */
  send(data: string): void;

  /**
   * Start the closing handshake.
   */
  close(code?: number, reason?: string): void;

  /**
   * Drop the connection without a closing handshake.
   */
  terminate(): void;

  readonly readyState: SocketReadyState;

  /**
   * Bytes queued by the platform and not yet written to the network.
   */
  readonly bufferedAmount: number;

  onMessage(listener: (data: RawFrame) => void): void;

  onClose(listener: (code: number, reason: string) => void): void;
}

/**
 * Facts the transport knows about a connection before any frame arrives.
 */
export interface ConnectionInfo {
  /** Origin header of the upgrade request, when sent */
  origin?: string;
  remoteAddress?: string;
}

export type ConnectionHandler = (socket: ServerWebSocket, info: ConnectionInfo) => void;

export interface ListenAddress {
  address: string;
  port: number;
}

export interface TransportAdapter {
  /**
   * Start accepting connections; `handler` runs once per upgrade.
   */
  listen(handler: ConnectionHandler): Promise<ListenAddress>;

  /**
   * Stop accepting connections and release the listening socket.
   */
  close(): Promise<void>;
}

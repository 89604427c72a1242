// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type {
  LoggerAdapter,
  RawFrame,
  ServerWebSocket,
  SocketReadyState,
} from "@steno-bridge/core";
import { LOG_CONTEXT } from "@steno-bridge/core";
import { WebSocket, type RawData } from "ws";

const READY_STATES: Record<number, SocketReadyState> = {
  [WebSocket.CONNECTING]: "CONNECTING",
  [WebSocket.OPEN]: "OPEN",
  [WebSocket.CLOSING]: "CLOSING",
  [WebSocket.CLOSED]: "CLOSED",
};

function toFrame(data: RawData, isBinary: boolean): RawFrame {
  const bytes = Array.isArray(data) ? Buffer.concat(data) : data;
  if (!isBinary) return bytes.toString();
  return bytes instanceof ArrayBuffer ? new Uint8Array(bytes) : bytes;
}

/**
 * Adapt a `ws` socket to the core ServerWebSocket contract.
 *
 * Text frames arrive as strings, binary frames as bytes; the codec decides
 * what to do with either.
 */
export function adaptWebSocket(
  ws: WebSocket,
  logger?: LoggerAdapter,
): ServerWebSocket {
  ws.on("error", (err) => {
    logger?.warn(LOG_CONTEXT.TRANSPORT, "Socket error", { error: err.message });
  });

  return {
    send(data) {
      ws.send(data, (err) => {
        if (err) {
          logger?.warn(LOG_CONTEXT.TRANSPORT, "Send failed", {
            error: err.message,
          });
        }
      });
    },
    close(code, reason) {
      ws.close(code, reason);
    },
    terminate() {
      ws.terminate();
    },
    get readyState() {
      return READY_STATES[ws.readyState] ?? "CLOSED";
    },
    get bufferedAmount() {
      return ws.bufferedAmount;
    },
    onMessage(listener) {
      ws.on("message", (data, isBinary) => {
        listener(toFrame(data, isBinary));
      });
    },
    onClose(listener) {
      ws.on("close", (code, reason) => {
        listener(code, reason.toString());
      });
    },
  };
}

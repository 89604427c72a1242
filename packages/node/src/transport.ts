// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type {
  ConnectionHandler,
  ListenAddress,
  LoggerAdapter,
  TransportAdapter,
} from "@steno-bridge/core";
import { BridgeError, LOG_CONTEXT, WEBSOCKET_PATH } from "@steno-bridge/core";
import {
  createServer,
  STATUS_CODES,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { Duplex } from "node:stream";
import { WebSocket, WebSocketServer } from "ws";
import { adaptWebSocket } from "./websocket.js";

// Bound on waiting for clients to answer a close frame during close()
const CLOSE_WAIT_MS = 1_000;

export interface NodeTransportOptions {
  host: string;
  /** 0 = ephemeral */
  port: number;
  /**
   * Accepted `Origin` header values. Upgrades from any other origin get a
   * 403. Requests without an Origin header (non-browser clients) pass.
   */
  allowedOrigins?: readonly string[];
  /** Largest frame `ws` will read before closing with 1009 */
  maxPayload?: number;
  logger?: LoggerAdapter;
}

export interface HealthReport {
  status: "ok";
  connections: number;
  /** Seconds since listen() */
  uptime: number;
}

/**
 * WebSocket transport over `node:http` and `ws`.
 *
 * Routes:
 * - `GET /health` → JSON {@link HealthReport}
 * - upgrade on `/websocket` → handed to the connection handler
 * - upgrade on any other path → 404
 * - any other HTTP request → 426 Upgrade Required
 */
export class NodeTransport implements TransportAdapter {
  private readonly server: Server;
  private readonly wss: WebSocketServer;
  private readonly logger: LoggerAdapter | undefined;
  private handler: ConnectionHandler | null = null;
  private startedAt = 0;

  constructor(private readonly options: NodeTransportOptions) {
    this.logger = options.logger;
    this.server = createServer((req, res) => {
      this.handleRequest(req, res);
    });
    this.wss = new WebSocketServer({
      noServer: true,
      maxPayload: options.maxPayload,
    });
    this.server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });
  }

  listen(handler: ConnectionHandler): Promise<ListenAddress> {
    if (this.handler) {
      return Promise.reject(
        new BridgeError("INTERNAL", "Transport is already listening"),
      );
    }
    this.handler = handler;

    return new Promise<ListenAddress>((resolve, reject) => {
      const onError = (err: Error) => {
        this.handler = null;
        reject(err);
      };
      this.server.once("error", onError);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off("error", onError);
        this.server.on("error", (err) => {
          this.logger?.error(LOG_CONTEXT.TRANSPORT, "HTTP server error", {
            error: err.message,
          });
        });

        const address = this.server.address();
        if (address === null || typeof address === "string") {
          reject(new BridgeError("INTERNAL", "Server is not bound to a TCP port"));
          return;
        }
        this.startedAt = Date.now();
        resolve({ address: address.address, port: address.port });
      });
    });
  }

  async close(): Promise<void> {
    this.handler = null;
    await Promise.all(
      Array.from(this.wss.clients, (ws) => settleSocket(ws, CLOSE_WAIT_MS)),
    );
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
    if (!this.server.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  health(): HealthReport {
    return {
      status: "ok",
      connections: this.wss.clients.size,
      uptime: Math.floor((Date.now() - this.startedAt) / 1000),
    };
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const path = pathOf(req);
    if (req.method === "GET" && (path === "/health" || path === "/health/")) {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(this.health()));
      return;
    }

    res.writeHead(426, { "Content-Type": "text/plain", Upgrade: "websocket" });
    res.end(`WebSocket connection required on ${WEBSOCKET_PATH}`);
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const handler = this.handler;
    if (!handler) {
      rejectUpgrade(socket, 503);
      return;
    }
    if (pathOf(req) !== WEBSOCKET_PATH) {
      rejectUpgrade(socket, 404);
      return;
    }

    const origin = req.headers.origin;
    const allowed = this.options.allowedOrigins;
    if (allowed && origin !== undefined && !allowed.includes(origin)) {
      this.logger?.warn(LOG_CONTEXT.TRANSPORT, "Upgrade from disallowed origin", {
        origin,
      });
      rejectUpgrade(socket, 403);
      return;
    }

    const remoteAddress = req.socket.remoteAddress;
    this.wss.handleUpgrade(req, socket, head, (ws) => {
      handler(adaptWebSocket(ws, this.logger), { origin, remoteAddress });
    });
  }
}

function pathOf(req: IncomingMessage): string {
  return new URL(req.url ?? "/", "http://localhost").pathname;
}

function rejectUpgrade(socket: Duplex, status: number): void {
  socket.once("finish", () => socket.destroy());
  socket.end(
    `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ""}\r\n` +
      "Connection: close\r\nContent-Length: 0\r\n\r\n",
  );
}

/**
 * Let a socket finish a closing handshake already in progress, for at
 * most `ms`; drop anything else at once.
 */
function settleSocket(ws: WebSocket, ms: number): Promise<void> {
  if (ws.readyState === WebSocket.CLOSED) return Promise.resolve();
  if (ws.readyState !== WebSocket.CLOSING) {
    ws.terminate();
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => {
    const timer = setTimeout(() => {
      ws.terminate();
      resolve();
    }, ms);
    ws.once("close", () => {
      clearTimeout(timer);
      resolve();
    });
  });
}

export function createNodeTransport(options: NodeTransportOptions): NodeTransport {
  return new NodeTransport(options);
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * One client connection: state machine, subscription filter and the
 * outbound queue that shields the broadcaster from slow sockets.
 *
 *   Connecting ──authenticate()──▶ Authenticated
 *        │                              │
 *        └──────────close()─────────────┴──▶ Closing ──▶ Closed
 *
 * enqueue() never blocks. Frames wait in a bounded FIFO and a pump writes
 * them while the socket's buffered byte count stays under the high-water
 * mark. A queue that overflows closes the connection with OVERWHELMED.
 */

import type { Identity } from "../auth/gate.js";
import { systemClock, type Clock } from "../clock.js";
import { CLOSE_CODES, DEFAULTS } from "../constants.js";
import { BridgeError } from "../error/error.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import { encode, encodeEvent } from "../protocol/codec.js";
import type { EngineEvent, EventKind } from "../protocol/events.js";
import type { ServerMessage } from "../protocol/messages.js";
import type { ConnectionInfo, ServerWebSocket } from "../server/transport.js";
import { generateConnectionId } from "../utils/ids.js";

export type ConnectionState =
  | "Connecting"
  | "Authenticated"
  | "Closing"
  | "Closed";

export interface CloseReason {
  code: number;
  reason: string;
  /** Set when an error ended the connection */
  error?: BridgeError;
  /** True when the peer (or the network) closed first */
  remote?: boolean;
}

export interface CloseOptions {
  /**
   * Deliver frames already queued before closing (bounded by the grace
   * window). Default: discard them.
   */
  drain?: boolean;
}

export interface ConnectionOptions {
  socket: ServerWebSocket;
  info: ConnectionInfo;
  id?: string;
  outboundQueueCapacity?: number;
  sendHighWaterMark?: number;
  closeGraceMs?: number;
  clock?: Clock;
  logger?: LoggerAdapter;
}

// Close reasons are limited to 123 bytes on the wire
const MAX_REASON_LENGTH = 123;

/**
 * Close reason for a connection ended by `error`.
 */
export function closeReasonFor(error: BridgeError): CloseReason {
  return { code: error.closeCode, reason: error.code, error };
}

export class Connection {
  readonly id: string;
  readonly info: ConnectionInfo;
  readonly socket: ServerWebSocket;
  readonly closed: Promise<CloseReason>;

  private state_: ConnectionState = "Connecting";
  private identity_: Identity | null = null;
  private filter_: ReadonlySet<EventKind> | null = null;
  private queue: string[] = [];
  private lastSeq_ = 0;
  private pumpTimer: unknown = null;
  private graceTimer: unknown = null;
  private pending: CloseReason | null = null;
  private readonly resolveClosed: (reason: CloseReason) => void;

  private readonly capacity: number;
  private readonly highWaterMark: number;
  private readonly graceMs: number;
  private readonly clock: Clock;
  private readonly logger: LoggerAdapter | undefined;

  constructor(options: ConnectionOptions) {
    this.id = options.id ?? generateConnectionId();
    this.info = options.info;
    this.socket = options.socket;
    this.capacity = options.outboundQueueCapacity ?? DEFAULTS.OUTBOUND_QUEUE_CAPACITY;
    this.highWaterMark = options.sendHighWaterMark ?? DEFAULTS.SEND_HIGH_WATER_MARK;
    this.graceMs = options.closeGraceMs ?? DEFAULTS.CLOSE_GRACE_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;

    let resolveClosed: (reason: CloseReason) => void = () => undefined;
    this.closed = new Promise<CloseReason>((resolve) => {
      resolveClosed = resolve;
    });
    this.resolveClosed = resolveClosed;

    this.socket.onClose((code, reason) => {
      this.finalize({ code, reason, remote: true });
    });
  }

  get state(): ConnectionState {
    return this.state_;
  }

  get identity(): Identity | null {
    return this.identity_;
  }

  /**
   * Event kinds this connection receives; null = every kind.
   */
  get filter(): ReadonlySet<EventKind> | null {
    return this.filter_;
  }

  /**
   * Sequence number of the last event queued for this connection.
   */
  get lastSeq(): number {
    return this.lastSeq_;
  }

  get queued(): number {
    return this.queue.length;
  }

  get isOpen(): boolean {
    return this.state_ === "Connecting" || this.state_ === "Authenticated";
  }

  authenticate(identity: Identity): void {
    if (this.state_ !== "Connecting") {
      throw new BridgeError(
        "INTERNAL",
        `Cannot authenticate a connection in state ${this.state_}`,
      );
    }
    this.identity_ = identity;
    this.state_ = "Authenticated";
  }

  setFilter(kinds: Iterable<EventKind> | null): void {
    this.filter_ = kinds === null ? null : new Set(kinds);
  }

  /**
   * True when an event of `kind` should be delivered here.
   */
  accepts(kind: EventKind): boolean {
    if (this.state_ !== "Authenticated") return false;
    return this.filter_ === null || this.filter_.has(kind);
  }

  /**
   * Queue an already-encoded frame. Returns false when the frame was not
   * queued (connection closing, or queue overflow, which closes it).
   */
  enqueue(frame: string): boolean {
    if (!this.isOpen) return false;

    if (this.queue.length >= this.capacity) {
      const error = new BridgeError("OVERWHELMED", undefined, {
        capacity: this.capacity,
      });
      this.logger?.warn(
        LOG_CONTEXT.CONNECTION,
        "Outbound queue full; closing slow consumer",
        { connectionId: this.id, capacity: this.capacity },
      );
      void this.close(closeReasonFor(error));
      return false;
    }

    this.queue.push(frame);
    this.pump();
    return true;
  }

  /**
   * Queue an event using a frame shared with other recipients.
   */
  enqueueEvent(event: EngineEvent, frame: string = encodeEvent(event)): boolean {
    const queued = this.enqueue(frame);
    if (queued) this.lastSeq_ = event.seq;
    return queued;
  }

  send(message: ServerMessage): boolean {
    return this.enqueue(encode(message));
  }

  /**
   * Move to Closing. Resolves once the connection is Closed: immediately
   * when nothing is queued, otherwise after the queue drains or the grace
   * window elapses, whichever comes first.
   */
  close(reason: CloseReason, options: CloseOptions = {}): Promise<CloseReason> {
    if (!this.isOpen) return this.closed;

    this.state_ = "Closing";
    this.pending = reason;
    if (!options.drain) {
      this.queue.length = 0;
      this.cancelPump();
    }

    if (this.queue.length > 0) {
      this.graceTimer = this.clock.setTimeout(() => {
        this.graceTimer = null;
        this.logger?.debug(LOG_CONTEXT.CONNECTION, "Close grace window elapsed", {
          connectionId: this.id,
          undelivered: this.queue.length,
        });
        this.socket.terminate();
        this.finalize(reason);
      }, this.graceMs);
    }

    this.pump();
    return this.closed;
  }

  /**
   * Drop the connection immediately, discarding anything still queued.
   */
  terminate(reason: CloseReason): void {
    if (this.state_ === "Closed") return;
    this.state_ = "Closing";
    this.pending ??= reason;
    this.queue.length = 0;
    this.socket.terminate();
    this.finalize(this.pending);
  }

  private pump(): void {
    if (this.pumpTimer !== null) return;

    while (this.queue.length > 0) {
      if (this.socket.readyState !== "OPEN") {
        this.finalize(
          this.pending ?? { code: CLOSE_CODES.GOING_AWAY, reason: "socket closed" },
        );
        return;
      }
      if (this.socket.bufferedAmount > this.highWaterMark) {
        this.pumpTimer = this.clock.setTimeout(() => {
          this.pumpTimer = null;
          this.pump();
        }, DEFAULTS.PUMP_RETRY_MS);
        return;
      }

      const frame = this.queue.shift();
      if (frame === undefined) break;
      try {
        this.socket.send(frame);
      } catch (err) {
        this.logger?.warn(LOG_CONTEXT.CONNECTION, "Socket send failed", {
          connectionId: this.id,
          error: err instanceof Error ? err.message : String(err),
        });
        this.terminate({
          code: CLOSE_CODES.INTERNAL_ERROR,
          reason: "send failed",
          error: BridgeError.wrap(err),
        });
        return;
      }
    }

    if (this.state_ === "Closing" && this.pending) {
      const { code, reason } = this.pending;
      this.socket.close(code, reason.slice(0, MAX_REASON_LENGTH));
      this.finalize(this.pending);
    }
  }

  private cancelPump(): void {
    if (this.pumpTimer === null) return;
    this.clock.clearTimeout(this.pumpTimer);
    this.pumpTimer = null;
  }

  private finalize(reason: CloseReason): void {
    if (this.state_ === "Closed") return;
    const wasOpen = this.isOpen;
    this.state_ = "Closed";
    this.queue.length = 0;

    this.cancelPump();
    if (this.graceTimer !== null) {
      this.clock.clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }

    // A peer that hangs up mid-close still reports the server's reason
    const final = !wasOpen && this.pending ? this.pending : reason;
    this.logger?.debug(LOG_CONTEXT.CONNECTION, "Connection closed", {
      connectionId: this.id,
      code: final.code,
      reason: final.reason,
    });
    this.resolveClosed(final);
  }
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Broadcaster: fans each engine event out to every interested connection.
 *
 * The event is encoded once and the same frame is queued on every
 * recipient. Queuing never blocks; a connection that cannot keep up is
 * closed by its own queue without affecting the others.
 */

import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import { encodeEvent } from "../protocol/codec.js";
import type { EngineEvent } from "../protocol/events.js";
import type { ConnectionRegistry } from "./registry.js";

export interface BroadcastResult {
  seq: number;
  /** Connections the frame was queued on */
  delivered: number;
  /** Matching connections that refused the frame (closing or overflowed) */
  refused: number;
}

export class Broadcaster {
  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly logger?: LoggerAdapter,
  ) {}

  broadcast(event: EngineEvent): BroadcastResult {
    const result: BroadcastResult = { seq: event.seq, delivered: 0, refused: 0 };
    let frame: string | undefined;

    for (const connection of this.registry.snapshot()) {
      if (!connection.accepts(event.kind)) continue;

      frame ??= encodeEvent(event);
      if (connection.enqueueEvent(event, frame)) {
        result.delivered++;
      } else {
        result.refused++;
      }
    }

    if (result.refused > 0) {
      this.logger?.debug(LOG_CONTEXT.BROADCAST, "Event refused by some connections", {
        seq: event.seq,
        kind: event.kind,
        refused: result.refused,
      });
    }
    return result;
  }
}

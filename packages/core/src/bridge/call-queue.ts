// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Host call queue: FIFO of functions the host context drains on its own turn.
 *
 * Hosts without their own concurrency primitives pass `onPending` and call
 * drain() from their event loop (a UI tick, an engine hook). Without
 * `onPending` the queue drains itself on the next macrotask, which suits
 * hosts that share the Node.js event loop.
 */

import { BridgeError } from "../error/error.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import type { HostExecutor } from "./host.js";

export interface HostCallQueueOptions {
  /**
   * Called once when work becomes pending and no drain is in progress.
   */
  onPending?: () => void;
  logger?: LoggerAdapter;
}

type QueuedCall = () => void | Promise<void>;

export class HostCallQueue implements HostExecutor {
  private queue: QueuedCall[] = [];
  private draining = false;
  private notified = false;
  private closed = false;

  constructor(private readonly options: HostCallQueueOptions = {}) {}

  schedule(fn: QueuedCall): void {
    if (this.closed) {
      throw new BridgeError("HOST_UNAVAILABLE", "Host call queue is closed");
    }
    this.queue.push(fn);
    this.notify();
  }

  /**
   * Run queued calls one at a time until the queue is empty.
   * Calls queued while draining run in the same pass.
   * Returns the number of calls run; 0 if a drain is already in progress.
   */
  async drain(): Promise<number> {
    if (this.draining) return 0;
    this.draining = true;
    this.notified = false;

    let ran = 0;
    try {
      for (let fn = this.queue.shift(); fn; fn = this.queue.shift()) {
        try {
          await fn();
        } catch (err) {
          this.options.logger?.error(
            LOG_CONTEXT.BRIDGE,
            "Host call failed outside its task boundary",
            err,
          );
        }
        ran++;
      }
    } finally {
      this.draining = false;
    }
    return ran;
  }

  close(): void {
    this.closed = true;
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private notify(): void {
    if (this.notified || this.draining) return;
    this.notified = true;
    if (this.options.onPending) {
      this.options.onPending();
      return;
    }
    setImmediate(() => {
      void this.drain();
    });
  }
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Event bridge: the only crossing point between the host context and the
 * server loop.
 *
 * Host → server: publish() sequences an event, buffers it and returns. The
 * attached consumer receives buffered events on a later microtask, strictly
 * in sequence order. The buffer is bounded; on overflow the oldest event is
 * dropped and the loss is logged and reported.
 *
 * Server → host: submit() hands a task to the host executor and settles once
 * the host has run it. Tasks sharing a key run in submission order; each
 * task runs to completion before the executor starts another.
 */

import { systemClock, type Clock } from "../clock.js";
import { DEFAULTS } from "../constants.js";
import { BridgeError } from "../error/error.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import type { EngineEvent, EngineEventInit } from "../protocol/events.js";
import {
  EngineEventInitSchema,
  EventStampSchema,
} from "../protocol/events.js";
import type { HostEngine, HostExecutor, HostTask } from "./host.js";

export type EventConsumer = (event: EngineEvent) => void;

export interface EventBridgeOptions {
  executor: HostExecutor;
  /** Events buffered before the oldest is dropped (default: 1024) */
  capacity?: number;
  clock?: Clock;
  logger?: LoggerAdapter;
  /** Receives BRIDGE_OVERFLOW and consumer failures */
  onError?: (err: BridgeError) => void;
}

export interface BridgeStats {
  published: number;
  delivered: number;
  dropped: number;
  buffered: number;
  lastSeq: number;
}

export class EventBridge {
  private readonly capacity: number;
  private readonly clock: Clock;
  private buffer: EngineEvent[] = [];
  private consumer: EventConsumer | null = null;
  private drainScheduled = false;
  private closed = false;
  private lastSeq = 0;
  private published = 0;
  private delivered = 0;
  private dropped = 0;
  private unreportedDrops = 0;
  private chains = new Map<string, Promise<void>>();

  constructor(
    private readonly host: HostEngine,
    private readonly options: EventBridgeOptions,
  ) {
    this.capacity = options.capacity ?? DEFAULTS.BRIDGE_CAPACITY;
    this.clock = options.clock ?? systemClock;
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new BridgeError(
        "INVALID_ARGUMENT",
        "Bridge capacity must be a positive integer",
      );
    }
  }

  /**
   * Host side. Never blocks; a no-op once the bridge is shut down.
   *
   * Events without a sequence number are numbered by the bridge. Events
   * that carry one must be strictly increasing or they are dropped.
   */
  publish(input: EngineEventInit | EngineEvent): void {
    if (this.closed) return;

    const parsed = EngineEventInitSchema.safeParse(input);
    if (!parsed.success) {
      this.options.logger?.error(
        LOG_CONTEXT.BRIDGE,
        "Host published an invalid event; dropped",
        { kind: input.kind, issues: parsed.error.issues },
      );
      return;
    }

    let seq = this.lastSeq + 1;
    let timestamp = this.clock.now();
    const stamp = EventStampSchema.safeParse(input);
    if (stamp.success) {
      if (stamp.data.seq <= this.lastSeq) {
        this.options.logger?.warn(
          LOG_CONTEXT.BRIDGE,
          "Out-of-order event dropped",
          { seq: stamp.data.seq, lastSeq: this.lastSeq },
        );
        return;
      }
      ({ seq, timestamp } = stamp.data);
    }
    this.lastSeq = seq;

    Object.freeze(parsed.data.payload);
    const event: EngineEvent = Object.freeze({ ...parsed.data, seq, timestamp });

    if (this.buffer.length >= this.capacity) {
      const oldest = this.buffer.shift();
      this.dropped++;
      if (this.unreportedDrops === 0) {
        this.reportOverflow(oldest?.seq);
      }
      this.unreportedDrops++;
    }

    this.buffer.push(event);
    this.published++;
    this.scheduleDrain();
  }

  /**
   * Server side. Start receiving events; anything buffered is flushed first.
   */
  attach(consumer: EventConsumer): void {
    if (this.consumer && this.consumer !== consumer) {
      throw new BridgeError(
        "INVALID_ARGUMENT",
        "Event bridge already has a consumer",
      );
    }
    this.consumer = consumer;
    this.scheduleDrain();
  }

  /**
   * Stop delivering; events buffer again until the next attach().
   */
  detach(): void {
    this.consumer = null;
  }

  /**
   * Server side. Run `task` in the host context.
   * Tasks with the same key (one per connection) run in submission order.
   */
  submit<T>(key: string, task: HostTask<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(
        new BridgeError("HOST_UNAVAILABLE", "Host context is shutting down"),
      );
    }

    const previous = this.chains.get(key) ?? Promise.resolve();
    const run = previous.then(() => this.runOnHost(task));
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.chains.set(key, tail);
    void tail.then(() => {
      if (this.chains.get(key) === tail) this.chains.delete(key);
    });
    return run;
  }

  /**
   * Reject further work. Publish becomes a no-op; tasks already handed to
   * the host still settle; tasks still waiting behind them are rejected.
   */
  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    this.flushDropReport();
    this.options.executor.close();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  stats(): BridgeStats {
    return {
      published: this.published,
      delivered: this.delivered,
      dropped: this.dropped,
      buffered: this.buffer.length,
      lastSeq: this.lastSeq,
    };
  }

  private runOnHost<T>(task: HostTask<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(
        new BridgeError("HOST_UNAVAILABLE", "Host context is shutting down"),
      );
    }
    return new Promise<T>((resolve, reject) => {
      try {
        this.options.executor.schedule(async () => {
          try {
            resolve(await task(this.host));
          } catch (err) {
            reject(err);
          }
        });
      } catch (err) {
        reject(BridgeError.wrap(err, "HOST_UNAVAILABLE"));
      }
    });
  }

  private scheduleDrain(): void {
    if (this.drainScheduled || !this.consumer || this.buffer.length === 0) {
      return;
    }
    this.drainScheduled = true;
    queueMicrotask(() => this.drain());
  }

  private drain(): void {
    this.drainScheduled = false;
    this.flushDropReport();

    while (this.consumer && this.buffer.length > 0) {
      const consumer = this.consumer;
      const event = this.buffer.shift();
      if (!event) break;
      this.delivered++;
      try {
        consumer(event);
      } catch (err) {
        const error = BridgeError.wrap(err, "INTERNAL", { seq: event.seq });
        this.options.logger?.error(
          LOG_CONTEXT.BRIDGE,
          "Event consumer threw",
          error,
        );
        this.options.onError?.(error);
      }
    }
  }

  private reportOverflow(droppedSeq: number | undefined): void {
    const error = new BridgeError(
      "BRIDGE_OVERFLOW",
      `Event buffer full (${this.capacity}); dropping oldest events`,
      { capacity: this.capacity, firstDroppedSeq: droppedSeq },
    );
    this.options.logger?.warn(LOG_CONTEXT.BRIDGE, error.message, error.details);
    this.options.onError?.(error);
  }

  private flushDropReport(): void {
    if (this.unreportedDrops === 0) return;
    this.options.logger?.warn(
      LOG_CONTEXT.BRIDGE,
      `Dropped ${this.unreportedDrops} event(s) while the buffer was full`,
      { totalDropped: this.dropped },
    );
    this.unreportedDrops = 0;
  }
}

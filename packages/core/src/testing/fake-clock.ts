// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Fake clock for deterministic tests. Timers only fire when the test
 * advances time.
 *
 * Usage:
 *   const clock = new FakeClock();
 *   await clock.tick(30_000); // Advance 30s, running due timers in order
 *   await clock.flush();      // Settle promises and host calls, time unchanged
 */

import type { Clock } from "../clock.js";

interface ScheduledTimer {
  id: number;
  fn: () => void;
  dueAt: number;
}

/**
 * Let pending work run: each turn waits one macrotask, by which point every
 * queued microtask and earlier setImmediate callback (such as a
 * self-draining host call queue) has run.
 */
export async function settle(turns = 3): Promise<void> {
  for (let i = 0; i < turns; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export class FakeClock implements Clock {
  private current: number;
  private timers = new Map<number, ScheduledTimer>();
  private nextId = 1;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  setTimeout(fn: () => void, ms: number): unknown {
    const id = this.nextId++;
    this.timers.set(id, { id, fn, dueAt: this.current + Math.max(0, ms) });
    return id;
  }

  clearTimeout(id: unknown): void {
    if (typeof id === "number") this.timers.delete(id);
  }

  /**
   * Advance time by `ms`, running every timer that falls due, earliest
   * first (FIFO for equal due times). Settles between timers, so work a
   * timer triggers completes before the next one fires.
   */
  async tick(ms: number): Promise<void> {
    const target = this.current + ms;
    await this.flush();

    for (let timer = this.nextDue(target); timer; timer = this.nextDue(target)) {
      this.current = timer.dueAt;
      this.timers.delete(timer.id);
      timer.fn();
      await this.flush();
    }

    this.current = target;
    await this.flush();
  }

  /**
   * Settle pending work without advancing time.
   */
  flush(turns = 3): Promise<void> {
    return settle(turns);
  }

  /**
   * Due times of timers still pending.
   */
  pendingTimers(): number[] {
    return Array.from(this.timers.values(), (t) => t.dueAt);
  }

  private nextDue(limit: number): ScheduledTimer | undefined {
    let next: ScheduledTimer | undefined;
    for (const timer of this.timers.values()) {
      if (timer.dueAt > limit) continue;
      // Map iteration order is insertion order, so ties keep FIFO
      if (!next || timer.dueAt < next.dueAt) next = timer;
    }
    return next;
  }
}

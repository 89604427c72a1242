// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Time source for every timer the server arms: challenge expiry, idle
 * timeouts, close grace windows and send-pump retries. Tests swap in
 * FakeClock from the testing entry.
 */
export interface Clock {
  /** Returns an opaque handle for clearTimeout */
  setTimeout(fn: () => void, ms: number): unknown;
  clearTimeout(handle: unknown): void;
  /** Milliseconds since epoch (or since the fake clock's start) */
  now(): number;
}

function isTimeout(handle: unknown): handle is NodeJS.Timeout {
  return typeof handle === "object" && handle !== null && "ref" in handle;
}

export class SystemClock implements Clock {
  setTimeout(fn: () => void, ms: number): unknown {
    return globalThis.setTimeout(fn, ms);
  }

  clearTimeout(handle: unknown): void {
    if (isTimeout(handle)) globalThis.clearTimeout(handle);
  }

  now(): number {
    return Date.now();
  }
}

export const systemClock: Clock = new SystemClock();

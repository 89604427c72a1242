// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Host-facing contract: what the embedding stenography engine provides.
 *
 * The host runs on its own execution context and is never assumed to be
 * reentrant. Everything here is called either from the host's own callbacks
 * (event emission) or from tasks the bridge runs on the host's behalf.
 */

import type { ClientCommand } from "../protocol/commands.js";
import type { EngineEvent, EngineEventInit } from "../protocol/events.js";

export type HostEventListener = (event: EngineEventInit | EngineEvent) => void;

/**
 * Reverse dictionary access used by the Lookup command.
 */
export interface HostDictionary {
  /**
   * Every outline (sequence of strokes) that translates to `text`.
   */
  reverseLookup(text: string): Iterable<readonly string[]>;

  /**
   * Longest outline, in strokes, across the loaded dictionaries. Bounds
   * how many tokens a single looked-up phrase may span.
   */
  longestKey(): number;
}

export interface HostEngine {
  /**
   * Register the callback the host invokes for every domain event.
   * Returns a function that removes it.
   */
  onEvent(listener: HostEventListener): () => void;

  /**
   * Apply a command to host state. Throws HostError on refusal.
   */
  applyCommand(command: ClientCommand): void | Promise<void>;

  /**
   * Names of the configuration options SetConfigOption may touch.
   */
  configOptions(): readonly string[];

  /**
   * Present when the host can serve Lookup commands.
   */
  readonly dictionary?: HostDictionary;
}

/**
 * Unit of work run inside the host context.
 */
export type HostTask<T> = (host: HostEngine) => T | Promise<T>;

/**
 * How work is handed to the host context.
 */
export interface HostExecutor {
  /**
   * Queue a function for the host to run on its own turn.
   * Functions run one at a time, in order; a returned promise is awaited
   * before the next function starts.
   */
  schedule(fn: () => void | Promise<void>): void;

  /**
   * Stop accepting work. Already-queued work still runs.
   */
  close(): void;
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Fake stenography engine implementing HostEngine.
 *
 * Commands change its state and emit the event a real engine would:
 * SetConfigOption → ConfigChanged (OutputToggled for "output_enabled"),
 * ToggleOutput → OutputToggled, Send* → the matching output event.
 * The reverse dictionary is built from `{ "KPA/HEL": "Hello" }` entries.
 */

import type { HostDictionary, HostEngine, HostEventListener } from "../bridge/host.js";
import { HostError } from "../error/error.js";
import type { ClientCommand, CommandKind } from "../protocol/commands.js";
import type { ConfigValue, EngineEventInit } from "../protocol/events.js";

export const OUTPUT_OPTION = "output_enabled";

export interface TestHostOptions {
  /** Initial configuration; keys become the known option names */
  config?: Record<string, ConfigValue>;
  /** Outline ("S/T" strokes) → translation; omit for a host without lookups */
  dictionary?: Record<string, string>;
  outputEnabled?: boolean;
}

class TestDictionary implements HostDictionary {
  private readonly byText = new Map<string, string[][]>();
  private readonly longest: number;

  constructor(entries: Record<string, string>) {
    let longest = 0;
    for (const [outline, text] of Object.entries(entries)) {
      const strokes = outline.split("/");
      longest = Math.max(longest, strokes.length);
      const list = this.byText.get(text) ?? [];
      list.push(strokes);
      this.byText.set(text, list);
    }
    this.longest = longest;
  }

  reverseLookup(text: string): Iterable<readonly string[]> {
    return this.byText.get(text) ?? [];
  }

  longestKey(): number {
    return this.longest;
  }
}

export class TestHost implements HostEngine {
  readonly dictionary?: HostDictionary;
  readonly config: Map<string, ConfigValue>;
  outputEnabled: boolean;
  /** Every command applied, in order */
  readonly applied: ClientCommand[] = [];

  private listeners = new Set<HostEventListener>();
  private failures = new Map<CommandKind, string>();

  constructor(options: TestHostOptions = {}) {
    this.config = new Map(Object.entries(options.config ?? { [OUTPUT_OPTION]: true }));
    this.outputEnabled = options.outputEnabled ?? true;
    if (options.dictionary) {
      this.dictionary = new TestDictionary(options.dictionary);
    }
  }

  onEvent(listener: HostEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  configOptions(): readonly string[] {
    return Array.from(this.config.keys());
  }

  /**
   * Make the next commands of `kind` fail with a HostError.
   */
  failWith(kind: CommandKind, message: string): void {
    this.failures.set(kind, message);
  }

  /**
   * Emit an event as the engine would (a stroke, a translation...).
   */
  emit(event: EngineEventInit): void {
    for (const listener of [...this.listeners]) listener(event);
  }

  applyCommand(command: ClientCommand): void {
    const failure = this.failures.get(command.kind);
    if (failure !== undefined) {
      throw new HostError(failure, { kind: command.kind });
    }
    this.applied.push(command);

    switch (command.kind) {
      case "SetConfigOption": {
        const { option, value } = command.payload;
        this.config.set(option, value);
        if (option === OUTPUT_OPTION && typeof value === "boolean") {
          this.setOutput(value);
        } else {
          this.emit({ kind: "ConfigChanged", payload: { option, value } });
        }
        return;
      }
      case "ToggleOutput":
        this.setOutput(command.payload.enabled ?? !this.outputEnabled);
        return;
      case "SendText":
        this.emit({ kind: "SendString", payload: { text: command.payload.text } });
        return;
      case "SendBackspaces":
        this.emit({ kind: "SendBackspaces", payload: { count: command.payload.count } });
        return;
      case "SendKeyCombination":
        this.emit({ kind: "SendKeyCombination", payload: { combo: command.payload.combo } });
        return;
      case "Lookup":
        // Served by the dispatcher from the dictionary
        return;
    }
  }

  private setOutput(enabled: boolean): void {
    this.outputEnabled = enabled;
    this.config.set(OUTPUT_OPTION, enabled);
    this.emit({ kind: "OutputToggled", payload: { enabled } });
  }
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Command dispatcher: runs one client command against the host and
 * reports the outcome to the connection that sent it, and only to it.
 *
 * Pipeline: rate limit → bridge.submit(task) → reply.
 * Command invariants that depend on host state (known option names, a
 * loaded dictionary) are checked inside the host task, where reading that
 * state is safe.
 *
 * Reply policy:
 * - with correlationId: ack (ok + result, or error)
 * - without: error frame on failure, nothing on success
 * - connection closed meanwhile: outcome discarded
 */

import type { RateLimiter } from "@steno-bridge/rate-limit";
import { keyPerConnection } from "@steno-bridge/rate-limit";
import type { EventBridge } from "../bridge/bridge.js";
import type { HostTask } from "../bridge/host.js";
import type { Connection } from "../connection/connection.js";
import { BridgeError } from "../error/error.js";
import { translateError } from "../error/translate.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import { lookupOutlines } from "../lookup/lookup.js";
import type { ClientCommand } from "../protocol/commands.js";
import type { AckMessage } from "../protocol/messages.js";

export type DispatchOutcome =
  | { ok: true; result?: unknown }
  | { ok: false; error: BridgeError };

export interface CommandDispatcherOptions {
  bridge: EventBridge;
  /** Per-connection command budget; unlimited when absent */
  limiter?: RateLimiter;
  logger?: LoggerAdapter;
}

export class CommandDispatcher {
  constructor(private readonly options: CommandDispatcherOptions) {}

  /**
   * Run `command` for `connection` and send the reply. Never throws.
   */
  async handle(connection: Connection, command: ClientCommand): Promise<DispatchOutcome> {
    const outcome = await this.execute(connection, command);
    this.reply(connection, command.correlationId, outcome);
    return outcome;
  }

  /**
   * Send an outcome to the originating connection.
   */
  reply(
    connection: Connection,
    correlationId: string | undefined,
    outcome: DispatchOutcome,
  ): void {
    if (!connection.isOpen) {
      this.options.logger?.debug(
        LOG_CONTEXT.DISPATCH,
        "Connection closed before reply; outcome discarded",
        { connectionId: connection.id, correlationId },
      );
      return;
    }

    if (correlationId !== undefined) {
      connection.send(toAck(correlationId, outcome));
      return;
    }
    if (!outcome.ok) {
      const { code, message, retryable } = outcome.error;
      connection.send({ type: "error", code, message, retryable });
    }
  }

  private async execute(
    connection: Connection,
    command: ClientCommand,
  ): Promise<DispatchOutcome> {
    try {
      await this.checkBudget(connection);
      const result = await this.options.bridge.submit(connection.id, this.taskFor(command));
      return result === undefined ? { ok: true } : { ok: true, result };
    } catch (err) {
      const error = translateError(err);
      this.options.logger?.warn(LOG_CONTEXT.DISPATCH, `Command failed: ${error.message}`, {
        connectionId: connection.id,
        kind: command.kind,
        code: error.code,
      });
      return { ok: false, error };
    }
  }

  private async checkBudget(connection: Connection): Promise<void> {
    const limiter = this.options.limiter;
    if (!limiter) return;

    const decision = await limiter.consume(keyPerConnection(connection.id), 1);
    if (!decision.allowed) {
      throw new BridgeError("RESOURCE_EXHAUSTED", "Command rate limit exceeded", {
        retryAfterMs: decision.retryAfterMs,
      });
    }
  }

  private taskFor(command: ClientCommand): HostTask<unknown> {
    switch (command.kind) {
      case "SetConfigOption":
        return (host) => {
          const { option } = command.payload;
          if (!host.configOptions().includes(option)) {
            throw new BridgeError(
              "INVALID_ARGUMENT",
              `Unknown configuration option: "${option}"`,
              { option },
            );
          }
          return host.applyCommand(command);
        };
      case "Lookup":
        return (host) => {
          if (!host.dictionary) {
            throw new BridgeError("UNSUPPORTED_COMMAND", "Host has no dictionary for lookups");
          }
          return lookupOutlines(host.dictionary, command.payload.text, {
            logger: this.options.logger,
          });
        };
      default:
        return (host) => host.applyCommand(command);
    }
  }
}

function toAck(correlationId: string, outcome: DispatchOutcome): AckMessage {
  if (!outcome.ok) {
    const { code, message, retryable } = outcome.error;
    return {
      type: "ack",
      correlationId,
      outcome: "error",
      error: { code, message, retryable },
    };
  }
  return outcome.result === undefined
    ? { type: "ack", correlationId, outcome: "ok" }
    : { type: "ack", correlationId, outcome: "ok", result: outcome.result };
}

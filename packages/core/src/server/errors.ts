// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Error sink: every error caught at a boundary (connection, bridge,
 * transport, lifecycle) flows here, normalised to a BridgeError.
 */

import type { BridgeError } from "../error/error.js";
import { translateError } from "../error/translate.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";

export type ErrorSource = "connection" | "bridge" | "transport" | "lifecycle";

export interface ErrorContext {
  source: ErrorSource;
  connectionId?: string;
}

export type ErrorHandler = (
  error: BridgeError,
  context: ErrorContext,
) => void | Promise<void>;

export class ErrorSink {
  private handlers: ErrorHandler[] = [];

  constructor(private readonly logger?: LoggerAdapter) {}

  /**
   * Register a handler. Returns a function that removes it.
   */
  add(handler: ErrorHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  /**
   * Deliver `err` to every handler. Never rejects.
   */
  async report(err: unknown, context: ErrorContext): Promise<void> {
    const error = translateError(err);
    this.logger?.error(LOG_CONTEXT.LIFECYCLE, error.message, {
      ...context,
      code: error.code,
    });

    for (const handler of [...this.handlers]) {
      try {
        await handler(error, context);
      } catch (e) {
        // One failing handler must not stop the others
        this.logger?.error(LOG_CONTEXT.LIFECYCLE, "Error in onError handler", e);
      }
    }
  }
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Logger adapter interface for structured logging across the bridge.
 *
 * Lets the embedding host route logs into its own logging facility instead
 * of the console.
 *
 * @example
 * ```typescript
 * import { createLogger, ServerLifecycleManager } from "@steno-bridge/core";
 *
 * const logger = createLogger({
 *   minLevel: "info",
 *   log: (level, context, message, data) => {
 *     hostLog.write({ level, context, message, data, at: new Date() });
 *   },
 * });
 *
 * const server = new ServerLifecycleManager(host, { transport, scheme, logger });
 * ```
 */
export interface LoggerAdapter {
  /**
   * Log a debug-level message
   *
   * @param context - Category or source of the log (e.g., "connection", "bridge")
   * @param message - Log message
   * @param data - Optional structured data
   */
  debug(context: string, message: string, data?: unknown): void;

  info(context: string, message: string, data?: unknown): void;

  warn(context: string, message: string, data?: unknown): void;

  /**
   * Log an error-level message
   *
   * @param data - Optional structured data (error details, stack trace, etc.)
   */
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Default logger adapter that uses console methods
 *
 * @internal
 */
export class DefaultLoggerAdapter implements LoggerAdapter {
  debug(context: string, message: string, data?: unknown): void {
    console.debug(`[${context}] ${message}`, data ?? "");
  }

  info(context: string, message: string, data?: unknown): void {
    console.info(`[${context}] ${message}`, data ?? "");
  }

  warn(context: string, message: string, data?: unknown): void {
    console.warn(`[${context}] ${message}`, data ?? "");
  }

  error(context: string, message: string, data?: unknown): void {
    console.error(`[${context}] ${message}`, data ?? "");
  }
}

export interface LoggerOptions {
  /**
   * Custom log function. When set, replaces console output entirely.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum log level to output (default: "info")
   */
  minLevel?: LogLevel;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create a logger adapter with level filtering and an optional sink.
 */
export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LEVELS[options.minLevel ?? "info"];
  const fallback = new DefaultLoggerAdapter();

  const emit = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void => {
    if (LEVELS[level] < minLevelValue) return;
    if (options.log) {
      options.log(level, context, message, data);
      return;
    }
    fallback[level](context, message, data);
  };

  return {
    debug: (context, message, data) => emit("debug", context, message, data),
    info: (context, message, data) => emit("info", context, message, data),
    warn: (context, message, data) => emit("warn", context, message, data),
    error: (context, message, data) => emit("error", context, message, data),
  };
}

/**
 * Log context constants used by the bridge components
 *
 * Hosts can use these to filter or categorize logs
 */
export const LOG_CONTEXT = {
  CONNECTION: "connection",
  AUTH: "auth",
  BRIDGE: "bridge",
  BROADCAST: "broadcast",
  DISPATCH: "dispatch",
  LIFECYCLE: "lifecycle",
  TRANSPORT: "transport",
} as const;

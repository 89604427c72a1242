// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type {
  ApproveHook,
  Clock,
  ErrorHandler,
  HostEngine,
  HostExecutor,
  ListenAddress,
  LoggerAdapter,
  ProofScheme,
  ServerConfigInput,
  ServerStatus,
} from "@steno-bridge/core";
import {
  BridgeError,
  hmacScheme,
  LOG_CONTEXT,
  resolveServerConfig,
  ServerLifecycleManager,
} from "@steno-bridge/core";
import { loadKeyMaterial } from "./keys.js";
import { createNodeTransport } from "./transport.js";

export interface ExtensionOptions extends ServerConfigInput {
  logger?: LoggerAdapter;
  clock?: Clock;
  /** Called once per start(); each server closes its executor on stop */
  createExecutor?: () => HostExecutor;
  /** Proof scheme to use instead of HMAC over the key at `keyPath` */
  scheme?: ProofScheme;
  approve?: ApproveHook;
  onError?: ErrorHandler;
}

interface Launched {
  manager: ServerLifecycleManager;
  address: ListenAddress;
}

/**
 * What the host sees: a plugin it can start and stop with the engine.
 */
export interface Extension {
  start(): Promise<ListenAddress>;
  stop(): Promise<void>;
  status(): ServerStatus | null;
}

/**
 * Wrap a host engine in a WebSocket server extension.
 *
 * Each start() after a stop() builds a fresh server, so the key file is
 * re-read and configuration changes on the host side take effect.
 *
 * @example
 * ```typescript
 * const extension = createExtension(engine, {
 *   port: 8086,
 *   keyPath: join(configDir, "websocket.key"),
 * });
 * await extension.start();
 * ```
 */
export function createExtension(
  host: HostEngine,
  options: ExtensionOptions,
): Extension {
  const { logger, clock, createExecutor, scheme, approve, onError, ...input } = options;
  const config = resolveServerConfig(input);

  // One launch per start/stop cycle; stop() waits for it before stopping
  let running: Promise<Launched> | null = null;
  let server: ServerLifecycleManager | null = null;

  async function resolveScheme(): Promise<ProofScheme> {
    if (scheme) return scheme;
    if (config.keyPath === undefined) {
      throw new BridgeError(
        "INVALID_ARGUMENT",
        "keyPath is required unless a proof scheme is given",
      );
    }
    return hmacScheme(await loadKeyMaterial(config.keyPath));
  }

  async function build(): Promise<ServerLifecycleManager> {
    const manager = new ServerLifecycleManager(host, {
      transport: createNodeTransport({
        host: config.host,
        port: config.port,
        allowedOrigins: config.allowedOrigins,
        maxPayload: config.maxFrameBytes,
        logger,
      }),
      scheme: await resolveScheme(),
      config,
      executor: createExecutor?.(),
      clock,
      logger,
      approve,
    });
    if (onError) manager.onError(onError);
    return manager;
  }

  async function launch(): Promise<Launched> {
    const manager = await build();
    server = manager;
    try {
      return { manager, address: await manager.start() };
    } catch (err) {
      if (server === manager) server = null;
      throw err;
    }
  }

  return {
    async start() {
      running ??= launch();
      const pending = running;
      try {
        return (await pending).address;
      } catch (err) {
        if (running === pending) running = null;
        throw err;
      }
    },

    async stop() {
      const pending = running;
      running = null;
      if (!pending) return;

      // A failed launch left nothing listening; start() reports the failure
      const launched = await pending.then(
        (value) => value,
        () => null,
      );
      if (!launched) return;

      await launched.manager.stop();
      if (server === launched.manager) server = null;
      logger?.info(LOG_CONTEXT.LIFECYCLE, "Extension stopped");
    },

    status() {
      return server?.status() ?? null;
    },
  };
}

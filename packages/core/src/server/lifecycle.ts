// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Server lifecycle manager: owns one server instance end to end.
 *
 * Everything is scoped to the instance (registry, bridge, gate, limiters),
 * so several servers can run side by side and each tears down cleanly.
 *
 *   idle ──start()──▶ running ──stop()──▶ stopping ──▶ stopped
 *
 * start() is idempotent while running; stop() is idempotent and concurrent
 * callers share one shutdown.
 */

import type { RateLimiter } from "@steno-bridge/rate-limit";
import { memoryRateLimiter } from "@steno-bridge/rate-limit";
import { AuthenticationGate } from "../auth/gate.js";
import type { ProofScheme } from "../auth/schemes.js";
import { EventBridge, type BridgeStats } from "../bridge/bridge.js";
import { HostCallQueue } from "../bridge/call-queue.js";
import type { HostEngine, HostExecutor } from "../bridge/host.js";
import { systemClock, type Clock } from "../clock.js";
import { Broadcaster } from "../connection/broadcaster.js";
import { closeReasonFor, Connection } from "../connection/connection.js";
import { ConnectionRegistry } from "../connection/registry.js";
import { CommandDispatcher } from "../dispatch/dispatcher.js";
import { BridgeError } from "../error/error.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import { resolveServerConfig, type ServerConfig, type ServerConfigInput } from "../options.js";
import { ErrorSink, type ErrorHandler } from "./errors.js";
import { Session, type ApproveHook } from "./session.js";
import type {
  ConnectionInfo,
  ListenAddress,
  ServerWebSocket,
  TransportAdapter,
} from "./transport.js";

export type ServerState = "idle" | "starting" | "running" | "stopping" | "stopped";

export interface ServerLifecycleOptions {
  transport: TransportAdapter;
  scheme: ProofScheme;
  config?: ServerConfigInput;
  /** How work reaches the host context (default: a self-draining HostCallQueue) */
  executor?: HostExecutor;
  clock?: Clock;
  logger?: LoggerAdapter;
  /** Failed-handshake limiter (default: in-memory, from config.authFailures) */
  authLimiter?: RateLimiter;
  /** Command limiter (default: in-memory from config.commandRateLimit, if set) */
  commandLimiter?: RateLimiter;
  approve?: ApproveHook;
}

export interface ServerStatus {
  state: ServerState;
  address: ListenAddress | null;
  /** Admitted connections */
  connections: number;
  /** Connections still in their handshake */
  handshaking: number;
  bridge: BridgeStats;
}

export class ServerLifecycleManager {
  readonly config: ServerConfig;
  readonly registry: ConnectionRegistry;
  readonly bridge: EventBridge;

  private readonly clock: Clock;
  private readonly logger: LoggerAdapter | undefined;
  private readonly errors: ErrorSink;
  private readonly gate: AuthenticationGate;
  private readonly dispatcher: CommandDispatcher;
  private readonly broadcaster: Broadcaster;
  private readonly authLimiter: RateLimiter;
  private readonly commandLimiter: RateLimiter | undefined;
  private readonly live = new Set<Connection>();

  private state_: ServerState = "idle";
  private address: ListenAddress | null = null;
  private starting: Promise<ListenAddress> | null = null;
  private stopping: Promise<void> | null = null;
  private unsubscribeHost: (() => void) | null = null;

  constructor(
    private readonly host: HostEngine,
    private readonly options: ServerLifecycleOptions,
  ) {
    this.config = resolveServerConfig(options.config);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
    this.errors = new ErrorSink(this.logger);

    this.authLimiter =
      options.authLimiter ??
      memoryRateLimiter(this.config.authFailures, { clock: this.clock });
    this.commandLimiter =
      options.commandLimiter ??
      (this.config.commandRateLimit
        ? memoryRateLimiter(this.config.commandRateLimit, { clock: this.clock })
        : undefined);

    this.registry = new ConnectionRegistry({
      maxConnections: this.config.maxConnections,
    });
    this.bridge = new EventBridge(host, {
      executor: options.executor ?? new HostCallQueue({ logger: this.logger }),
      capacity: this.config.bridgeCapacity,
      clock: this.clock,
      logger: this.logger,
      onError: (error) => {
        void this.errors.report(error, { source: "bridge" });
      },
    });
    this.gate = new AuthenticationGate({
      scheme: options.scheme,
      limiter: this.authLimiter,
      challengeTtlMs: this.config.challengeTtlMs,
      clock: this.clock,
      logger: this.logger,
    });
    this.dispatcher = new CommandDispatcher({
      bridge: this.bridge,
      limiter: this.commandLimiter,
      logger: this.logger,
    });
    this.broadcaster = new Broadcaster(this.registry, this.logger);
  }

  get state(): ServerState {
    return this.state_;
  }

  /**
   * Register an error handler. Returns a function that removes it.
   */
  onError(handler: ErrorHandler): () => void {
    return this.errors.add(handler);
  }

  async start(): Promise<ListenAddress> {
    if (this.state_ === "running" && this.address) return this.address;
    if (this.starting) return this.starting;
    if (this.state_ === "stopping" || this.state_ === "stopped") {
      throw new BridgeError("SHUTTING_DOWN", "Server has been stopped");
    }

    this.starting = this.listen();
    try {
      return await this.starting;
    } finally {
      this.starting = null;
    }
  }

  /**
   * Close every connection (queued frames get the grace window to drain),
   * then release the bridge, host subscription, transport and limiters.
   */
  stop(): Promise<void> {
    if (this.state_ === "stopped") return Promise.resolve();
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  status(): ServerStatus {
    return {
      state: this.state_,
      address: this.address,
      connections: this.registry.size,
      handshaking: this.registry.pending,
      bridge: this.bridge.stats(),
    };
  }

  private async listen(): Promise<ListenAddress> {
    this.state_ = "starting";
    this.bridge.attach((event) => {
      this.broadcaster.broadcast(event);
    });
    this.unsubscribeHost = this.host.onEvent((event) => {
      this.bridge.publish(event);
    });

    try {
      const address = await this.options.transport.listen((socket, info) => {
        this.accept(socket, info);
      });
      this.address = address;
      this.state_ = "running";
      this.logger?.info(LOG_CONTEXT.LIFECYCLE, "Server listening", address);
      return address;
    } catch (err) {
      this.bridge.detach();
      this.unsubscribeHost?.();
      this.unsubscribeHost = null;
      this.state_ = "idle";
      void this.errors.report(err, { source: "transport" });
      throw err;
    }
  }

  private accept(socket: ServerWebSocket, info: ConnectionInfo): void {
    const connection = new Connection({
      socket,
      info,
      outboundQueueCapacity: this.config.outboundQueueCapacity,
      sendHighWaterMark: this.config.sendHighWaterMark,
      closeGraceMs: this.config.closeGraceMs,
      clock: this.clock,
      logger: this.logger,
    });

    if (this.state_ !== "running") {
      this.refuse(connection, new BridgeError("SHUTTING_DOWN"));
      return;
    }

    let release: () => void;
    try {
      release = this.registry.reserve();
    } catch (err) {
      this.refuse(connection, BridgeError.wrap(err, "RESOURCE_EXHAUSTED"));
      return;
    }

    this.live.add(connection);
    void connection.closed.then(() => {
      this.live.delete(connection);
    });

    new Session({
      connection,
      gate: this.gate,
      registry: this.registry,
      dispatcher: this.dispatcher,
      errors: this.errors,
      clock: this.clock,
      idleTimeoutMs: this.config.idleTimeoutMs,
      maxFrameBytes: this.config.maxFrameBytes,
      release,
      approve: this.options.approve,
      logger: this.logger,
    }).start();
  }

  private refuse(connection: Connection, error: BridgeError): void {
    this.logger?.warn(LOG_CONTEXT.CONNECTION, `Connection refused: ${error.message}`, {
      origin: connection.info.origin,
      code: error.code,
    });
    const { code, message, retryable } = error;
    connection.send({ type: "error", code, message, retryable });
    void connection.close(closeReasonFor(error), { drain: true });
  }

  private async shutdown(): Promise<void> {
    if (this.starting) {
      // A failed start already reported its error to its own caller
      await this.starting.catch(() => undefined);
    }
    this.state_ = "stopping";
    this.logger?.info(LOG_CONTEXT.LIFECYCLE, "Stopping server", {
      connections: this.live.size,
    });

    const reason = closeReasonFor(new BridgeError("SHUTTING_DOWN"));
    const closing = Array.from(this.live, (connection) =>
      connection.close(reason, { drain: true }),
    );
    await this.within(this.config.closeGraceMs, Promise.all(closing));
    for (const connection of this.live) {
      connection.terminate(reason);
    }

    this.bridge.shutdown();
    this.unsubscribeHost?.();
    this.unsubscribeHost = null;
    this.gate.dispose();

    try {
      await this.options.transport.close();
    } catch (err) {
      await this.errors.report(err, { source: "transport" });
    }
    try {
      await this.authLimiter.dispose?.();
      await this.commandLimiter?.dispose?.();
    } catch (err) {
      await this.errors.report(err, { source: "lifecycle" });
    }

    this.state_ = "stopped";
    this.address = null;
    this.logger?.info(LOG_CONTEXT.LIFECYCLE, "Server stopped");
  }

  /**
   * Wait for `work`, but no longer than `ms` on the server clock.
   */
  private within(ms: number, work: Promise<unknown>): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = this.clock.setTimeout(resolve, ms);
      void work.then(() => {
        this.clock.clearTimeout(timer);
        resolve();
      });
    });
  }
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Session: drives one connection from upgrade to close.
 *
 *   origin check → challenge → proof → approve → welcome → message loop
 *
 * Inbound frames are handled one at a time in arrival order. Before
 * admission only `proof` and `ping` are accepted; anything else ends the
 * handshake as a missing credential. After admission the loop serves
 * commands, subscriptions and heartbeats, and an idle timer closes
 * connections that go quiet.
 *
 * Any unexpected exception closes this connection with INTERNAL and is
 * reported to the error sink; other connections are unaffected.
 */

import type { AuthenticationGate, Identity } from "../auth/gate.js";
import type { Clock } from "../clock.js";
import { PROTOCOL_VERSION } from "../constants.js";
import { closeReasonFor, type Connection } from "../connection/connection.js";
import type { ConnectionRegistry } from "../connection/registry.js";
import type { CommandDispatcher } from "../dispatch/dispatcher.js";
import { BridgeError, DecodeError } from "../error/error.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import { decode } from "../protocol/codec.js";
import { EVENT_KINDS } from "../protocol/events.js";
import type {
  ClientMessage,
  ErrorMessage,
  ProofMessage,
} from "../protocol/messages.js";
import type { RawFrame } from "../utils/json.js";
import type { ErrorSink } from "./errors.js";
import type { ConnectionInfo } from "./transport.js";

/**
 * Final say on an authenticated client. Return false to refuse it with
 * CONNECTION_DENIED.
 */
export type ApproveHook = (
  info: ConnectionInfo,
  identity: Identity,
) => boolean | Promise<boolean>;

export interface SessionOptions {
  connection: Connection;
  gate: AuthenticationGate;
  registry: ConnectionRegistry;
  dispatcher: CommandDispatcher;
  errors: ErrorSink;
  clock: Clock;
  idleTimeoutMs: number;
  maxFrameBytes: number;
  /** Releases the handshake slot held in the registry */
  release: () => void;
  approve?: ApproveHook;
  logger?: LoggerAdapter;
}

type Phase = "opening" | "challenged" | "verifying" | "admitted";

export class Session {
  private phase: Phase = "opening";
  private nonce: string | null = null;
  private challengeTimer: unknown = null;
  private idleTimer: unknown = null;
  private inbox: Promise<void> = Promise.resolve();

  constructor(private readonly options: SessionOptions) {}

  get connection(): Connection {
    return this.options.connection;
  }

  start(): void {
    const { connection } = this.options;
    connection.socket.onMessage((data) => this.receive(data));
    void connection.closed.then(() => this.cleanup());
    this.schedule(() => this.open());
  }

  private receive(data: RawFrame): void {
    if (!this.connection.isOpen) return;
    this.schedule(() => this.process(data));
  }

  /**
   * Run `work` after everything already scheduled for this connection.
   */
  private schedule(work: () => Promise<void> | void): void {
    this.inbox = this.inbox.then(async () => {
      if (!this.connection.isOpen) return;
      try {
        await work();
      } catch (err) {
        await this.crash(err);
      }
    });
  }

  private async open(): Promise<void> {
    const { gate, clock } = this.options;
    try {
      await gate.checkPeer(this.connection.info);
    } catch (err) {
      this.fail(BridgeError.wrap(err, "RESOURCE_EXHAUSTED"));
      return;
    }

    const challenge = gate.issueChallenge();
    this.nonce = challenge.nonce;
    this.phase = "challenged";
    this.connection.send({
      type: "challenge",
      nonce: challenge.nonce,
      scheme: challenge.scheme,
      expiresAt: challenge.expiresAt,
    });
    this.challengeTimer = clock.setTimeout(() => {
      this.challengeTimer = null;
      this.schedule(() => this.verify(undefined));
    }, challenge.expiresAt - clock.now());
  }

  private async process(data: RawFrame): Promise<void> {
    let message: ClientMessage;
    try {
      message = decode(data, { maxBytes: this.options.maxFrameBytes });
    } catch (err) {
      if (!(err instanceof BridgeError)) throw err;
      if (err instanceof DecodeError) {
        this.fail(err);
      } else if (this.phase !== "admitted") {
        await this.verify(undefined);
      } else {
        // Unsupported kind or bad payload: this request fails, the connection stays
        this.options.dispatcher.reply(this.connection, err.correlationId, {
          ok: false,
          error: err,
        });
        this.touch();
      }
      return;
    }

    if (message.type === "ping") {
      this.connection.send({ type: "pong", timestamp: this.options.clock.now() });
      this.touch();
      return;
    }

    if (this.phase !== "admitted") {
      await this.verify(message.type === "proof" ? message : undefined);
      return;
    }

    this.touch();
    switch (message.type) {
      case "proof":
        this.fail(new DecodeError("Already authenticated"));
        return;
      case "subscribe":
        this.connection.setFilter(message.kinds);
        if (message.correlationId !== undefined) {
          this.options.dispatcher.reply(this.connection, message.correlationId, { ok: true });
        }
        return;
      case "command":
        void this.options.dispatcher
          .handle(this.connection, message)
          .catch((err: unknown) => this.crash(err));
        return;
    }
  }

  /**
   * Finish the handshake with the client's answer (or lack of one).
   */
  private async verify(proof: ProofMessage | undefined): Promise<void> {
    if (this.phase !== "challenged" || this.nonce === null) return;
    this.phase = "verifying";
    this.clearChallengeTimer();

    const { gate, approve, registry } = this.options;
    const connection = this.connection;
    const result = await gate.authenticate({
      nonce: this.nonce,
      proof: proof && { response: proof.response, keyId: proof.keyId },
      info: connection.info,
    });
    this.nonce = null;
    if (!result.ok) {
      this.fail(result.error);
      return;
    }

    if (approve && !(await approve(connection.info, result.identity))) {
      this.fail(new BridgeError("CONNECTION_DENIED"));
      return;
    }
    // The client may have gone away while we waited
    if (!connection.isOpen) return;

    connection.authenticate(result.identity);
    registry.add(connection);
    this.options.release();
    this.phase = "admitted";

    connection.send({
      type: "welcome",
      connectionId: connection.id,
      protocol: PROTOCOL_VERSION,
      kinds: [...EVENT_KINDS],
    });
    this.options.logger?.info(LOG_CONTEXT.CONNECTION, "Client admitted", {
      connectionId: connection.id,
      origin: connection.info.origin,
    });
    this.touch();
  }

  /**
   * Send the error to the client, then close with its close code.
   */
  private fail(error: BridgeError): void {
    const { code, message, retryable, correlationId } = error;
    const frame: ErrorMessage = { type: "error", code, message, retryable };
    if (correlationId !== undefined) frame.correlationId = correlationId;
    this.connection.send(frame);
    void this.connection.close(closeReasonFor(error), { drain: true });
  }

  private async crash(err: unknown): Promise<void> {
    const error = BridgeError.wrap(err, "INTERNAL");
    await this.options.errors.report(error, {
      source: "connection",
      connectionId: this.connection.id,
    });
    if (this.connection.isOpen) {
      this.fail(error.code === "INTERNAL" ? error : new BridgeError("INTERNAL", error.message));
    }
  }

  /**
   * Inbound activity: restart the idle timer.
   */
  private touch(): void {
    if (this.phase !== "admitted") return;
    const { clock, idleTimeoutMs } = this.options;
    if (this.idleTimer !== null) clock.clearTimeout(this.idleTimer);
    this.idleTimer = clock.setTimeout(() => {
      this.idleTimer = null;
      this.options.logger?.info(LOG_CONTEXT.CONNECTION, "Closing idle connection", {
        connectionId: this.connection.id,
      });
      this.fail(new BridgeError("IDLE_TIMEOUT"));
    }, idleTimeoutMs);
  }

  private clearChallengeTimer(): void {
    if (this.challengeTimer === null) return;
    this.options.clock.clearTimeout(this.challengeTimer);
    this.challengeTimer = null;
  }

  private cleanup(): void {
    this.clearChallengeTimer();
    if (this.idleTimer !== null) {
      this.options.clock.clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
    if (this.nonce !== null) {
      this.options.gate.discard(this.nonce);
      this.nonce = null;
    }
    this.options.release();
  }
}

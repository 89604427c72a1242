// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import type { BridgeError } from "../../src/error/error.js";
import type { ErrorContext } from "../../src/server/errors.js";
import { TestHost } from "../../src/testing/index.js";
import { ORIGIN, prove, START, startServer } from "../helpers.js";

describe("admitted session", () => {
  describe("events", () => {
    it("streams host events in sequence", async () => {
      const { host, clock, admit } = await startServer();
      const client = await admit();

      host.emit({ kind: "Translation", payload: { text: "hello" } });
      host.emit({ kind: "Stroke", payload: { steno: "HEL", keys: ["H-", "E", "-L"] } });
      await clock.flush();

      expect(client.events()).toEqual([
        { kind: "Translation", payload: { text: "hello" }, seq: 1, timestamp: START },
        {
          kind: "Stroke",
          payload: { steno: "HEL", keys: ["H-", "E", "-L"] },
          seq: 2,
          timestamp: START,
        },
      ]);
    });

    it("delivers only the subscribed kinds", async () => {
      const { host, clock, admit } = await startServer();
      const client = await admit();

      client.send({ type: "subscribe", kinds: ["Stroke"], correlationId: "s1" });
      await clock.flush();
      host.emit({ kind: "Translation", payload: { text: "hi" } });
      host.emit({ kind: "Stroke", payload: { steno: "HEU", keys: ["H-", "E", "U"] } });
      await clock.flush();

      expect(client.control().at(-1)).toEqual({
        type: "ack",
        correlationId: "s1",
        outcome: "ok",
      });
      expect(client.events().map((e) => [e.kind, e.seq])).toEqual([["Stroke", 2]]);
    });

    it("keeps events away from clients still in their handshake", async () => {
      const { host, transport, clock, admit } = await startServer();
      const admitted = await admit();
      const pending = transport.connect({ origin: ORIGIN });
      await clock.flush();

      host.emit({ kind: "Translation", payload: { text: "hi" } });
      await clock.flush();

      expect(admitted.events()).toHaveLength(1);
      expect(pending.events()).toEqual([]);
    });
  });

  describe("commands", () => {
    it("acknowledges a config change and broadcasts the output toggle", async () => {
      const { host, clock, admit } = await startServer();
      const client = await admit();
      const observer = await admit();

      client.send({
        type: "command",
        kind: "SetConfigOption",
        payload: { option: "output_enabled", value: false },
        correlationId: "c1",
      });
      await clock.flush();

      expect(host.outputEnabled).toBe(false);
      expect(client.control().at(-1)).toEqual({
        type: "ack",
        correlationId: "c1",
        outcome: "ok",
      });
      const toggled = [
        { kind: "OutputToggled", payload: { enabled: false }, seq: 1, timestamp: START },
      ];
      expect(client.events()).toEqual(toggled);
      expect(observer.events()).toEqual(toggled);
      expect(observer.control().map((m) => m.type)).toEqual(["challenge", "welcome"]);
    });

    it("fails an unsupported command without closing the connection", async () => {
      const { clock, admit } = await startServer();
      const client = await admit();

      client.sendRaw('{"type":"command","kind":"Reboot","correlationId":"c9"}');
      await clock.flush();

      expect(client.control().at(-1)).toEqual({
        type: "ack",
        correlationId: "c9",
        outcome: "error",
        error: {
          code: "UNSUPPORTED_COMMAND",
          message: 'Unsupported command: "Reboot"',
          retryable: false,
        },
      });
      expect(client.closedWith).toBeNull();
    });

    it("reports an uncorrelated host failure with an error frame", async () => {
      const { host, clock, admit } = await startServer();
      const client = await admit();
      host.failWith("SendText", "keyboard locked");

      client.send({ type: "command", kind: "SendText", payload: { text: "hi" } });
      await clock.flush();

      expect(client.control().at(-1)).toEqual({
        type: "error",
        code: "HOST_ERROR",
        message: "keyboard locked",
        retryable: false,
      });
      expect(client.closedWith).toBeNull();
    });

    it("answers lookups from the host dictionary", async () => {
      const host = new TestHost({ dictionary: { "HEL/HRO": "hello", WORLD: "world" } });
      const { clock, admit } = await startServer({ host });
      const client = await admit();

      client.send({
        type: "command",
        kind: "Lookup",
        payload: { text: "hello world" },
        correlationId: "c5",
      });
      await clock.flush();

      expect(client.control().at(-1)).toEqual({
        type: "ack",
        correlationId: "c5",
        outcome: "ok",
        result: [
          [
            { text: "hello", steno: ["HEL", "HRO"] },
            { text: "world", steno: ["WORLD"] },
          ],
        ],
      });
    });

    it("applies the per-connection command budget", async () => {
      const { host, clock, admit } = await startServer({
        config: { commandRateLimit: { capacity: 1, tokensPerSecond: 1 } },
      });
      const client = await admit();

      client.send({ type: "command", kind: "SendText", payload: { text: "a" }, correlationId: "a" });
      client.send({ type: "command", kind: "SendText", payload: { text: "b" }, correlationId: "b" });
      await clock.flush();

      expect(host.applied).toHaveLength(1);
      const acks = client.control().filter((m) => m.type === "ack");
      expect(acks).toHaveLength(2);
      expect(acks).toContainEqual({ type: "ack", correlationId: "a", outcome: "ok" });
      expect(acks).toContainEqual({
        type: "ack",
        correlationId: "b",
        outcome: "error",
        error: {
          code: "RESOURCE_EXHAUSTED",
          message: "Command rate limit exceeded",
          retryable: true,
        },
      });
      expect(client.closedWith).toBeNull();
    });
  });

  describe("idle timeout", () => {
    it("closes a quiet connection, counting pings as activity", async () => {
      const { clock, admit } = await startServer({ config: { idleTimeoutMs: 5_000 } });
      const client = await admit();

      await clock.tick(4_999);
      client.send({ type: "ping" });
      await clock.tick(4_998);
      expect(client.closedWith).toBeNull();

      await clock.tick(1);
      expect(client.control().at(-1)).toEqual({
        type: "error",
        code: "IDLE_TIMEOUT",
        message: "Idle timeout",
        retryable: true,
      });
      expect(client.closedWith).toEqual({ code: 4010, reason: "IDLE_TIMEOUT", terminated: false });
    });
  });

  describe("failures", () => {
    it("reports an unexpected exception and closes only that connection", async () => {
      const reported: [BridgeError, ErrorContext][] = [];
      let approvals = 0;
      const { server, transport, clock, admit } = await startServer({
        approve: () => {
          approvals++;
          if (approvals === 2) throw new Error("approval backend down");
          return true;
        },
      });
      server.onError((error, context) => {
        reported.push([error, context]);
      });

      const healthy = await admit();
      const failing = transport.connect({ origin: ORIGIN });
      await failing.handshake(prove);
      await clock.flush();

      expect(failing.control().at(-1)).toEqual({
        type: "error",
        code: "INTERNAL",
        message: "approval backend down",
        retryable: false,
      });
      expect(failing.closedWith).toEqual({ code: 1011, reason: "INTERNAL", terminated: false });
      expect(reported).toHaveLength(1);
      expect(reported[0]?.[0].code).toBe("INTERNAL");
      expect(reported[0]?.[1]).toEqual({
        source: "connection",
        connectionId: expect.stringMatching(/^conn_/),
      });

      expect(healthy.closedWith).toBeNull();
      expect(server.status().connections).toBe(1);
    });
  });
});

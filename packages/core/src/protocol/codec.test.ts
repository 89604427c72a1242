// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { BridgeError, DecodeError } from "../error/error.js";
import { decode, decodeServer, encode, encodeClient, encodeEvent } from "./codec.js";

function decodeFailure(data: string | Uint8Array, maxBytes?: number): BridgeError {
  try {
    decode(data, { maxBytes });
  } catch (err) {
    if (err instanceof BridgeError) return err;
    throw err;
  }
  throw new Error("decode() accepted the frame");
}

describe("decode", () => {
  describe("heartbeat", () => {
    it("accepts the bare ping text frame", () => {
      expect(decode("ping")).toEqual({ type: "ping" });
      expect(decode(" ping\n")).toEqual({ type: "ping" });
    });

    it("accepts the JSON ping message", () => {
      expect(decode('{"type":"ping"}')).toEqual({ type: "ping" });
    });
  });

  describe("protocol violations", () => {
    it("rejects text that is not JSON", () => {
      const error = decodeFailure("{nope");
      expect(error).toBeInstanceOf(DecodeError);
      expect(error.message).toMatch(/^Invalid JSON: /);
    });

    it("rejects JSON without a type tag", () => {
      for (const frame of ["[]", "42", "null", '{"kind":"Stroke"}', '{"type":7}']) {
        const error = decodeFailure(frame);
        expect(error).toBeInstanceOf(DecodeError);
        expect(error.message).toBe(
          "Invalid message envelope: missing or invalid type field",
        );
      }
    });

    it("rejects unknown message types", () => {
      const error = decodeFailure('{"type":"hello"}');
      expect(error).toBeInstanceOf(DecodeError);
      expect(error.message).toBe('Unknown message type: "hello"');
    });

    it("rejects frames over the size limit before parsing", () => {
      const error = decodeFailure('{"type":"ping"}', 5);
      expect(error).toBeInstanceOf(DecodeError);
      expect(error.message).toBe(
        "Invalid JSON: Message exceeds max payload size: 15 > 5",
      );
    });

    it("rejects binary frames that are not UTF-8", () => {
      const error = decodeFailure(new Uint8Array([0x7b, 0xff, 0x7d]));
      expect(error).toBeInstanceOf(DecodeError);
    });

    it("rejects a command envelope without a kind", () => {
      const error = decodeFailure('{"type":"command","payload":{}}');
      expect(error).toBeInstanceOf(DecodeError);
      expect(error.message).toMatch(/^Invalid "command" envelope: kind: /);
    });
  });

  describe("commands", () => {
    it("decodes a valid command and strips unknown fields", () => {
      const message = decode(
        '{"type":"command","kind":"SendText","payload":{"text":"hi","x":1},"correlationId":"c2","extra":true}',
      );
      expect(message).toEqual({
        type: "command",
        kind: "SendText",
        payload: { text: "hi" },
        correlationId: "c2",
      });
    });

    it("defaults a missing payload to an empty object", () => {
      expect(decode('{"type":"command","kind":"ToggleOutput"}')).toEqual({
        type: "command",
        kind: "ToggleOutput",
        payload: {},
      });
    });

    it("reports unknown kinds as unsupported, not malformed", () => {
      const error = decodeFailure(
        '{"type":"command","kind":"Reboot","correlationId":"c1"}',
      );
      expect(error).not.toBeInstanceOf(DecodeError);
      expect(error.code).toBe("UNSUPPORTED_COMMAND");
      expect(error.message).toBe('Unsupported command: "Reboot"');
      expect(error.correlationId).toBe("c1");
    });

    it("reports payload validation failures as invalid arguments", () => {
      const error = decodeFailure(
        '{"type":"command","kind":"SendBackspaces","payload":{"count":0},"correlationId":"c3"}',
      );
      expect(error.code).toBe("INVALID_ARGUMENT");
      expect(error.message).toMatch(
        /^Invalid payload for SendBackspaces: payload\.count: /,
      );
      expect(error.correlationId).toBe("c3");
    });
  });

  describe("subscribe and proof", () => {
    it("decodes event kind filters", () => {
      expect(decode('{"type":"subscribe","kinds":["Stroke","Translation"]}')).toEqual({
        type: "subscribe",
        kinds: ["Stroke", "Translation"],
      });
      expect(decode('{"type":"subscribe","kinds":null,"correlationId":"s1"}')).toEqual({
        type: "subscribe",
        kinds: null,
        correlationId: "s1",
      });
    });

    it("rejects unknown event kinds as invalid arguments", () => {
      const error = decodeFailure('{"type":"subscribe","kinds":["Stroke","Bogus"]}');
      expect(error.code).toBe("INVALID_ARGUMENT");
      expect(error.message).toBe("Unknown event kinds: Bogus");
    });

    it("decodes a proof", () => {
      expect(decode('{"type":"proof","response":"abc","keyId":"laptop"}')).toEqual({
        type: "proof",
        response: "abc",
        keyId: "laptop",
      });
    });

    it("accepts binary frames carrying JSON text", () => {
      const frame = new TextEncoder().encode('{"type":"proof","response":"abc"}');
      expect(decode(frame)).toEqual({ type: "proof", response: "abc" });
    });
  });
});

describe("encode", () => {
  it("writes event frames with a fixed field order", () => {
    const frame = encodeEvent({
      seq: 1,
      timestamp: 5,
      kind: "Translation",
      payload: { text: "hi" },
    });
    expect(frame).toBe(
      '{"type":"event","seq":1,"kind":"Translation","payload":{"text":"hi"},"timestamp":5}',
    );
  });

  it("routes event messages through the event encoder", () => {
    const frame = encode({
      type: "event",
      seq: 2,
      timestamp: 9,
      kind: "OutputToggled",
      payload: { enabled: false },
    });
    expect(frame).toBe(
      '{"type":"event","seq":2,"kind":"OutputToggled","payload":{"enabled":false},"timestamp":9}',
    );
  });

  it("writes control messages as plain JSON", () => {
    expect(encode({ type: "pong", timestamp: 7 })).toBe('{"type":"pong","timestamp":7}');
  });

  it("produces client frames the server decodes", () => {
    const frame = encodeClient({
      type: "command",
      kind: "SendKeyCombination",
      payload: { combo: "ctrl_l(c)" },
    });
    expect(decode(frame)).toEqual({
      type: "command",
      kind: "SendKeyCombination",
      payload: { combo: "ctrl_l(c)" },
    });
  });
});

describe("decodeServer", () => {
  it("decodes an error acknowledgement", () => {
    const frame = encode({
      type: "ack",
      correlationId: "c1",
      outcome: "error",
      error: { code: "HOST_ERROR", message: "nope", retryable: false },
    });
    expect(decodeServer(frame)).toEqual({
      type: "ack",
      correlationId: "c1",
      outcome: "error",
      error: { code: "HOST_ERROR", message: "nope", retryable: false },
    });
  });

  it("rejects an event whose payload does not match its kind", () => {
    expect(() =>
      decodeServer(
        '{"type":"event","seq":1,"kind":"OutputToggled","payload":{"enabled":"yes"},"timestamp":1}',
      ),
    ).toThrow(DecodeError);
  });

  it("rejects an unknown error code", () => {
    expect(() =>
      decodeServer('{"type":"error","code":"TEAPOT","message":"x","retryable":false}'),
    ).toThrow(DecodeError);
  });
});

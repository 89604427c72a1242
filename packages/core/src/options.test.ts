// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { BridgeError } from "./error/error.js";
import { resolveServerConfig } from "./options.js";

function configFailure(input: Parameters<typeof resolveServerConfig>[0]): BridgeError {
  try {
    resolveServerConfig(input);
  } catch (err) {
    if (err instanceof BridgeError) return err;
    throw err;
  }
  throw new Error("resolveServerConfig() accepted the input");
}

describe("resolveServerConfig", () => {
  it("fills every default", () => {
    expect(resolveServerConfig()).toEqual({
      host: "127.0.0.1",
      port: 8086,
      idleTimeoutMs: 60_000,
      maxConnections: 32,
      outboundQueueCapacity: 1024,
      sendHighWaterMark: 1024 * 1024,
      challengeTtlMs: 10_000,
      bridgeCapacity: 1024,
      closeGraceMs: 2_000,
      maxFrameBytes: 64 * 1024,
      authFailures: { capacity: 5, tokensPerSecond: 0.1 },
    });
  });

  it("keeps explicit values", () => {
    const config = resolveServerConfig({
      port: 0,
      keyPath: "/etc/steno/websocket.key",
      commandRateLimit: { capacity: 20, tokensPerSecond: 10 },
      allowedOrigins: ["http://localhost:3000"],
    });
    expect(config).toMatchObject({
      port: 0,
      keyPath: "/etc/steno/websocket.key",
      commandRateLimit: { capacity: 20, tokensPerSecond: 10 },
      allowedOrigins: ["http://localhost:3000"],
    });
  });

  it("names every invalid field", () => {
    const error = configFailure({
      port: 70_000,
      maxConnections: 0,
      authFailures: { capacity: 1, tokensPerSecond: -1 },
    });
    expect(error.code).toBe("INVALID_ARGUMENT");
    expect(error.message).toMatch(/^Invalid server configuration: /);
    expect(error.details).toEqual({
      fields: ["port", "maxConnections", "authFailures.tokensPerSecond"],
    });
  });

  it("rejects an empty key path", () => {
    expect(configFailure({ keyPath: "" }).details).toEqual({ fields: ["keyPath"] });
  });
});

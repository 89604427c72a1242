// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { BridgeError, computeHmacProof, decodeServer, encodeClient } from "@steno-bridge/core";
import type { ServerMessage } from "@steno-bridge/core";
import { TestHost } from "@steno-bridge/core/testing";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WebSocket } from "ws";
import { createExtension, type Extension } from "../src/extension.js";
import { loadKeyMaterial } from "../src/keys.js";

describe("loadKeyMaterial", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "steno-bridge-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("trims surrounding whitespace", async () => {
    const path = join(dir, "websocket.key");
    await writeFile(path, "  test-secret\n");
    await expect(loadKeyMaterial(path)).resolves.toBe("test-secret");
  });

  it("rejects an empty key file", async () => {
    const path = join(dir, "empty.key");
    await writeFile(path, "\n\n");
    await expect(loadKeyMaterial(path)).rejects.toMatchObject({
      code: "INVALID_ARGUMENT",
      message: `Key file is empty: ${path}`,
    });
  });

  it("rejects a missing key file", async () => {
    const path = join(dir, "missing.key");
    const error: unknown = await loadKeyMaterial(path).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BridgeError);
    expect(error).toMatchObject({
      code: "INVALID_ARGUMENT",
      message: `Cannot read key file: ${path}`,
    });
  });
});

describe("createExtension", () => {
  let dir: string;
  let keyPath: string;
  let extension: Extension | undefined;
  const sockets: WebSocket[] = [];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "steno-bridge-"));
    keyPath = join(dir, "websocket.key");
    await writeFile(keyPath, "test-secret\n");
  });

  afterEach(async () => {
    for (const ws of sockets.splice(0)) ws.terminate();
    await extension?.stop();
    extension = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it("requires a key path when no scheme is given", async () => {
    extension = createExtension(new TestHost(), { host: "127.0.0.1", port: 0 });
    await expect(extension.start()).rejects.toMatchObject({
      code: "INVALID_ARGUMENT",
      message: "keyPath is required unless a proof scheme is given",
    });
    expect(extension.status()).toBeNull();
  });

  it("rejects invalid configuration up front", () => {
    expect(() =>
      createExtension(new TestHost(), { port: 70_000, keyPath }),
    ).toThrow(BridgeError);
  });

  it("admits clients that prove the key from the key file", async () => {
    const host = new TestHost();
    extension = createExtension(host, { host: "127.0.0.1", port: 0, keyPath });
    const { port } = await extension.start();
    expect(extension.status()?.state).toBe("running");

    const received: ServerMessage[] = [];
    const ws = new WebSocket(`ws://127.0.0.1:${port}/websocket`);
    sockets.push(ws);
    ws.on("message", (data) => {
      const message = decodeServer(data.toString());
      received.push(message);
      if (message.type === "challenge") {
        ws.send(
          encodeClient({
            type: "proof",
            response: computeHmacProof("test-secret", message.nonce),
          }),
        );
      }
    });

    await vi.waitFor(() => {
      expect(received.map((m) => m.type)).toEqual(["challenge", "welcome"]);
    });
    expect(extension.status()?.connections).toBe(1);
  });

  it("can be started again after stop", async () => {
    extension = createExtension(new TestHost(), {
      host: "127.0.0.1",
      port: 0,
      keyPath,
    });
    await extension.start();
    await extension.stop();
    expect(extension.status()).toBeNull();

    const address = await extension.start();
    expect(address.port).toBeGreaterThan(0);
    expect(extension.status()?.state).toBe("running");
  });

  it("shares one launch between concurrent starts", async () => {
    extension = createExtension(new TestHost(), { host: "127.0.0.1", port: 0, keyPath });
    const [first, second] = await Promise.all([extension.start(), extension.start()]);
    expect(second).toEqual(first);
  });

  it("stops a server whose start was still in flight", async () => {
    extension = createExtension(new TestHost(), { host: "127.0.0.1", port: 0, keyPath });
    const starting = extension.start();
    await extension.stop();
    const { port } = await starting;

    expect(extension.status()).toBeNull();
    await expect(fetch(`http://127.0.0.1:${port}/health`)).rejects.toThrow(TypeError);
  });
});

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Test utilities: fake clock, in-memory sockets and transport, fake host.
 * Usage: import { FakeClock, InMemoryTransport, TestHost } from "@steno-bridge/core/testing"
 *
 * ```ts
 * const clock = new FakeClock();
 * const host = new TestHost({ config: { output_enabled: true } });
 * const transport = new InMemoryTransport();
 * const server = new ServerLifecycleManager(host, {
 *   transport,
 *   scheme: hmacScheme("test-secret"),
 *   clock,
 * });
 * await server.start();
 *
 * const client = transport.connect();
 * await client.handshake((nonce) => computeHmacProof("test-secret", nonce));
 * host.emit({ kind: "Translation", payload: { text: "hello" } });
 * await clock.flush();
 * expect(client.events()).toHaveLength(1);
 * ```
 */

export { FakeClock, settle } from "./fake-clock.js";
export { TestLogger, type LogEntry } from "./test-logger.js";
export { OUTPUT_OPTION, TestHost, type TestHostOptions } from "./test-host.js";
export {
  InMemoryTransport,
  TestClient,
  type ProofFn,
} from "./test-transport.js";
export { TestWebSocket, type ClosedWith } from "./test-websocket.js";

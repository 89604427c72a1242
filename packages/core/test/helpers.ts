// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { computeHmacProof, hmacScheme } from "../src/auth/schemes.js";
import type { ServerConfigInput } from "../src/options.js";
import {
  ServerLifecycleManager,
  type ServerLifecycleOptions,
} from "../src/server/lifecycle.js";
import {
  FakeClock,
  InMemoryTransport,
  TestHost,
  type ProofFn,
  type TestClient,
} from "../src/testing/index.js";

export const SECRET = "test-secret";
export const ORIGIN = "http://localhost:3000";
export const START = 1_000;

export const prove: ProofFn = (nonce) => computeHmacProof(SECRET, nonce);
export const proveWrong: ProofFn = (nonce) => computeHmacProof("wrong-secret", nonce);

export interface TestServer {
  clock: FakeClock;
  host: TestHost;
  transport: InMemoryTransport;
  server: ServerLifecycleManager;
  /** Connect from ORIGIN and complete the handshake */
  admit(): Promise<TestClient>;
}

export async function startServer(
  options: {
    config?: ServerConfigInput;
    host?: TestHost;
  } & Partial<Pick<ServerLifecycleOptions, "approve" | "logger">> = {},
): Promise<TestServer> {
  const clock = new FakeClock(START);
  const host = options.host ?? new TestHost();
  const transport = new InMemoryTransport();
  const server = new ServerLifecycleManager(host, {
    transport,
    scheme: hmacScheme(SECRET),
    config: options.config,
    clock,
    approve: options.approve,
    logger: options.logger,
  });
  await server.start();

  return {
    clock,
    host,
    transport,
    server,
    async admit() {
      const client = transport.connect({ origin: ORIGIN });
      await client.handshake(prove);
      if (!client.welcome()) throw new Error("Client was not admitted");
      return client;
    },
  };
}

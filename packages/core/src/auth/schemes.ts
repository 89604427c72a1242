// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Proof schemes for the challenge/response handshake.
 *
 * The server sends a fresh nonce; the client proves possession of a key by
 * answering with a value derived from that nonce. Because every connection
 * attempt gets its own nonce, a captured proof cannot be replayed.
 *
 * - hmac: pre-shared secret, proof = hex HMAC-SHA256(secret, nonce)
 * - ed25519: client key pairs, proof = base64 signature of the nonce by a
 *   key the server trusts, named by `keyId`
 */

import {
  createHmac,
  createPublicKey,
  timingSafeEqual,
  verify,
  type KeyObject,
} from "node:crypto";
import { BridgeError } from "../error/error.js";

export interface ProofResponse {
  response: string;
  keyId?: string;
}

export interface ProofScheme {
  /** Sent to the client in the challenge so it knows how to answer */
  readonly name: string;

  /**
   * True when `proof` answers `nonce`. Must not throw on malformed input.
   */
  verify(nonce: string, proof: ProofResponse): boolean | Promise<boolean>;
}

const HEX_SHA256 = /^[0-9a-f]{64}$/i;

/**
 * Client side of the hmac scheme.
 */
export function computeHmacProof(secret: string, nonce: string): string {
  return createHmac("sha256", secret).update(nonce, "utf8").digest("hex");
}

export function hmacScheme(secret: string): ProofScheme {
  if (secret.length === 0) {
    throw new BridgeError("INVALID_ARGUMENT", "Pre-shared key is empty");
  }

  return {
    name: "hmac-sha256",
    verify(nonce, proof) {
      if (!HEX_SHA256.test(proof.response)) return false;
      const expected = Buffer.from(computeHmacProof(secret, nonce), "hex");
      const actual = Buffer.from(proof.response, "hex");
      return timingSafeEqual(expected, actual);
    },
  };
}

/**
 * Trusted client keys by id. Values are KeyObjects or PEM-encoded public keys.
 */
export type TrustedKeys = Readonly<Record<string, KeyObject | string>>;

function toKeyMap(keys: TrustedKeys): Map<string, KeyObject> {
  const result = new Map<string, KeyObject>();
  for (const [keyId, key] of Object.entries(keys)) {
    const publicKey = typeof key === "string" ? createPublicKey(key) : key;
    if (publicKey.asymmetricKeyType !== "ed25519") {
      throw new BridgeError(
        "INVALID_ARGUMENT",
        `Trusted key "${keyId}" is not an Ed25519 public key`,
      );
    }
    result.set(keyId, publicKey);
  }
  return result;
}

export function ed25519Scheme(trustedKeys: TrustedKeys): ProofScheme {
  const keys = toKeyMap(trustedKeys);

  return {
    name: "ed25519",
    verify(nonce, proof) {
      if (proof.keyId === undefined) return false;
      const key = keys.get(proof.keyId);
      if (!key) return false;

      const signature = Buffer.from(proof.response, "base64");
      // Ed25519 signatures are always 64 bytes
      if (signature.length !== 64) return false;
      return verify(null, Buffer.from(nonce, "utf8"), key, signature);
    },
  };
}

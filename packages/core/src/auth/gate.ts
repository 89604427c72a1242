// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Authentication gate: decides whether a new connection may be admitted.
 *
 * Flow per connection attempt:
 *   checkPeer(info)        refuse early while the peer is locked out
 *   issueChallenge()       fresh nonce, single use, expires after the TTL
 *   authenticate(...)      verify the proof against the outstanding nonce
 *
 * Every failure (missing proof, bad proof, expired or unknown nonce) costs
 * the peer one token from the failure limiter. Peers are keyed by remote
 * address; the Origin header names the bucket only when no address is known.
 * A peer whose budget is empty is refused with RESOURCE_EXHAUSTED until it
 * refills.
 */

import type { RateLimiter } from "@steno-bridge/rate-limit";
import { keyPerPeer } from "@steno-bridge/rate-limit";
import { systemClock, type Clock } from "../clock.js";
import { DEFAULTS } from "../constants.js";
import type { AuthErrorCode } from "../error/codes.js";
import { AuthError, BridgeError } from "../error/error.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import type { ConnectionInfo } from "../server/transport.js";
import { generateNonce } from "../utils/ids.js";
import type { ProofResponse, ProofScheme } from "./schemes.js";

export interface Challenge {
  nonce: string;
  scheme: string;
  issuedAt: number;
  expiresAt: number;
}

export interface Identity {
  scheme: string;
  /** Client key that produced the proof (public-key schemes) */
  keyId?: string;
  origin?: string;
  authenticatedAt: number;
}

export interface Handshake {
  nonce: string;
  /** Absent when the client never answered the challenge */
  proof?: ProofResponse;
  info: ConnectionInfo;
}

export type AuthResult =
  | { ok: true; identity: Identity }
  | { ok: false; error: AuthError };

export interface AuthenticationGateOptions {
  scheme: ProofScheme;
  /** Failed-attempt budget per peer; no lockout when absent */
  limiter?: RateLimiter;
  challengeTtlMs?: number;
  clock?: Clock;
  logger?: LoggerAdapter;
}

export class AuthenticationGate {
  private readonly pending = new Map<string, Challenge>();
  private readonly clock: Clock;
  private readonly ttl: number;

  constructor(private readonly options: AuthenticationGateOptions) {
    this.clock = options.clock ?? systemClock;
    this.ttl = options.challengeTtlMs ?? DEFAULTS.CHALLENGE_TTL_MS;
  }

  get scheme(): string {
    return this.options.scheme.name;
  }

  /**
   * Number of challenges issued and not yet answered.
   */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Throws RESOURCE_EXHAUSTED while the peer has no failure budget left.
   */
  async checkPeer(info: ConnectionInfo): Promise<void> {
    const limiter = this.options.limiter;
    if (!limiter) return;

    const remaining = await limiter.peek(keyPerPeer(info));
    if (remaining < 1) {
      throw new BridgeError(
        "RESOURCE_EXHAUSTED",
        "Too many failed authentication attempts",
        { remoteAddress: info.remoteAddress ?? null, origin: info.origin ?? null },
      );
    }
  }

  issueChallenge(): Challenge {
    const now = this.clock.now();
    this.pruneExpired(now);

    const challenge: Challenge = {
      nonce: generateNonce(),
      scheme: this.options.scheme.name,
      issuedAt: now,
      expiresAt: now + this.ttl,
    };
    this.pending.set(challenge.nonce, challenge);
    return challenge;
  }

  /**
   * Check the answer to a challenge. The nonce is consumed whatever the
   * outcome, so each challenge can be answered at most once.
   */
  async authenticate(handshake: Handshake): Promise<AuthResult> {
    const challenge = this.pending.get(handshake.nonce);
    this.pending.delete(handshake.nonce);

    if (!challenge) {
      return this.fail(handshake, "INVALID_PROOF", "Unknown or already used challenge");
    }
    const now = this.clock.now();
    if (now >= challenge.expiresAt) {
      return this.fail(handshake, "EXPIRED_CHALLENGE");
    }
    if (!handshake.proof || handshake.proof.response.length === 0) {
      return this.fail(handshake, "MISSING_CREDENTIAL");
    }

    const valid = await this.options.scheme.verify(challenge.nonce, handshake.proof);
    if (!valid) {
      return this.fail(handshake, "INVALID_PROOF");
    }

    const identity: Identity = {
      scheme: this.options.scheme.name,
      authenticatedAt: now,
    };
    if (handshake.proof.keyId !== undefined) identity.keyId = handshake.proof.keyId;
    if (handshake.info.origin !== undefined) identity.origin = handshake.info.origin;

    this.options.logger?.info(LOG_CONTEXT.AUTH, "Client authenticated", {
      origin: handshake.info.origin,
      keyId: identity.keyId,
    });
    return { ok: true, identity };
  }

  /**
   * Forget an outstanding challenge (the connection went away before
   * answering). Does not count as a failure.
   */
  discard(nonce: string): void {
    this.pending.delete(nonce);
  }

  dispose(): void {
    this.pending.clear();
  }

  private async fail(
    handshake: Handshake,
    code: AuthErrorCode,
    message?: string,
  ): Promise<AuthResult> {
    const error = new AuthError(code, message);
    const { origin, remoteAddress } = handshake.info;

    if (this.options.limiter) {
      const decision = await this.options.limiter.consume(
        keyPerPeer(handshake.info),
        1,
      );
      if (decision.remaining === 0) {
        this.options.logger?.warn(
          LOG_CONTEXT.AUTH,
          "Failure budget exhausted; peer locked out",
          { origin, remoteAddress },
        );
      }
    }

    this.options.logger?.warn(LOG_CONTEXT.AUTH, `Authentication failed: ${error.message}`, {
      code,
      origin,
      remoteAddress,
    });
    return { ok: false, error };
  }

  // Expired entries linger one extra TTL so late answers still read as expired
  private pruneExpired(now: number): void {
    for (const [nonce, challenge] of this.pending) {
      if (now >= challenge.expiresAt + this.ttl) this.pending.delete(nonce);
    }
  }
}

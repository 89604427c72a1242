// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Key builders for the buckets the server keeps.
 *
 * Key format: `rl:<scope>:<id>`. Scopes keep failed-handshake budgets and
 * command budgets apart when they share one limiter.
 */

export interface PeerInfo {
  remoteAddress?: string;
  origin?: string;
}

/**
 * Failed-handshake budget, one bucket per remote address. The Origin header
 * is client-controlled, so it only names the bucket when the transport
 * reports no address.
 */
export function keyPerPeer(peer: PeerInfo): string {
  if (peer.remoteAddress) return `rl:addr:${peer.remoteAddress}`;
  if (peer.origin) return `rl:origin:${peer.origin}`;
  return "rl:addr:unknown";
}

/**
 * Command budget, one bucket per connection.
 */
export function keyPerConnection(connectionId: string): string {
  return `rl:conn:${connectionId}`;
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Envelope codec: JSON text frames with an explicit `type` tag.
 *
 * decode() is all-or-nothing. A frame either becomes a fully validated
 * ClientMessage or is rejected:
 * - DecodeError: not JSON, not an object, unknown `type`, bad envelope fields
 * - UNSUPPORTED_COMMAND: sound command envelope with an unknown `kind`
 * - INVALID_ARGUMENT: known kind whose payload fails its schema
 *
 * Unknown extra fields are stripped so newer clients can add fields freely.
 */

import type { z } from "zod";
import { LEGACY_PING } from "../constants.js";
import { BridgeError, DecodeError } from "../error/error.js";
import { safeJsonParse, type RawFrame } from "../utils/json.js";
import { ClientCommandSchema, isCommandKind } from "./commands.js";
import type { EngineEvent } from "./events.js";
import { EngineEventSchema, isEventKind } from "./events.js";
import type {
  ClientMessage,
  CommandMessage,
  ServerMessage,
  SubscribeMessage,
} from "./messages.js";
import {
  CommandEnvelopeSchema,
  ControlMessageSchema,
  PingMessageSchema,
  ProofMessageSchema,
  SubscribeEnvelopeSchema,
} from "./messages.js";

export interface DecodeOptions {
  /** Frames larger than this are rejected before parsing */
  maxBytes?: number;
}

interface TypedRecord extends Record<string, unknown> {
  type: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

function parseTyped(data: RawFrame, maxBytes?: number): TypedRecord {
  const parsed = safeJsonParse(data, maxBytes);
  if (!parsed.ok) {
    throw new DecodeError(`Invalid JSON: ${parsed.error}`);
  }
  const value = parsed.value;
  if (
    typeof value !== "object" ||
    value === null ||
    Array.isArray(value) ||
    !("type" in value) ||
    typeof value.type !== "string"
  ) {
    throw new DecodeError(
      "Invalid message envelope: missing or invalid type field",
    );
  }
  return { ...value, type: value.type };
}

function parseEnvelope<T>(schema: z.ZodType<T>, raw: TypedRecord): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new DecodeError(
      `Invalid "${raw.type}" envelope: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

function correlationDetails(
  correlationId: string | undefined,
  extra: Record<string, unknown>,
): Record<string, unknown> {
  return correlationId === undefined ? extra : { ...extra, correlationId };
}

function toCommand(raw: TypedRecord): CommandMessage {
  const envelope = parseEnvelope(CommandEnvelopeSchema, raw);
  const { kind, correlationId } = envelope;
  const details = correlationDetails(correlationId, { kind });

  if (!isCommandKind(kind)) {
    throw new BridgeError(
      "UNSUPPORTED_COMMAND",
      `Unsupported command: "${kind}"`,
      details,
    );
  }

  const candidate: Record<string, unknown> = {
    kind,
    payload: envelope.payload ?? {},
  };
  if (correlationId !== undefined) candidate["correlationId"] = correlationId;

  const result = ClientCommandSchema.safeParse(candidate);
  if (!result.success) {
    throw new BridgeError(
      "INVALID_ARGUMENT",
      `Invalid payload for ${kind}: ${formatIssues(result.error)}`,
      details,
    );
  }
  return { type: "command", ...result.data };
}

function toSubscribe(raw: TypedRecord): SubscribeMessage {
  const envelope = parseEnvelope(SubscribeEnvelopeSchema, raw);
  const message: SubscribeMessage = { type: "subscribe", kinds: null };
  if (envelope.correlationId !== undefined) {
    message.correlationId = envelope.correlationId;
  }
  if (envelope.kinds === null) return message;

  const unknown = envelope.kinds.filter((kind) => !isEventKind(kind));
  if (unknown.length > 0) {
    throw new BridgeError(
      "INVALID_ARGUMENT",
      `Unknown event kinds: ${unknown.join(", ")}`,
      correlationDetails(envelope.correlationId, { kinds: unknown }),
    );
  }
  message.kinds = envelope.kinds.filter(isEventKind);
  return message;
}

/**
 * Decode one inbound (client → server) frame.
 */
export function decode(
  data: RawFrame,
  options: DecodeOptions = {},
): ClientMessage {
  if (typeof data === "string" && data.trim() === LEGACY_PING) {
    return { type: "ping" };
  }

  const raw = parseTyped(data, options.maxBytes);
  switch (raw.type) {
    case "proof":
      return parseEnvelope(ProofMessageSchema, raw);
    case "ping":
      return parseEnvelope(PingMessageSchema, raw);
    case "subscribe":
      return toSubscribe(raw);
    case "command":
      return toCommand(raw);
    default:
      throw new DecodeError(`Unknown message type: "${raw.type}"`);
  }
}

/**
 * Encode one outbound (server → client) message.
 */
export function encode(message: ServerMessage): string {
  if (message.type === "event") {
    return encodeEvent(message);
  }
  return JSON.stringify(message);
}

/**
 * Encode an engine event as an event frame. The broadcaster calls this
 * once per event and shares the result across recipients.
 */
export function encodeEvent(event: EngineEvent): string {
  return JSON.stringify({
    type: "event",
    seq: event.seq,
    kind: event.kind,
    payload: event.payload,
    timestamp: event.timestamp,
  });
}

/**
 * Encode a client message (client side of the protocol).
 */
export function encodeClient(message: ClientMessage): string {
  return JSON.stringify(message);
}

/**
 * Decode a server message (client side of the protocol).
 */
export function decodeServer(
  data: RawFrame,
  options: DecodeOptions = {},
): ServerMessage {
  const raw = parseTyped(data, options.maxBytes);
  if (raw.type === "event") {
    const event = parseEnvelope(EngineEventSchema, raw);
    return { type: "event", ...event };
  }
  return parseEnvelope(ControlMessageSchema, raw);
}

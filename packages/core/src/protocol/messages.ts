// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Control messages: handshake, acknowledgements, errors and heartbeat.
 *
 * Server → client: challenge, welcome, ack, error, pong (plus event frames).
 * Client → server: proof, subscribe, ping (plus command frames).
 */

import { z } from "zod";
import { isErrorCode, type ErrorCode } from "../error/codes.js";
import type { ClientCommand } from "./commands.js";
import { CorrelationIdSchema } from "./commands.js";
import type { EngineEvent, EventKind } from "./events.js";
import { EventKindSchema } from "./events.js";

const ErrorCodeSchema = z.custom<ErrorCode>((value) => isErrorCode(value));

const WireErrorSchema = z.object({
  code: ErrorCodeSchema,
  message: z.string(),
  retryable: z.boolean(),
});

export type WireError = z.infer<typeof WireErrorSchema>;

// Server → client

export const ChallengeMessageSchema = z.object({
  type: z.literal("challenge"),
  nonce: z.string().min(1),
  scheme: z.string().min(1),
  expiresAt: z.number().int(),
});

export const WelcomeMessageSchema = z.object({
  type: z.literal("welcome"),
  connectionId: z.string().min(1),
  protocol: z.number().int().positive(),
  kinds: z.array(EventKindSchema),
});

export const AckMessageSchema = z.union([
  z.object({
    type: z.literal("ack"),
    correlationId: CorrelationIdSchema,
    outcome: z.literal("ok"),
    result: z.unknown().optional(),
  }),
  z.object({
    type: z.literal("ack"),
    correlationId: CorrelationIdSchema,
    outcome: z.literal("error"),
    error: WireErrorSchema,
  }),
]);

export const ErrorMessageSchema = z.object({
  type: z.literal("error"),
  code: ErrorCodeSchema,
  message: z.string(),
  retryable: z.boolean(),
  correlationId: CorrelationIdSchema.optional(),
});

export const PongMessageSchema = z.object({
  type: z.literal("pong"),
  timestamp: z.number().int(),
});

export const ControlMessageSchema = z.union([
  ChallengeMessageSchema,
  WelcomeMessageSchema,
  AckMessageSchema,
  ErrorMessageSchema,
  PongMessageSchema,
]);

export type ChallengeMessage = z.infer<typeof ChallengeMessageSchema>;
export type WelcomeMessage = z.infer<typeof WelcomeMessageSchema>;
export type AckMessage = z.infer<typeof AckMessageSchema>;
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;
export type PongMessage = z.infer<typeof PongMessageSchema>;
export type ControlMessage = z.infer<typeof ControlMessageSchema>;

export type EventMessage = { type: "event" } & EngineEvent;

export type ServerMessage = EventMessage | ControlMessage;

// Client → server

export const ProofMessageSchema = z.object({
  type: z.literal("proof"),
  response: z.string().max(1024),
  keyId: z.string().min(1).max(256).optional(),
});

/**
 * Envelope-level subscribe shape. Kinds are checked separately so an
 * unknown kind is a per-request error, not a protocol violation.
 */
export const SubscribeEnvelopeSchema = z.object({
  type: z.literal("subscribe"),
  kinds: z.array(z.string()).max(64).nullable(),
  correlationId: CorrelationIdSchema.optional(),
});

export const PingMessageSchema = z.object({
  type: z.literal("ping"),
});

/**
 * Envelope-level command shape. `kind` and `payload` are checked against
 * the per-kind schemas after the envelope itself is known to be sound.
 */
export const CommandEnvelopeSchema = z.object({
  type: z.literal("command"),
  kind: z.string().min(1).max(64),
  payload: z.unknown().optional(),
  correlationId: CorrelationIdSchema.optional(),
});

export type ProofMessage = z.infer<typeof ProofMessageSchema>;
export type PingMessage = z.infer<typeof PingMessageSchema>;

export interface SubscribeMessage {
  type: "subscribe";
  /** null = every kind */
  kinds: EventKind[] | null;
  correlationId?: string;
}

export type CommandMessage = { type: "command" } & ClientCommand;

export type ClientMessage =
  | ProofMessage
  | SubscribeMessage
  | PingMessage
  | CommandMessage;

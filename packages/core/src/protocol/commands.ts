// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Client commands: the closed set of operations a client may ask the host
 * to perform. Payloads are validated per kind before anything reaches the host.
 */

import { z } from "zod";
import { ConfigValueSchema } from "./events.js";

export const COMMAND_PAYLOAD_SCHEMAS = {
  SetConfigOption: z.object({
    option: z.string().min(1),
    value: ConfigValueSchema,
  }),
  ToggleOutput: z.object({
    // Absent = flip the current state
    enabled: z.boolean().optional(),
  }),
  SendText: z.object({
    text: z.string().max(10_000),
  }),
  SendBackspaces: z.object({
    count: z.number().int().min(1).max(1_000),
  }),
  SendKeyCombination: z.object({
    combo: z.string().min(1).max(256),
  }),
  Lookup: z.object({
    text: z.string().min(1).max(1_000),
  }),
} as const;

export const COMMAND_KINDS = [
  "SetConfigOption",
  "ToggleOutput",
  "SendText",
  "SendBackspaces",
  "SendKeyCombination",
  "Lookup",
] as const satisfies readonly (keyof typeof COMMAND_PAYLOAD_SCHEMAS)[];

export type CommandKind = (typeof COMMAND_KINDS)[number];

const CommandKindSchema = z.enum(COMMAND_KINDS);

export function isCommandKind(value: unknown): value is CommandKind {
  return CommandKindSchema.safeParse(value).success;
}

export const CorrelationIdSchema = z.string().min(1).max(128);

function commandVariant<K extends CommandKind>(kind: K) {
  return z.object({
    kind: z.literal(kind),
    payload: COMMAND_PAYLOAD_SCHEMAS[kind],
    correlationId: CorrelationIdSchema.optional(),
  });
}

export const ClientCommandSchema = z.discriminatedUnion("kind", [
  commandVariant("SetConfigOption"),
  commandVariant("ToggleOutput"),
  commandVariant("SendText"),
  commandVariant("SendBackspaces"),
  commandVariant("SendKeyCombination"),
  commandVariant("Lookup"),
]);

export type ClientCommand = z.infer<typeof ClientCommandSchema>;

export type CommandPayload<K extends CommandKind> = Extract<
  ClientCommand,
  { kind: K }
>["payload"];

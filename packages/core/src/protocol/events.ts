// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Engine events: the closed set of domain events a host can emit.
 *
 * Each kind has its own payload schema. Events are stamped with a
 * sequence number and timestamp by the bridge and are immutable after that.
 */

import { z } from "zod";

/**
 * Values a configuration option can take on the wire.
 */
export const ConfigValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.string()),
]);

export type ConfigValue = z.infer<typeof ConfigValueSchema>;

export const MACHINE_STATES = [
  "stopped",
  "initializing",
  "connected",
  "disconnected",
] as const;

export const EVENT_PAYLOAD_SCHEMAS = {
  Stroke: z.object({
    steno: z.string(),
    keys: z.array(z.string()),
  }),
  Translation: z.object({
    text: z.string(),
  }),
  ConfigChanged: z.object({
    option: z.string().min(1),
    value: ConfigValueSchema,
  }),
  OutputToggled: z.object({
    enabled: z.boolean(),
  }),
  MachineStateChanged: z.object({
    machine: z.string(),
    state: z.enum(MACHINE_STATES),
  }),
  SendString: z.object({
    text: z.string(),
  }),
  SendBackspaces: z.object({
    count: z.number().int().nonnegative(),
  }),
  SendKeyCombination: z.object({
    combo: z.string().min(1),
  }),
} as const;

export const EVENT_KINDS = [
  "Stroke",
  "Translation",
  "ConfigChanged",
  "OutputToggled",
  "MachineStateChanged",
  "SendString",
  "SendBackspaces",
  "SendKeyCombination",
] as const satisfies readonly (keyof typeof EVENT_PAYLOAD_SCHEMAS)[];

export type EventKind = (typeof EVENT_KINDS)[number];

export const EventKindSchema = z.enum(EVENT_KINDS);

export function isEventKind(value: unknown): value is EventKind {
  return EventKindSchema.safeParse(value).success;
}

function eventVariant<K extends EventKind>(kind: K) {
  return z.object({
    kind: z.literal(kind),
    payload: EVENT_PAYLOAD_SCHEMAS[kind],
  });
}

/**
 * An event as the host hands it over, before sequencing.
 */
export const EngineEventInitSchema = z.discriminatedUnion("kind", [
  eventVariant("Stroke"),
  eventVariant("Translation"),
  eventVariant("ConfigChanged"),
  eventVariant("OutputToggled"),
  eventVariant("MachineStateChanged"),
  eventVariant("SendString"),
  eventVariant("SendBackspaces"),
  eventVariant("SendKeyCombination"),
]);

export type EngineEventInit = z.infer<typeof EngineEventInitSchema>;

export type EventPayload<K extends EventKind> = Extract<
  EngineEventInit,
  { kind: K }
>["payload"];

/**
 * Fields the bridge stamps onto every event.
 */
export const EventStampSchema = z.object({
  seq: z.number().int().positive(),
  timestamp: z.number().int().nonnegative(),
});

export const EngineEventSchema = z.intersection(
  EventStampSchema,
  EngineEventInitSchema,
);

export type EventStamp = z.infer<typeof EventStampSchema>;

export type EngineEvent = Readonly<EngineEventInit & EventStamp>;

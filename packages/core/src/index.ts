// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @steno-bridge/core: event bridge between a stenography engine and
 * WebSocket clients.
 *
 * Transport-agnostic. Pair with @steno-bridge/node for a listening server,
 * or with the in-memory transport from @steno-bridge/core/testing.
 */

// Server
export { ServerLifecycleManager } from "./server/lifecycle.js";
export type {
  ServerLifecycleOptions,
  ServerState,
  ServerStatus,
} from "./server/lifecycle.js";
export { Session } from "./server/session.js";
export type { ApproveHook, SessionOptions } from "./server/session.js";
export { ErrorSink } from "./server/errors.js";
export type { ErrorContext, ErrorHandler, ErrorSource } from "./server/errors.js";
export type {
  ConnectionHandler,
  ConnectionInfo,
  ListenAddress,
  ServerWebSocket,
  SocketReadyState,
  TransportAdapter,
} from "./server/transport.js";

// Configuration
export { resolveServerConfig, ServerConfigSchema } from "./options.js";
export type { ServerConfig, ServerConfigInput } from "./options.js";
export {
  CLOSE_CODES,
  DEFAULTS,
  LEGACY_PING,
  PROTOCOL_VERSION,
  WEBSOCKET_PATH,
} from "./constants.js";
export type { CloseCode } from "./constants.js";

// Bridge
export { EventBridge } from "./bridge/bridge.js";
export type { BridgeStats, EventBridgeOptions, EventConsumer } from "./bridge/bridge.js";
export { HostCallQueue } from "./bridge/call-queue.js";
export type { HostCallQueueOptions } from "./bridge/call-queue.js";
export type {
  HostDictionary,
  HostEngine,
  HostEventListener,
  HostExecutor,
  HostTask,
} from "./bridge/host.js";

// Authentication
export { AuthenticationGate } from "./auth/gate.js";
export type {
  AuthenticationGateOptions,
  AuthResult,
  Challenge,
  Handshake,
  Identity,
} from "./auth/gate.js";
export { computeHmacProof, ed25519Scheme, hmacScheme } from "./auth/schemes.js";
export type { ProofResponse, ProofScheme, TrustedKeys } from "./auth/schemes.js";

// Connections
export { Connection, closeReasonFor } from "./connection/connection.js";
export type {
  CloseOptions,
  CloseReason,
  ConnectionOptions,
  ConnectionState,
} from "./connection/connection.js";
export { ConnectionRegistry } from "./connection/registry.js";
export type { ConnectionRegistryOptions } from "./connection/registry.js";
export { Broadcaster } from "./connection/broadcaster.js";
export type { BroadcastResult } from "./connection/broadcaster.js";

// Commands
export { CommandDispatcher } from "./dispatch/dispatcher.js";
export type { CommandDispatcherOptions, DispatchOutcome } from "./dispatch/dispatcher.js";
export {
  CAPITALIZE_NEXT,
  lookupOutlines,
  outlinesFor,
  tokenize,
} from "./lookup/lookup.js";
export type { LookupOptions, LookupSegment, Outline, Segmentation } from "./lookup/lookup.js";

// Protocol
export { decode, decodeServer, encode, encodeClient, encodeEvent } from "./protocol/codec.js";
export type { DecodeOptions } from "./protocol/codec.js";
export {
  COMMAND_KINDS,
  COMMAND_PAYLOAD_SCHEMAS,
  ClientCommandSchema,
  isCommandKind,
} from "./protocol/commands.js";
export type { ClientCommand, CommandKind, CommandPayload } from "./protocol/commands.js";
export {
  ConfigValueSchema,
  EVENT_KINDS,
  EVENT_PAYLOAD_SCHEMAS,
  EngineEventInitSchema,
  EngineEventSchema,
  EventKindSchema,
  EventStampSchema,
  isEventKind,
  MACHINE_STATES,
} from "./protocol/events.js";
export type {
  ConfigValue,
  EngineEvent,
  EngineEventInit,
  EventKind,
  EventPayload,
  EventStamp,
} from "./protocol/events.js";
export type {
  AckMessage,
  ChallengeMessage,
  ClientMessage,
  CommandMessage,
  ControlMessage,
  ErrorMessage,
  EventMessage,
  PingMessage,
  PongMessage,
  ProofMessage,
  ServerMessage,
  SubscribeMessage,
  WelcomeMessage,
  WireError,
} from "./protocol/messages.js";

// Errors
export { AuthError, BridgeError, DecodeError, HostError } from "./error/error.js";
export { ERROR_CODE_META, getErrorMetadata, isErrorCode } from "./error/codes.js";
export type {
  AuthErrorCode,
  ErrorCode,
  ErrorCodeMetadata,
  ErrorData,
} from "./error/codes.js";
export { translateError } from "./error/translate.js";

// Logging & time
export { createLogger, DefaultLoggerAdapter, LOG_CONTEXT } from "./logger.js";
export type { LoggerAdapter, LoggerOptions, LogLevel } from "./logger.js";
export { SystemClock, systemClock } from "./clock.js";
export type { Clock } from "./clock.js";

// Utilities
export { safeJsonParse } from "./utils/json.js";
export type { ParseOutcome, RawFrame } from "./utils/json.js";

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @steno-bridge/node: run the bridge on Node.js.
 *
 * `createExtension()` is the usual entry point. The transport and key
 * loader are exported for hosts that assemble the server themselves.
 */

export { createExtension } from "./extension.js";
export type { Extension, ExtensionOptions } from "./extension.js";
export { loadKeyMaterial } from "./keys.js";
export { createNodeTransport, NodeTransport } from "./transport.js";
export type { HealthReport, NodeTransportOptions } from "./transport.js";
export { adaptWebSocket } from "./websocket.js";

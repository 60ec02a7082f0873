// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @sockroute/node - Node.js websocket server for sockroute endpoints
 *
 * - `WsTransport` delivers frames to ws sockets by handle
 * - `attachEndpoints()` serves endpoints on an existing HTTP server
 * - `serve()` starts a dedicated server
 * - `loadConfig()` reads SOCKROUTE_* environment variables
 *
 * @example
 * ```typescript
 * import { cookieSessionStore, createEndpoint } from "@sockroute/core";
 * import { endpointOptionsFrom, loadConfig, serve, WsTransport } from "@sockroute/node";
 *
 * const config = loadConfig();
 * const transport = new WsTransport();
 * const lobby = createEndpoint({
 *   ...endpointOptionsFrom(config),
 *   transport,
 *   sessions: cookieSessionStore(lookupUser, { cookieName: config.sessionCookie }),
 * });
 * await serve({ transport, endpoints: [{ path: "/lobby", endpoint: lobby }], port: config.port });
 * ```
 */

export { WsTransport } from "./transport.js";
export {
  bindSocket,
  CLOSE_INTERNAL_ERROR,
  CLOSE_INVALID_PAYLOAD,
  handleUpgrade,
  refuseUpgrade,
  requestPath,
  type UpgradeRequest,
} from "./handler.js";
export {
  attachEndpoints,
  serve,
  type AttachedEndpoints,
  type AttachOptions,
  type RunningServer,
  type ServeOptions,
} from "./serve.js";
export { endpointOptionsFrom, loadConfig, type NodeConfig } from "./config.js";
export type {
  EndpointBinding,
  RequestLike,
  SocketLike,
  Upgrader,
  UpgradeSocket,
} from "./types.js";

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @sockroute/core: transport-agnostic websocket routing and connection liveness.
 *
 * Transports (@sockroute/node) deliver frames and lifecycle events; the
 * endpoint routes envelopes, keeps the connection registry, addresses
 * groups and sweeps stale connections.
 */

// Endpoint
export { createEndpoint } from "./core/createEndpoint.js";
export {
  ConnectionLifecycle,
  RECONNECT_DETAILS,
  type ConnectResult,
  type EndpointOptions,
} from "./engine/lifecycle.js";
export { builtinRoutes, onHello, onPingResponse } from "./engine/handlers.js";

// Routing
export { matches, RouteTable } from "./core/route-table.js";
export {
  Router,
  unknownActionRoute,
  type Resolution,
  type RouterOptions,
} from "./core/router.js";
export type {
  ConnectHook,
  DisconnectHook,
  FaultHandler,
  Handler,
  Matcher,
  RouteDefinition,
  RouteEntry,
} from "./core/types.js";
export type { ConnectionContext } from "./context/connection-context.js";

// Registry
export {
  ConnectionRegistry,
  type ConnectionRegistryOptions,
  type SessionFields,
} from "./registry/registry.js";
export {
  memoryConnectionStore,
  type MemoryConnectionStore,
} from "./registry/memory.js";
export {
  matchesScope,
  type ConnectionFields,
  type ConnectionIdentity,
  type ConnectionRecord,
  type ConnectionScope,
  type ConnectionStore,
  type PurgeScope,
} from "./registry/types.js";

// Groups and liveness
export {
  EMPTY_GROUP,
  GroupAddressor,
  type Group,
  type GroupAddressorOptions,
} from "./group/group.js";
export {
  StaleSweeper,
  type StaleScope,
  type StaleSweeperDeps,
  type StaleSweepResult,
  type SweeperConfig,
} from "./engine/sweeper.js";

// Protocol
export {
  assertEnvelope,
  createAction,
  decodeEnvelope,
  getActionType,
  isEnvelope,
  stampEnvelope,
  type Envelope,
} from "./protocol/envelope.js";
export {
  ABNORMAL_CLOSE_CODE,
  ACTION_TYPES,
  BOT_HANDLE_PREFIX,
  DEFAULTS,
  TIMESTAMP_KEY,
  type ActionType,
} from "./constants.js";

// Transport and sessions
export {
  isAddressable,
  type CloseInfo,
  type HandshakeInfo,
  type Transport,
} from "./ws/transport.js";
export {
  anonymousSessions,
  cookieSessionStore,
  type CookieSessionOptions,
  type SessionStore,
} from "./session.js";
export {
  clientAddress,
  headerValue,
  readCookie,
  type HandshakeHeaders,
} from "./utils/headers.js";
export { decodeFrame, safeJsonParse, type RawFrame } from "./utils/json.js";
export { generateConnectionId, hashHandles } from "./utils/ids.js";
export { KeyedMutex } from "./utils/mutex.js";
export { systemClock, type Clock } from "./utils/clock.js";

// Errors and logging
export {
  describeError,
  ErrorCode,
  errorDetails,
  isSockrouteError,
  SockrouteError,
  type ExtErrorCode,
} from "./error.js";
export {
  createLogger,
  DefaultLoggerAdapter,
  LOG_CONTEXT,
  type LoggerAdapter,
  type LoggerOptions,
  type LogLevel,
} from "./logger.js";

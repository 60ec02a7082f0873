// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { ConnectionContext } from "../context/connection-context.js";
import type { Envelope } from "../protocol/envelope.js";
import type { CloseInfo } from "../ws/transport.js";

/**
 * Route handler. Receives the connection it serves and the parsed envelope.
 */
export type Handler = (
  ctx: ConnectionContext,
  envelope: Envelope,
) => void | Promise<void>;

/**
 * Exact action type, or a pattern that must match the whole action type.
 */
export type Matcher = string | RegExp;

/**
 * Declarative route: `[matcher, handler]`.
 */
export type RouteDefinition = readonly [Matcher, Handler];

export interface RouteEntry {
  readonly matcher: Matcher;
  readonly handler: Handler;
  /** Used in flow-tracing logs */
  readonly name: string;
}

/**
 * Sink for errors thrown by handlers (default route included).
 */
export type FaultHandler = (
  err: unknown,
  ctx: ConnectionContext,
  envelope: Envelope,
) => void | Promise<void>;

export type ConnectHook = (ctx: ConnectionContext) => void | Promise<void>;

export type DisconnectHook = (
  ctx: ConnectionContext,
  close: CloseInfo,
) => void | Promise<void>;

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { IncomingHttpHeaders } from "node:http";
import type { ConnectionLifecycle, Matcher } from "@sockroute/core";
import type { RawData } from "ws";

/**
 * The part of a ws `WebSocket` the transport uses. Kept structural so tests
 * can drive it with a plain event emitter.
 */
export interface SocketLike {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

/**
 * The part of an upgrade request the handshake reads.
 */
export interface RequestLike {
  url?: string | undefined;
  headers: IncomingHttpHeaders;
  socket: { remoteAddress?: string | undefined };
}

/**
 * Raw TCP socket of a pending upgrade.
 */
export interface UpgradeSocket {
  readonly destroyed: boolean;
  write(chunk: string): unknown;
  destroy(): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  once(event: "close", listener: () => void): unknown;
  off(event: "close", listener: () => void): unknown;
  off(event: "error", listener: (err: Error) => void): unknown;
}

/**
 * Completes the HTTP upgrade and hands over the open websocket.
 */
export type Upgrader<Req extends RequestLike, Sock extends UpgradeSocket> = (
  request: Req,
  socket: Sock,
  head: Buffer,
  done: (ws: SocketLike) => void,
) => void;

/**
 * One endpoint served under a path. String paths match exactly, patterns
 * must match the whole request path.
 */
export interface EndpointBinding {
  path: Matcher;
  endpoint: ConnectionLifecycle;
}

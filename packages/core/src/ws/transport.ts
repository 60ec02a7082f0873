// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Transport contract.
 * Concrete implementations: @sockroute/node (ws), TestTransport (in-process).
 *
 * Core never touches sockets; it addresses connections by handle name and
 * hands serialized text to the transport.
 */

import { BOT_HANDLE_PREFIX } from "../constants.js";
import type { HandshakeHeaders } from "../utils/headers.js";

export interface Transport {
  /**
   * Deliver one serialized frame. Resolves false (or throws) when the
   * handle is gone or the socket refused the write.
   */
  send(handle: string, data: string): boolean | Promise<boolean>;

  /**
   * Complete the opening handshake for a handle.
   */
  acceptHandshake(handle: string): void | Promise<void>;
}

/**
 * What the transport knows about a connection when it opens.
 */
export interface HandshakeInfo {
  /** Transport handle name, unique among live connections */
  handle: string;
  /** Logical endpoint the socket is bound to, e.g. "/table/1234" */
  path: string;
  headers: HandshakeHeaders;
  peerAddress?: string | null;
}

export interface CloseInfo {
  code: number;
  reason?: string;
}

/**
 * Synthetic (bot) connections share the registry but never receive frames.
 */
export function isAddressable(handle: string): boolean {
  return !handle.startsWith(BOT_HANDLE_PREFIX);
}

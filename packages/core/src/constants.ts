// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Global constants: default values, reserved action types, wire keys.
 */

// Default configuration
export const DEFAULTS = {
  ROUTING_KEY: "type",
  GRACE_MS: 5 * 60_000,
  SWEEP_INTERVAL_MS: 60_000,
  SESSION_COOKIE: "sessionid",
} as const;

// Action types exchanged over the wire
export const ACTION_TYPES = {
  /** server → client liveness check */
  PING: "PING",
  /** client → server liveness reply */
  PING_RESPONSE: "PING_RESPONSE",
  /** client → server handshake confirmation */
  HELLO: "HELLO",
  /** server → client handshake ack */
  GOT_HELLO: "GOT_HELLO",
  /** server → client: re-establish the session and reconnect */
  RECONNECT: "RECONNECT",
  /** server → client: routing or handler failure */
  ERROR: "ERROR",
} as const;

export type ActionType = (typeof ACTION_TYPES)[keyof typeof ACTION_TYPES];

// Injected into every outbound envelope (ms since epoch)
export const TIMESTAMP_KEY = "TIMESTAMP";

// Handles with this prefix belong to synthetic connections and are never sent to
export const BOT_HANDLE_PREFIX = "bot-";

// Close code the transport reports when the server dropped the socket under load
export const ABNORMAL_CLOSE_CODE = 1006;

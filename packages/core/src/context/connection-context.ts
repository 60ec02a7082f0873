// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Connection context: what a route handler sees of the connection it serves.
 */

import type { Group } from "../group/group.js";
import type { Envelope } from "../protocol/envelope.js";
import type { ConnectionRecord, ConnectionScope } from "../registry/types.js";
import type { StaleSweepResult } from "../engine/sweeper.js";

export interface ConnectionContext {
  /** Transport handle name */
  readonly handle: string;
  readonly path: string;
  readonly sessionId: string | null;
  /** User resolved from the session on the last refresh, null when anonymous */
  readonly userId: string | null;
  readonly userIp: string | null;
  /** Envelope field that carries the action type */
  readonly routingKey: string;
  /** Latest registry snapshot written by this connection */
  readonly record: ConnectionRecord | undefined;

  /**
   * Re-resolve the user, then create-or-refresh the registry record with
   * active=true and lastPing=now.
   */
  refreshSession(): Promise<ConnectionRecord>;

  /** Stamp, log and deliver one envelope to this connection. */
  send(envelope: Envelope): Promise<boolean>;
  sendAction(type: string, fields?: Envelope): Promise<boolean>;
  sendRaw(text: string): Promise<boolean>;

  /**
   * Ping this user's other connections on the same path, then purge the
   * ones that never answered an earlier ping. No-op for anonymous users.
   */
  cleanupStale(): Promise<StaleSweepResult | null>;

  /** Group of registry connections in scope (defaults to this path). */
  group(scope?: ConnectionScope): Promise<Group>;
  broadcastAction(
    type: string,
    fields?: Envelope,
    scope?: ConnectionScope,
  ): Promise<number>;
}

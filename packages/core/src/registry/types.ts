// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Connection registry contracts: the record shape and the pluggable store.
 */

/**
 * One live connection as the registry sees it.
 */
export interface ConnectionRecord {
  /** Opaque id assigned on first upsert, stable for the connection lifetime */
  id: string;
  /** Transport handle name; unique among records */
  handle: string;
  userId: string | null;
  sessionId: string | null;
  /** Logical endpoint/topic, e.g. "/table/1234" */
  path: string;
  /** false while a PING is awaiting confirmation */
  active: boolean;
  /** Last confirmed liveness (ms since epoch) */
  lastPing: number;
  userIp: string | null;
  createdAt: number;
}

/**
 * Mutable fields written by an upsert.
 */
export type ConnectionFields = Partial<
  Omit<ConnectionRecord, "id" | "handle" | "createdAt">
>;

/**
 * Fields a store sets only when the upsert creates the record.
 */
export interface ConnectionIdentity {
  id: string;
  createdAt: number;
}

/**
 * Registry query. Every present field narrows the selection.
 */
export interface ConnectionScope {
  userId?: string | null;
  path?: string;
  active?: boolean;
  excludeHandles?: readonly string[];
  /** Only records whose lastPing is strictly older than this */
  lastPingBefore?: number;
}

export type PurgeScope = ConnectionScope & { lastPingBefore: number };

/**
 * Storage backend for connection records, keyed by handle.
 *
 * Each operation must be atomic for the keys it touches: an upsert never
 * interleaves with another write to the same handle, and deactivate()
 * flips exactly the records it returns.
 */
export interface ConnectionStore {
  /** Create or merge; identity is applied only on create. Returns the stored record. */
  upsert(
    handle: string,
    fields: ConnectionFields,
    identity: ConnectionIdentity,
  ): Promise<ConnectionRecord>;
  get(handle: string): Promise<ConnectionRecord | undefined>;
  /** Remove and return the record as it was. Missing handle resolves undefined. */
  delete(handle: string): Promise<ConnectionRecord | undefined>;
  query(scope: ConnectionScope): Promise<ConnectionRecord[]>;
  /** Set active=false on every active record in scope; returns them as flipped. */
  deactivate(scope: ConnectionScope): Promise<ConnectionRecord[]>;
  /** Delete inactive records in scope older than scope.lastPingBefore. */
  purge(scope: PurgeScope): Promise<number>;
}

export function matchesScope(
  record: ConnectionRecord,
  scope: ConnectionScope,
): boolean {
  if (scope.userId !== undefined && record.userId !== scope.userId) return false;
  if (scope.path !== undefined && record.path !== scope.path) return false;
  if (scope.active !== undefined && record.active !== scope.active) return false;
  if (scope.excludeHandles?.includes(record.handle)) return false;
  if (
    scope.lastPingBefore !== undefined &&
    !(record.lastPing < scope.lastPingBefore)
  ) {
    return false;
  }
  return true;
}

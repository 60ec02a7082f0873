// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type {
  ConnectionFields,
  ConnectionIdentity,
  ConnectionRecord,
  ConnectionScope,
  ConnectionStore,
  PurgeScope,
} from "./types.js";
import { matchesScope } from "./types.js";

/**
 * Memory store with introspection helpers for tests and single-process use.
 */
export interface MemoryConnectionStore extends ConnectionStore {
  size(): number;
  dispose(): void;
}

/**
 * In-memory connection store: one Map keyed by handle.
 *
 * Every operation completes synchronously inside its promise, so each call
 * is one atomic pass over the map. Records are copied on the way in and out;
 * callers only ever hold snapshots.
 *
 * For deployments where several processes share connection state, use
 * `redisConnectionStore()` from @sockroute/redis.
 */
export function memoryConnectionStore(): MemoryConnectionStore {
  const records = new Map<string, ConnectionRecord>();

  const select = (scope: ConnectionScope): ConnectionRecord[] =>
    Array.from(records.values()).filter((record) =>
      matchesScope(record, scope),
    );

  return {
    async upsert(
      handle: string,
      fields: ConnectionFields,
      identity: ConnectionIdentity,
    ): Promise<ConnectionRecord> {
      const existing = records.get(handle);
      const next: ConnectionRecord = existing
        ? { ...existing, ...fields }
        : {
            id: identity.id,
            handle,
            userId: null,
            sessionId: null,
            path: "",
            active: false,
            lastPing: identity.createdAt,
            userIp: null,
            createdAt: identity.createdAt,
            ...fields,
          };
      records.set(handle, next);
      return { ...next };
    },

    async get(handle: string): Promise<ConnectionRecord | undefined> {
      const record = records.get(handle);
      return record && { ...record };
    },

    async delete(handle: string): Promise<ConnectionRecord | undefined> {
      const record = records.get(handle);
      records.delete(handle);
      return record;
    },

    async query(scope: ConnectionScope): Promise<ConnectionRecord[]> {
      return select(scope).map((record) => ({ ...record }));
    },

    async deactivate(scope: ConnectionScope): Promise<ConnectionRecord[]> {
      const flipped: ConnectionRecord[] = [];
      for (const record of select({ ...scope, active: true })) {
        const next = { ...record, active: false };
        records.set(record.handle, next);
        flipped.push({ ...next });
      }
      return flipped;
    },

    async purge(scope: PurgeScope): Promise<number> {
      let deleted = 0;
      for (const record of select({ ...scope, active: false })) {
        records.delete(record.handle);
        deleted++;
      }
      return deleted;
    },

    size: () => records.size,

    dispose() {
      records.clear();
    },
  };
}

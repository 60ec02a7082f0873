// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Connection registry: the single owner of connection records.
 *
 * Lifecycle and sweeper mutate records only through these operations.
 * Writes to the same handle are serialized in-process; the store makes each
 * operation atomic for everyone sharing it.
 */

import { generateConnectionId } from "../utils/ids.js";
import { KeyedMutex } from "../utils/mutex.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { memoryConnectionStore } from "./memory.js";
import type {
  ConnectionFields,
  ConnectionRecord,
  ConnectionScope,
  ConnectionStore,
} from "./types.js";

export interface ConnectionRegistryOptions {
  /** @default memoryConnectionStore() */
  store?: ConnectionStore;
  clock?: Clock;
}

/**
 * Identity carried on every liveness refresh.
 */
export interface SessionFields {
  path: string;
  userId: string | null;
  sessionId: string | null;
  userIp?: string | null;
}

function definedFields(fields: ConnectionFields): ConnectionFields {
  const out: ConnectionFields = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

export class ConnectionRegistry {
  readonly store: ConnectionStore;
  private readonly clock: Clock;
  private readonly locks = new KeyedMutex();

  constructor(options: ConnectionRegistryOptions = {}) {
    this.store = options.store ?? memoryConnectionStore();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Create-or-refresh the record for a handle and mark it confirmed live
   * (active=true, lastPing=now). This is the only way a pending connection
   * becomes active again.
   */
  refresh(handle: string, session: SessionFields): Promise<ConnectionRecord> {
    return this.update(handle, {
      ...session,
      active: true,
      lastPing: this.clock.now(),
    });
  }

  /**
   * Raw upsert for callers that manage liveness themselves (e.g. bots).
   */
  update(handle: string, fields: ConnectionFields): Promise<ConnectionRecord> {
    return this.locks.run(handle, () =>
      this.store.upsert(handle, definedFields(fields), {
        id: generateConnectionId(),
        createdAt: this.clock.now(),
      }),
    );
  }

  get(handle: string): Promise<ConnectionRecord | undefined> {
    return this.store.get(handle);
  }

  /**
   * Delete the record. Resolves with the record as it was, or undefined
   * when the handle was already gone.
   */
  remove(handle: string): Promise<ConnectionRecord | undefined> {
    return this.locks.run(handle, () => this.store.delete(handle));
  }

  find(scope: ConnectionScope = {}): Promise<ConnectionRecord[]> {
    return this.store.query(scope);
  }

  /**
   * Flip every active record in scope to pending, in one pass.
   */
  deactivate(scope: ConnectionScope): Promise<ConnectionRecord[]> {
    return this.store.deactivate(scope);
  }

  /**
   * Delete pending records in scope not confirmed within the last graceMs.
   */
  purge(graceMs: number, scope: ConnectionScope = {}): Promise<number> {
    return this.store.purge({
      ...scope,
      lastPingBefore: this.clock.now() - graceMs,
    });
  }
}

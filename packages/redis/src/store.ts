// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  matchesScope,
  safeJsonParse,
  type ConnectionFields,
  type ConnectionIdentity,
  type ConnectionRecord,
  type ConnectionScope,
  type ConnectionStore,
  type PurgeScope,
} from "@sockroute/core";
import { SCRIPTS, type ScriptName } from "./scripts.js";

/**
 * Redis client interface (compatible with ioredis and clients exposing the
 * same EVALSHA / SCRIPT LOAD surface).
 */
export interface RedisClient {
  evalsha(
    sha: string,
    numKeys: number,
    ...args: (string | number)[]
  ): Promise<unknown>;
  scriptLoad(script: string): Promise<string>;
}

export interface RedisConnectionStoreOptions {
  /**
   * Prefix of the hash holding the records. Use one per deployment sharing
   * a Redis instance.
   * @default "sockroute:"
   */
  keyPrefix?: string;
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

function isConnectionRecord(value: unknown): value is ConnectionRecord {
  if (typeof value !== "object" || value === null) return false;
  const r: Record<string, unknown> = { ...value };
  return (
    typeof r.id === "string" &&
    typeof r.handle === "string" &&
    typeof r.path === "string" &&
    typeof r.active === "boolean" &&
    typeof r.lastPing === "number" &&
    typeof r.createdAt === "number" &&
    isNullableString(r.userId) &&
    isNullableString(r.sessionId) &&
    isNullableString(r.userIp)
  );
}

function decodeRecord(value: unknown): ConnectionRecord | undefined {
  if (typeof value !== "string") return undefined;
  const parsed = safeJsonParse(value);
  if (!parsed.ok || !isConnectionRecord(parsed.value)) {
    throw new Error(`Corrupt connection record: ${value.slice(0, 200)}`);
  }
  return parsed.value;
}

function decodeRecords(value: unknown): ConnectionRecord[] {
  if (!Array.isArray(value)) return [];
  const records: ConnectionRecord[] = [];
  for (const item of value) {
    const record = decodeRecord(item);
    if (record) records.push(record);
  }
  return records;
}

/**
 * Connection store kept in Redis, for endpoints running in several processes.
 *
 * Every mutation is one Lua script over one hash, so upserts, deactivation
 * and purges are atomic across processes. Scripts are loaded on first use
 * and reloaded if Redis evicts them (NOSCRIPT).
 *
 * @example
 * ```typescript
 * import Redis from "ioredis";
 * import { ConnectionRegistry, createEndpoint } from "@sockroute/core";
 * import { redisConnectionStore } from "@sockroute/redis";
 *
 * const redis = new Redis(process.env.REDIS_URL);
 * const registry = new ConnectionRegistry({
 *   store: redisConnectionStore({
 *     evalsha: (sha, numKeys, ...args) => redis.evalsha(sha, numKeys, ...args),
 *     scriptLoad: async (script) => String(await redis.script("LOAD", script)),
 *   }),
 * });
 * const endpoint = createEndpoint({ transport, registry });
 * ```
 */
export function redisConnectionStore(
  client: RedisClient,
  options: RedisConnectionStoreOptions = {},
): ConnectionStore {
  const key = `${options.keyPrefix ?? "sockroute:"}connections`;
  const shas = new Map<ScriptName, string>();
  const loading = new Map<ScriptName, Promise<string>>();

  function ensureScriptLoaded(name: ScriptName): Promise<string> {
    const sha = shas.get(name);
    if (sha) return Promise.resolve(sha);

    // Another call is already loading it; wait for that
    const pending = loading.get(name);
    if (pending) return pending;

    const load = client
      .scriptLoad(SCRIPTS[name])
      .then((loaded) => {
        shas.set(name, loaded);
        return loaded;
      })
      .finally(() => loading.delete(name));
    loading.set(name, load);
    return load;
  }

  async function run(
    name: ScriptName,
    args: (string | number)[],
    retried = false,
  ): Promise<unknown> {
    const sha = await ensureScriptLoaded(name);
    try {
      return await client.evalsha(sha, 1, key, ...args);
    } catch (err) {
      // Script evicted from Redis; reload and retry once
      if (!retried && err instanceof Error && err.message.includes("NOSCRIPT")) {
        shas.delete(name);
        return run(name, args, true);
      }
      throw err;
    }
  }

  return {
    async upsert(
      handle: string,
      fields: ConnectionFields,
      identity: ConnectionIdentity,
    ): Promise<ConnectionRecord> {
      const created: ConnectionRecord = {
        id: identity.id,
        handle,
        userId: null,
        sessionId: null,
        path: "",
        active: false,
        lastPing: identity.createdAt,
        userIp: null,
        createdAt: identity.createdAt,
      };
      const record = decodeRecord(
        await run("upsert", [handle, JSON.stringify(fields), JSON.stringify(created)]),
      );
      if (!record) throw new Error(`Upsert returned nothing for ${handle}`);
      return record;
    },

    async get(handle: string): Promise<ConnectionRecord | undefined> {
      return decodeRecord(await run("get", [handle]));
    },

    async delete(handle: string): Promise<ConnectionRecord | undefined> {
      return decodeRecord(await run("delete", [handle]));
    },

    async query(scope: ConnectionScope): Promise<ConnectionRecord[]> {
      const records = decodeRecords(await run("query", []));
      return records.filter((record) => matchesScope(record, scope));
    },

    async deactivate(scope: ConnectionScope): Promise<ConnectionRecord[]> {
      return decodeRecords(await run("deactivate", [JSON.stringify(scope)]));
    },

    async purge(scope: PurgeScope): Promise<number> {
      const deleted = await run("purge", [JSON.stringify(scope)]);
      return typeof deleted === "number" ? deleted : 0;
    },
  };
}

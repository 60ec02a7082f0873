// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  ConnectionRegistry,
  matchesScope,
  type ConnectionRecord,
  type ConnectionScope,
} from "@sockroute/core";
import { FakeClock } from "@sockroute/core/testing";
import { beforeEach, describe, expect, it } from "vitest";
import { redisConnectionStore, type RedisClient } from "../src/index.js";

/**
 * Mock Redis client for testing without a real Redis instance.
 *
 * Loaded scripts are recognised by their `-- op:` header and emulated
 * against an in-memory hash, mirroring what the Lua does on the server.
 */
class MockRedisClient implements RedisClient {
  readonly hashes = new Map<string, Map<string, string>>();
  private scripts = new Map<string, string>();
  scriptLoads = 0;
  evalCalls = 0;

  async scriptLoad(script: string): Promise<string> {
    this.scriptLoads++;
    const sha = `sha_${this.scriptLoads}`;
    this.scripts.set(sha, script);
    return sha;
  }

  /** Simulate SCRIPT FLUSH */
  flushScripts(): void {
    this.scripts.clear();
  }

  async evalsha(
    sha: string,
    numKeys: number,
    ...args: (string | number)[]
  ): Promise<unknown> {
    this.evalCalls++;
    const script = this.scripts.get(sha);
    if (!script) throw new Error("NOSCRIPT No matching script. Please use EVAL.");

    const key = String(args[0]);
    const argv = args.slice(numKeys).map(String);
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    this.hashes.set(key, hash);
    const op = /^-- op: (\w+)/.exec(script)?.[1];

    switch (op) {
      case "upsert": {
        const [handle = "", fields = "{}", created = "{}"] = argv;
        const current = hash.get(handle);
        const record = { ...JSON.parse(current ?? created), ...JSON.parse(fields) };
        const encoded = JSON.stringify(record);
        hash.set(handle, encoded);
        return encoded;
      }
      case "get":
        return hash.get(argv[0] ?? "") ?? null;
      case "delete": {
        const current = hash.get(argv[0] ?? "") ?? null;
        hash.delete(argv[0] ?? "");
        return current;
      }
      case "query":
        return Array.from(hash.values());
      case "deactivate": {
        const scope: ConnectionScope = JSON.parse(argv[0] ?? "{}");
        const flipped: string[] = [];
        for (const value of hash.values()) {
          const record: ConnectionRecord = JSON.parse(value);
          if (!record.active || !matchesScope(record, scope)) continue;
          const encoded = JSON.stringify({ ...record, active: false });
          hash.set(record.handle, encoded);
          flipped.push(encoded);
        }
        return flipped;
      }
      case "purge": {
        const scope: ConnectionScope = JSON.parse(argv[0] ?? "{}");
        let deleted = 0;
        for (const value of Array.from(hash.values())) {
          const record: ConnectionRecord = JSON.parse(value);
          if (record.active || !matchesScope(record, scope)) continue;
          hash.delete(record.handle);
          deleted++;
        }
        return deleted;
      }
      default:
        throw new Error(`ERR unknown script ${sha}`);
    }
  }
}

const T0 = 1_700_000_000_000;

describe("redisConnectionStore()", () => {
  let client: MockRedisClient;
  let clock: FakeClock;
  let registry: ConnectionRegistry;

  beforeEach(() => {
    client = new MockRedisClient();
    clock = new FakeClock(T0);
    registry = new ConnectionRegistry({
      store: redisConnectionStore(client, { keyPrefix: "test:" }),
      clock,
    });
  });

  const session = (userId: string | null, path = "/t/1") => ({
    path,
    userId,
    sessionId: null,
    userIp: "10.0.0.1",
  });

  it("should keep every record in one prefixed hash", async () => {
    await registry.refresh("h1", session("alice"));
    await registry.refresh("h2", session("bob"));

    expect(Array.from(client.hashes.keys())).toEqual(["test:connections"]);
    expect(client.hashes.get("test:connections")?.size).toBe(2);
  });

  it("should create, refresh and read back records", async () => {
    const created = await registry.refresh("h1", session("alice"));
    clock.set(T0 + 100);
    const refreshed = await registry.refresh("h1", session("alice"));

    expect(refreshed).toEqual({ ...created, lastPing: T0 + 100 });
    expect(await registry.get("h1")).toEqual(refreshed);
    expect(await registry.get("missing")).toBeUndefined();
  });

  it("should return the deleted record once", async () => {
    await registry.refresh("h1", session("alice"));

    expect((await registry.remove("h1"))?.handle).toBe("h1");
    expect(await registry.remove("h1")).toBeUndefined();
  });

  it("should filter queries by scope", async () => {
    await registry.refresh("a1", session("alice"));
    await registry.refresh("a2", session("alice", "/t/2"));
    await registry.refresh("anon", session(null));

    const found = await registry.find({ userId: "alice", path: "/t/1" });
    expect(found.map((record) => record.handle)).toEqual(["a1"]);
    expect((await registry.find({ userId: null })).map((record) => record.handle)).toEqual([
      "anon",
    ]);
  });

  it("should deactivate and purge in scope", async () => {
    await registry.refresh("a1", session("alice"));
    await registry.refresh("a2", session("alice"));
    await registry.refresh("b1", session("bob"));

    const flipped = await registry.deactivate({ userId: "alice", excludeHandles: ["a2"] });
    expect(flipped.map((record) => record.handle)).toEqual(["a1"]);
    expect(flipped[0]?.active).toBe(false);

    clock.set(T0 + 10_000);
    expect(await registry.purge(5_000)).toBe(1);
    expect(await registry.purge(5_000)).toBe(0);
    expect((await registry.find({})).map((record) => record.handle).sort()).toEqual([
      "a2",
      "b1",
    ]);
  });

  it("should load each script once", async () => {
    await registry.refresh("h1", session("alice"));
    await registry.refresh("h1", session("alice"));
    await registry.get("h1");

    expect(client.scriptLoads).toBe(2);
  });

  it("should reload scripts evicted from Redis", async () => {
    await registry.refresh("h1", session("alice"));
    client.flushScripts();

    await registry.refresh("h1", session("alice"));

    expect(client.scriptLoads).toBe(2);
    expect(client.evalCalls).toBe(3);
  });

  it("should reject a record that does not decode", async () => {
    client.hashes.set("test:connections", new Map([["h1", '{"handle":"h1"}']]));

    await expect(registry.get("h1")).rejects.toThrow(/Corrupt connection record/);
  });
});

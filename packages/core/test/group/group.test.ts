// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { createHash } from "node:crypto";
import { beforeEach, describe, expect, it } from "vitest";
import { EMPTY_GROUP, GroupAddressor } from "../../src/group/group.js";
import type { ConnectionRecord } from "../../src/registry/types.js";
import {
  createTestLogger,
  FakeClock,
  TestTransport,
  type TestLogger,
} from "../../src/testing/index.js";

const NOW = 1_700_000_123_456;

function record(handle: string): ConnectionRecord {
  return {
    id: `conn_${handle}`,
    handle,
    userId: null,
    sessionId: null,
    path: "/table/1",
    active: true,
    lastPing: 0,
    userIp: null,
    createdAt: 0,
  };
}

describe("GroupAddressor", () => {
  let transport: TestTransport;
  let logger: TestLogger;
  let addressor: GroupAddressor;

  beforeEach(() => {
    transport = new TestTransport();
    logger = createTestLogger();
    addressor = new GroupAddressor({ transport, logger, clock: new FakeClock(NOW) });
  });

  describe("fromConnections()", () => {
    it("should return the empty sentinel for no members", async () => {
      const group = addressor.fromConnections([]);

      expect(group).toBe(EMPTY_GROUP);
      expect(group.id).toBe("");
      expect(await group.sendAction("PING")).toBe(0);
    });

    it("should derive the id from sorted member handles", () => {
      const expected = createHash("md5").update("a\0b\0c").digest("hex");

      expect(addressor.fromConnections([record("c"), record("a"), record("b")]).id).toBe(
        expected,
      );
      expect(addressor.fromConnections([record("b"), record("c"), record("a")]).id).toBe(
        expected,
      );
    });

    it("should give different memberships different ids", () => {
      const ab = addressor.fromConnections([record("a"), record("b")]);
      const abc = addressor.fromConnections([record("a"), record("b"), record("c")]);

      expect(ab.id).not.toBe(abc.id);
    });

    it("should collapse duplicate handles", () => {
      const group = addressor.fromConnections([record("a"), record("a")]);

      expect(group.members).toHaveLength(1);
      expect(group.id).toBe(addressor.fromConnections([record("a")]).id);
    });
  });

  describe("broadcast()", () => {
    it("should deliver one identical frame to every member", async () => {
      const group = addressor.fromConnections([record("a"), record("b"), record("c")]);

      const delivered = await group.sendAction("CHAT", { text: "hi" });

      expect(delivered).toBe(3);
      const frames = ["a", "b", "c"].map((handle) => transport.raw(handle));
      expect(frames[0]).toEqual([
        JSON.stringify({ text: "hi", type: "CHAT", TIMESTAMP: NOW }),
      ]);
      expect(frames[1]).toEqual(frames[0]);
      expect(frames[2]).toEqual(frames[0]);
    });

    it("should stamp a single timestamp per broadcast", async () => {
      let ticks = NOW;
      const advancing = new GroupAddressor({
        transport,
        logger,
        clock: { now: () => ticks++, setInterval: () => 0, clearInterval: () => {} },
      });

      await advancing
        .fromConnections([record("a"), record("b"), record("c")])
        .sendAction("DEAL");

      const stamps = ["a", "b", "c"].map((handle) => transport.sent(handle)[0]?.TIMESTAMP);
      expect(stamps).toEqual([NOW, NOW, NOW]);
    });

    it("should not mutate the caller's envelope", async () => {
      const envelope = { type: "CHAT" };
      await addressor.fromConnections([record("a")]).broadcast(envelope);

      expect(envelope).toEqual({ type: "CHAT" });
    });

    it("should skip bot handles", async () => {
      const group = addressor.fromConnections([record("a"), record("bot-dealer")]);

      expect(group.members).toHaveLength(2);
      expect(await group.sendAction("DEAL")).toBe(1);
      expect(transport.raw("bot-dealer")).toEqual([]);
    });

    it("should keep delivering when one member fails", async () => {
      transport.failOn("b", "throw");
      transport.failOn("c", "refuse");
      const group = addressor.fromConnections([record("a"), record("b"), record("c"), record("d")]);

      expect(await group.sendAction("CHAT")).toBe(2);
      expect(transport.raw("a")).toHaveLength(1);
      expect(transport.raw("d")).toHaveLength(1);
      expect(logger.at("warn", "Group send failed")).toHaveLength(2);
    });
  });

  describe("broadcastRaw()", () => {
    it("should deliver text unchanged", async () => {
      const group = addressor.fromConnections([record("a")]);

      await group.broadcastRaw('{"type":"RAW"}');

      expect(transport.raw("a")).toEqual(['{"type":"RAW"}']);
    });
  });
});

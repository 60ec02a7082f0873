// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { ErrorCode, isSockrouteError } from "../../src/error.js";
import { matches, RouteTable } from "../../src/core/route-table.js";
import type { Handler } from "../../src/core/types.js";

const noop: Handler = () => {};

function named(name: string): Handler {
  const handler: Handler = () => {};
  Object.defineProperty(handler, "name", { value: name });
  return handler;
}

describe("matches()", () => {
  it("should compare strings exactly", () => {
    expect(matches("JOIN", "JOIN")).toBe(true);
    expect(matches("JOIN", "JOIN_TABLE")).toBe(false);
    expect(matches("join", "JOIN")).toBe(false);
  });

  it("should require a pattern to cover the whole action type", () => {
    expect(matches(/CHAT_.*/, "CHAT_SEND")).toBe(true);
    expect(matches(/CHAT/, "CHAT_SEND")).toBe(false);
    expect(matches(/SEND/, "CHAT_SEND")).toBe(false);
    expect(matches(/A|AB/, "AB")).toBe(true);
    expect(matches(/A|AB/, "ABC")).toBe(false);
  });
});

describe("RouteTable", () => {
  describe("add()", () => {
    it("should return this for chaining", () => {
      const table = new RouteTable();
      expect(table.add("PING", noop)).toBe(table);
      expect(table.size()).toBe(1);
    });

    it("should reject an empty string matcher", () => {
      const table = new RouteTable();
      let caught: unknown;
      try {
        table.add("", noop);
      } catch (err) {
        caught = err;
      }
      expect(isSockrouteError(caught, ErrorCode.INVALID_ROUTE)).toBe(true);
    });

    it("should name entries after the handler, then the matcher", () => {
      const table = new RouteTable()
        .add("A", named("onA"))
        .add(/B.*/, () => {})
        .add("C", noop, "custom");
      expect(table.list().map((entry) => entry.name)).toEqual([
        "onA",
        "/B.*/",
        "custom",
      ]);
    });

    it("should drop stateful regexp flags", () => {
      const table = new RouteTable().add(/X\d/g, noop);
      expect(table.match("X1")).toBeDefined();
      expect(table.match("X1")).toBeDefined();
    });
  });

  describe("match()", () => {
    it("should return undefined when nothing matches", () => {
      expect(new RouteTable().add("A", noop).match("B")).toBeUndefined();
    });

    it("should prefer the most recently registered matching entry", () => {
      const first = named("first");
      const second = named("second");
      const table = new RouteTable().add(/JOIN.*/, first).add("JOIN_TABLE", second);

      expect(table.match("JOIN_TABLE")?.handler).toBe(second);
      expect(table.match("JOIN_LOBBY")?.handler).toBe(first);
    });

    it("should let a later pattern shadow an earlier exact entry", () => {
      const exact = named("exact");
      const wildcard = named("wildcard");
      const table = new RouteTable().add("HELLO", exact).add(/.*/, wildcard);

      expect(table.match("HELLO")?.handler).toBe(wildcard);
    });
  });

  describe("merge()", () => {
    it("should append entries so merged routes win ties", () => {
      const builtin = named("builtin");
      const override = named("override");
      const table = new RouteTable().add("HELLO", builtin);
      table.merge(new RouteTable().add("HELLO", override));

      expect(table.size()).toBe(2);
      expect(table.match("HELLO")?.handler).toBe(override);
    });
  });

  describe("from()", () => {
    it("should keep definition order", () => {
      const a = named("a");
      const b = named("b");
      const table = RouteTable.from([
        ["X", a],
        ["X", b],
      ]);
      expect(table.match("X")?.handler).toBe(b);
    });
  });
});

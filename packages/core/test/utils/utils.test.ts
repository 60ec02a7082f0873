// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { describeError, SockrouteError } from "../../src/error.js";
import { clientAddress, readCookie } from "../../src/utils/headers.js";
import { hashHandles } from "../../src/utils/ids.js";
import { KeyedMutex } from "../../src/utils/mutex.js";

describe("KeyedMutex", () => {
  it("should keep running the queue after a rejection", async () => {
    const mutex = new KeyedMutex();
    const order: number[] = [];

    const failed = mutex.run("k", async () => {
      order.push(1);
      throw new Error("first");
    });
    const next = mutex.run("k", async () => {
      order.push(2);
      return "ok";
    });

    await expect(failed).rejects.toThrow("first");
    await expect(next).resolves.toBe("ok");
    expect(order).toEqual([1, 2]);
  });

  it("should forget keys once their queue drains", async () => {
    const mutex = new KeyedMutex();

    await mutex.run("k", async () => {});
    await new Promise((resolve) => setImmediate(resolve));

    expect(mutex.size).toBe(0);
  });
});

describe("clientAddress()", () => {
  it("should prefer x-real-ip, then the first forwarded hop, then the peer", () => {
    expect(
      clientAddress({ "x-real-ip": "198.51.100.1", "x-forwarded-for": "203.0.113.5" }, "10.0.0.1"),
    ).toBe("198.51.100.1");
    expect(clientAddress({ "x-forwarded-for": " 203.0.113.5 , 10.0.0.9" }, "10.0.0.1")).toBe(
      "203.0.113.5",
    );
    expect(clientAddress({}, "10.0.0.1")).toBe("10.0.0.1");
    expect(clientAddress({})).toBeNull();
  });
});

describe("readCookie()", () => {
  it("should find a cookie among several", () => {
    const headers = { Cookie: "theme=dark; sessionid=abc%20123; csrftoken=x" };

    expect(readCookie(headers, "sessionid")).toBe("abc 123");
    expect(readCookie(headers, "missing")).toBeUndefined();
  });
});

describe("hashHandles()", () => {
  it("should ignore order and duplicates", () => {
    expect(hashHandles(["b", "a", "a"])).toBe(hashHandles(["a", "b"]));
    expect(hashHandles(["a", "b"])).toMatch(/^[0-9a-f]{32}$/);
  });
});

describe("describeError()", () => {
  it("should render the error name and quoted message", () => {
    expect(describeError(new TypeError("x is undefined"))).toBe('TypeError("x is undefined")');
    expect(describeError(SockrouteError.from("CUSTOM", "nope"))).toBe('SockrouteError("nope")');
    expect(describeError("plain")).toBe("plain");
  });
});

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { createTestEndpoint, TEST_EPOCH } from "@sockroute/core/testing";
import { describe, expect, it, vi } from "vitest";
import {
  createMessages,
  formatIssues,
  message,
  route,
  validated,
  z,
} from "../src/index.js";

const Sit = message("SIT", { seat: z.number().int().min(0) });

describe("message()", () => {
  it("should accept the action type with valid fields and keep extra fields", () => {
    expect(Sit.parse({ type: "SIT", seat: 2, requestId: "r1" })).toEqual({
      type: "SIT",
      seat: 2,
      requestId: "r1",
    });
  });

  it("should reject another action type", () => {
    expect(Sit.safeParse({ type: "STAND", seat: 2 }).success).toBe(false);
  });
});

describe("formatIssues()", () => {
  it("should prefix each issue with its path", () => {
    const result = Sit.safeParse({ type: "SIT", seat: -1 });
    if (result.success) throw new Error("expected failure");

    const [line] = formatIssues(result.error);
    expect(line?.startsWith("seat: ")).toBe(true);
  });
});

describe("validated()", () => {
  it("should pass the parsed message to the handler", async () => {
    const handler = vi.fn();
    const te = createTestEndpoint({ routes: [["SIT", validated(Sit, handler)]] });
    const conn = await te.connect("h1");

    await conn.send({ type: "SIT", seat: 3 });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[1]).toEqual({ type: "SIT", seat: 3 });
    expect(conn.sent()).toEqual([]);
  });

  it("should answer ERROR and skip the handler for an invalid message", async () => {
    const handler = vi.fn();
    const te = createTestEndpoint({ routes: [["SIT", validated(Sit, handler)]] });
    const conn = await te.connect("h1");

    await conn.send({ type: "SIT", seat: "front" });

    expect(handler).not.toHaveBeenCalled();
    const [frame] = conn.sent();
    expect(frame).toMatchObject({
      type: "ERROR",
      success: false,
      TIMESTAMP: TEST_EPOCH,
    });
    expect(frame?.errors).toEqual([expect.stringMatching(/^seat: /)]);
    expect(frame?.details).toEqual(expect.stringContaining("seat"));
  });

  it("should keep the handler's name for flow tracing", () => {
    async function onSit(): Promise<void> {}

    expect(validated(Sit, onSit).name).toBe("onSit");
  });
});

describe("route()", () => {
  it("should register under the action type", async () => {
    const seats: number[] = [];
    const te = createTestEndpoint({
      routes: [
        route("SIT", { seat: z.number() }, (_ctx, msg) => {
          seats.push(msg.seat);
        }),
      ],
    });
    const conn = await te.connect("h1");

    await conn.send({ type: "SIT", seat: 4 });
    await conn.send({ type: "SIT" });

    expect(seats).toEqual([4]);
    expect(conn.sentOfType("ERROR")).toHaveLength(1);
  });
});

describe("createMessages()", () => {
  const action = createMessages("action");

  it("should put the action type under the given routing key", () => {
    const Chat = action.message("CHAT", { text: z.string() });

    expect(Chat.parse({ action: "CHAT", text: "hi" })).toEqual({
      action: "CHAT",
      text: "hi",
    });
    expect(Chat.safeParse({ type: "CHAT", text: "hi" }).success).toBe(false);
  });

  it("should run routes on an endpoint with a custom routing key", async () => {
    const texts: string[] = [];
    const te = createTestEndpoint({
      routingKey: "action",
      routes: [
        action.route("CHAT", { text: z.string() }, (_ctx, msg) => {
          texts.push(msg.text);
        }),
      ],
    });
    const conn = await te.connect("h1");

    await conn.send({ action: "CHAT", text: "hi" });

    expect(texts).toEqual(["hi"]);
    expect(conn.sent()).toEqual([]);
  });

  it("should answer ERROR under the custom routing key", async () => {
    const te = createTestEndpoint({
      routingKey: "action",
      routes: [action.route("CHAT", { text: z.string() }, () => {})],
    });
    const conn = await te.connect("h1");

    await conn.send({ action: "CHAT", text: 5 });

    expect(conn.sentOfType("ERROR")).toEqual([
      expect.objectContaining({
        action: "ERROR",
        success: false,
        errors: [expect.stringMatching(/^text: /)],
      }),
    ]);
  });
});

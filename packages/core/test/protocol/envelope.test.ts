// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { ErrorCode, isSockrouteError } from "../../src/error.js";
import {
  createAction,
  decodeEnvelope,
  getActionType,
  stampEnvelope,
} from "../../src/protocol/envelope.js";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("decodeEnvelope()", () => {
  it("should parse a JSON object", () => {
    expect(decodeEnvelope('{"type":"JOIN","table":3}')).toEqual({
      type: "JOIN",
      table: 3,
    });
  });

  it("should join fragmented binary frames", () => {
    const bytes = new TextEncoder().encode('{"type":"ÉTÉ"}');
    const fragments = [bytes.subarray(0, 10), bytes.subarray(10)];

    expect(decodeEnvelope(fragments)).toEqual({ type: "ÉTÉ" });
  });

  it.each([
    ["[1,2]", "array"],
    ["null", "null"],
    ['"JOIN"', "string"],
    ["42", "number"],
  ])("should reject %s as a non-object", (raw, kind) => {
    const err = thrown(() => decodeEnvelope(raw));

    expect(isSockrouteError(err, ErrorCode.PROTOCOL_VIOLATION)).toBe(true);
    expect(err).toMatchObject({
      message: `Expected JSON websocket message to be an object, but got ${kind}`,
    });
  });

  it("should reject malformed JSON", () => {
    const err = thrown(() => decodeEnvelope("{"));

    expect(isSockrouteError(err, ErrorCode.PROTOCOL_VIOLATION)).toBe(true);
  });
});

describe("getActionType()", () => {
  it("should read only non-empty strings", () => {
    expect(getActionType({ type: "A" }, "type")).toBe("A");
    expect(getActionType({ type: "" }, "type")).toBeUndefined();
    expect(getActionType({ type: 1 }, "type")).toBeUndefined();
    expect(getActionType({ action: "B" }, "type")).toBeUndefined();
    expect(getActionType({ action: "B" }, "action")).toBe("B");
  });
});

describe("createAction() / stampEnvelope()", () => {
  it("should let the action type win over a same-named field", () => {
    expect(createAction("type", "CHAT", { type: "OTHER", text: "x" })).toEqual({
      type: "CHAT",
      text: "x",
    });
  });

  it("should stamp a copy", () => {
    const envelope = { type: "CHAT" };

    expect(stampEnvelope(envelope, 123)).toEqual({ type: "CHAT", TIMESTAMP: 123 });
    expect(envelope).toEqual({ type: "CHAT" });
  });
});

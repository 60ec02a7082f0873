// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Wire envelope: a JSON object carrying a routing key plus free-form fields.
 */

import { TIMESTAMP_KEY } from "../constants.js";
import { ErrorCode, SockrouteError } from "../error.js";
import { decodeFrame, safeJsonParse, type RawFrame } from "../utils/json.js";

export type Envelope = Record<string, unknown>;

export function isEnvelope(value: unknown): value is Envelope {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function kindOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Fail fast on anything that is not a key-value mapping.
 */
export function assertEnvelope(value: unknown): asserts value is Envelope {
  if (!isEnvelope(value)) {
    throw SockrouteError.from(
      ErrorCode.PROTOCOL_VIOLATION,
      `Expected JSON websocket message to be an object, but got ${kindOf(value)}`,
      { received: kindOf(value) },
    );
  }
}

/**
 * Decode and parse one inbound frame. Malformed JSON is a protocol violation.
 */
export function decodeEnvelope(raw: RawFrame): Envelope {
  const text = decodeFrame(raw);
  const parsed = safeJsonParse(text);
  if (!parsed.ok) {
    throw SockrouteError.from(
      ErrorCode.PROTOCOL_VIOLATION,
      `Invalid JSON: ${parsed.error}`,
      { length: text.length },
    );
  }
  assertEnvelope(parsed.value);
  return parsed.value;
}

/**
 * Routing value of an envelope. Missing, empty and non-string values all read
 * as "no action type".
 */
export function getActionType(
  envelope: Envelope,
  routingKey: string,
): string | undefined {
  const value = envelope[routingKey];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Copy of the envelope with the delivery timestamp injected.
 */
export function stampEnvelope(envelope: Envelope, now: number): Envelope {
  return { ...envelope, [TIMESTAMP_KEY]: now };
}

export function createAction(
  routingKey: string,
  type: string,
  fields: Envelope = {},
): Envelope {
  return { ...fields, [routingKey]: type };
}

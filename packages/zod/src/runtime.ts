// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  DEFAULTS,
  type ConnectionContext,
  type RouteDefinition,
} from "@sockroute/core";
import { z, type ZodRawShape } from "zod";
import { validated } from "./validator.js";

/** The routing key's field in a message shape */
function routingField<K extends string, T extends string>(
  routingKey: K,
  type: T,
): { [P in K]: z.ZodLiteral<T> };
function routingField(routingKey: string, type: string): Record<string, z.ZodType> {
  return { [routingKey]: z.literal(type) };
}

/**
 * Schema of one inbound action: the action type as a literal under the
 * routing key, plus payload fields.
 *
 * Unknown fields pass through, since clients attach their own bookkeeping
 * (timestamps, request ids) to envelopes.
 */
export function keyedMessage<
  K extends string,
  T extends string,
  S extends ZodRawShape,
>(routingKey: K, type: T, shape: S) {
  return z.looseObject({ ...shape, ...routingField(routingKey, type) });
}

export type MessageSchema<
  T extends string,
  S extends ZodRawShape,
  K extends string = typeof DEFAULTS.ROUTING_KEY,
> = ReturnType<typeof keyedMessage<K, T, S>>;

/** Parsed message as a handler receives it */
export type Message<
  T extends string,
  S extends ZodRawShape,
  K extends string = typeof DEFAULTS.ROUTING_KEY,
> = z.output<MessageSchema<T, S, K>>;

/**
 * Message and route builders for endpoints that route on `routingKey`.
 *
 * @example
 * ```typescript
 * const { route } = createMessages("action");
 * const endpoint = createEndpoint({
 *   transport,
 *   routingKey: "action",
 *   routes: [route("SIT", { seat: z.number().int() }, onSit)],
 * });
 * ```
 */
export function createMessages<K extends string>(routingKey: K) {
  /**
   * @example
   * ```typescript
   * const Join = message("JOIN_TABLE", { tableId: z.string(), seat: z.number().int() });
   * ```
   */
  function message<T extends string, S extends ZodRawShape>(
    type: T,
    shape: S,
  ): MessageSchema<T, S, K> {
    return keyedMessage(routingKey, type, shape);
  }

  /**
   * Route whose handler only ever sees messages that passed validation.
   *
   * @example
   * ```typescript
   * route("SIT", { seat: z.number().int() }, async (ctx, msg) => {
   *   await ctx.broadcastAction("SAT", { seat: msg.seat, userId: ctx.userId });
   * });
   * ```
   */
  function route<T extends string, S extends ZodRawShape>(
    type: T,
    shape: S,
    handler: (
      ctx: ConnectionContext,
      message: Message<T, S, K>,
    ) => void | Promise<void>,
  ): RouteDefinition {
    return [type, validated(message(type, shape), handler)];
  }

  return { routingKey, message, route };
}

export const { message, route } = createMessages(DEFAULTS.ROUTING_KEY);

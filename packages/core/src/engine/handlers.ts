// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Routes every endpoint ships with. Registered before user routes, so a
 * user route with the same matcher replaces them.
 */

import { ACTION_TYPES } from "../constants.js";
import type { ConnectionContext } from "../context/connection-context.js";
import type { RouteDefinition } from "../core/types.js";

/**
 * Initial handshake confirmation from the page. Confirms the connection,
 * reports round-trip data back, and asks the user's other connections on the
 * same page to prove they are still alive.
 */
export async function onHello(ctx: ConnectionContext): Promise<void> {
  const record = await ctx.refreshSession();
  await ctx.sendAction(ACTION_TYPES.GOT_HELLO, {
    userId: ctx.userId,
    connectionId: record.id,
    path: ctx.path,
    lastPing: record.lastPing,
    userIp: record.userIp,
  });
  await ctx.cleanupStale();
}

/**
 * Reply to a PING: the refresh is what marks the connection active again.
 */
export async function onPingResponse(ctx: ConnectionContext): Promise<void> {
  await ctx.refreshSession();
}

export function builtinRoutes(): RouteDefinition[] {
  return [
    [ACTION_TYPES.PING_RESPONSE, onPingResponse],
    [ACTION_TYPES.HELLO, onHello],
  ];
}

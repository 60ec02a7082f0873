// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Card table server: a lobby endpoint plus one endpoint per table.
 *
 * Run with SOCKROUTE_LOGIN_REQUIRED=true to require a session cookie; the
 * session lookup below accepts any cookie of the form "user-<name>".
 */

import { cookieSessionStore, createEndpoint, getActionType } from "@sockroute/core";
import {
  endpointOptionsFrom,
  loadConfig,
  serve,
  WsTransport,
} from "@sockroute/node";
import { createMessages, z } from "@sockroute/zod";

const config = loadConfig();
const { route } = createMessages(config.routingKey);
const transport = new WsTransport();
const sessions = cookieSessionStore(
  (sessionId) => (sessionId.startsWith("user-") ? sessionId.slice(5) : null),
  { cookieName: config.sessionCookie },
);

const lobby = createEndpoint({
  ...endpointOptionsFrom(config),
  transport,
  sessions,
  routes: [
    route("CHAT", { text: z.string().min(1).max(500) }, async (ctx, msg) => {
      await ctx.broadcastAction("CHAT", { userId: ctx.userId, text: msg.text });
    }),
  ],
});

const tables = createEndpoint({
  ...endpointOptionsFrom(config),
  transport,
  sessions,
  routes: [
    route("SIT", { seat: z.number().int().min(0).max(9) }, async (ctx, msg) => {
      await ctx.broadcastAction("SAT", { seat: msg.seat, userId: ctx.userId });
    }),
    route("BET", { amount: z.number().positive() }, async (ctx, msg) => {
      await ctx.broadcastAction("BET", { amount: msg.amount, userId: ctx.userId });
    }),
    // Remaining player actions are relayed to the table
    [
      /PLAYER_[A-Z]+/,
      async (ctx, envelope) => {
        await ctx.broadcastAction("PLAYER_ACTION", {
          action: getActionType(envelope, ctx.routingKey),
          userId: ctx.userId,
        });
      },
    ],
  ],
  onConnect: async (ctx) => {
    const group = await ctx.group();
    await ctx.sendAction("TABLE_STATE", { players: group.members.length });
  },
  onDisconnect: async (ctx) => {
    await ctx.broadcastAction("LEFT", { userId: ctx.userId });
  },
});

const running = await serve({
  transport,
  port: config.port,
  host: config.host,
  maxPayloadBytes: config.maxPayloadBytes,
  endpoints: [
    { path: "/lobby", endpoint: lobby },
    { path: /\/table\/\d+/, endpoint: tables },
  ],
});

const shutdown = () => {
  running.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    },
  );
};
process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @sockroute/zod - Zod schemas for sockroute endpoints
 *
 * @example
 * ```typescript
 * import { createEndpoint } from "@sockroute/core";
 * import { route, z } from "@sockroute/zod";
 *
 * const endpoint = createEndpoint({
 *   transport,
 *   routes: [
 *     route("CHAT", { text: z.string().max(500) }, async (ctx, msg) => {
 *       await ctx.broadcastAction("CHAT", { text: msg.text, userId: ctx.userId });
 *     }),
 *   ],
 * });
 * ```
 *
 * Endpoints with another routing key build their routes with
 * `createMessages(routingKey)`.
 */

// Canonical Zod instance (single import source)
export { z } from "zod";

export {
  createMessages,
  keyedMessage,
  message,
  route,
  type Message,
  type MessageSchema,
} from "./runtime.js";
export { formatIssues, validated } from "./validator.js";

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Factory: createEndpoint(opts) → ConnectionLifecycle
 *
 * Options:
 * - transport: where frames go (required)
 * - routes / defaultRoute: extra routes on top of HELLO and PING_RESPONSE
 * - sessions / loginRequired: user resolution and RECONNECT gating
 * - registry: shared connection store (default: in-memory)
 * - sweeper: { graceMs?, sweepIntervalMs? } for the stale-connection purge
 */

import {
  ConnectionLifecycle,
  type EndpointOptions,
} from "../engine/lifecycle.js";

/**
 * Create an endpoint. Call `start()` to run the background purge.
 *
 * Example:
 * ```ts
 * const endpoint = createEndpoint({
 *   transport,
 *   routes: [["JOIN_TABLE", onJoin], [/^CHAT_/, onChat]],
 *   sessions: cookieSessionStore(lookupUser),
 *   loginRequired: true,
 * });
 * endpoint.start();
 * ```
 */
export function createEndpoint(options: EndpointOptions): ConnectionLifecycle {
  return new ConnectionLifecycle(options);
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Session store contract: the external user/session lookup.
 */

import { DEFAULTS } from "./constants.js";
import { readCookie } from "./utils/headers.js";
import type { HandshakeInfo } from "./ws/transport.js";

type MaybePromise<T> = T | Promise<T>;

export interface SessionStore {
  /** Session id carried by the opening request, if any */
  sessionIdFor(handshake: HandshakeInfo): MaybePromise<string | null>;
  /** Owning user of a session, or null when the session is unknown or anonymous */
  lookupUser(sessionId: string): MaybePromise<string | null>;
}

/**
 * Store for endpoints without authentication: every connection is anonymous.
 */
export const anonymousSessions: SessionStore = {
  sessionIdFor: () => null,
  lookupUser: () => null,
};

export interface CookieSessionOptions {
  /** @default "sessionid" */
  cookieName?: string;
}

/**
 * Session id from the handshake's cookie header, user from `lookupUser`.
 *
 * @example
 * ```typescript
 * const sessions = cookieSessionStore(async (sid) => {
 *   const row = await db.session.findUnique({ where: { id: sid } });
 *   return row?.userId ?? null;
 * });
 * ```
 */
export function cookieSessionStore(
  lookupUser: SessionStore["lookupUser"],
  options: CookieSessionOptions = {},
): SessionStore {
  const cookieName = options.cookieName ?? DEFAULTS.SESSION_COOKIE;
  return {
    sessionIdFor: (handshake) => readCookie(handshake.headers, cookieName) ?? null,
    lookupUser,
  };
}

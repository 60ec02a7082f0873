// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Route table: ordered (matcher, handler) entries.
 *
 * Precedence is registration order, last match wins: lookup scans from the
 * most recently added entry backwards and stops at the first match. Routes a
 * downstream endpoint adds therefore override the built-in ones.
 */

import { ErrorCode, SockrouteError } from "../error.js";
import type { Handler, Matcher, RouteDefinition, RouteEntry } from "./types.js";

const anchored = new WeakMap<RegExp, RegExp>();

function wholeMatch(pattern: RegExp): RegExp {
  let compiled = anchored.get(pattern);
  if (!compiled) {
    // g and y make test() stateful; m would anchor per line
    compiled = new RegExp(
      `^(?:${pattern.source})$`,
      pattern.flags.replace(/[gmy]/g, ""),
    );
    anchored.set(pattern, compiled);
  }
  return compiled;
}

/**
 * Exact equality for strings, whole-string match for patterns.
 */
export function matches(matcher: Matcher, actionType: string): boolean {
  if (typeof matcher === "string") return matcher === actionType;
  return wholeMatch(matcher).test(actionType);
}

export class RouteTable {
  private entries: RouteEntry[] = [];

  static from(routes: Iterable<RouteDefinition>): RouteTable {
    const table = new RouteTable();
    for (const [matcher, handler] of routes) table.add(matcher, handler);
    return table;
  }

  /**
   * Append a route. Throws INVALID_ROUTE for an empty string matcher or a
   * handler that is not a function.
   */
  add(matcher: Matcher, handler: Handler, name?: string): this {
    if (typeof matcher === "string" && matcher.length === 0) {
      throw SockrouteError.from(
        ErrorCode.INVALID_ROUTE,
        "Route matcher must be a non-empty string or a RegExp",
      );
    }
    if (typeof handler !== "function") {
      throw SockrouteError.from(
        ErrorCode.INVALID_ROUTE,
        `Route handler for ${String(matcher)} must be a function`,
      );
    }
    this.entries.push({
      matcher,
      handler,
      name: name ?? (handler.name || String(matcher)),
    });
    return this;
  }

  /**
   * Last-registered entry whose matcher matches the action type.
   */
  match(actionType: string): RouteEntry | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry && matches(entry.matcher, actionType)) return entry;
    }
    return undefined;
  }

  size(): number {
    return this.entries.length;
  }

  list(): readonly RouteEntry[] {
    return [...this.entries];
  }

  /**
   * Append every entry of another table, keeping its order. Merged entries
   * take precedence over existing ones.
   */
  merge(other: RouteTable): this {
    this.entries.push(...other.list());
    return this;
  }
}

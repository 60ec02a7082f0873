// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Stale-connection sweep: application-level ping → await → purge.
 *
 * Per connection there are two states. `cleanupStale` moves active
 * connections in a scope to pending (active=false) and pings them; any
 * session refresh moves a pending connection back to active; `purgeInactive`
 * deletes connections still pending after the grace window.
 *
 * This is best-effort: a live connection slower than the grace window is
 * purged and gets recreated on its next refresh.
 */

import { ACTION_TYPES, DEFAULTS } from "../constants.js";
import type { GroupAddressor } from "../group/group.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import type { ConnectionRegistry } from "../registry/registry.js";
import type { ConnectionScope } from "../registry/types.js";
import { systemClock, type Clock } from "../utils/clock.js";

export interface SweeperConfig {
  /** Pending connections older than this are purged. @default 300_000 */
  graceMs?: number;
  /** Period of the background purge started by start(). @default 60_000 */
  sweepIntervalMs?: number;
}

export interface StaleScope {
  userId?: string | null;
  path?: string;
}

export interface StaleSweepResult {
  /** Connections flipped to pending */
  flipped: number;
  /** PING frames actually delivered */
  pinged: number;
}

export interface StaleSweeperDeps {
  registry: ConnectionRegistry;
  addressor: GroupAddressor;
  logger: LoggerAdapter;
  clock?: Clock;
}

export class StaleSweeper {
  readonly graceMs: number;
  readonly sweepIntervalMs: number;
  private readonly registry: ConnectionRegistry;
  private readonly addressor: GroupAddressor;
  private readonly logger: LoggerAdapter;
  private readonly clock: Clock;
  private timer: unknown = null;
  private sweeping = false;

  constructor(deps: StaleSweeperDeps, config: SweeperConfig = {}) {
    this.registry = deps.registry;
    this.addressor = deps.addressor;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.graceMs = config.graceMs ?? DEFAULTS.GRACE_MS;
    this.sweepIntervalMs = config.sweepIntervalMs ?? DEFAULTS.SWEEP_INTERVAL_MS;
  }

  /**
   * Flip the active connections in scope to pending and send them a single
   * PING broadcast.
   */
  async cleanupStale(
    scope: StaleScope,
    options: { exclude?: readonly string[] } = {},
  ): Promise<StaleSweepResult> {
    const flipped = await this.registry.deactivate(
      toConnectionScope(scope, options.exclude),
    );
    const pinged = await this.addressor
      .fromConnections(flipped)
      .sendAction(ACTION_TYPES.PING);

    if (flipped.length > 0) {
      this.logger.debug(LOG_CONTEXT.SWEEP, "Asked stale connections to ping back", {
        scope,
        flipped: flipped.length,
        pinged,
      });
    }
    return { flipped: flipped.length, pinged };
  }

  /**
   * Delete pending connections whose last ping is older than graceMs.
   */
  async purgeInactive(
    graceMs: number = this.graceMs,
    scope: StaleScope = {},
    options: { exclude?: readonly string[] } = {},
  ): Promise<number> {
    const purged = await this.registry.purge(
      graceMs,
      toConnectionScope(scope, options.exclude),
    );
    if (purged > 0) {
      this.logger.info(LOG_CONTEXT.SWEEP, `Purged ${purged} stale connections`, {
        scope,
        graceMs,
      });
    }
    return purged;
  }

  /**
   * Run purgeInactive every sweepIntervalMs. Idempotent.
   */
  start(): void {
    if (this.timer !== null) return;
    this.timer = this.clock.setInterval(() => {
      void this.sweep();
    }, this.sweepIntervalMs);
  }

  stop(): void {
    if (this.timer === null) return;
    this.clock.clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * One background pass. Skipped while the previous pass is still running.
   */
  async sweep(): Promise<number> {
    if (this.sweeping) return 0;
    this.sweeping = true;
    try {
      return await this.purgeInactive();
    } catch (err) {
      this.logger.error(LOG_CONTEXT.SWEEP, "Background purge failed", {
        error: err,
      });
      return 0;
    } finally {
      this.sweeping = false;
    }
  }
}

function toConnectionScope(
  scope: StaleScope,
  exclude: readonly string[] | undefined,
): ConnectionScope {
  const out: ConnectionScope = {};
  if (scope.userId !== undefined) out.userId = scope.userId;
  if (scope.path !== undefined) out.path = scope.path;
  if (exclude && exclude.length > 0) out.excludeHandles = exclude;
  return out;
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Message dispatch: guard → extract action type → lookup → handler → errors.
 *
 * A non-object envelope fails fast (PROTOCOL_VIOLATION). Everything after
 * the guard is contained: handler errors go to the fault sink and dispatch
 * resolves normally.
 */

import { ACTION_TYPES, DEFAULTS } from "../constants.js";
import type { ConnectionContext } from "../context/connection-context.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import {
  assertEnvelope,
  getActionType,
  type Envelope,
} from "../protocol/envelope.js";
import { RouteTable } from "./route-table.js";
import type {
  FaultHandler,
  Handler,
  RouteDefinition,
  RouteEntry,
} from "./types.js";

export interface RouterOptions {
  routes?: RouteTable | Iterable<RouteDefinition>;
  /** Fallback for envelopes without an action type or without a matching route */
  defaultRoute?: Handler;
  /** @default "type" */
  routingKey?: string;
  logger: LoggerAdapter;
  /** Receives handler errors. Without one they are logged at error level. */
  onFault?: FaultHandler;
}

export interface Resolution {
  actionType: string | undefined;
  /** undefined → default route */
  entry: RouteEntry | undefined;
}

/**
 * Built-in default route: reply ERROR naming the unrecognized action.
 */
export function unknownActionRoute(
  routingKey: string,
  logger: LoggerAdapter,
): Handler {
  return async function defaultRoute(ctx, envelope) {
    const actionType = getActionType(envelope, routingKey) ?? "(none)";
    await ctx.sendAction(ACTION_TYPES.ERROR, {
      details: `Unknown action: ${actionType}`,
    });
    logger.error(LOG_CONTEXT.MESSAGE, "Unrecognized websocket message", {
      handle: ctx.handle,
      path: ctx.path,
      envelope,
    });
  };
}

export class Router {
  readonly routingKey: string;
  private readonly table: RouteTable;
  private readonly defaultRoute: Handler;
  private readonly logger: LoggerAdapter;
  private readonly onFault: FaultHandler | undefined;

  constructor(options: RouterOptions) {
    this.routingKey = options.routingKey ?? DEFAULTS.ROUTING_KEY;
    this.logger = options.logger;
    this.onFault = options.onFault;
    // Snapshot: the table is fixed once the router exists
    this.table =
      options.routes instanceof RouteTable
        ? new RouteTable().merge(options.routes)
        : RouteTable.from(options.routes ?? []);
    this.defaultRoute =
      options.defaultRoute ?? unknownActionRoute(this.routingKey, this.logger);
  }

  routes(): readonly RouteEntry[] {
    return this.table.list();
  }

  resolve(envelope: Envelope): Resolution {
    const actionType = getActionType(envelope, this.routingKey);
    return {
      actionType,
      entry: actionType === undefined ? undefined : this.table.match(actionType),
    };
  }

  async dispatch(ctx: ConnectionContext, envelope: unknown): Promise<void> {
    assertEnvelope(envelope);
    const { actionType, entry } = this.resolve(envelope);

    try {
      if (entry) {
        this.logger.debug(LOG_CONTEXT.MESSAGE, `<- ${actionType}`, {
          handle: ctx.handle,
          handler: entry.name,
          envelope,
        });
        await entry.handler(ctx, envelope);
        return;
      }

      this.logger.debug(
        LOG_CONTEXT.MESSAGE,
        `<- ${actionType ?? "(none)"} (unknown)`,
        { handle: ctx.handle, envelope },
      );
      await this.defaultRoute(ctx, envelope);
    } catch (err) {
      await this.reportFault(err, ctx, envelope);
    }
  }

  private async reportFault(
    err: unknown,
    ctx: ConnectionContext,
    envelope: Envelope,
  ): Promise<void> {
    if (!this.onFault) {
      this.logger.error(LOG_CONTEXT.ERROR, "Handler failed", {
        handle: ctx.handle,
        error: err,
      });
      return;
    }
    try {
      await this.onFault(err, ctx, envelope);
    } catch (sinkErr) {
      this.logger.error(LOG_CONTEXT.ERROR, "Error in fault handler", {
        handle: ctx.handle,
        error: sinkErr,
        original: err,
      });
    }
  }
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Connection lifecycle: connect, receive and disconnect orchestration.
 *
 * - onConnect records the connection (active, lastPing=now) and completes the handshake
 * - onReceive parses the frame, enforces loginRequired, dispatches through the Router
 * - onDisconnect deletes the record and reports abnormal closes
 *
 * Events of one handle run strictly in arrival order; different handles run
 * concurrently.
 */

import {
  ABNORMAL_CLOSE_CODE,
  ACTION_TYPES,
  DEFAULTS,
} from "../constants.js";
import type { ConnectionContext } from "../context/connection-context.js";
import { RouteTable } from "../core/route-table.js";
import { Router } from "../core/router.js";
import type {
  ConnectHook,
  DisconnectHook,
  Handler,
  RouteDefinition,
} from "../core/types.js";
import {
  describeError,
  ErrorCode,
  errorDetails,
  SockrouteError,
} from "../error.js";
import { GroupAddressor, type Group } from "../group/group.js";
import { createLogger, LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import {
  createAction,
  decodeEnvelope,
  getActionType,
  stampEnvelope,
  type Envelope,
} from "../protocol/envelope.js";
import { ConnectionRegistry } from "../registry/registry.js";
import type { ConnectionRecord, ConnectionScope } from "../registry/types.js";
import { anonymousSessions, type SessionStore } from "../session.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { clientAddress } from "../utils/headers.js";
import type { RawFrame } from "../utils/json.js";
import { KeyedMutex } from "../utils/mutex.js";
import {
  isAddressable,
  type CloseInfo,
  type HandshakeInfo,
  type Transport,
} from "../ws/transport.js";
import { builtinRoutes } from "./handlers.js";
import {
  StaleSweeper,
  type StaleSweepResult,
  type SweeperConfig,
} from "./sweeper.js";

export interface EndpointOptions {
  transport: Transport;
  /** Extra routes; registered after the built-ins, so they win ties */
  routes?: RouteTable | Iterable<RouteDefinition>;
  defaultRoute?: Handler;
  onConnect?: ConnectHook;
  onDisconnect?: DisconnectHook;
  /** Messages from connections without a user get RECONNECT instead of routing */
  loginRequired?: boolean;
  /** Send stack traces of handler errors back to the client */
  debug?: boolean;
  /** @default "type" */
  routingKey?: string;
  sessions?: SessionStore;
  registry?: ConnectionRegistry;
  logger?: LoggerAdapter;
  clock?: Clock;
  sweeper?: SweeperConfig;
  /** Register the HELLO and PING_RESPONSE routes. @default true */
  builtins?: boolean;
}

export type ConnectResult = "accept" | "reject";

export const RECONNECT_DETAILS =
  "No session was attached to socket, the frontend should try reconnecting.";

interface ConnectionDeps {
  registry: ConnectionRegistry;
  sessions: SessionStore;
  transport: Transport;
  logger: LoggerAdapter;
  clock: Clock;
  routingKey: string;
  sweeper: StaleSweeper;
  addressor: GroupAddressor;
}

class LiveConnection implements ConnectionContext {
  private currentUser: string | null = null;
  private current: ConnectionRecord | undefined;

  constructor(
    private readonly deps: ConnectionDeps,
    readonly handle: string,
    readonly path: string,
    readonly sessionId: string | null,
    readonly userIp: string | null,
  ) {}

  get userId(): string | null {
    return this.currentUser;
  }

  get record(): ConnectionRecord | undefined {
    return this.current;
  }

  get routingKey(): string {
    return this.deps.routingKey;
  }

  async resolveUser(): Promise<string | null> {
    this.currentUser = this.sessionId
      ? await this.deps.sessions.lookupUser(this.sessionId)
      : null;
    return this.currentUser;
  }

  async refreshSession(): Promise<ConnectionRecord> {
    await this.resolveUser();
    this.current = await this.deps.registry.refresh(this.handle, {
      path: this.path,
      userId: this.currentUser,
      sessionId: this.sessionId,
      userIp: this.userIp,
    });
    return this.current;
  }

  send(envelope: Envelope): Promise<boolean> {
    const stamped = stampEnvelope(envelope, this.deps.clock.now());
    this.deps.logger.debug(
      LOG_CONTEXT.MESSAGE,
      `-> ${String(stamped[this.deps.routingKey])}`,
      { handle: this.handle, envelope: stamped },
    );
    return this.sendRaw(JSON.stringify(stamped));
  }

  sendAction(type: string, fields?: Envelope): Promise<boolean> {
    return this.send(createAction(this.deps.routingKey, type, fields));
  }

  async sendRaw(text: string): Promise<boolean> {
    if (!isAddressable(this.handle)) return false;
    let delivered: boolean;
    try {
      delivered = await this.deps.transport.send(this.handle, text);
    } catch (err) {
      this.deps.logger.warn(LOG_CONTEXT.DELIVERY, "Send failed", {
        handle: this.handle,
        error: err,
      });
      return false;
    }
    if (!delivered) {
      this.deps.logger.warn(LOG_CONTEXT.DELIVERY, "Send refused", {
        handle: this.handle,
      });
    }
    return delivered;
  }

  async cleanupStale(): Promise<StaleSweepResult | null> {
    // Pinging every anonymous connection on a page would storm the whole page
    if (!this.currentUser) return null;
    const scope = { userId: this.currentUser, path: this.path };
    const exclude = [this.handle];
    const result = await this.deps.sweeper.cleanupStale(scope, { exclude });
    await this.deps.sweeper.purgeInactive(undefined, scope, { exclude });
    return result;
  }

  async group(scope: ConnectionScope = { path: this.path }): Promise<Group> {
    const members = await this.deps.registry.find(scope);
    return this.deps.addressor.fromConnections(members);
  }

  async broadcastAction(
    type: string,
    fields?: Envelope,
    scope?: ConnectionScope,
  ): Promise<number> {
    const group = await this.group(scope);
    return group.sendAction(type, fields);
  }

  identity(): Record<string, unknown> {
    return identityOf(this);
  }
}

function identityOf(ctx: ConnectionContext): Record<string, unknown> {
  return {
    connectionId: ctx.record?.id ?? null,
    handle: ctx.handle,
    path: ctx.path,
    userId: ctx.userId,
    sessionId: ctx.sessionId,
    userIp: ctx.userIp,
  };
}

export class ConnectionLifecycle {
  readonly router: Router;
  readonly registry: ConnectionRegistry;
  readonly addressor: GroupAddressor;
  readonly sweeper: StaleSweeper;
  readonly logger: LoggerAdapter;
  readonly routingKey: string;

  private readonly transport: Transport;
  private readonly sessions: SessionStore;
  private readonly clock: Clock;
  private readonly connectHook: ConnectHook | undefined;
  private readonly disconnectHook: DisconnectHook | undefined;
  private readonly loginRequired: boolean;
  private readonly debug: boolean;
  private readonly deps: ConnectionDeps;
  private readonly connections = new Map<string, LiveConnection>();
  private readonly queue = new KeyedMutex();

  constructor(options: EndpointOptions) {
    this.transport = options.transport;
    this.sessions = options.sessions ?? anonymousSessions;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger({ minLevel: "info" });
    this.routingKey = options.routingKey ?? DEFAULTS.ROUTING_KEY;
    this.connectHook = options.onConnect;
    this.disconnectHook = options.onDisconnect;
    this.loginRequired = options.loginRequired ?? false;
    this.debug = options.debug ?? false;
    this.registry =
      options.registry ?? new ConnectionRegistry({ clock: this.clock });
    this.addressor = new GroupAddressor({
      transport: this.transport,
      logger: this.logger,
      clock: this.clock,
      routingKey: this.routingKey,
    });
    this.sweeper = new StaleSweeper(
      {
        registry: this.registry,
        addressor: this.addressor,
        logger: this.logger,
        clock: this.clock,
      },
      options.sweeper,
    );

    const table = new RouteTable();
    if (options.builtins !== false) table.merge(RouteTable.from(builtinRoutes()));
    if (options.routes instanceof RouteTable) {
      table.merge(options.routes);
    } else if (options.routes) {
      table.merge(RouteTable.from(options.routes));
    }

    this.router = new Router({
      routes: table,
      routingKey: this.routingKey,
      logger: this.logger,
      ...(options.defaultRoute && { defaultRoute: options.defaultRoute }),
      onFault: (err, ctx, envelope) =>
        this.handleFault(
          err,
          ctx,
          getActionType(envelope, this.routingKey) ?? "(none)",
        ),
    });

    this.deps = {
      registry: this.registry,
      sessions: this.sessions,
      transport: this.transport,
      logger: this.logger,
      clock: this.clock,
      routingKey: this.routingKey,
      sweeper: this.sweeper,
      addressor: this.addressor,
    };
  }

  /**
   * Register the connection and complete the handshake.
   *
   * Resolves "reject" without completing the handshake when the connection
   * cannot be recorded. Pass `{ initialize: false }` only from tests that
   * drive the handshake themselves.
   */
  onConnect(
    handshake: HandshakeInfo,
    options: { initialize?: boolean } = {},
  ): Promise<ConnectResult> {
    const { handle, path } = handshake;
    return this.queue.run(handle, async () => {
      let conn: LiveConnection;
      try {
        const sessionId = await this.sessions.sessionIdFor(handshake);
        conn = new LiveConnection(
          this.deps,
          handle,
          path,
          sessionId,
          clientAddress(handshake.headers, handshake.peerAddress),
        );
        await conn.refreshSession();
      } catch (err) {
        this.logger.error(LOG_CONTEXT.CONNECTION, "Could not register connection", {
          handle,
          path,
          error: err,
        });
        return "reject";
      }

      this.connections.set(handle, conn);
      if (options.initialize !== false) {
        try {
          await this.transport.acceptHandshake(handle);
        } catch (err) {
          this.connections.delete(handle);
          await this.registry.remove(handle);
          this.logger.error(LOG_CONTEXT.CONNECTION, "Handshake failed", {
            ...conn.identity(),
            error: err,
          });
          return "reject";
        }
      }

      this.logger.info(LOG_CONTEXT.CONNECTION, "Connected", conn.identity());
      if (this.connectHook) {
        try {
          await this.connectHook(conn);
        } catch (err) {
          await this.handleFault(err, conn, "connect hook");
        }
      }
      return "accept";
    });
  }

  /**
   * Parse and route one inbound frame.
   *
   * Rejects with PROTOCOL_VIOLATION for malformed frames and NOT_CONNECTED
   * for handles that are not open. Handler errors never reject.
   */
  onReceive(handle: string, raw: RawFrame): Promise<void> {
    return this.queue.run(handle, async () => {
      const conn = this.connections.get(handle);
      if (!conn) {
        throw SockrouteError.from(
          ErrorCode.NOT_CONNECTED,
          `No open connection for handle "${handle}"`,
          { handle },
        );
      }
      const envelope = decodeEnvelope(raw);

      const userId = await conn.resolveUser();
      if (this.loginRequired && !userId) {
        // Happens when the session store was wiped under a live socket
        await conn.sendAction(ACTION_TYPES.RECONNECT, {
          details: RECONNECT_DETAILS,
        });
        return;
      }

      await this.router.dispatch(conn, envelope);
    });
  }

  /**
   * Delete the connection record. A second call for the same handle is a no-op.
   */
  onDisconnect(handle: string, close: CloseInfo): Promise<void> {
    return this.queue.run(handle, async () => {
      const conn = this.connections.get(handle);
      if (!conn) return;
      this.connections.delete(handle);

      try {
        await conn.resolveUser();
      } catch (err) {
        this.logger.warn(LOG_CONTEXT.CONNECTION, "Session lookup failed on close", {
          handle,
          error: err,
        });
      }
      const removed = await this.removeRecord(conn);

      if (close.code === ABNORMAL_CLOSE_CODE) {
        this.reportAbnormalClose(conn, close, removed);
      }
      this.logger.info(LOG_CONTEXT.CONNECTION, "Disconnected", {
        ...conn.identity(),
        code: close.code,
      });

      if (this.disconnectHook) {
        try {
          await this.disconnectHook(conn, close);
        } catch (err) {
          this.logger.error(LOG_CONTEXT.ERROR, "Error in disconnect hook", {
            ...conn.identity(),
            error: err,
          });
        }
      }
    });
  }

  /**
   * Delete a closed connection's record. When the store refuses, leave the
   * record pending so the background purge reaps it after the grace window.
   */
  private async removeRecord(
    conn: LiveConnection,
  ): Promise<ConnectionRecord | undefined> {
    try {
      return await this.registry.remove(conn.handle);
    } catch (err) {
      this.logger.error(LOG_CONTEXT.CONNECTION, "Could not delete connection record", {
        ...conn.identity(),
        error: err,
      });
    }
    try {
      await this.registry.update(conn.handle, { active: false });
    } catch (err) {
      this.logger.error(LOG_CONTEXT.CONNECTION, "Could not mark connection pending", {
        ...conn.identity(),
        error: err,
      });
    }
    return conn.record;
  }

  connection(handle: string): ConnectionContext | undefined {
    return this.connections.get(handle);
  }

  get size(): number {
    return this.connections.size;
  }

  /**
   * Group of registry connections in scope.
   */
  async group(scope: ConnectionScope = {}): Promise<Group> {
    return this.addressor.fromConnections(await this.registry.find(scope));
  }

  /** Start the background purge of unconfirmed connections. */
  start(): void {
    this.sweeper.start();
  }

  stop(): void {
    this.sweeper.stop();
  }

  private async handleFault(
    err: unknown,
    ctx: ConnectionContext,
    source: string,
  ): Promise<void> {
    try {
      await ctx.refreshSession();
    } catch (refreshErr) {
      this.logger.warn(LOG_CONTEXT.ERROR, "Session refresh failed", {
        handle: ctx.handle,
        error: refreshErr,
      });
    }

    if (this.debug) {
      await ctx.sendAction(ACTION_TYPES.ERROR, {
        success: false,
        errors: [describeError(err)],
        details: errorDetails(err),
      });
    }

    this.logger.error(LOG_CONTEXT.ERROR, `Handler failed: ${source}`, {
      error: err instanceof Error ? err : SockrouteError.wrap(err),
      user: identityOf(ctx),
    });
  }

  private reportAbnormalClose(
    conn: LiveConnection,
    close: CloseInfo,
    removed: ConnectionRecord | undefined,
  ): void {
    const details = {
      code: close.code,
      reason: close.reason ?? null,
      path: conn.path,
      handle: conn.handle,
      lastPing: removed?.lastPing ?? null,
      userId: conn.userId,
      userIp: removed?.userIp ?? conn.userIp,
    };
    const message = "Closed websocket due to overloaded server";

    if (this.debug) {
      this.logger.warn(LOG_CONTEXT.CONNECTION, message, details);
    } else if (conn.userId) {
      // Dropping a signed-in user's socket is much worse than a spectator's
      this.logger.error(LOG_CONTEXT.CONNECTION, message, details);
    } else {
      this.logger.debug(LOG_CONTEXT.CONNECTION, message, details);
    }
  }
}


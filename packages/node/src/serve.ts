// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { createServer, type IncomingMessage, type Server } from "node:http";
import type { Duplex } from "node:stream";
import {
  createLogger,
  LOG_CONTEXT,
  matches,
  type LoggerAdapter,
} from "@sockroute/core";
import { WebSocketServer } from "ws";
import { handleUpgrade, refuseUpgrade, requestPath } from "./handler.js";
import type { WsTransport } from "./transport.js";
import type { EndpointBinding } from "./types.js";

/** 1001: the server is going away */
const CLOSE_GOING_AWAY = 1001;

export interface AttachOptions {
  transport: WsTransport;
  endpoints: readonly EndpointBinding[];
  logger?: LoggerAdapter;
  /** Largest accepted frame. @default 1 MiB */
  maxPayloadBytes?: number;
}

export interface AttachedEndpoints {
  readonly wss: WebSocketServer;
  /** Stop accepting upgrades and close every open socket with 1001. */
  close(): Promise<void>;
}

/**
 * Serve endpoints on an existing HTTP server's upgrade requests.
 *
 * Requests whose path matches no endpoint get 404. The first binding whose
 * path matches wins.
 *
 * @example
 * ```typescript
 * const transport = new WsTransport();
 * const table = createEndpoint({ transport, routes });
 * attachEndpoints(server, {
 *   transport,
 *   endpoints: [{ path: /\/table\/\d+/, endpoint: table }],
 * });
 * ```
 */
export function attachEndpoints(
  server: Server,
  options: AttachOptions,
): AttachedEndpoints {
  const { transport, endpoints } = options;
  const logger = options.logger ?? createLogger({ minLevel: "info" });
  const wss = new WebSocketServer({
    noServer: true,
    maxPayload: options.maxPayloadBytes ?? 1024 * 1024,
  });

  const onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const path = requestPath(request);
    const binding = endpoints.find((candidate) => matches(candidate.path, path));
    if (!binding) {
      logger.debug(LOG_CONTEXT.CONNECTION, "No endpoint for path", { path });
      refuseUpgrade(socket, 404, "Not Found");
      return;
    }
    void handleUpgrade({
      endpoint: binding.endpoint,
      transport,
      logger,
      request,
      socket,
      head,
      upgrade: (req, sock, data, done) => {
        wss.handleUpgrade(req, sock, data, (ws) => done(ws));
      },
    });
  };
  server.on("upgrade", onUpgrade);

  return {
    wss,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.off("upgrade", onUpgrade);
        for (const handle of transport.handles()) {
          transport.close(handle, CLOSE_GOING_AWAY, "Server shutting down");
        }
        wss.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export interface ServeOptions extends AttachOptions {
  /** @default 8000 */
  port?: number;
  /** @default "0.0.0.0" */
  host?: string;
}

export interface RunningServer extends AttachedEndpoints {
  readonly server: Server;
}

/**
 * Start an HTTP server that only serves websocket endpoints, and start each
 * endpoint's stale-connection sweep.
 *
 * Plain HTTP requests get 426 Upgrade Required.
 */
export async function serve(options: ServeOptions): Promise<RunningServer> {
  const logger = options.logger ?? createLogger({ minLevel: "info" });
  const server = createServer((_req, res) => {
    res.writeHead(426, { "Content-Type": "text/plain" });
    res.end("Upgrade Required");
  });
  const attached = attachEndpoints(server, { ...options, logger });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port ?? 8000, options.host ?? "0.0.0.0", () => {
      server.off("error", reject);
      resolve();
    });
  });
  for (const { endpoint } of options.endpoints) endpoint.start();
  logger.info(LOG_CONTEXT.CONNECTION, "Listening", {
    port: options.port ?? 8000,
    host: options.host ?? "0.0.0.0",
  });

  return {
    server,
    wss: attached.wss,
    close: async () => {
      for (const { endpoint } of options.endpoints) endpoint.stop();
      await attached.close();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}

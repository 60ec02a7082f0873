// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { randomUUID } from "node:crypto";
import {
  createLogger,
  ErrorCode,
  isSockrouteError,
  LOG_CONTEXT,
  SockrouteError,
  type ConnectionLifecycle,
  type LoggerAdapter,
} from "@sockroute/core";
import type { WsTransport } from "./transport.js";
import type {
  RequestLike,
  SocketLike,
  Upgrader,
  UpgradeSocket,
} from "./types.js";

/** 1007: the frame's data does not fit the protocol */
export const CLOSE_INVALID_PAYLOAD = 1007;
/** 1011: the server hit an unexpected condition */
export const CLOSE_INTERNAL_ERROR = 1011;

const defaultLogger = createLogger({ minLevel: "info" });

/**
 * Path of an upgrade request, without the query string.
 */
export function requestPath(request: RequestLike): string {
  return new URL(request.url ?? "/", "http://localhost").pathname;
}

/**
 * Refuse a pending upgrade with a bare HTTP response.
 */
export function refuseUpgrade(
  socket: UpgradeSocket,
  status: number,
  text: string,
): void {
  socket.write(`HTTP/1.1 ${status} ${text}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

/**
 * Forward a socket's events to the endpoint.
 *
 * A frame that is not a JSON object closes the socket with 1007. Any other
 * failure to process a frame is logged and the socket stays open.
 */
export function bindSocket(
  socket: SocketLike,
  handle: string,
  endpoint: ConnectionLifecycle,
  transport: WsTransport,
  logger: LoggerAdapter = defaultLogger,
): void {
  socket.on("message", (data) => {
    endpoint.onReceive(handle, data).catch((err: unknown) => {
      if (isSockrouteError(err, ErrorCode.PROTOCOL_VIOLATION)) {
        logger.warn(LOG_CONTEXT.MESSAGE, "Closing socket after protocol violation", {
          handle,
          error: err.message,
        });
        socket.close(CLOSE_INVALID_PAYLOAD, "Invalid message");
        return;
      }
      logger.error(LOG_CONTEXT.MESSAGE, "Message handling failed", {
        handle,
        error: err,
      });
    });
  });

  socket.on("close", (code, reason) => {
    transport.detach(handle);
    const text = reason.toString("utf8");
    endpoint
      .onDisconnect(handle, { code, ...(text.length > 0 && { reason: text }) })
      .catch((err: unknown) => {
        logger.error(LOG_CONTEXT.CONNECTION, "Disconnect handling failed", {
          handle,
          error: err,
        });
      });
  });

  socket.on("error", (err) => {
    logger.warn(LOG_CONTEXT.CONNECTION, "Socket error", { handle, error: err });
  });
}

export interface UpgradeRequest<Req extends RequestLike, Sock extends UpgradeSocket> {
  endpoint: ConnectionLifecycle;
  transport: WsTransport;
  upgrade: Upgrader<Req, Sock>;
  request: Req;
  socket: Sock;
  head: Buffer;
  logger?: LoggerAdapter;
}

/**
 * Run the endpoint's connect step for one upgrade request.
 *
 * The HTTP upgrade is completed only when the endpoint accepts the
 * connection; a rejected connection gets 503 instead. Never rejects.
 *
 * @returns the new handle, or null when the connection was refused
 */
export async function handleUpgrade<
  Req extends RequestLike,
  Sock extends UpgradeSocket,
>(options: UpgradeRequest<Req, Sock>): Promise<string | null> {
  const { endpoint, transport, request, socket, head } = options;
  const logger = options.logger ?? defaultLogger;
  const handle = randomUUID();

  // Nothing else listens on the raw socket until ws takes it over
  const onSocketError = (err: Error) => {
    logger.warn(LOG_CONTEXT.CONNECTION, "Socket error during upgrade", {
      handle,
      error: err,
    });
  };
  socket.on("error", onSocketError);

  transport.expect(
    handle,
    () =>
      new Promise<void>((resolve, reject) => {
        // ws aborts a bad handshake itself and never calls back
        const onGone = () => {
          reject(
            SockrouteError.from(
              ErrorCode.DELIVERY_FAILED,
              "Socket closed during upgrade",
              { handle },
            ),
          );
        };
        socket.off("error", onSocketError);
        if (socket.destroyed) {
          onGone();
          return;
        }
        socket.once("close", onGone);
        options.upgrade(request, socket, head, (ws) => {
          socket.off("close", onGone);
          transport.attach(handle, ws);
          bindSocket(ws, handle, endpoint, transport, logger);
          resolve();
        });
      }),
  );

  try {
    const result = await endpoint.onConnect({
      handle,
      path: requestPath(request),
      headers: request.headers,
      peerAddress: request.socket.remoteAddress ?? null,
    });
    if (result === "accept") return handle;
  } catch (err) {
    logger.error(LOG_CONTEXT.CONNECTION, "Connect failed", { handle, error: err });
  }

  const opened = transport.socket(handle);
  transport.detach(handle);
  if (opened) {
    opened.close(CLOSE_INTERNAL_ERROR, "Connection refused");
  } else {
    refuseUpgrade(socket, 503, "Service Unavailable");
    socket.off("error", onSocketError);
  }
  return null;
}

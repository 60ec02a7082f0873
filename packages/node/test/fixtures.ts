// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { EventEmitter } from "node:events";
import type { IncomingHttpHeaders } from "node:http";
import { WebSocket } from "ws";
import type { RequestLike, SocketLike, UpgradeSocket } from "../src/types.js";

/**
 * Open websocket stand-in. close() emits "close" the way ws does once the
 * closing handshake finishes.
 */
export class FakeSocket extends EventEmitter implements SocketLike {
  readyState: number = WebSocket.OPEN;
  readonly sent: string[] = [];
  closedWith: { code: number | undefined; reason: string | undefined } | null = null;
  /** Next send reports this error to its callback */
  failNextSend: Error | null = null;

  send(data: string, cb?: (err?: Error) => void): void {
    const err = this.failNextSend;
    this.failNextSend = null;
    if (err) {
      cb?.(err);
      return;
    }
    this.sent.push(data);
    cb?.();
  }

  close(code?: number, reason?: string): void {
    if (this.closedWith) return;
    this.closedWith = { code, reason };
    this.readyState = WebSocket.CLOSED;
    this.emit("close", code ?? 1005, Buffer.from(reason ?? ""));
  }

  receive(text: string): void {
    this.emit("message", Buffer.from(text), false);
  }

  frames(): Record<string, unknown>[] {
    return this.sent.map((text): Record<string, unknown> => JSON.parse(text));
  }
}

/**
 * TCP socket of a pending upgrade.
 */
export class FakeUpgradeSocket extends EventEmitter implements UpgradeSocket {
  readonly written: string[] = [];
  destroyed = false;

  write(chunk: string): boolean {
    this.written.push(chunk);
    return true;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.emit("close");
  }
}

export function fakeRequest(
  url: string,
  headers: IncomingHttpHeaders = {},
  remoteAddress = "127.0.0.1",
): RequestLike {
  return { url, headers, socket: { remoteAddress } };
}

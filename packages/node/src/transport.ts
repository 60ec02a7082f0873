// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Transport } from "@sockroute/core";
import { WebSocket } from "ws";
import type { SocketLike } from "./types.js";

/**
 * Transport over ws sockets, addressed by handle.
 *
 * A handle is first registered with the upgrade that will open it; the
 * endpoint's `acceptHandshake` runs that upgrade, after which the socket
 * can receive frames. Several endpoints may share one transport.
 */
export class WsTransport implements Transport {
  private readonly sockets = new Map<string, SocketLike>();
  private readonly pending = new Map<string, () => Promise<void>>();

  /**
   * Register the upgrade that opens a handle once the endpoint accepts it.
   */
  expect(handle: string, accept: () => Promise<void>): void {
    this.pending.set(handle, accept);
  }

  async acceptHandshake(handle: string): Promise<void> {
    const accept = this.pending.get(handle);
    if (!accept) return;
    this.pending.delete(handle);
    await accept();
  }

  attach(handle: string, socket: SocketLike): void {
    this.sockets.set(handle, socket);
  }

  /**
   * Forget a handle, pending or open.
   */
  detach(handle: string): void {
    this.pending.delete(handle);
    this.sockets.delete(handle);
  }

  socket(handle: string): SocketLike | undefined {
    return this.sockets.get(handle);
  }

  send(handle: string, data: string): Promise<boolean> {
    const socket = this.sockets.get(handle);
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.resolve(false);
    }
    return new Promise((resolve) => {
      socket.send(data, (err) => resolve(!err));
    });
  }

  close(handle: string, code?: number, reason?: string): boolean {
    const socket = this.sockets.get(handle);
    if (!socket) return false;
    socket.close(code, reason);
    return true;
  }

  /** Handles with an open socket */
  handles(): string[] {
    return Array.from(this.sockets.keys());
  }

  get size(): number {
    return this.sockets.size;
  }
}

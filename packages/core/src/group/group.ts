// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Group addressing: fan one envelope out to a snapshot of connections.
 *
 * A group is derived, never stored. Its id is a digest of the member handles,
 * so the same membership always yields the same id regardless of order.
 */

import { DEFAULTS } from "../constants.js";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger.js";
import {
  createAction,
  stampEnvelope,
  type Envelope,
} from "../protocol/envelope.js";
import type { ConnectionRecord } from "../registry/types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { hashHandles } from "../utils/ids.js";
import { isAddressable, type Transport } from "../ws/transport.js";

export interface Group {
  readonly id: string;
  /** true only for the empty-set sentinel */
  readonly empty: boolean;
  readonly members: readonly ConnectionRecord[];
  /**
   * Stamp one TIMESTAMP, serialize once, deliver to every addressable member.
   * Resolves with the number of successful deliveries.
   */
  broadcast(envelope: Envelope): Promise<number>;
  sendAction(type: string, fields?: Envelope): Promise<number>;
  /** Deliver pre-serialized text as-is. */
  broadcastRaw(text: string): Promise<number>;
}

/**
 * Sentinel for an empty membership. Accepts every send and drops it; it never
 * addresses a real group (an empty name would collide across callers).
 */
export const EMPTY_GROUP: Group = Object.freeze({
  id: "",
  empty: true,
  members: Object.freeze([]),
  broadcast: async () => 0,
  sendAction: async () => 0,
  broadcastRaw: async () => 0,
});

export interface GroupAddressorOptions {
  transport: Transport;
  logger: LoggerAdapter;
  clock?: Clock;
  routingKey?: string;
}

export class GroupAddressor {
  private readonly transport: Transport;
  private readonly logger: LoggerAdapter;
  private readonly clock: Clock;
  private readonly routingKey: string;

  constructor(options: GroupAddressorOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.routingKey = options.routingKey ?? DEFAULTS.ROUTING_KEY;
  }

  fromConnections(connections: Iterable<ConnectionRecord>): Group {
    const byHandle = new Map<string, ConnectionRecord>();
    for (const record of connections) byHandle.set(record.handle, record);
    if (byHandle.size === 0) return EMPTY_GROUP;

    const members = Object.freeze(Array.from(byHandle.values()));
    const id = hashHandles(byHandle.keys());

    const broadcastRaw = (text: string): Promise<number> =>
      this.deliver(id, members, text);

    const broadcast = (envelope: Envelope): Promise<number> => {
      const stamped = stampEnvelope(envelope, this.clock.now());
      this.logger.debug(
        LOG_CONTEXT.MESSAGE,
        `-> ${String(stamped[this.routingKey])}`,
        { group: id, members: members.length, envelope: stamped },
      );
      return broadcastRaw(JSON.stringify(stamped));
    };

    return {
      id,
      empty: false,
      members,
      broadcast,
      sendAction: (type, fields) =>
        broadcast(createAction(this.routingKey, type, fields)),
      broadcastRaw,
    };
  }

  private async deliver(
    groupId: string,
    members: readonly ConnectionRecord[],
    text: string,
  ): Promise<number> {
    const targets = members.filter((member) => isAddressable(member.handle));

    // Membership is a snapshot: a socket that closed since then fails alone
    const results = await Promise.allSettled(
      targets.map((member) =>
        Promise.resolve().then(() => this.transport.send(member.handle, text)),
      ),
    );

    let delivered = 0;
    results.forEach((result, index) => {
      if (result.status === "fulfilled" && result.value) {
        delivered++;
        return;
      }
      this.logger.warn(LOG_CONTEXT.DELIVERY, "Group send failed", {
        group: groupId,
        handle: targets[index]?.handle,
        error: result.status === "rejected" ? result.reason : "refused",
      });
    });
    return delivered;
  }
}

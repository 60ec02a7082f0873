/**
 * ID generation: connection ids, group ids.
 */

import { createHash, randomBytes } from "node:crypto";

export function generateConnectionId(): string {
  return `conn_${randomBytes(8).toString("hex")}`;
}

/**
 * Order-independent digest of a set of handle names.
 */
export function hashHandles(handles: Iterable<string>): string {
  const sorted = Array.from(new Set(handles)).sort();
  return createHash("md5").update(sorted.join("\0"), "utf8").digest("hex");
}

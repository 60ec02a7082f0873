// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Clock interface: abstracts setInterval and Date.now() so the sweeper and
 * timestamps can run on a fake clock in tests.
 */
export interface Clock {
  setInterval(fn: () => void, ms: number): unknown;
  clearInterval(id: unknown): void;
  /** Current time in milliseconds since epoch */
  now(): number;
}

function isIntervalHandle(id: unknown): id is ReturnType<typeof setInterval> {
  return typeof id === "object" && id !== null;
}

/**
 * Passthrough to native timers.
 */
export const systemClock: Clock = {
  setInterval(fn, ms) {
    const timer = setInterval(fn, ms);
    // Never keep the process alive just for housekeeping
    timer.unref();
    return timer;
  },
  clearInterval(id) {
    if (isIntervalHandle(id)) clearInterval(id);
  },
  now: () => Date.now(),
};

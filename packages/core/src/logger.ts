// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Logger adapter interface for structured logging in websocket endpoints.
 *
 * Applications plug in their own sink (Winston, Pino, a log shipper) by
 * implementing four level methods. Every component receives the adapter at
 * construction time; nothing logs through a global.
 *
 * @example
 * ```typescript
 * import { createEndpoint, createLogger } from "@sockroute/core";
 *
 * const endpoint = createEndpoint({
 *   transport,
 *   logger: createLogger({ minLevel: "info" }),
 * });
 * ```
 */
export interface LoggerAdapter {
  /**
   * @param context - Category or source of the log (see LOG_CONTEXT)
   * @param message - Log message
   * @param data - Optional structured data
   */
  debug(context: string, message: string, data?: unknown): void;
  info(context: string, message: string, data?: unknown): void;
  warn(context: string, message: string, data?: unknown): void;
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Default logger adapter that uses console methods
 */
export class DefaultLoggerAdapter implements LoggerAdapter {
  debug(context: string, message: string, data?: unknown): void {
    console.debug(`[${context}] ${message}`, data);
  }

  info(context: string, message: string, data?: unknown): void {
    console.info(`[${context}] ${message}`, data);
  }

  warn(context: string, message: string, data?: unknown): void {
    console.warn(`[${context}] ${message}`, data);
  }

  error(context: string, message: string, data?: unknown): void {
    console.error(`[${context}] ${message}`, data);
  }
}

export interface LoggerOptions {
  /**
   * Custom log function. When omitted, entries go to the console.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum log level to output (default: "debug")
   */
  minLevel?: LogLevel;
}

/**
 * Create a logger adapter with level filtering and an optional custom sink
 */
export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LEVELS[options.minLevel ?? "debug"];
  const fallback = new DefaultLoggerAdapter();

  const emit = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void => {
    if (LEVELS[level] < minLevelValue) return;
    if (options.log) {
      options.log(level, context, message, data);
    } else {
      fallback[level](context, message, data);
    }
  };

  return {
    debug: (context, message, data) => emit("debug", context, message, data),
    info: (context, message, data) => emit("info", context, message, data),
    warn: (context, message, data) => emit("warn", context, message, data),
    error: (context, message, data) => emit("error", context, message, data),
  };
}

/**
 * Log context constants. Applications can use these to filter or categorize logs.
 */
export const LOG_CONTEXT = {
  CONNECTION: "connection",
  MESSAGE: "message",
  SWEEP: "sweep",
  DELIVERY: "delivery",
  ERROR: "error",
} as const;

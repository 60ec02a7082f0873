// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Process configuration from SOCKROUTE_* environment variables.
 */

import {
  createLogger,
  DEFAULTS,
  ErrorCode,
  SockrouteError,
  type EndpointOptions,
} from "@sockroute/core";
import { z } from "zod";

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const ConfigSchema = z.object({
  SOCKROUTE_HOST: z.string().min(1).default("0.0.0.0"),
  SOCKROUTE_PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  SOCKROUTE_DEBUG: flag,
  SOCKROUTE_LOGIN_REQUIRED: flag,
  SOCKROUTE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  SOCKROUTE_ROUTING_KEY: z.string().min(1).default(DEFAULTS.ROUTING_KEY),
  SOCKROUTE_SESSION_COOKIE: z.string().min(1).default(DEFAULTS.SESSION_COOKIE),
  SOCKROUTE_GRACE_MS: positiveInt(DEFAULTS.GRACE_MS),
  SOCKROUTE_SWEEP_INTERVAL_MS: positiveInt(DEFAULTS.SWEEP_INTERVAL_MS),
  SOCKROUTE_MAX_PAYLOAD_BYTES: positiveInt(1024 * 1024),
});

export interface NodeConfig {
  host: string;
  port: number;
  debug: boolean;
  loginRequired: boolean;
  logLevel: "debug" | "info" | "warn" | "error";
  routingKey: string;
  sessionCookie: string;
  graceMs: number;
  sweepIntervalMs: number;
  maxPayloadBytes: number;
}

/**
 * Read and validate configuration. Unset variables take their defaults;
 * empty strings count as unset.
 *
 * @throws SockrouteError INVALID_CONFIG listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): NodeConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith("SOCKROUTE_") && value !== undefined && value !== "") {
      present[key] = value;
    }
  }

  const result = ConfigSchema.safeParse(present);
  if (!result.success) {
    throw SockrouteError.from(
      ErrorCode.INVALID_CONFIG,
      `Invalid configuration:\n${z.prettifyError(result.error)}`,
      { variables: result.error.issues.map((issue) => issue.path.join(".")) },
    );
  }

  const c = result.data;
  return {
    host: c.SOCKROUTE_HOST,
    port: c.SOCKROUTE_PORT,
    debug: c.SOCKROUTE_DEBUG,
    loginRequired: c.SOCKROUTE_LOGIN_REQUIRED,
    logLevel: c.SOCKROUTE_LOG_LEVEL,
    routingKey: c.SOCKROUTE_ROUTING_KEY,
    sessionCookie: c.SOCKROUTE_SESSION_COOKIE,
    graceMs: c.SOCKROUTE_GRACE_MS,
    sweepIntervalMs: c.SOCKROUTE_SWEEP_INTERVAL_MS,
    maxPayloadBytes: c.SOCKROUTE_MAX_PAYLOAD_BYTES,
  };
}

/**
 * Endpoint options that follow from the process configuration.
 */
export function endpointOptionsFrom(
  config: NodeConfig,
): Pick<EndpointOptions, "debug" | "loginRequired" | "routingKey" | "logger" | "sweeper"> {
  return {
    debug: config.debug,
    loginRequired: config.loginRequired,
    routingKey: config.routingKey,
    logger: createLogger({ minLevel: config.logLevel }),
    sweeper: { graceMs: config.graceMs, sweepIntervalMs: config.sweepIntervalMs },
  };
}

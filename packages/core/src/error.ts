// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Error codes raised by the routing layer.
 *
 * Fatal to the call that triggered them:
 * - PROTOCOL_VIOLATION: inbound payload is not JSON or not an object
 * - NOT_CONNECTED: message or send for a handle that was never connected (or already closed)
 * - INVALID_ROUTE: route table entry with an unusable matcher or handler
 * - INVALID_CONFIG: process configuration failed validation
 *
 * Contained (logged, never propagated out of dispatch or broadcast):
 * - HANDLER_FAULT: a route handler threw something that is not an Error
 * - DELIVERY_FAILED: the transport refused a single send
 */
export enum ErrorCode {
  PROTOCOL_VIOLATION = "PROTOCOL_VIOLATION",
  NOT_CONNECTED = "NOT_CONNECTED",
  INVALID_ROUTE = "INVALID_ROUTE",
  INVALID_CONFIG = "INVALID_CONFIG",
  HANDLER_FAULT = "HANDLER_FAULT",
  DELIVERY_FAILED = "DELIVERY_FAILED",
}

/**
 * Standard codes plus custom string literals. The `(string & {})` arm keeps
 * literal inference for application codes.
 */
export type ExtErrorCode = ErrorCode | (string & {});

/**
 * SockrouteError: structured error with a machine-readable code.
 *
 * Follows the WHATWG `cause` convention so wrapped errors keep their origin.
 *
 * @example
 * throw SockrouteError.from(ErrorCode.PROTOCOL_VIOLATION, "Expected an object", {
 *   received: "array",
 * });
 *
 * @example
 * try {
 *   await handler(ctx, envelope);
 * } catch (err) {
 *   logger.error("error", "handler failed", SockrouteError.wrap(err));
 * }
 */
export class SockrouteError<C extends string = ExtErrorCode> extends Error {
  readonly code: C;

  /** Additional details safe to log */
  readonly details: Record<string, unknown>;

  override readonly cause: unknown;

  constructor(
    code: C,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = "SockrouteError";
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SockrouteError);
    }
  }

  static from<C extends string>(
    code: C,
    message: string,
    details?: Record<string, unknown>,
  ): SockrouteError<C> {
    return new SockrouteError(code, message, details);
  }

  /**
   * Wrap any thrown value. Existing SockrouteErrors are returned unchanged.
   */
  static wrap(
    err: unknown,
    code: ExtErrorCode = ErrorCode.HANDLER_FAULT,
    message?: string,
  ): SockrouteError {
    if (err instanceof SockrouteError) return err;
    const text =
      message ?? (err instanceof Error ? err.message : String(err));
    return new SockrouteError(code, text, {}, err);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isSockrouteError<C extends string>(
  err: unknown,
  code?: C,
): err is SockrouteError<C> {
  return (
    err instanceof SockrouteError && (code === undefined || err.code === code)
  );
}

/**
 * Short representation of a thrown value, e.g. `TypeError('x is undefined')`.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}(${JSON.stringify(err.message)})`;
  }
  return String(err);
}

/**
 * Stack trace when available, otherwise the message.
 */
export function errorDetails(err: unknown): string {
  if (err instanceof Error) return err.stack ?? err.message;
  return String(err);
}

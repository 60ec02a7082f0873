// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { ACTION_TYPES, type ConnectionContext, type Handler } from "@sockroute/core";
import { z } from "zod";

/**
 * One line per issue: `path.to.field: message`, or just the message for
 * issues about the whole envelope.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.map(String).join(".")}: ${issue.message}`
      : issue.message,
  );
}

/**
 * Wrap a handler so it receives the parsed envelope.
 *
 * Envelopes that fail validation never reach the handler; the sender gets
 * `ERROR { success: false, errors, details }` instead.
 */
export function validated<S extends z.ZodType>(
  schema: S,
  handler: (ctx: ConnectionContext, message: z.output<S>) => void | Promise<void>,
): Handler {
  const name = handler.name || "handler";

  const wrapped: Handler = async (ctx, envelope) => {
    const result = schema.safeParse(envelope);
    if (!result.success) {
      await ctx.sendAction(ACTION_TYPES.ERROR, {
        success: false,
        errors: formatIssues(result.error),
        details: z.prettifyError(result.error),
      });
      return;
    }
    await handler(ctx, result.data);
  };
  // Keep the wrapped handler's name in flow-tracing logs
  Object.defineProperty(wrapped, "name", { value: name });
  return wrapped;
}

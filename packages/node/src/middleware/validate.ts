/**
 * Zod validation middleware.
 *
 * Validates request body against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodType, ZodTypeDef } from "zod";
import { formatClaimIssues } from "@closeout/reconciler";
import { createErrorEnvelope } from "../types/error.js";

/** Context variables contributed by validateBody. */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` (the parsed output) in context variables.
 * On failure, returns 400 with structured validation errors.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatClaimIssues(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    await next();
  };
}

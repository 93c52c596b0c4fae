/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (SettlementError, LedgerError, HubError)
 * to HTTP status codes by their `code`.
 */

import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import pino from "pino";
import type { Logger } from "pino";
import { SettlementError } from "@closeout/settlement";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Settlement errors
  VALIDATION_ERROR: 400,
  CYCLE_NOT_FOUND: 404,
  INVALID_CYCLE_STATE: 409,
  ALREADY_CLOSED: 409,
  PARTICIPANT_NOT_IN_CYCLE: 403,
  CURRENCY_MISMATCH: 422,
  AMOUNT_MISMATCH: 422,
  REMOTE_UNAVAILABLE: 503,
  QUORUM_NOT_MET: 409,
  STORAGE_ERROR: 503,

  // Ledger errors
  INVALID_AMOUNT: 400,
  INVALID_KEY: 400,
};

function codeOf(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function statusFor(code: string | undefined): ContentfulStatusCode {
  if (code !== undefined) {
    return STATUS_MAP[code] ?? 500;
  }
  return 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create the global error handler. Registered as Hono's onError handler.
 *
 * 500s are logged with the full error and answered without its message.
 */
export function createErrorHandler(
  logger: Logger = pino({ level: "silent" }),
): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    const code = codeOf(err);
    const status = statusFor(code);

    if (status === 500) {
      const requestLogger = c.get("logger") ?? logger;
      requestLogger.error({ err }, "Unhandled error");
      return c.json(
        createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
        500,
      );
    }

    const details =
      err instanceof SettlementError && err.details !== undefined
        ? { ...err.details }
        : undefined;

    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, details), status);
  };
}

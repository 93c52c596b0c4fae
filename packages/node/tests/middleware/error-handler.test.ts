/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { LedgerError } from "@closeout/ledger";
import { SettlementError } from "@closeout/settlement";
import type { SettlementErrorCode } from "@closeout/settlement";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createErrorHandler, statusFor } from "../../src/middleware/error-handler.js";
import { loggerMiddleware } from "../../src/middleware/logger.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";
import { captureLogger } from "../setup.js";

function appThrowing(error: Error, lines: Record<string, unknown>[] = []) {
  const logger = captureLogger(lines);
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));
  app.onError(createErrorHandler(logger));
  app.get("/boom", () => {
    throw error;
  });
  return app;
}

describe("error handler", () => {
  it.each<[SettlementErrorCode, number]>([
    ["VALIDATION_ERROR", 400],
    ["CYCLE_NOT_FOUND", 404],
    ["INVALID_CYCLE_STATE", 409],
    ["ALREADY_CLOSED", 409],
    ["PARTICIPANT_NOT_IN_CYCLE", 403],
    ["CURRENCY_MISMATCH", 422],
    ["AMOUNT_MISMATCH", 422],
    ["REMOTE_UNAVAILABLE", 503],
    ["QUORUM_NOT_MET", 409],
    ["STORAGE_ERROR", 503],
  ])("maps %s to %i", async (code, status) => {
    const res = await appThrowing(new SettlementError(code, "refused")).request("/boom");

    expect(res.status).toBe(status);
    expect(await res.json()).toEqual({ error: { code, message: "refused" } });
  });

  it("includes settlement error details", async () => {
    const error = new SettlementError("QUORUM_NOT_MET", "Settlement cycle '32' has 2 of 4 confirmations", {
      details: { accepted: 2, expected: 4 },
    });

    const res = await appThrowing(error).request("/boom");

    expect(await res.json()).toEqual({
      error: {
        code: "QUORUM_NOT_MET",
        message: "Settlement cycle '32' has 2 of 4 confirmations",
        details: { accepted: 2, expected: 4 },
      },
    });
  });

  it("maps ledger input errors to 400", async () => {
    const res = await appThrowing(new LedgerError("INVALID_KEY", "cycleId and participantId must be non-empty")).request("/boom");

    expect(res.status).toBe(400);
  });

  it("hides the message of unexpected errors and logs them", async () => {
    const lines: Record<string, unknown>[] = [];
    const res = await appThrowing(new Error("secret connection string"), lines).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
    const logged = lines.find((line) => line["msg"] === "Unhandled error");
    expect(logged?.["level"]).toBe(50);
  });

  it("passes HTTP exceptions through", async () => {
    const res = await appThrowing(new HTTPException(418, { message: "short and stout" })).request("/boom");

    expect(res.status).toBe(418);
    expect(await res.text()).toBe("short and stout");
  });
});

describe("statusFor", () => {
  it("falls back to 500 for unknown or missing codes", () => {
    expect(statusFor("SOMETHING_ELSE")).toBe(500);
    expect(statusFor(undefined)).toBe(500);
  });
});

/**
 * Settlement routes.
 *
 * POST /api/v1/settlements/:cycleId/confirmations — Submit a confirmation
 * GET  /api/v1/settlements/:cycleId/status        — Quorum and closure status
 * POST /api/v1/settlements/:cycleId/close         — Retry a failed closure
 */

import { Hono } from "hono";
import { ConfirmationClaimSchema } from "@closeout/reconciler";
import type { SubmissionResult } from "@closeout/settlement";
import type { AppEnv } from "../types/api-contract.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import type { SettlementService } from "../services/settlement-service.js";

/**
 * 201 for a new record, 200 for a duplicate, 202 when the record was
 * written but an upstream step has to be repeated.
 */
export function submissionStatus(result: SubmissionResult): 200 | 201 | 202 {
  if (result.status === "duplicate") {
    return 200;
  }
  if (!result.upstream.participantSettled || result.closure === "failed") {
    return 202;
  }
  return 201;
}

export function createSettlementRoutes(service: SettlementService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post(
    "/:cycleId/confirmations",
    requirePermission("confirmation:submit"),
    validateBody(ConfirmationClaimSchema),
    async (c) => {
      const cycleId = c.req.param("cycleId");
      const claim = c.get("validatedBody");

      const result = await service.submitConfirmation(cycleId, claim);
      return c.json({ data: result }, submissionStatus(result));
    },
  );

  routes.get("/:cycleId/status", requirePermission("status:read"), async (c) => {
    const status = await service.getStatus(c.req.param("cycleId"));
    return c.json({ data: status });
  });

  routes.post("/:cycleId/close", requirePermission("cycle:close"), async (c) => {
    const result = await service.retryClosure(c.req.param("cycleId"));
    return c.json({ data: result });
  });

  return routes;
}

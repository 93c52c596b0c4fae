/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (notification store writable)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { SettlementService } from "../services/settlement-service.js";

export function createHealthRoutes(
  service: SettlementService,
  now: () => Date = () => new Date(),
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: now().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: {
          notificationStore: { status: ready ? "ok" : "down" },
        },
        timestamp: now().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}

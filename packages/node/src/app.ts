/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { SettlementService } from "./services/settlement-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createSettlementRoutes } from "./routes/settlements.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: SettlementService;
  /** Request and error logging. Default: silent */
  readonly logger?: Logger | undefined;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig | undefined;
  readonly now?: (() => Date) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: SettlementService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const { service } = options;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(logger));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service, options.now));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): no auth context, every permission passes
    app.use("/api/*", async (c, next) => {
      c.set("auth", undefined);
      await next();
    });
  }

  app.route("/api/v1/settlements", createSettlementRoutes(service));

  return { app, service };
}

/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, statusFor } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
export { authMiddleware, requirePermission, API_KEY_HEADER } from "./auth.js";
export type { AuthConfig } from "./auth.js";

/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createSettlementRoutes, submissionStatus } from "./settlements.js";

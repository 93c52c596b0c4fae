/**
 * Type barrel — re-exports all public types from @closeout/node.
 */

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, HttpErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";

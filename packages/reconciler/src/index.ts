/**
 * @closeout/reconciler — Checks confirmation claims against the hub.
 *
 * - Claim schema: typed input validation with a field-level issue list
 * - ReconciliationValidator: existence, state, membership, currency, amount
 * - IdentityResolver: account id → participant identity for alerting
 *
 * Everything here is read-only towards the hub.
 */

// Claim schema
export {
  ConfirmationClaimSchema,
  parseConfirmationClaim,
  formatClaimIssues,
} from "./claim-schema.js";
export type { ConfirmationClaimInput } from "./claim-schema.js";

// Validator
export { ReconciliationValidator, ACCEPTING_STATES } from "./reconciliation-validator.js";
export type { ReconciliationValidatorConfig } from "./reconciliation-validator.js";

// Identity
export { IdentityResolver } from "./identity-resolver.js";
export type { IdentityResolverConfig } from "./identity-resolver.js";

// Deadlines
export { withDeadline, DeadlineExceededError } from "./deadline.js";

// Types
export type {
  Result,
  FieldIssue,
  ClaimValidationError,
  ReconciliationErrorCode,
  ReconciliationError,
  ValidatedClaim,
  ReconciliationResult,
  IdentityResolutionError,
  IdentityResult,
} from "./types.js";

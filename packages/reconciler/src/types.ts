/**
 * @closeout/reconciler domain types.
 *
 * Outcomes of checking a confirmation claim against the authoritative
 * settlement cycle, and of resolving participant identities.
 */

import type {
  ConfirmationClaim,
  ParticipantIdentity,
  ParticipantPosition,
  SettlementCycle,
} from "@closeout/types";

// =============================================================================
// Result
// =============================================================================

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

// =============================================================================
// Claim validation
// =============================================================================

/** One field-level constraint violation in an inbound claim. */
export interface FieldIssue {
  readonly path: string;
  readonly message: string;
}

export interface ClaimValidationError {
  readonly code: "VALIDATION_ERROR";
  readonly message: string;
  readonly issues: readonly FieldIssue[];
}

// =============================================================================
// Reconciliation
// =============================================================================

export type ReconciliationErrorCode =
  | "CYCLE_NOT_FOUND"
  | "INVALID_CYCLE_STATE"
  | "ALREADY_CLOSED"
  | "PARTICIPANT_NOT_IN_CYCLE"
  | "CURRENCY_MISMATCH"
  | "AMOUNT_MISMATCH"
  | "REMOTE_UNAVAILABLE";

/**
 * Why a claim was refused. `cycle` is present whenever the hub answered.
 */
export interface ReconciliationError {
  readonly code: ReconciliationErrorCode;
  readonly message: string;
  readonly cycle?: SettlementCycle | undefined;
  readonly details?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * A claim that matched the hub's record, bundled with the cycle it was
 * checked against so later steps need no second fetch.
 */
export interface ValidatedClaim {
  readonly cycleId: string;
  readonly claim: ConfirmationClaim;
  readonly position: ParticipantPosition;
  readonly cycle: SettlementCycle;
}

export type ReconciliationResult = Result<ValidatedClaim, ReconciliationError>;

// =============================================================================
// Identity
// =============================================================================

export interface IdentityResolutionError {
  readonly code: "IDENTITY_UNRESOLVED";
  readonly accountId: string;
  readonly message: string;
}

export type IdentityResult = Result<ParticipantIdentity, IdentityResolutionError>;

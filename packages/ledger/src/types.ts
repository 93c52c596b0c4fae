/**
 * @closeout/ledger — Core types.
 *
 * Defines the notification store contract and the outcomes of recording
 * a confirmation.
 *
 * Design principles:
 * - Records are immutable after creation
 * - The store is append-only (no UPDATE, no DELETE)
 * - (cycleId, participantId) is unique; check-and-insert is atomic
 */

import type { NotificationRecord } from "@closeout/types";

// =============================================================================
// Store
// =============================================================================

/**
 * Result of an atomic check-and-insert.
 */
export type InsertResult =
  | { readonly inserted: true; readonly record: NotificationRecord }
  | { readonly inserted: false; readonly existing: NotificationRecord };

/**
 * Append-only persistence for notification records.
 *
 * Invariants:
 * - At most one record per (cycleId, participantId)
 * - `insertIfAbsent` runs to completion without yielding, so two callers
 *   can never both observe `inserted: true` for the same key
 * - `list` returns records in insertion order
 */
export interface NotificationStore {
  insertIfAbsent(record: NotificationRecord): InsertResult;
  find(cycleId: string, participantId: string): NotificationRecord | undefined;
  list(cycleId: string): readonly NotificationRecord[];
  count(cycleId: string): number;

  /** Cycle ids with at least one record, in first-seen order */
  cycleIds(): readonly string[];

  /** Whether the next insert could be persisted */
  checkWritable(): boolean;
}

// =============================================================================
// Ledger
// =============================================================================

/**
 * Outcome of NotificationLedger.tryRecord.
 *
 * `already-recorded` is the duplicate-submission signal: the caller must not
 * repeat any side effect tied to the first recording.
 */
export type RecordOutcome =
  | { readonly status: "recorded"; readonly record: NotificationRecord }
  | { readonly status: "already-recorded"; readonly record: NotificationRecord };

/**
 * Claim data the ledger persists, after validation.
 */
export interface RecordableClaim {
  readonly accountId: string;
  readonly amount: string;
  readonly currency: string;
  readonly reference: string;
  readonly settledAt?: string | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_KEY"
  | "STORAGE_ERROR";

/**
 * Structured error from the ledger.
 * Always thrown; ledger operations do not return error codes.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }
}

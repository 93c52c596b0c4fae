/**
 * Settlement errors.
 *
 * Every refusal the lifecycle reports is a SettlementError with a stable
 * code. `retriable` tells the caller whether the same request may succeed
 * later without any change on their side.
 */

import { LedgerError } from "@closeout/ledger";
import type { ReconciliationError } from "@closeout/reconciler";

export type SettlementErrorCode =
  | "VALIDATION_ERROR"
  | "CYCLE_NOT_FOUND"
  | "INVALID_CYCLE_STATE"
  | "ALREADY_CLOSED"
  | "PARTICIPANT_NOT_IN_CYCLE"
  | "CURRENCY_MISMATCH"
  | "AMOUNT_MISMATCH"
  | "REMOTE_UNAVAILABLE"
  | "QUORUM_NOT_MET"
  | "STORAGE_ERROR";

const RETRIABLE_CODES: ReadonlySet<SettlementErrorCode> = new Set<SettlementErrorCode>([
  "REMOTE_UNAVAILABLE",
  "STORAGE_ERROR",
]);

/** Refusals that mean the claimant and the hub disagree. */
export const INTEGRITY_CODES: ReadonlySet<SettlementErrorCode> = new Set<SettlementErrorCode>([
  "CURRENCY_MISMATCH",
  "AMOUNT_MISMATCH",
]);

export interface SettlementErrorOptions {
  readonly details?: Readonly<Record<string, unknown>> | undefined;
  readonly cause?: unknown;
}

export class SettlementError extends Error {
  public readonly code: SettlementErrorCode;
  public readonly retriable: boolean;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(code: SettlementErrorCode, message: string, options: SettlementErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "SettlementError";
    this.code = code;
    this.retriable = RETRIABLE_CODES.has(code);
    this.details = options.details;
  }

  static fromReconciliation(error: ReconciliationError): SettlementError {
    return new SettlementError(error.code, error.message, { details: error.details });
  }

  /**
   * Ledger failures: bad keys or amounts are input errors, the rest are
   * storage errors.
   */
  static fromLedger(error: unknown): SettlementError {
    if (error instanceof LedgerError && error.code !== "STORAGE_ERROR") {
      return new SettlementError("VALIDATION_ERROR", error.message, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new SettlementError("STORAGE_ERROR", message, { cause: error });
  }
}

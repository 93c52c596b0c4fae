/**
 * @closeout/ledger — Durable record of settlement confirmations.
 *
 * - NotificationLedger: idempotent, append-only confirmation records
 * - Stores: in-memory and fsync'd JSONL
 * - Money math: bigint-backed decimal string arithmetic
 */

// Ledger
export { NotificationLedger } from "./notification-ledger.js";
export type { NotificationLedgerOptions } from "./notification-ledger.js";

// Stores
export { InMemoryNotificationStore } from "./in-memory-store.js";
export { JsonlNotificationStore } from "./jsonl-store.js";
export type { JsonlNotificationStoreOptions } from "./jsonl-store.js";

// Money math
export {
  parseAmount,
  formatAmount,
  fractionDigits,
  normalizeAmount,
  absAmount,
  isPositiveAmount,
  amountDifference,
  withinTolerance,
} from "./money-math.js";

// Types
export type {
  InsertResult,
  NotificationStore,
  RecordOutcome,
  RecordableClaim,
  LedgerErrorCode,
} from "./types.js";
export { LedgerError } from "./types.js";

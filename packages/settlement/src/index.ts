/**
 * @closeout/settlement — Quorum closure of settlement cycles.
 *
 * - SettlementLifecycle: validate → record → settle upstream → close once
 * - QuorumEngine: {accepted, expected, satisfied} derived from the ledger
 * - ClosureTracker: per-cycle closure phase
 * - KeyedMutex: per-cycle serialization
 */

// Lifecycle
export { SettlementLifecycle, OPERATOR_RECIPIENT_ID } from "./settlement-lifecycle.js";
export type {
  SettlementLifecycleConfig,
  ClosureOutcome,
  AcceptedSubmission,
  DuplicateSubmission,
  SubmissionResult,
  CycleStatus,
  ClosureRetryResult,
} from "./settlement-lifecycle.js";

// Quorum
export { QuorumEngine, isQuorumSatisfied } from "./quorum-engine.js";
export type { QuorumEngineOptions } from "./quorum-engine.js";

// Closure tracking
export { ClosureTracker } from "./closure-tracker.js";
export type { ClosurePhase } from "./closure-tracker.js";

// Concurrency
export { KeyedMutex } from "./keyed-mutex.js";

// Errors
export { SettlementError, INTEGRITY_CODES } from "./errors.js";
export type { SettlementErrorCode, SettlementErrorOptions } from "./errors.js";

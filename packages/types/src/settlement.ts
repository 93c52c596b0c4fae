/**
 * Settlement Types
 *
 * The settlement cycle as held by the authoritative hub, the confirmation
 * claims participants send after settling outside the ledger, and the
 * durable records those claims produce.
 *
 * Rules:
 * - All amounts are decimal strings (no floating point)
 * - Cycle and position data is owned by the hub; this stack only reads it
 * - Notification records are append-only, one per (cycleId, participantId)
 */

/**
 * Lifecycle state of a settlement cycle, in hub order.
 *
 * Amounts are frozen from RECORDED onward. SETTLED and ABORTED are terminal.
 */
export type SettlementState =
  | "OPEN"
  | "RECORDED"
  | "RESERVED"
  | "COMMITTED"
  | "SETTLED"
  | "ABORTED";

/**
 * A participant's net obligation in one currency.
 */
export interface ParticipantPosition {
  /** Hub account identifier (cycle-scoped, opaque) */
  readonly accountId: string;

  /** Signed decimal string; negative for net debtors */
  readonly netAmount: string;

  /** ISO 4217 code */
  readonly currency: string;
}

/**
 * A participant of a cycle with all of its positions.
 */
export interface CycleParticipant {
  readonly participantId: string;
  readonly positions: readonly ParticipantPosition[];
}

/**
 * A settlement cycle as reported by the authoritative hub.
 */
export interface SettlementCycle {
  readonly cycleId: string;
  readonly state: SettlementState;
  readonly participants: readonly CycleParticipant[];
}

/**
 * A participant's statement that it has settled its position.
 */
export interface ConfirmationClaim {
  readonly participantId: string;

  /** Positive decimal string */
  readonly amount: string;

  /** Upper-case 3-letter ISO 4217 code */
  readonly currency: string;

  /** Proof of settlement (bank or RTGS reference) */
  readonly reference: string;

  /** ISO 8601 timestamp of the external settlement */
  readonly settledAt?: string | undefined;
}

/**
 * An accepted confirmation, as persisted.
 */
export interface NotificationRecord {
  readonly cycleId: string;
  readonly participantId: string;
  readonly accountId: string;
  readonly amount: string;
  readonly currency: string;
  readonly reference: string;
  readonly settledAt: string;
  readonly receivedAt: string;
}

/**
 * Confirmation progress of one cycle. Derived, never stored.
 */
export interface QuorumStatus {
  readonly accepted: number;
  readonly expected: number;
  readonly satisfied: boolean;
}

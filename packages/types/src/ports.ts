/**
 * Collaborator Ports
 *
 * Interfaces for the systems the settlement core talks to. Adapters live in
 * @closeout/hub-client and @closeout/alerts; tests use in-process fakes.
 */

import type { QuorumStatus, SettlementCycle } from "./settlement.js";

// =============================================================================
// Authoritative hub
// =============================================================================

/**
 * The account a participant settled, as reported back to the hub.
 */
export interface SettledPositionRef {
  readonly participantId: string;
  readonly accountId: string;
  readonly reference: string;
}

/**
 * Record-of-truth for cycles and positions.
 *
 * Lookup resolves to `undefined` when the cycle does not exist and rejects
 * when the hub cannot be reached. Both mutations must be safe to repeat.
 */
export interface AuthoritativeSettlementSource {
  getSettlement(cycleId: string): Promise<SettlementCycle | undefined>;
  markParticipantSettled(cycleId: string, position: SettledPositionRef): Promise<void>;
  closeSettlement(cycleId: string): Promise<void>;
}

// =============================================================================
// Participant directory
// =============================================================================

/**
 * Contact details of the participant owning an account.
 */
export interface ParticipantContacts {
  readonly participantName: string;
  readonly displayName: string;
  readonly contacts: readonly string[];
}

/**
 * Lookup of contact details by hub account id.
 * Resolves to `undefined` when the account is unknown.
 */
export interface ParticipantDirectory {
  getContacts(accountId: string): Promise<ParticipantContacts | undefined>;
}

/**
 * A globally meaningful participant identity.
 */
export interface ParticipantIdentity {
  readonly accountId: string;
  readonly participantName: string;
  readonly displayName: string;
  readonly contacts: readonly string[];
}

// =============================================================================
// Alerts
// =============================================================================

export type AlertKind = "PARTICIPANT_CONFIRMED" | "CYCLE_CLOSED";

/**
 * One addressee of an alert. `addresses` is empty when the participant's
 * identity could not be resolved.
 */
export interface AlertRecipient {
  readonly participantId: string;
  readonly displayName?: string | undefined;
  readonly addresses: readonly string[];
}

export interface AlertEvent {
  readonly cycleId: string;
  readonly kind: AlertKind;
  readonly recipients: readonly AlertRecipient[];
  readonly quorum: QuorumStatus;
  readonly occurredAt: string;
}

/**
 * Receiver of settlement alerts. Fire-and-forget from the caller's side.
 */
export interface AlertSink {
  notify(event: AlertEvent): void | Promise<void>;
}

/**
 * @closeout/types — Shared domain types for the Closeout stack.
 *
 * - Settlement cycles, positions and confirmation claims
 * - Notification records and quorum status
 * - Ports for the hub, the participant directory and alert delivery
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Meaning lives in consuming code
 */

// Settlement types
export type {
  SettlementState,
  ParticipantPosition,
  CycleParticipant,
  SettlementCycle,
  ConfirmationClaim,
  NotificationRecord,
  QuorumStatus,
} from "./settlement.js";

// Collaborator ports
export type {
  SettledPositionRef,
  AuthoritativeSettlementSource,
  ParticipantContacts,
  ParticipantDirectory,
  ParticipantIdentity,
  AlertKind,
  AlertRecipient,
  AlertEvent,
  AlertSink,
} from "./ports.js";

// Runtime type guards
export { isNotificationRecord } from "./guards.js";

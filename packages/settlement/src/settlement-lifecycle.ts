/**
 * Settlement Lifecycle
 *
 * Drives one confirmation through the quorum-closure protocol:
 *
 *   validate → record → mark participant settled upstream
 *            → evaluate quorum → close the cycle upstream (once)
 *
 * Validation talks to the hub outside any lock. Everything from the ledger
 * insert to the close call runs under a per-cycle mutex, so the final two
 * confirmations of a cycle cannot both decide to close it. Alerts go out
 * after the lock is released and never affect the outcome.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  AlertEvent,
  AlertKind,
  AlertRecipient,
  AlertSink,
  AuthoritativeSettlementSource,
  ConfirmationClaim,
  CycleParticipant,
  NotificationRecord,
  QuorumStatus,
  SettledPositionRef,
  SettlementCycle,
  SettlementState,
} from "@closeout/types";
import type { NotificationLedger, RecordOutcome } from "@closeout/ledger";
import {
  ACCEPTING_STATES,
  withDeadline,
} from "@closeout/reconciler";
import type { IdentityResolver, ReconciliationValidator, ValidatedClaim } from "@closeout/reconciler";
import { ClosureTracker } from "./closure-tracker.js";
import type { ClosurePhase } from "./closure-tracker.js";
import { INTEGRITY_CODES, SettlementError } from "./errors.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { QuorumEngine } from "./quorum-engine.js";

// =============================================================================
// Configuration
// =============================================================================

export interface SettlementLifecycleConfig {
  readonly validator: ReconciliationValidator;
  readonly ledger: NotificationLedger;
  readonly source: AuthoritativeSettlementSource;
  readonly identities: IdentityResolver;
  readonly alerts: AlertSink;
  /** Deadline for upstream mutations. Default: 5000 */
  readonly remoteTimeoutMs?: number | undefined;
  /** Emit PARTICIPANT_CONFIRMED for confirmations short of quorum. Default: true */
  readonly notifyPartialProgress?: boolean | undefined;
  /** Hub operator addresses added to every CYCLE_CLOSED alert. Default: none */
  readonly operatorAddresses?: readonly string[] | undefined;
  readonly logger?: Logger | undefined;
  readonly now?: (() => Date) | undefined;
}

// =============================================================================
// Results
// =============================================================================

/**
 * Closure as seen by one request.
 * - pending: quorum not reached, or another request is closing the cycle
 * - closed: the cycle is closed upstream
 * - failed: quorum reached but the close call failed; retry with retryClosure
 */
export type ClosureOutcome = "pending" | "closed" | "failed";

export interface AcceptedSubmission {
  readonly status: "accepted";
  readonly record: NotificationRecord;
  readonly quorum: QuorumStatus;
  readonly upstream: { readonly participantSettled: boolean };
  readonly closure: ClosureOutcome;
}

/**
 * The participant had already confirmed. Nothing was written and no
 * upstream call was made.
 */
export interface DuplicateSubmission {
  readonly status: "duplicate";
  readonly record: NotificationRecord;
  readonly quorum: QuorumStatus;
  readonly closure: ClosureOutcome;
}

export type SubmissionResult = AcceptedSubmission | DuplicateSubmission;

export interface CycleStatus {
  readonly cycleId: string;
  readonly state: SettlementState;
  readonly accepted: number;
  readonly expected: number;
  readonly satisfied: boolean;
  readonly closed: boolean;
  readonly phase: ClosurePhase;
  readonly records: readonly NotificationRecord[];
}

export interface ClosureRetryResult {
  readonly cycleId: string;
  readonly closure: "closed" | "already-closed";
  readonly quorum: QuorumStatus;
}

/** Alert to send once the cycle lock is released. */
interface PendingAlert {
  readonly kind: AlertKind;
  readonly cycle: SettlementCycle;
  readonly participants: readonly CycleParticipant[];
  readonly quorum: QuorumStatus;
}

type CloseAttempt = "closed" | "failed" | "skipped";

function closureOf(phase: ClosurePhase): ClosureOutcome {
  switch (phase) {
    case "CLOSED":
      return "closed";
    case "CLOSE_FAILED":
      return "failed";
    default:
      return "pending";
  }
}

/** Recipient id of the hub operator in CYCLE_CLOSED alerts. */
export const OPERATOR_RECIPIENT_ID = "hub-operator";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// Lifecycle
// =============================================================================

export class SettlementLifecycle {
  private readonly validator: ReconciliationValidator;
  private readonly ledger: NotificationLedger;
  private readonly source: AuthoritativeSettlementSource;
  private readonly identities: IdentityResolver;
  private readonly alerts: AlertSink;
  private readonly remoteTimeoutMs: number;
  private readonly notifyPartialProgress: boolean;
  private readonly operatorAddresses: readonly string[];
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly quorum: QuorumEngine;
  private readonly closures = new ClosureTracker();
  private readonly mutex = new KeyedMutex();
  private readonly inFlightAlerts = new Set<Promise<void>>();

  constructor(config: SettlementLifecycleConfig) {
    this.validator = config.validator;
    this.ledger = config.ledger;
    this.source = config.source;
    this.identities = config.identities;
    this.alerts = config.alerts;
    this.remoteTimeoutMs = config.remoteTimeoutMs ?? 5000;
    this.notifyPartialProgress = config.notifyPartialProgress ?? true;
    this.operatorAddresses = config.operatorAddresses ?? [];
    this.logger = config.logger ?? pino({ level: "silent" });
    this.now = config.now ?? (() => new Date());
    this.quorum = new QuorumEngine({ ledger: this.ledger, logger: this.logger });
  }

  // ─── Confirmations ─────────────────────────────────────────────────

  /**
   * Accept a participant's confirmation that it settled its position.
   *
   * @throws SettlementError for every refusal; duplicates are not refusals
   */
  async submitConfirmation(cycleId: string, claim: ConfirmationClaim): Promise<SubmissionResult> {
    const validation = await this.validator.validate(cycleId, claim);

    if (!validation.ok) {
      const { error } = validation;

      // A confirmation repeated after closure is still a duplicate.
      if (error.code === "ALREADY_CLOSED" && error.cycle !== undefined) {
        await this.adoptHubClosure(error.cycle);
        const existing = this.ledger.find(cycleId, claim.participantId);
        if (existing !== undefined) {
          return this.duplicateOf(existing, error.cycle);
        }
      }

      const refusal = SettlementError.fromReconciliation(error);
      if (INTEGRITY_CODES.has(refusal.code)) {
        this.logger.warn(
          { cycleId, participantId: claim.participantId, code: refusal.code, details: refusal.details },
          "Confirmation disagrees with hub position",
        );
      }
      throw refusal;
    }

    const { result, alert } = await this.mutex.runExclusive(cycleId, () =>
      this.recordAndMaybeClose(validation.value),
    );

    if (alert !== undefined) {
      this.dispatch(alert);
    }
    return result;
  }

  private async recordAndMaybeClose(
    validated: ValidatedClaim,
  ): Promise<{ result: SubmissionResult; alert?: PendingAlert | undefined }> {
    const { cycleId, claim, position, cycle } = validated;

    let outcome: RecordOutcome;
    try {
      outcome = this.ledger.tryRecord(cycleId, claim.participantId, {
        accountId: position.accountId,
        amount: claim.amount,
        currency: claim.currency,
        reference: claim.reference,
        settledAt: claim.settledAt,
      });
    } catch (err: unknown) {
      this.logger.error({ err, cycleId, participantId: claim.participantId }, "Failed to record confirmation");
      throw SettlementError.fromLedger(err);
    }

    if (outcome.status === "already-recorded") {
      return { result: this.duplicateOf(outcome.record, cycle) };
    }

    this.logger.info(
      { cycleId, participantId: claim.participantId, amount: claim.amount, currency: claim.currency },
      "Confirmation recorded",
    );

    const participantSettled = await this.markParticipantSettled(cycleId, {
      participantId: claim.participantId,
      accountId: position.accountId,
      reference: claim.reference,
    });

    const quorum = this.quorum.evaluate(cycleId, cycle.participants);
    let attempt: CloseAttempt = "skipped";
    if (quorum.satisfied) {
      attempt = await this.closeCycle(cycleId);
    }

    const result: AcceptedSubmission = {
      status: "accepted",
      record: outcome.record,
      quorum,
      upstream: { participantSettled },
      closure: attempt === "skipped" ? closureOf(this.closures.phaseOf(cycleId)) : attempt,
    };

    if (attempt === "closed") {
      return {
        result,
        alert: { kind: "CYCLE_CLOSED", cycle, participants: cycle.participants, quorum },
      };
    }
    if (this.notifyPartialProgress) {
      const confirming = cycle.participants.filter((p) => p.participantId === claim.participantId);
      return {
        result,
        alert: { kind: "PARTICIPANT_CONFIRMED", cycle, participants: confirming, quorum },
      };
    }
    return { result };
  }

  private duplicateOf(record: NotificationRecord, cycle: SettlementCycle): DuplicateSubmission {
    return {
      status: "duplicate",
      record,
      quorum: this.quorum.evaluate(cycle.cycleId, cycle.participants),
      closure: closureOf(this.closures.phaseOf(cycle.cycleId)),
    };
  }

  // ─── Status ────────────────────────────────────────────────────────

  async getStatus(cycleId: string): Promise<CycleStatus> {
    const cycle = await this.fetchCycle(cycleId);
    if (cycle.state === "SETTLED") {
      await this.adoptHubClosure(cycle);
    }

    const quorum = this.quorum.evaluate(cycleId, cycle.participants);
    const phase = this.closures.phaseOf(cycleId);
    return {
      cycleId,
      state: cycle.state,
      accepted: quorum.accepted,
      expected: quorum.expected,
      satisfied: quorum.satisfied,
      closed: phase === "CLOSED",
      phase,
      records: this.ledger.listFor(cycleId),
    };
  }

  // ─── Closure retry ─────────────────────────────────────────────────

  /**
   * Close a cycle whose quorum is met but whose close call failed, or
   * that was left unclosed by a restart.
   *
   * @throws SettlementError QUORUM_NOT_MET, INVALID_CYCLE_STATE, or
   *   REMOTE_UNAVAILABLE when the close call fails again
   */
  async retryClosure(cycleId: string): Promise<ClosureRetryResult> {
    const cycle = await this.fetchCycle(cycleId);

    const { result, alert } = await this.mutex.runExclusive(cycleId, () =>
      this.closeIfReady(cycle),
    );

    if (alert !== undefined) {
      this.dispatch(alert);
    }
    return result;
  }

  private async closeIfReady(
    cycle: SettlementCycle,
  ): Promise<{ result: ClosureRetryResult; alert?: PendingAlert | undefined }> {
    const { cycleId } = cycle;
    const quorum = this.quorum.evaluate(cycleId, cycle.participants);

    if (cycle.state === "SETTLED" || this.closures.isClosed(cycleId)) {
      return {
        result: { cycleId, closure: "already-closed", quorum },
        alert: cycle.state === "SETTLED" ? this.settledUpstream(cycle) : undefined,
      };
    }
    if (!ACCEPTING_STATES.has(cycle.state)) {
      throw new SettlementError(
        "INVALID_CYCLE_STATE",
        `Settlement cycle '${cycleId}' is ${cycle.state} and cannot be closed`,
        { details: { state: cycle.state } },
      );
    }
    if (!quorum.satisfied) {
      throw new SettlementError(
        "QUORUM_NOT_MET",
        `Settlement cycle '${cycleId}' has ${String(quorum.accepted)} of ${String(quorum.expected)} confirmations`,
        { details: { accepted: quorum.accepted, expected: quorum.expected } },
      );
    }

    const attempt = await this.closeCycle(cycleId);
    if (attempt !== "closed") {
      throw new SettlementError(
        "REMOTE_UNAVAILABLE",
        `Closing settlement cycle '${cycleId}' failed; try again later`,
      );
    }
    return {
      result: { cycleId, closure: "closed", quorum },
      alert: { kind: "CYCLE_CLOSED", cycle, participants: cycle.participants, quorum },
    };
  }

  // ─── Closure seen upstream ─────────────────────────────────────────

  /**
   * Record that the hub reports the cycle SETTLED, under the cycle lock.
   */
  private async adoptHubClosure(cycle: SettlementCycle): Promise<void> {
    const alert = await this.mutex.runExclusive(cycle.cycleId, () =>
      Promise.resolve(this.settledUpstream(cycle)),
    );
    if (alert !== undefined) {
      this.dispatch(alert);
    }
  }

  /**
   * Caller holds the cycle lock. A close call of ours that timed out or
   * failed may still have been applied; its CYCLE_CLOSED alert is owed.
   */
  private settledUpstream(cycle: SettlementCycle): PendingAlert | undefined {
    const { cycleId } = cycle;
    const previous = this.closures.markClosed(cycleId);
    if (previous !== "CLOSE_FAILED" && previous !== "CLOSING") {
      return undefined;
    }
    this.logger.info({ cycleId, previous }, "Settlement cycle found closed upstream");
    return {
      kind: "CYCLE_CLOSED",
      cycle,
      participants: cycle.participants,
      quorum: this.quorum.evaluate(cycleId, cycle.participants),
    };
  }

  // ─── Alerts ────────────────────────────────────────────────────────

  /**
   * Resolves once every alert started so far has been handed to the sink.
   */
  async drainAlerts(): Promise<void> {
    while (this.inFlightAlerts.size > 0) {
      await Promise.all([...this.inFlightAlerts]);
    }
  }

  private dispatch(alert: PendingAlert): void {
    const delivery = this.deliver(alert).catch((err: unknown) => {
      this.logger.error(
        { err, cycleId: alert.cycle.cycleId, kind: alert.kind },
        "Alert delivery failed",
      );
    });
    this.inFlightAlerts.add(delivery);
    void delivery.finally(() => this.inFlightAlerts.delete(delivery));
  }

  private async deliver(alert: PendingAlert): Promise<void> {
    const recipients = await this.recipientsOf(alert.participants);
    if (alert.kind === "CYCLE_CLOSED" && this.operatorAddresses.length > 0) {
      recipients.push({
        participantId: OPERATOR_RECIPIENT_ID,
        displayName: "Hub operator",
        addresses: this.operatorAddresses,
      });
    }
    const event: AlertEvent = {
      cycleId: alert.cycle.cycleId,
      kind: alert.kind,
      recipients,
      quorum: alert.quorum,
      occurredAt: this.now().toISOString(),
    };
    await this.alerts.notify(event);
  }

  /**
   * One recipient per participant, addressed through the owner of its
   * first account. Unresolved identities keep the recipient with no
   * addresses.
   */
  private async recipientsOf(participants: readonly CycleParticipant[]): Promise<AlertRecipient[]> {
    const accountIds = participants.flatMap((p) => p.positions.slice(0, 1).map((pos) => pos.accountId));
    const identities = await this.identities.resolveMany(accountIds);

    return participants.map((participant) => {
      const accountId = participant.positions[0]?.accountId;
      const identity = accountId !== undefined ? identities.get(accountId) : undefined;
      if (identity === undefined || !identity.ok) {
        if (identity !== undefined) {
          this.logger.warn(
            { participantId: participant.participantId, accountId, reason: identity.error.message },
            "Alert recipient unresolved",
          );
        }
        return { participantId: participant.participantId, addresses: [] };
      }
      return {
        participantId: participant.participantId,
        displayName: identity.value.displayName,
        addresses: identity.value.contacts,
      };
    });
  }

  // ─── Upstream ──────────────────────────────────────────────────────

  private async fetchCycle(cycleId: string): Promise<SettlementCycle> {
    const fetched = await this.validator.fetchCycle(cycleId);
    if (!fetched.ok) {
      throw SettlementError.fromReconciliation(fetched.error);
    }
    return fetched.value;
  }

  /**
   * Best effort: the confirmation stays recorded when the hub refuses.
   */
  private async markParticipantSettled(cycleId: string, position: SettledPositionRef): Promise<boolean> {
    try {
      await withDeadline(
        this.source.markParticipantSettled(cycleId, position),
        this.remoteTimeoutMs,
        `Marking participant '${position.participantId}' settled`,
      );
      return true;
    } catch (err: unknown) {
      this.logger.error(
        { cycleId, participantId: position.participantId, accountId: position.accountId, reason: errorMessage(err) },
        "Upstream participant settlement failed",
      );
      return false;
    }
  }

  /**
   * Caller holds the cycle lock.
   */
  private async closeCycle(cycleId: string): Promise<CloseAttempt> {
    if (!this.closures.begin(cycleId)) {
      return "skipped";
    }
    try {
      await withDeadline(
        this.source.closeSettlement(cycleId),
        this.remoteTimeoutMs,
        `Closing settlement cycle '${cycleId}'`,
      );
      this.closures.complete(cycleId);
      this.logger.info({ cycleId }, "Settlement cycle closed");
      return "closed";
    } catch (err: unknown) {
      this.closures.fail(cycleId);
      this.logger.error({ cycleId, reason: errorMessage(err) }, "Settlement cycle close failed");
      return "failed";
    }
  }
}

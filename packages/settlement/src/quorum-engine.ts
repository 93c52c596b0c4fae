/**
 * Quorum Engine
 *
 * Derives quorum status on demand from the notification ledger and the
 * cycle's participant list. Holds no state of its own.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { CycleParticipant, QuorumStatus } from "@closeout/types";
import type { NotificationLedger } from "@closeout/ledger";

export interface QuorumEngineOptions {
  readonly ledger: NotificationLedger;
  readonly logger?: Logger | undefined;
}

/**
 * A quorum needs at least one expected participant.
 */
export function isQuorumSatisfied(accepted: number, expected: number): boolean {
  return expected > 0 && accepted >= expected;
}

export class QuorumEngine {
  private readonly ledger: NotificationLedger;
  private readonly logger: Logger;

  constructor(options: QuorumEngineOptions) {
    this.ledger = options.ledger;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  evaluate(cycleId: string, participants: readonly CycleParticipant[]): QuorumStatus {
    const expected = new Set(participants.map((p) => p.participantId)).size;
    const accepted = this.ledger.countFor(cycleId);

    if (accepted > expected) {
      this.logger.warn(
        { cycleId, accepted, expected },
        "More confirmations recorded than participants in cycle",
      );
    }

    return { accepted, expected, satisfied: isQuorumSatisfied(accepted, expected) };
  }
}

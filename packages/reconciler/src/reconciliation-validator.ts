/**
 * Reconciliation Validator
 *
 * Checks one confirmation claim against the authoritative settlement cycle:
 *
 * 1. The cycle exists (and the hub answered in time)
 * 2. The cycle is in a state whose amounts are frozen
 * 3. The claimant is a participant of the cycle
 * 4. The claimant holds a position in the claimed currency
 * 5. The claimed amount matches |netAmount| within the tolerance
 *
 * No side effects: a refused claim leaves nothing behind.
 */

import type {
  AuthoritativeSettlementSource,
  ConfirmationClaim,
  SettlementCycle,
  SettlementState,
} from "@closeout/types";
import { absAmount, amountDifference, withinTolerance } from "@closeout/ledger";
import { withDeadline } from "./deadline.js";
import type {
  ReconciliationError,
  ReconciliationResult,
  Result,
} from "./types.js";

export interface ReconciliationValidatorConfig {
  readonly source: AuthoritativeSettlementSource;
  /** Largest accepted |claimed − |netAmount||. Default: "0.01" */
  readonly amountTolerance?: string | undefined;
  /** Deadline for the cycle lookup. Default: 5000 */
  readonly timeoutMs?: number | undefined;
}

/** States in which position amounts are final but the cycle is not closed. */
export const ACCEPTING_STATES: ReadonlySet<SettlementState> = new Set<SettlementState>([
  "RECORDED",
  "RESERVED",
  "COMMITTED",
]);

function refuse(error: ReconciliationError): { ok: false; error: ReconciliationError } {
  return { ok: false, error };
}

export class ReconciliationValidator {
  private readonly source: AuthoritativeSettlementSource;
  private readonly tolerance: string;
  private readonly timeoutMs: number;

  constructor(config: ReconciliationValidatorConfig) {
    this.source = config.source;
    this.tolerance = config.amountTolerance ?? "0.01";
    this.timeoutMs = config.timeoutMs ?? 5000;
  }

  /**
   * Fetch the cycle from the hub. Timeouts and transport failures become
   * REMOTE_UNAVAILABLE; never "no answer means no".
   */
  async fetchCycle(
    cycleId: string,
  ): Promise<Result<SettlementCycle, ReconciliationError>> {
    let cycle: SettlementCycle | undefined;
    try {
      cycle = await withDeadline(
        this.source.getSettlement(cycleId),
        this.timeoutMs,
        `Settlement lookup for '${cycleId}'`,
      );
    } catch (err: unknown) {
      return refuse({
        code: "REMOTE_UNAVAILABLE",
        message: `Settlement hub unavailable: ${err instanceof Error ? err.message : String(err)}`,
      });
    }

    if (cycle === undefined) {
      return refuse({
        code: "CYCLE_NOT_FOUND",
        message: `Settlement cycle '${cycleId}' not found`,
      });
    }
    return { ok: true, value: cycle };
  }

  async validate(
    cycleId: string,
    claim: ConfirmationClaim,
  ): Promise<ReconciliationResult> {
    const fetched = await this.fetchCycle(cycleId);
    if (!fetched.ok) {
      return fetched;
    }
    return this.check(fetched.value, claim);
  }

  /**
   * Run steps 2–5 against an already fetched cycle.
   */
  check(cycle: SettlementCycle, claim: ConfirmationClaim): ReconciliationResult {
    const { cycleId, state } = cycle;

    if (state === "SETTLED") {
      return refuse({
        code: "ALREADY_CLOSED",
        message: `Settlement cycle '${cycleId}' is already settled`,
        cycle,
      });
    }

    if (!ACCEPTING_STATES.has(state)) {
      return refuse({
        code: "INVALID_CYCLE_STATE",
        message: `Settlement cycle '${cycleId}' is ${state}; confirmations are accepted in RECORDED, RESERVED or COMMITTED`,
        cycle,
        details: { state },
      });
    }

    const participant = cycle.participants.find(
      (p) => p.participantId === claim.participantId,
    );
    if (participant === undefined) {
      return refuse({
        code: "PARTICIPANT_NOT_IN_CYCLE",
        message: `Participant '${claim.participantId}' is not part of settlement cycle '${cycleId}'`,
        cycle,
      });
    }

    const position = participant.positions.find((p) => p.currency === claim.currency);
    if (position === undefined) {
      return refuse({
        code: "CURRENCY_MISMATCH",
        message: `Participant '${claim.participantId}' has no ${claim.currency} position in cycle '${cycleId}'`,
        cycle,
        details: { available: participant.positions.map((p) => p.currency) },
      });
    }

    const expected = absAmount(position.netAmount);
    if (!withinTolerance(expected, claim.amount, this.tolerance)) {
      return refuse({
        code: "AMOUNT_MISMATCH",
        message: `Claimed ${claim.amount} ${claim.currency} does not match position of ${expected} ${claim.currency}`,
        cycle,
        details: {
          expected,
          claimed: claim.amount,
          difference: amountDifference(expected, claim.amount),
          tolerance: this.tolerance,
        },
      });
    }

    return { ok: true, value: { cycleId, claim, position, cycle } };
  }
}

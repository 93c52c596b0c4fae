/**
 * Shared fixtures for reconciler tests.
 */
import type {
  AuthoritativeSettlementSource,
  ConfirmationClaim,
  SettlementCycle,
  SettlementState,
} from "@closeout/types";

export function cycle(state: SettlementState = "COMMITTED"): SettlementCycle {
  return {
    cycleId: "32",
    state,
    participants: [
      { participantId: "5", positions: [{ accountId: "9", netAmount: "50000", currency: "XOF" }] },
      { participantId: "6", positions: [{ accountId: "11", netAmount: "-50000", currency: "XOF" }] },
    ],
  };
}

export function claim(overrides: Partial<ConfirmationClaim> = {}): ConfirmationClaim {
  return {
    participantId: "6",
    amount: "50000",
    currency: "XOF",
    reference: "RTGS-2024-001",
    ...overrides,
  };
}

/**
 * Source whose lookup is driven by the test.
 */
export function sourceOf(
  lookup: (cycleId: string) => Promise<SettlementCycle | undefined>,
): AuthoritativeSettlementSource {
  return {
    getSettlement: lookup,
    markParticipantSettled: () => Promise.resolve(),
    closeSettlement: () => Promise.resolve(),
  };
}

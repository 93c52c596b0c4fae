/**
 * Wire formats of the settlement hub and the central ledger.
 *
 * Ids arrive as numbers or strings and are carried as strings. Unknown
 * fields are dropped.
 */

import { z } from "zod";
import type { CycleParticipant, SettlementCycle, SettlementState } from "@closeout/types";

// =============================================================================
// Settlement states
// =============================================================================

const STATE_MAP: Readonly<Record<string, SettlementState>> = {
  PENDING_SETTLEMENT: "OPEN",
  PS_TRANSFERS_RECORDED: "RECORDED",
  PS_TRANSFERS_RESERVED: "RESERVED",
  PS_TRANSFERS_COMMITTED: "COMMITTED",
  // Some accounts settled, others not yet: amounts are final
  SETTLING: "COMMITTED",
  SETTLED: "SETTLED",
  ABORTED: "ABORTED",
};

/**
 * Map a hub settlement state to the domain state. Unknown states map to
 * OPEN, which accepts no confirmations.
 */
export function mapWireState(state: string): SettlementState {
  return STATE_MAP[state.toUpperCase()] ?? "OPEN";
}

// =============================================================================
// Schemas
// =============================================================================

const WireId = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

const WireAmount = z
  .union([z.string(), z.number()])
  .transform((value) => (typeof value === "number" ? String(value) : value.trim()))
  .pipe(z.string().regex(/^-?\d+(\.\d+)?$/, "Amount must be a decimal"));

const WireAccount = z.object({
  id: WireId,
  netSettlementAmount: z
    .object({
      amount: WireAmount,
      currency: z.string().length(3),
    })
    .optional(),
});

const WireParticipant = z
  .object({
    id: WireId.optional(),
    participantId: WireId.optional(),
    accounts: z.array(WireAccount).default([]),
  })
  .refine((p) => p.id !== undefined || p.participantId !== undefined, {
    message: "Participant needs an id",
  });

export const WireSettlementSchema = z.object({
  id: WireId.optional(),
  state: z.string(),
  participants: z.array(WireParticipant).nullish(),
  participantSettlements: z.array(WireParticipant).nullish(),
});

export type WireSettlement = z.infer<typeof WireSettlementSchema>;

export const WireLedgerParticipantsSchema = z.array(
  z.object({
    name: z.string().min(1),
    accounts: z
      .array(
        z.object({
          id: WireId,
          currency: z.string().optional(),
          ledgerAccountType: z.string().optional(),
        }),
      )
      .default([]),
  }),
);

export const WireEndpointsSchema = z.array(
  z.object({
    type: z.string(),
    value: z.string(),
  }),
);

// =============================================================================
// Conversion
// =============================================================================

export function toSettlementCycle(cycleId: string, wire: WireSettlement): SettlementCycle {
  // An empty `participants` list falls back to `participantSettlements`
  const participants =
    wire.participants !== null && wire.participants !== undefined && wire.participants.length > 0
      ? wire.participants
      : (wire.participantSettlements ?? []);

  return {
    cycleId,
    state: mapWireState(wire.state),
    participants: participants.map(
      (p): CycleParticipant => ({
        participantId: p.id ?? p.participantId ?? "",
        positions: p.accounts.flatMap((account) =>
          account.netSettlementAmount === undefined
            ? []
            : [
                {
                  accountId: account.id,
                  netAmount: account.netSettlementAmount.amount,
                  currency: account.netSettlementAmount.currency.toUpperCase(),
                },
              ],
        ),
      }),
    ),
  };
}

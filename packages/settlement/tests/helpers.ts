/**
 * In-process stand-ins for the hub, the participant directory and the
 * alert sink, plus a lifecycle wired to them.
 */
import pino from "pino";
import type { Logger } from "pino";
import type {
  AlertEvent,
  AlertSink,
  AuthoritativeSettlementSource,
  ParticipantContacts,
  ParticipantDirectory,
  SettledPositionRef,
  SettlementCycle,
} from "@closeout/types";
import { NotificationLedger } from "@closeout/ledger";
import { IdentityResolver, ReconciliationValidator } from "@closeout/reconciler";
import { SettlementLifecycle } from "../src/settlement-lifecycle.js";

export const NOW = new Date("2024-03-01T12:00:00.000Z");

// =============================================================================
// Fakes
// =============================================================================

export class FakeHub implements AuthoritativeSettlementSource {
  readonly cycles = new Map<string, SettlementCycle>();
  readonly settleCalls: { cycleId: string; position: SettledPositionRef }[] = [];
  readonly closeCalls: string[] = [];
  failLookup = false;
  failSettle = false;
  failClose = false;
  /** Upstream mutations that never answer. */
  hangSettle = false;
  hangClose = false;
  /** Apply the close before failing or hanging. */
  applyFailedClose = false;

  constructor(...cycles: SettlementCycle[]) {
    for (const cycle of cycles) {
      this.cycles.set(cycle.cycleId, cycle);
    }
  }

  getSettlement(cycleId: string): Promise<SettlementCycle | undefined> {
    if (this.failLookup) {
      return Promise.reject(new Error("hub unreachable"));
    }
    return Promise.resolve(this.cycles.get(cycleId));
  }

  markParticipantSettled(cycleId: string, position: SettledPositionRef): Promise<void> {
    this.settleCalls.push({ cycleId, position });
    if (this.hangSettle) {
      return new Promise<void>(() => undefined);
    }
    return this.failSettle ? Promise.reject(new Error("hub refused")) : Promise.resolve();
  }

  closeSettlement(cycleId: string): Promise<void> {
    this.closeCalls.push(cycleId);
    const failing = this.failClose || this.hangClose;
    const cycle = this.cycles.get(cycleId);
    if (cycle !== undefined && (!failing || this.applyFailedClose)) {
      this.cycles.set(cycleId, { ...cycle, state: "SETTLED" });
    }
    if (this.hangClose) {
      return new Promise<void>(() => undefined);
    }
    return this.failClose ? Promise.reject(new Error("hub refused")) : Promise.resolve();
  }
}

export class RecordingSink implements AlertSink {
  readonly events: AlertEvent[] = [];

  notify(event: AlertEvent): void {
    this.events.push(event);
  }
}

export function directoryOf(entries: Record<string, ParticipantContacts>): ParticipantDirectory {
  return { getContacts: (accountId) => Promise.resolve(entries[accountId]) };
}

/** Pino logger writing parsed JSON lines into `lines`. */
export function captureLogger(lines: Record<string, unknown>[]): Logger {
  return pino(
    { level: "info" },
    {
      write(msg: string): void {
        const line: Record<string, unknown> = JSON.parse(msg);
        lines.push(line);
      },
    },
  );
}

// =============================================================================
// Fixtures
// =============================================================================

/**
 * Cycle "32": four participants, all in XOF. Participant "6" owes 50000.
 */
export function cycle32(state: SettlementCycle["state"] = "COMMITTED"): SettlementCycle {
  return {
    cycleId: "32",
    state,
    participants: [
      { participantId: "3", positions: [{ accountId: "7", netAmount: "20000", currency: "XOF" }] },
      { participantId: "4", positions: [{ accountId: "8", netAmount: "45000", currency: "XOF" }] },
      { participantId: "5", positions: [{ accountId: "9", netAmount: "-15000", currency: "XOF" }] },
      { participantId: "6", positions: [{ accountId: "11", netAmount: "-50000", currency: "XOF" }] },
    ],
  };
}

/**
 * Cycle with `count` participants "p0".."p{count-1}", each owing 100 USD.
 */
export function cycleOf(cycleId: string, count: number): SettlementCycle {
  return {
    cycleId,
    state: "COMMITTED",
    participants: Array.from({ length: count }, (_, i) => ({
      participantId: `p${String(i)}`,
      positions: [{ accountId: `acc-${String(i)}`, netAmount: "-100", currency: "USD" }],
    })),
  };
}

export const DIRECTORY: Record<string, ParticipantContacts> = {
  "7": { participantName: "bank-a", displayName: "Bank A", contacts: ["ops@bank-a.test"] },
  "8": { participantName: "bank-b", displayName: "Bank B", contacts: ["{{SETTLEMENT_EMAIL}}"] },
  "11": { participantName: "bank-d", displayName: "Bank D", contacts: ["settle@bank-d.test"] },
};

// =============================================================================
// Harness
// =============================================================================

export interface Harness {
  readonly hub: FakeHub;
  readonly sink: RecordingSink;
  readonly ledger: NotificationLedger;
  readonly lifecycle: SettlementLifecycle;
}

export function createHarness(
  hub: FakeHub,
  options: {
    notifyPartialProgress?: boolean;
    remoteTimeoutMs?: number;
    operatorAddresses?: readonly string[];
    logger?: Logger;
  } = {},
): Harness {
  const sink = new RecordingSink();
  const ledger = new NotificationLedger({ now: () => NOW });
  const lifecycle = new SettlementLifecycle({
    validator: new ReconciliationValidator({ source: hub }),
    ledger,
    source: hub,
    identities: new IdentityResolver({ directory: directoryOf(DIRECTORY) }),
    alerts: sink,
    notifyPartialProgress: options.notifyPartialProgress,
    remoteTimeoutMs: options.remoteTimeoutMs,
    operatorAddresses: options.operatorAddresses,
    logger: options.logger,
    now: () => NOW,
  });
  return { hub, sink, ledger, lifecycle };
}

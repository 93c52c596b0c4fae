/**
 * Closure Tracker
 *
 * Per-cycle closure phase, held in process memory:
 *
 *   AWAITING → CLOSING → CLOSED
 *                 ↓
 *            CLOSE_FAILED → CLOSING (retry)
 *
 * A cycle the hub already reports as SETTLED goes straight to CLOSED.
 * `begin` is the only way into CLOSING, and it succeeds for at most one
 * caller at a time.
 */

export type ClosurePhase = "AWAITING" | "CLOSING" | "CLOSED" | "CLOSE_FAILED";

const VALID_TRANSITIONS: Record<ClosurePhase, readonly ClosurePhase[]> = {
  AWAITING: ["CLOSING", "CLOSED"],
  CLOSING: ["CLOSED", "CLOSE_FAILED"],
  CLOSE_FAILED: ["CLOSING", "CLOSED"],
  CLOSED: [],
};

export class ClosureTracker {
  private readonly phases = new Map<string, ClosurePhase>();

  phaseOf(cycleId: string): ClosurePhase {
    return this.phases.get(cycleId) ?? "AWAITING";
  }

  isClosed(cycleId: string): boolean {
    return this.phaseOf(cycleId) === "CLOSED";
  }

  /** Claim the right to close. False when closing or closed already. */
  begin(cycleId: string): boolean {
    return this.transition(cycleId, "CLOSING");
  }

  complete(cycleId: string): void {
    this.transition(cycleId, "CLOSED");
  }

  fail(cycleId: string): void {
    this.transition(cycleId, "CLOSE_FAILED");
  }

  /**
   * The hub reports the cycle settled. Returns the phase the cycle left,
   * or undefined when it was CLOSED already.
   */
  markClosed(cycleId: string): ClosurePhase | undefined {
    const from = this.phaseOf(cycleId);
    return this.transition(cycleId, "CLOSED") ? from : undefined;
  }

  private transition(cycleId: string, to: ClosurePhase): boolean {
    const from = this.phaseOf(cycleId);
    if (!VALID_TRANSITIONS[from].includes(to)) {
      return false;
    }
    this.phases.set(cycleId, to);
    return true;
  }
}

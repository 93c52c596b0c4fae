/**
 * Tests for ReconciliationValidator.
 */
import { describe, it, expect } from "vitest";
import type { SettlementState } from "@closeout/types";
import { ReconciliationValidator } from "../src/reconciliation-validator.js";
import { claim, cycle, sourceOf } from "./fixtures.js";

function validatorFor(state: SettlementState = "COMMITTED"): ReconciliationValidator {
  return new ReconciliationValidator({
    source: sourceOf((id) => Promise.resolve(id === "32" ? cycle(state) : undefined)),
  });
}

describe("ReconciliationValidator", () => {
  // ─── Lookup ──────────────────────────────────────────────────────────

  describe("lookup", () => {
    it("reports CYCLE_NOT_FOUND for an unknown cycle", async () => {
      const result = await validatorFor().validate("99", claim());
      expect(!result.ok && result.error.code).toBe("CYCLE_NOT_FOUND");
      expect(!result.ok && result.error.cycle).toBeUndefined();
    });

    it("reports REMOTE_UNAVAILABLE when the hub fails", async () => {
      const validator = new ReconciliationValidator({
        source: sourceOf(() => Promise.reject(new Error("connection refused"))),
      });
      const result = await validator.validate("32", claim());
      expect(!result.ok && result.error).toEqual({
        code: "REMOTE_UNAVAILABLE",
        message: "Settlement hub unavailable: connection refused",
      });
    });

    it("reports REMOTE_UNAVAILABLE when the hub does not answer in time", async () => {
      const validator = new ReconciliationValidator({
        source: sourceOf(() => new Promise(() => undefined)),
        timeoutMs: 10,
      });
      const result = await validator.validate("32", claim());
      expect(!result.ok && result.error.code).toBe("REMOTE_UNAVAILABLE");
      expect(!result.ok && result.error.message).toBe(
        "Settlement hub unavailable: Settlement lookup for '32' timed out after 10ms",
      );
    });
  });

  // ─── State gate ──────────────────────────────────────────────────────

  describe("state gate", () => {
    it.each(["RECORDED", "RESERVED", "COMMITTED"] as const)("accepts claims in %s", async (state) => {
      const result = await validatorFor(state).validate("32", claim());
      expect(result.ok).toBe(true);
    });

    it.each(["OPEN", "ABORTED"] as const)("rejects claims in %s", async (state) => {
      const result = await validatorFor(state).validate("32", claim());
      expect(!result.ok && result.error.code).toBe("INVALID_CYCLE_STATE");
      expect(!result.ok && result.error.details).toEqual({ state });
    });

    it("reports ALREADY_CLOSED for a settled cycle and carries the cycle", async () => {
      const result = await validatorFor("SETTLED").validate("32", claim());
      expect(!result.ok && result.error.code).toBe("ALREADY_CLOSED");
      expect(!result.ok && result.error.cycle?.state).toBe("SETTLED");
    });
  });

  // ─── Membership ──────────────────────────────────────────────────────

  it("rejects non-members regardless of amount", async () => {
    const result = await validatorFor().validate("32", claim({ participantId: "7" }));
    expect(!result.ok && result.error.code).toBe("PARTICIPANT_NOT_IN_CYCLE");
  });

  it("rejects a currency the participant holds no position in", async () => {
    const result = await validatorFor().validate("32", claim({ currency: "USD" }));
    expect(!result.ok && result.error.code).toBe("CURRENCY_MISMATCH");
    expect(!result.ok && result.error.details).toEqual({ available: ["XOF"] });
  });

  // ─── Amount ──────────────────────────────────────────────────────────

  describe("amount", () => {
    it("compares against the absolute net amount", async () => {
      const result = await validatorFor().validate("32", claim());
      expect(result.ok && result.value.position.accountId).toBe("11");
      expect(result.ok && result.value.cycleId).toBe("32");
    });

    it("accepts a difference of exactly 0.01", async () => {
      const result = await validatorFor().validate("32", claim({ amount: "50000.01" }));
      expect(result.ok).toBe(true);
    });

    it("rejects a difference of 0.02", async () => {
      const result = await validatorFor().validate("32", claim({ amount: "49999.98" }));
      expect(!result.ok && result.error.code).toBe("AMOUNT_MISMATCH");
      expect(!result.ok && result.error.details).toEqual({
        expected: "50000",
        claimed: "49999.98",
        difference: "0.02",
        tolerance: "0.01",
      });
    });

    it("honours a configured tolerance", async () => {
      const validator = new ReconciliationValidator({
        source: sourceOf(() => Promise.resolve(cycle())),
        amountTolerance: "1",
      });
      const result = await validator.validate("32", claim({ amount: "49999" }));
      expect(result.ok).toBe(true);
    });
  });
});

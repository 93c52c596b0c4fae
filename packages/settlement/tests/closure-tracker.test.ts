import { describe, it, expect } from "vitest";
import { ClosureTracker } from "../src/closure-tracker.js";

describe("ClosureTracker", () => {
  it("starts every cycle in AWAITING", () => {
    expect(new ClosureTracker().phaseOf("c1")).toBe("AWAITING");
  });

  it("lets only one caller begin closing", () => {
    const tracker = new ClosureTracker();
    expect(tracker.begin("c1")).toBe(true);
    expect(tracker.begin("c1")).toBe(false);
    expect(tracker.phaseOf("c1")).toBe("CLOSING");
  });

  it("allows another attempt after a failure", () => {
    const tracker = new ClosureTracker();
    tracker.begin("c1");
    tracker.fail("c1");
    expect(tracker.phaseOf("c1")).toBe("CLOSE_FAILED");
    expect(tracker.begin("c1")).toBe(true);
  });

  it("never reopens a closed cycle", () => {
    const tracker = new ClosureTracker();
    tracker.begin("c1");
    tracker.complete("c1");
    expect(tracker.isClosed("c1")).toBe(true);
    expect(tracker.begin("c1")).toBe(false);
    tracker.fail("c1");
    expect(tracker.phaseOf("c1")).toBe("CLOSED");
  });

  it("marks a cycle settled elsewhere as closed", () => {
    const tracker = new ClosureTracker();
    expect(tracker.markClosed("c1")).toBe("AWAITING");
    expect(tracker.isClosed("c1")).toBe(true);
    expect(tracker.phaseOf("c2")).toBe("AWAITING");
  });

  it("reports the phase a settled cycle left behind", () => {
    const tracker = new ClosureTracker();
    tracker.begin("c1");
    tracker.fail("c1");

    expect(tracker.markClosed("c1")).toBe("CLOSE_FAILED");
    expect(tracker.markClosed("c1")).toBeUndefined();
    expect(tracker.phaseOf("c1")).toBe("CLOSED");
  });
});

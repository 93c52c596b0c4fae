/**
 * AlertDispatcher tests with a recording channel.
 */
import { describe, it, expect } from "vitest";
import pino from "pino";
import type { Logger } from "pino";
import type { AlertEvent } from "@closeout/types";
import { AlertDispatcher } from "../src/alert-dispatcher.js";
import type { AlertChannel } from "../src/types.js";

class RecordingChannel implements AlertChannel {
  readonly name = "recording";
  readonly delivered: AlertEvent[] = [];
  failWith: Error | undefined;

  deliver(event: AlertEvent): Promise<void> {
    if (this.failWith !== undefined) {
      return Promise.reject(this.failWith);
    }
    this.delivered.push(event);
    return Promise.resolve();
  }
}

function captureLogger(lines: Record<string, unknown>[]): Logger {
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

const CLOSED_32: AlertEvent = {
  cycleId: "32",
  kind: "CYCLE_CLOSED",
  recipients: [
    { participantId: "3", displayName: "Bank A", addresses: ["ops@bank-a.test"] },
    { participantId: "4", displayName: "Bank B", addresses: ["{{SETTLEMENT_EMAIL}}"] },
    { participantId: "5", addresses: [] },
    { participantId: "6", displayName: "Bank D", addresses: ["settle@bank-d.test"] },
  ],
  quorum: { accepted: 4, expected: 4, satisfied: true },
  occurredAt: "2024-03-01T12:00:00.000Z",
};

describe("AlertDispatcher", () => {
  it("forwards only deliverable recipients", async () => {
    const channel = new RecordingChannel();
    const dispatcher = new AlertDispatcher({ channel });

    await dispatcher.notify(CLOSED_32);

    expect(channel.delivered).toEqual([
      {
        ...CLOSED_32,
        recipients: [
          { participantId: "3", displayName: "Bank A", addresses: ["ops@bank-a.test"] },
          { participantId: "6", displayName: "Bank D", addresses: ["settle@bank-d.test"] },
        ],
      },
    ]);
  });

  it("skips the channel when nobody is reachable", async () => {
    const lines: Record<string, unknown>[] = [];
    const channel = new RecordingChannel();
    const dispatcher = new AlertDispatcher({ channel, logger: captureLogger(lines) });

    await dispatcher.notify({
      ...CLOSED_32,
      kind: "PARTICIPANT_CONFIRMED",
      recipients: [{ participantId: "5", addresses: [] }],
    });

    expect(channel.delivered).toEqual([]);
    expect(lines.map((l) => l["msg"])).toEqual([
      "Participants without alert address",
      "Alert has no deliverable recipients",
    ]);
  });

  it("logs channel failures instead of throwing", async () => {
    const lines: Record<string, unknown>[] = [];
    const channel = new RecordingChannel();
    channel.failWith = new Error("relay down");
    const dispatcher = new AlertDispatcher({ channel, logger: captureLogger(lines) });

    await expect(dispatcher.notify(CLOSED_32)).resolves.toBeUndefined();

    const failure = lines.find((l) => l["msg"] === "Alert delivery failed");
    expect(failure).toMatchObject({ level: 50, cycleId: "32", kind: "CYCLE_CLOSED", channel: "recording" });
  });
});

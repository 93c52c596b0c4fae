/**
 * Writes alerts to the service log. Default channel when no webhook is
 * configured.
 */

import type { Logger } from "pino";
import type { AlertEvent } from "@closeout/types";
import type { AlertChannel } from "./types.js";

export class LogAlertChannel implements AlertChannel {
  readonly name = "log";

  constructor(private readonly logger: Logger) {}

  deliver(event: AlertEvent): Promise<void> {
    for (const recipient of event.recipients) {
      this.logger.info(
        {
          cycleId: event.cycleId,
          kind: event.kind,
          participantId: recipient.participantId,
          displayName: recipient.displayName,
          addresses: recipient.addresses,
          accepted: event.quorum.accepted,
          expected: event.quorum.expected,
        },
        event.kind === "CYCLE_CLOSED"
          ? `Settlement cycle ${event.cycleId} closed`
          : `Settlement cycle ${event.cycleId}: confirmation ${String(event.quorum.accepted)}/${String(event.quorum.expected)} recorded`,
      );
    }
    return Promise.resolve();
  }
}

/**
 * Alert Dispatcher
 *
 * The AlertSink the settlement lifecycle talks to. Filters recipient
 * addresses, then hands the event to a delivery channel. Delivery
 * failures are logged here and go no further.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AlertEvent, AlertSink } from "@closeout/types";
import { filterRecipients } from "./address-filter.js";
import type { AlertChannel } from "./types.js";

export interface AlertDispatcherOptions {
  readonly channel: AlertChannel;
  readonly logger?: Logger | undefined;
}

export class AlertDispatcher implements AlertSink {
  private readonly channel: AlertChannel;
  private readonly logger: Logger;

  constructor(options: AlertDispatcherOptions) {
    this.channel = options.channel;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  async notify(event: AlertEvent): Promise<void> {
    const { cycleId, kind } = event;
    const { deliverable, dropped, unreachable } = filterRecipients(event.recipients);

    if (dropped.length > 0) {
      this.logger.warn({ cycleId, kind, dropped }, "Dropped undeliverable alert addresses");
    }
    if (unreachable.length > 0) {
      this.logger.info({ cycleId, kind, unreachable }, "Participants without alert address");
    }
    if (deliverable.length === 0) {
      this.logger.warn({ cycleId, kind }, "Alert has no deliverable recipients");
      return;
    }

    try {
      await this.channel.deliver({ ...event, recipients: deliverable });
      this.logger.info(
        { cycleId, kind, channel: this.channel.name, recipients: deliverable.length },
        "Alert delivered",
      );
    } catch (err: unknown) {
      this.logger.error({ err, cycleId, kind, channel: this.channel.name }, "Alert delivery failed");
    }
  }
}

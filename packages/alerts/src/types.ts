/**
 * @closeout/alerts — Channel contract.
 */

import type { AlertEvent } from "@closeout/types";

/**
 * Transport for alerts that passed address filtering. Every recipient
 * handed to a channel has at least one deliverable address.
 */
export interface AlertChannel {
  readonly name: string;
  deliver(event: AlertEvent): Promise<void>;
}

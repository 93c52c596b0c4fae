/**
 * @closeout/alerts — Delivery of settlement alerts.
 *
 * - AlertDispatcher: AlertSink that filters addresses before delivery
 * - LogAlertChannel / WebhookAlertChannel: delivery transports
 */

export { AlertDispatcher } from "./alert-dispatcher.js";
export type { AlertDispatcherOptions } from "./alert-dispatcher.js";

export { filterRecipients, isDeliverableAddress, isPlaceholder } from "./address-filter.js";
export type { DroppedAddress, FilteredRecipients } from "./address-filter.js";

export { LogAlertChannel } from "./log-channel.js";
export { WebhookAlertChannel, WebhookDeliveryError } from "./webhook-channel.js";
export type { WebhookAlertChannelConfig } from "./webhook-channel.js";

export type { AlertChannel } from "./types.js";

/**
 * POSTs each alert as JSON to a webhook (mail relay, chat bridge, ...).
 */

import type { AlertEvent } from "@closeout/types";
import type { AlertChannel } from "./types.js";

export interface WebhookAlertChannelConfig {
  readonly url: string;
  /** Request timeout in milliseconds (default: 5000) */
  readonly timeout?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

export class WebhookDeliveryError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = "WebhookDeliveryError";
  }
}

export class WebhookAlertChannel implements AlertChannel {
  readonly name = "webhook";

  private readonly url: string;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: WebhookAlertChannelConfig) {
    this.url = config.url;
    this.timeout = config.timeout ?? 5000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async deliver(event: AlertEvent): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await this.fetchFn(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(event),
        signal: controller.signal,
      });
    } catch (error: unknown) {
      const reason = error instanceof Error && error.name === "AbortError"
        ? `timed out after ${String(this.timeout)}ms`
        : error instanceof Error ? error.message : String(error);
      throw new WebhookDeliveryError(`Alert webhook ${reason}`, 0);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new WebhookDeliveryError(
        `Alert webhook returned ${String(response.status)}`,
        response.status,
      );
    }
  }
}

/**
 * Settlement hub adapter.
 *
 *   GET {hub}/settlements/{id}
 *   PUT {hub}/settlements/{id}/participants/{pid}/accounts/{aid}
 *   PUT {hub}/settlements/{id}
 */

import type {
  AuthoritativeSettlementSource,
  SettledPositionRef,
  SettlementCycle,
} from "@closeout/types";
import { HttpClient } from "./http-client.js";
import type { HttpClientConfig } from "./types.js";
import { HubError } from "./types.js";
import { WireSettlementSchema, toSettlementCycle } from "./wire.js";

export interface HubSettlementSourceConfig extends HttpClientConfig {
  /** Free-text reason sent with state changes */
  readonly reason?: string | undefined;
}

export class HubSettlementSource implements AuthoritativeSettlementSource {
  private readonly http: HttpClient;
  private readonly reason: string;

  constructor(config: HubSettlementSourceConfig) {
    this.http = new HttpClient(config);
    this.reason = config.reason ?? "Settled externally; confirmed by participant";
  }

  async getSettlement(cycleId: string): Promise<SettlementCycle | undefined> {
    let body: unknown;
    try {
      ({ body } = await this.http.get(`/settlements/${encodeURIComponent(cycleId)}`));
    } catch (error: unknown) {
      if (error instanceof HubError && error.code === "NOT_FOUND") {
        return undefined;
      }
      throw error;
    }

    const parsed = WireSettlementSchema.safeParse(body);
    if (!parsed.success) {
      throw new HubError(
        "INVALID_RESPONSE",
        `Unexpected settlement payload for '${cycleId}'`,
        200,
        parsed.error.issues,
      );
    }
    return toSettlementCycle(cycleId, parsed.data);
  }

  async markParticipantSettled(cycleId: string, position: SettledPositionRef): Promise<void> {
    const path =
      `/settlements/${encodeURIComponent(cycleId)}` +
      `/participants/${encodeURIComponent(position.participantId)}` +
      `/accounts/${encodeURIComponent(position.accountId)}`;
    await this.http.put(path, {
      state: "SETTLED",
      reason: this.reason,
      externalReference: position.reference,
    });
  }

  async closeSettlement(cycleId: string): Promise<void> {
    await this.http.put(`/settlements/${encodeURIComponent(cycleId)}`, {
      state: "SETTLED",
      reason: this.reason,
    });
  }
}

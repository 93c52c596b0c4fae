/**
 * Central ledger participant directory.
 *
 * Account ids are mapped to participant names through
 * `GET {ledger}/participants`; the map is cached and refreshed when an
 * unknown account is asked for after `cacheTtlMs`. Contact addresses come
 * from the participant's SETTLEMENT_TRANSFER_POSITION_CHANGE_EMAIL
 * endpoints.
 */

import type { ParticipantContacts, ParticipantDirectory } from "@closeout/types";
import { HttpClient } from "./http-client.js";
import type { HttpClientConfig } from "./types.js";
import { HubError } from "./types.js";
import { WireEndpointsSchema, WireLedgerParticipantsSchema } from "./wire.js";

export const SETTLEMENT_EMAIL_ENDPOINT = "SETTLEMENT_TRANSFER_POSITION_CHANGE_EMAIL";

export interface HubParticipantDirectoryConfig extends HttpClientConfig {
  /** Age after which a miss triggers a reload of the account map. Default: 60000 */
  readonly cacheTtlMs?: number | undefined;
  readonly now?: (() => number) | undefined;
}

export class HubParticipantDirectory implements ParticipantDirectory {
  private readonly http: HttpClient;
  private readonly cacheTtlMs: number;
  private readonly now: () => number;

  private accounts: ReadonlyMap<string, string> = new Map();
  private loadedAt: number | undefined;
  private reloading: Promise<void> | undefined;

  constructor(config: HubParticipantDirectoryConfig) {
    this.http = new HttpClient(config);
    this.cacheTtlMs = config.cacheTtlMs ?? 60_000;
    this.now = config.now ?? Date.now;
  }

  async getContacts(accountId: string): Promise<ParticipantContacts | undefined> {
    const participantName = await this.participantFor(accountId);
    if (participantName === undefined) {
      return undefined;
    }
    return {
      participantName,
      displayName: participantName,
      contacts: await this.settlementEmails(participantName),
    };
  }

  private async participantFor(accountId: string): Promise<string | undefined> {
    const cached = this.accounts.get(accountId);
    const stale = this.loadedAt === undefined || this.now() - this.loadedAt >= this.cacheTtlMs;
    if (cached !== undefined || !stale) {
      return cached;
    }
    await this.reloadOnce();
    return this.accounts.get(accountId);
  }

  /** Concurrent misses share one request. */
  private reloadOnce(): Promise<void> {
    if (this.reloading === undefined) {
      this.reloading = this.reload().finally(() => {
        this.reloading = undefined;
      });
    }
    return this.reloading;
  }

  private async reload(): Promise<void> {
    const { body } = await this.http.get("/participants");
    const parsed = WireLedgerParticipantsSchema.safeParse(body);
    if (!parsed.success) {
      throw new HubError("INVALID_RESPONSE", "Unexpected participants payload", 200, parsed.error.issues);
    }

    const accounts = new Map<string, string>();
    for (const participant of parsed.data) {
      for (const account of participant.accounts) {
        accounts.set(account.id, participant.name);
      }
    }
    this.accounts = accounts;
    this.loadedAt = this.now();
  }

  private async settlementEmails(participantName: string): Promise<string[]> {
    let body: unknown;
    try {
      ({ body } = await this.http.get(`/participants/${encodeURIComponent(participantName)}/endpoints`));
    } catch (error: unknown) {
      if (error instanceof HubError && error.code === "NOT_FOUND") {
        return [];
      }
      throw error;
    }

    const parsed = WireEndpointsSchema.safeParse(body);
    if (!parsed.success) {
      throw new HubError("INVALID_RESPONSE", `Unexpected endpoints payload for '${participantName}'`, 200, parsed.error.issues);
    }
    return parsed.data
      .filter((endpoint) => endpoint.type === SETTLEMENT_EMAIL_ENDPOINT)
      .map((endpoint) => endpoint.value);
  }
}

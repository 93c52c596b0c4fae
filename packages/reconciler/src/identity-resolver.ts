/**
 * Identity Resolver
 *
 * Maps a hub account id to the participant identity behind it, for alert
 * addressing. Failures only cost alert delivery for that identity; they
 * never affect recording or quorum accounting.
 */

import type { ParticipantDirectory } from "@closeout/types";
import { withDeadline } from "./deadline.js";
import type { IdentityResult } from "./types.js";

export interface IdentityResolverConfig {
  readonly directory: ParticipantDirectory;
  /** Deadline per directory lookup. Default: 5000 */
  readonly timeoutMs?: number | undefined;
}

export class IdentityResolver {
  private readonly directory: ParticipantDirectory;
  private readonly timeoutMs: number;

  constructor(config: IdentityResolverConfig) {
    this.directory = config.directory;
    this.timeoutMs = config.timeoutMs ?? 5000;
  }

  async resolve(accountId: string): Promise<IdentityResult> {
    try {
      const contacts = await withDeadline(
        this.directory.getContacts(accountId),
        this.timeoutMs,
        `Directory lookup for account '${accountId}'`,
      );
      if (contacts === undefined) {
        return {
          ok: false,
          error: {
            code: "IDENTITY_UNRESOLVED",
            accountId,
            message: `No participant found for account '${accountId}'`,
          },
        };
      }
      return { ok: true, value: { accountId, ...contacts } };
    } catch (err: unknown) {
      return {
        ok: false,
        error: {
          code: "IDENTITY_UNRESOLVED",
          accountId,
          message: err instanceof Error ? err.message : String(err),
        },
      };
    }
  }

  /**
   * Resolve several accounts concurrently. Keys of the result are the
   * distinct input account ids.
   */
  async resolveMany(accountIds: readonly string[]): Promise<ReadonlyMap<string, IdentityResult>> {
    const unique = [...new Set(accountIds)];
    const entries = await Promise.all(
      unique.map(async (id): Promise<[string, IdentityResult]> => [id, await this.resolve(id)]),
    );
    return new Map(entries);
  }
}

/**
 * Notification Ledger — the durable record of accepted confirmations.
 *
 * Exclusive owner of notification records. Every accepted confirmation is
 * written exactly once; later submissions for the same (cycleId,
 * participantId) return the original record untouched.
 *
 * The insert is the linearization point for concurrent submissions: it
 * completes synchronously, so no interleaving can let two callers observe
 * "recorded" for the same key.
 */

import type { NotificationRecord } from "@closeout/types";
import { InMemoryNotificationStore } from "./in-memory-store.js";
import { normalizeAmount } from "./money-math.js";
import type {
  InsertResult,
  NotificationStore,
  RecordOutcome,
  RecordableClaim,
} from "./types.js";
import { LedgerError } from "./types.js";

export interface NotificationLedgerOptions {
  /** Backing store. Default: in-memory */
  readonly store?: NotificationStore | undefined;
  /** Clock for receivedAt. Default: system time */
  readonly now?: (() => Date) | undefined;
}

export class NotificationLedger {
  private readonly store: NotificationStore;
  private readonly now: () => Date;

  constructor(options: NotificationLedgerOptions = {}) {
    this.store = options.store ?? new InMemoryNotificationStore();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Record a confirmation unless one already exists for the key.
   *
   * @throws LedgerError INVALID_KEY for empty ids, STORAGE_ERROR when the
   *   store cannot persist the record
   */
  tryRecord(
    cycleId: string,
    participantId: string,
    claim: RecordableClaim,
  ): RecordOutcome {
    if (cycleId.length === 0 || participantId.length === 0) {
      throw new LedgerError(
        "INVALID_KEY",
        "cycleId and participantId must be non-empty",
      );
    }

    const receivedAt = this.now().toISOString();
    const record: NotificationRecord = {
      cycleId,
      participantId,
      accountId: claim.accountId,
      amount: normalizeAmount(claim.amount),
      currency: claim.currency,
      reference: claim.reference,
      settledAt: claim.settledAt ?? receivedAt,
      receivedAt,
    };

    let result: InsertResult;
    try {
      result = this.store.insertIfAbsent(record);
    } catch (err: unknown) {
      if (err instanceof LedgerError) {
        throw err;
      }
      throw new LedgerError(
        "STORAGE_ERROR",
        `Failed to record confirmation for ${cycleId}/${participantId}`,
        { cause: err },
      );
    }

    return result.inserted
      ? { status: "recorded", record: result.record }
      : { status: "already-recorded", record: result.existing };
  }

  /** Number of accepted confirmations for a cycle. */
  countFor(cycleId: string): number {
    return this.store.count(cycleId);
  }

  /** Accepted confirmations for a cycle, in the order they were received. */
  listFor(cycleId: string): readonly NotificationRecord[] {
    return this.store.list(cycleId);
  }

  find(cycleId: string, participantId: string): NotificationRecord | undefined {
    return this.store.find(cycleId, participantId);
  }

  cycleIds(): readonly string[] {
    return this.store.cycleIds();
  }

  isWritable(): boolean {
    return this.store.checkWritable();
  }
}

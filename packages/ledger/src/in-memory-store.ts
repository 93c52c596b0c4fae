/**
 * @closeout/ledger — In-memory NotificationStore implementation.
 *
 * Suitable for tests, development and single-process deployments that
 * can afford to lose confirmations on exit.
 */

import type { NotificationRecord } from "@closeout/types";
import type { InsertResult, NotificationStore } from "./types.js";

/**
 * In-memory notification store.
 *
 * Records are indexed per cycle, then per participant. A Map preserves
 * insertion order, which gives `list` its ordering for free.
 */
export class InMemoryNotificationStore implements NotificationStore {
  private readonly _cycles = new Map<string, Map<string, NotificationRecord>>();

  insertIfAbsent(record: NotificationRecord): InsertResult {
    let cycle = this._cycles.get(record.cycleId);
    const existing = cycle?.get(record.participantId);
    if (existing !== undefined) {
      return { inserted: false, existing };
    }

    if (cycle === undefined) {
      cycle = new Map();
      this._cycles.set(record.cycleId, cycle);
    }
    cycle.set(record.participantId, record);
    return { inserted: true, record };
  }

  find(cycleId: string, participantId: string): NotificationRecord | undefined {
    return this._cycles.get(cycleId)?.get(participantId);
  }

  list(cycleId: string): readonly NotificationRecord[] {
    const cycle = this._cycles.get(cycleId);
    return cycle === undefined ? [] : [...cycle.values()];
  }

  count(cycleId: string): number {
    return this._cycles.get(cycleId)?.size ?? 0;
  }

  cycleIds(): readonly string[] {
    return [...this._cycles.keys()];
  }

  checkWritable(): boolean {
    return true;
  }
}

/**
 * @closeout/ledger — File-based JSONL NotificationStore implementation.
 *
 * Stores one notification record per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each insert flushes to disk via fsync before returning
 * - Partial writes (torn last line) are detected and skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * {"cycleId":"32","participantId":"6","accountId":"12","amount":"50000",...}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import type { NotificationRecord } from "@closeout/types";
import { isNotificationRecord } from "@closeout/types";
import { InMemoryNotificationStore } from "./in-memory-store.js";
import type { InsertResult, NotificationStore } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Options for creating a JsonlNotificationStore.
 */
export interface JsonlNotificationStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * Durable notification store backed by an append-only JSONL file.
 *
 * The index is an InMemoryNotificationStore rebuilt from the file on
 * construction. A record reaches the index only after its line is on disk.
 */
export class JsonlNotificationStore implements NotificationStore {
  private readonly _filePath: string;
  private readonly _index = new InMemoryNotificationStore();
  private _skippedLines = 0;

  /**
   * Create a new JsonlNotificationStore.
   *
   * If the file exists, records are loaded from it. The parent directory
   * is created if it doesn't exist.
   */
  constructor(options: JsonlNotificationStoreOptions) {
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  // ─── Insert ─────────────────────────────────────────────────────────

  insertIfAbsent(record: NotificationRecord): InsertResult {
    const existing = this._index.find(record.cycleId, record.participantId);
    if (existing !== undefined) {
      return { inserted: false, existing };
    }

    this._writeAndSync(JSON.stringify(record) + "\n");
    return this._index.insertIfAbsent(record);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  find(cycleId: string, participantId: string): NotificationRecord | undefined {
    return this._index.find(cycleId, participantId);
  }

  list(cycleId: string): readonly NotificationRecord[] {
    return this._index.list(cycleId);
  }

  count(cycleId: string): number {
    return this._index.count(cycleId);
  }

  cycleIds(): readonly string[] {
    return this._index.cycleIds();
  }

  // ─── Diagnostics ────────────────────────────────────────────────────

  get filePath(): string {
    return this._filePath;
  }

  /** Lines dropped while loading (corrupt, torn or duplicate). */
  get skippedLines(): number {
    return this._skippedLines;
  }

  /**
   * Check that the file can be opened for append.
   */
  checkWritable(): boolean {
    try {
      closeSync(openSync(this._filePath, "a"));
      return true;
    } catch {
      return false;
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Tolerates partial/corrupt lines (unclean shutdown). A duplicate key keeps
   * the first record, matching what callers observed before the restart.
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        this._skippedLines++;
        continue;
      }

      if (!isNotificationRecord(parsed) || !this._index.insertIfAbsent(parsed).inserted) {
        this._skippedLines++;
      }
    }
  }

  private _writeAndSync(data: string): void {
    let fd: number;
    try {
      fd = openSync(this._filePath, "a");
    } catch (err: unknown) {
      throw new LedgerError("STORAGE_ERROR", `Cannot open ${this._filePath}`, { cause: err });
    }

    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } catch (err: unknown) {
      throw new LedgerError("STORAGE_ERROR", `Cannot append to ${this._filePath}`, { cause: err });
    } finally {
      closeSync(fd);
    }
  }
}

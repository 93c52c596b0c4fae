/**
 * Tests for JsonlNotificationStore.
 *
 * Verifies:
 * - Persistence: records survive store recreation
 * - Crash safety: torn and corrupt lines are skipped
 * - Duplicate keys on disk keep the first record
 * - File creation: directory and file created on demand
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { NotificationRecord } from "@closeout/types";
import { JsonlNotificationStore } from "../src/jsonl-store.js";

// =============================================================================
// Helpers
// =============================================================================

let testDir: string;
let testFile: string;

function makeRecord(participantId: string, cycleId = "32"): NotificationRecord {
  return {
    cycleId,
    participantId,
    accountId: `acc-${participantId}`,
    amount: "1000",
    currency: "XOF",
    reference: `REF-${participantId}`,
    settledAt: "2024-03-01T10:00:00.000Z",
    receivedAt: "2024-03-01T10:05:00.000Z",
  };
}

beforeEach(() => {
  testDir = join(tmpdir(), `closeout-jsonl-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  mkdirSync(testDir, { recursive: true });
  testFile = join(testDir, "notifications.jsonl");
});

afterEach(() => {
  try {
    rmSync(testDir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
});

// =============================================================================
// File Creation
// =============================================================================

describe("file creation", () => {
  it("creates the file on first insert", () => {
    const store = new JsonlNotificationStore({ filePath: testFile });
    expect(existsSync(testFile)).toBe(false);

    store.insertIfAbsent(makeRecord("6"));

    expect(existsSync(testFile)).toBe(true);
    const lines = readFileSync(testFile, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "")).toEqual(makeRecord("6"));
  });

  it("creates missing parent directories", () => {
    const nested = join(testDir, "a", "b", "notifications.jsonl");
    const store = new JsonlNotificationStore({ filePath: nested });

    store.insertIfAbsent(makeRecord("6"));

    expect(existsSync(nested)).toBe(true);
    expect(store.filePath).toBe(nested);
  });
});

// =============================================================================
// Idempotent insert
// =============================================================================

describe("insertIfAbsent", () => {
  it("writes nothing for a duplicate key", () => {
    const store = new JsonlNotificationStore({ filePath: testFile });

    store.insertIfAbsent(makeRecord("6"));
    const second = store.insertIfAbsent({ ...makeRecord("6"), reference: "OTHER" });

    expect(second.inserted).toBe(false);
    if (!second.inserted) {
      expect(second.existing.reference).toBe("REF-6");
    }
    expect(readFileSync(testFile, "utf-8").trim().split("\n")).toHaveLength(1);
  });
});

// =============================================================================
// Persistence
// =============================================================================

describe("persistence", () => {
  it("reloads records in insertion order", () => {
    const first = new JsonlNotificationStore({ filePath: testFile });
    first.insertIfAbsent(makeRecord("9"));
    first.insertIfAbsent(makeRecord("3"));
    first.insertIfAbsent(makeRecord("1", "33"));

    const reopened = new JsonlNotificationStore({ filePath: testFile });

    expect(reopened.count("32")).toBe(2);
    expect(reopened.list("32").map((r) => r.participantId)).toEqual(["9", "3"]);
    expect(reopened.cycleIds()).toEqual(["32", "33"]);
  });

  it("keeps enforcing uniqueness after a restart", () => {
    new JsonlNotificationStore({ filePath: testFile }).insertIfAbsent(makeRecord("6"));

    const reopened = new JsonlNotificationStore({ filePath: testFile });

    expect(reopened.insertIfAbsent(makeRecord("6")).inserted).toBe(false);
  });
});

// =============================================================================
// Crash safety
// =============================================================================

describe("crash safety", () => {
  it("skips a torn trailing line", () => {
    writeFileSync(testFile, JSON.stringify(makeRecord("6")) + "\n");
    appendFileSync(testFile, '{"cycleId":"32","participantId":"7","amo');

    const store = new JsonlNotificationStore({ filePath: testFile });

    expect(store.count("32")).toBe(1);
    expect(store.skippedLines).toBe(1);
  });

  it("skips lines that are not notification records", () => {
    writeFileSync(
      testFile,
      [JSON.stringify({ hello: "world" }), JSON.stringify(makeRecord("6")), ""].join("\n"),
    );

    const store = new JsonlNotificationStore({ filePath: testFile });

    expect(store.count("32")).toBe(1);
    expect(store.skippedLines).toBe(1);
  });

  it("keeps the first record when a key appears twice on disk", () => {
    writeFileSync(
      testFile,
      [
        JSON.stringify(makeRecord("6")),
        JSON.stringify({ ...makeRecord("6"), reference: "LATER" }),
        "",
      ].join("\n"),
    );

    const store = new JsonlNotificationStore({ filePath: testFile });

    expect(store.find("32", "6")?.reference).toBe("REF-6");
    expect(store.skippedLines).toBe(1);
  });

  it("reports the file as writable", () => {
    const store = new JsonlNotificationStore({ filePath: testFile });
    expect(store.checkWritable()).toBe(true);
  });
});

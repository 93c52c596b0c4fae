/**
 * Runtime Type Guards
 *
 * Narrowing for records loaded from disk. Hub payloads are parsed with
 * zod schemas in @closeout/hub-client instead.
 */

import type { NotificationRecord } from "./settlement.js";

const DECIMAL = /^-?\d+(\.\d+)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

export function isNotificationRecord(value: unknown): value is NotificationRecord {
  if (!isRecord(value)) return false;
  return (
    isNonEmptyString(value.cycleId) &&
    isNonEmptyString(value.participantId) &&
    typeof value.accountId === "string" &&
    typeof value.amount === "string" &&
    DECIMAL.test(value.amount) &&
    typeof value.currency === "string" &&
    isNonEmptyString(value.reference) &&
    typeof value.settledAt === "string" &&
    typeof value.receivedAt === "string"
  );
}

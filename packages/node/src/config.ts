/**
 * @closeout/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * The result is frozen and passed explicitly to everything that needs it.
 */

import { z } from "zod";
import { isRole } from "./types/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const BooleanFlag = z
  .enum(["true", "false"])
  .default("true")
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Settlement hub and central ledger
  HUB_BASE_URL: z.string().url(),
  LEDGER_URL: z.string().url(),
  REMOTE_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),
  REMOTE_RETRIES: z.coerce.number().int().min(0).max(5).default(0),

  // Reconciliation
  AMOUNT_TOLERANCE: z
    .string()
    .regex(/^\d+(\.\d+)?$/, "AMOUNT_TOLERANCE must be a non-negative decimal")
    .default("0.01"),

  // Notification ledger; in-memory when unset
  LEDGER_FILE: z.string().min(1).optional(),

  // Alerts; logged when no webhook is set
  ALERT_WEBHOOK_URL: z.string().url().optional(),
  NOTIFY_PARTIAL_PROGRESS: BooleanFlag,
  // Hub operator, told when a cycle closes. Comma-separated
  OPERATOR_ALERT_ADDRESSES: z
    .string()
    .default("")
    .transform((raw) =>
      raw
        .split(",")
        .map((address) => address.trim())
        .filter((address) => address !== ""),
    ),
});

export type AppConfig = Readonly<z.infer<typeof ConfigSchema>>;

// =============================================================================
// API Key Parsing
// =============================================================================

export type ParsedApiKey = ApiKeyRecord;

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1,key2:role2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role] = parts;
    if (parts.length !== 2 || key === undefined || role === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }

    keys.push({ key, role });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return Object.freeze(ConfigSchema.parse(env));
}

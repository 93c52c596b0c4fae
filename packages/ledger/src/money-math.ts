/**
 * @closeout/ledger — Deterministic decimal arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 * - Scale is chosen per operation from the operands
 */

import { LedgerError } from "./types.js";

const DECIMAL_FORMAT = /^-?\d+(\.\d+)?$/;

// ─── Internal Helpers ────────────────────────────────────────────────────

function checkFormat(amount: string): string {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();
  if (!DECIMAL_FORMAT.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }
  return trimmed;
}

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = checkFormat(amount);

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but scale allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Number of digits after the decimal point.
 */
export function fractionDigits(amount: string): number {
  const trimmed = checkFormat(amount);
  const dot = trimmed.indexOf(".");
  return dot === -1 ? 0 : trimmed.length - dot - 1;
}

/**
 * Canonical form: no leading zeros, no trailing fractional zeros, no "-0".
 *
 * "050000.00" → "50000", "-0.50" → "-0.5", "-0.00" → "0"
 */
export function normalizeAmount(amount: string): string {
  const decimals = fractionDigits(amount);
  const scaled = parseAmount(amount, decimals);
  const formatted = formatAmount(scaled, decimals);
  if (decimals === 0) {
    return formatted;
  }
  return formatted.replace(/0+$/, "").replace(/\.$/, "");
}

/**
 * Absolute value of a decimal string.
 */
export function absAmount(amount: string): string {
  const normalized = normalizeAmount(amount);
  return normalized.startsWith("-") ? normalized.slice(1) : normalized;
}

/**
 * Check if an amount is strictly greater than zero.
 */
export function isPositiveAmount(amount: string): boolean {
  return parseAmount(amount, fractionDigits(amount)) > 0n;
}

/**
 * Absolute difference between two amounts, as a decimal string.
 */
export function amountDifference(a: string, b: string): string {
  const scale = Math.max(fractionDigits(a), fractionDigits(b));
  const diff = parseAmount(a, scale) - parseAmount(b, scale);
  return normalizeAmount(formatAmount(diff < 0n ? -diff : diff, scale));
}

/**
 * Whether two amounts differ by at most `tolerance` (inclusive).
 *
 * withinTolerance("50000", "50000.01", "0.01") → true
 * withinTolerance("50000", "50000.02", "0.01") → false
 */
export function withinTolerance(a: string, b: string, tolerance: string): boolean {
  const scale = Math.max(fractionDigits(a), fractionDigits(b), fractionDigits(tolerance));
  const diff = parseAmount(a, scale) - parseAmount(b, scale);
  const abs = diff < 0n ? -diff : diff;
  const limit = parseAmount(tolerance, scale);
  if (limit < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Tolerance must not be negative: "${tolerance}"`);
  }
  return abs <= limit;
}

/**
 * Confirmation claim schema.
 *
 * Checks the shape of an inbound claim before any domain logic runs and
 * converts it to canonical form: string ids, normalized decimal amounts,
 * upper-case currency codes.
 */

import { z } from "zod";
import type { ZodError } from "zod";
import type { ConfirmationClaim } from "@closeout/types";
import { isPositiveAmount, normalizeAmount } from "@closeout/ledger";
import type { ClaimValidationError, FieldIssue, Result } from "./types.js";

const UNSIGNED_DECIMAL = /^\d+(\.\d+)?$/;

/**
 * Amount as a JSON number or decimal string. Numbers that only print in
 * exponent form (1e21, 1e-7) are refused rather than guessed at.
 */
const AmountSchema = z
  .union([z.number().finite(), z.string().trim()])
  .transform((value, ctx) => {
    const text = typeof value === "number" ? String(value) : value;
    if (!UNSIGNED_DECIMAL.test(text)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Amount must be a positive decimal",
      });
      return z.NEVER;
    }
    if (!isPositiveAmount(text)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Amount must be greater than zero",
      });
      return z.NEVER;
    }
    return normalizeAmount(text);
  });

export const ConfirmationClaimSchema = z.object({
  participantId: z
    .union([z.string().trim().min(1), z.number().int().nonnegative()])
    .transform((value) => String(value)),
  amount: AmountSchema,
  currency: z
    .string()
    .trim()
    .transform((value) => value.toUpperCase())
    .pipe(z.string().regex(/^[A-Z]{3}$/, "Currency must be a 3-letter ISO 4217 code")),
  reference: z.string().trim().min(1, "Reference is required"),
  // Offset optional: banks often report local time
  settledAt: z.string().datetime({ local: true, offset: true }).optional(),
});

export type ConfirmationClaimInput = z.input<typeof ConfirmationClaimSchema>;

export function formatClaimIssues(error: ZodError): readonly FieldIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Validate and normalize an inbound claim.
 */
export function parseConfirmationClaim(
  input: unknown,
): Result<ConfirmationClaim, ClaimValidationError> {
  const result = ConfirmationClaimSchema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return {
    ok: false,
    error: {
      code: "VALIDATION_ERROR",
      message: "Confirmation claim validation failed",
      issues: formatClaimIssues(result.error),
    },
  };
}

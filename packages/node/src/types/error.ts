/**
 * Error envelope returned by every failing endpoint:
 *
 *   { "error": { "code": "AMOUNT_MISMATCH", "message": "...", "details": { ... } } }
 *
 * Domain errors keep their own code; the codes below come from the HTTP
 * layer itself.
 */

import type { SettlementErrorCode } from "@closeout/settlement";

export type HttpErrorCode =
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

export type ApiErrorCode = HttpErrorCode | SettlementErrorCode;

export interface ErrorDetail {
  readonly code: ApiErrorCode | (string & {});
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorDetail["code"],
  message: string,
  details?: Readonly<Record<string, unknown>>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}

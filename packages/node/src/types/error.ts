/**
 * Error envelope for API responses.
 *
 * { error: { code, message, details? } }
 *
 * `code` is either a LedgerErrorCode raised by a ledger or one of the
 * transport-level codes below.
 */

import type { ErrorCategory, LedgerErrorCode } from "@vestline/gate";

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  readonly code: ApiErrorCode | LedgerErrorCode;
  readonly message: string;
  readonly category?: ErrorCategory | undefined;
  readonly details?: Record<string, unknown> | undefined;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode | LedgerErrorCode,
  message: string,
  details?: Record<string, unknown>,
  category?: ErrorCategory,
): ErrorEnvelope {
  return {
    error: {
      code,
      message,
      ...(category !== undefined ? { category } : {}),
      ...(details !== undefined ? { details } : {}),
    },
  };
}

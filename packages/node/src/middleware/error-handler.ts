/**
 * Global error handler.
 *
 * Ledger errors map to a status by category; validation failures to 400.
 * Anything else is a 500 with a generic message and is reported through
 * the optional callback.
 */

import type { Context, ErrorHandler } from "hono";
import { ZodError } from "zod";
import type { ErrorCategory } from "@vestline/gate";
import { isLedgerError } from "@vestline/gate";
import { createErrorEnvelope } from "../types/error.js";
import type { AppEnv } from "../types/api-contract.js";
import { formatZodIssues } from "./validate.js";

// =============================================================================
// Category → HTTP Status
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 503;

export const CATEGORY_STATUS: Readonly<Record<ErrorCategory, ErrorStatus>> = {
  authorization: 403,
  invalid_input: 400,
  invalid_reference: 404,
  state_conflict: 409,
  system_halted: 503,
};

export type UnexpectedErrorCallback = (error: Error, c: Context<AppEnv>) => void;

// =============================================================================
// Handler
// =============================================================================

export function createErrorHandler(
  onUnexpected?: UnexpectedErrorCallback,
): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (isLedgerError(err)) {
      return c.json(
        createErrorEnvelope(err.code, err.message, undefined, err.category),
        CATEGORY_STATUS[err.category],
      );
    }

    if (err instanceof ZodError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
          issues: formatZodIssues(err),
        }),
        400,
      );
    }

    onUnexpected?.(err, c);
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}

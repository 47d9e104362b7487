/**
 * @vestline/gate — Error taxonomy.
 *
 * Every failure a ledger raises is a LedgerError carrying a distinct
 * `code` and one of five categories. Callers and tests branch on the
 * code; transports map the category to a status.
 */

// ─── Categories ──────────────────────────────────────────────────────────

export type ErrorCategory =
  | "authorization"
  | "invalid_input"
  | "invalid_reference"
  | "state_conflict"
  | "system_halted";

// ─── Codes ───────────────────────────────────────────────────────────────

/** Error codes for ledger operations, mapped to their category. */
export const ERROR_CATEGORIES = {
  // Authorization
  NOT_AUTHORIZED: "authorization",
  NOT_BENEFICIARY: "authorization",
  CANNOT_ADD_SELF: "authorization",
  CANNOT_REMOVE_SELF: "authorization",

  // Invalid input
  INVALID_ADDRESS: "invalid_input",
  INVALID_BENEFICIARY: "invalid_input",
  INVALID_AMOUNT: "invalid_input",
  INVALID_DURATION: "invalid_input",
  CLIFF_EXCEEDS_DURATION: "invalid_input",
  START_TIME_IN_PAST: "invalid_input",
  INVALID_STATUS: "invalid_input",
  ARRAYS_LENGTH_MISMATCH: "invalid_input",
  EMPTY_BATCH: "invalid_input",

  // Invalid reference
  INVALID_ALLOCATION_ID: "invalid_reference",
  INVALID_SCHEDULE_ID: "invalid_reference",
  INVALID_AIRDROP_ID: "invalid_reference",
  ALLOCATION_BENEFICIARY_MISMATCH: "invalid_reference",
  ALLOCATION_REVOKED: "invalid_reference",

  // State conflict
  ALLOCATION_ALREADY_REVOKED: "state_conflict",
  SCHEDULE_TERMINATED: "state_conflict",
  NO_TOKENS_DUE: "state_conflict",
  AMOUNT_EXCEEDS_REMAINING: "state_conflict",
  INSUFFICIENT_ALLOCATION: "state_conflict",
  NOTHING_TO_REVOKE: "state_conflict",
  MAX_SUPPLY_EXCEEDED: "state_conflict",
  INSUFFICIENT_BALANCE: "state_conflict",
  REENTRANT_CALL: "state_conflict",

  // Halted
  LEDGER_PAUSED: "system_halted",
} as const satisfies Record<string, ErrorCategory>;

export type LedgerErrorCode = keyof typeof ERROR_CATEGORIES;

/**
 * Structured error from a ledger.
 * Thrown, never returned as a status value.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

/**
 * @vestline/gate — Authorization, circuit breaking and error taxonomy.
 *
 * Shared by every ledger:
 * - LedgerError: one distinct code per failure, grouped in five categories
 * - AccessGate: role membership and the pause flag
 * - ReentrancyGuard: whole-ledger mutual exclusion
 * - EventOutbox: commit-or-discard event publication
 *
 * Every mutating entry point checks, in order:
 * pause → role → input validation → state invariants.
 */

export { LedgerError, isLedgerError, ERROR_CATEGORIES } from "./errors.js";
export type { ErrorCategory, LedgerErrorCode } from "./errors.js";

export { AccessGate, ADMIN_ROLE } from "./access-gate.js";
export type { AccessGateSnapshot, AdminRole } from "./access-gate.js";

export { ReentrancyGuard } from "./reentrancy.js";

export { EventOutbox } from "./outbox.js";
export type { Emit } from "./outbox.js";

export { systemClock, ManualClock } from "./clock.js";

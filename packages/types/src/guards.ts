/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, restored snapshots, journal appends).
 */

import type { Address } from "./identity.js";
import type { ScheduleStatus } from "./records.js";
import type {
  EventMetadata,
  LedgerEvent,
  LedgerEventSource,
  LedgerEventType,
} from "./event.js";

// =============================================================================
// Identity guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;

/** True for a normalized (lower-case) address. */
export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/** A non-negative integer written in base 10 without sign or fraction. */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

// =============================================================================
// Record guards
// =============================================================================

const SCHEDULE_STATUSES = new Set<string>(["active", "completed", "revoked"]);

export function isScheduleStatus(value: unknown): value is ScheduleStatus {
  return typeof value === "string" && SCHEDULE_STATUSES.has(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["allocation", "vesting", "token"]);

const EVENT_TYPES = new Set<string>([
  "allocation.created",
  "allocation.revoked",
  "allocation.reduced",
  "airdrop.executed",
  "manager.assigned",
  "manager.removed",
  "role.granted",
  "role.revoked",
  "ledger.paused",
  "ledger.unpaused",
  "vesting.schedule_created",
  "vesting.tokens_released",
  "vesting.manual_unlock",
  "vesting.schedule_revoked",
  "vesting.totals_updated",
  "vesting.allocation_sync_failed",
  "token.minted",
  "token.burned",
  "token.transferred",
] satisfies LedgerEventType[]);

export function isLedgerEventSource(value: unknown): value is LedgerEventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isLedgerEventType(value: unknown): value is LedgerEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    v.eventId.length > 0 &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isLedgerEventSource(v.source)
  );
}

/**
 * Structural check of the envelope. Payload contents are trusted to match
 * the type, since only the ledgers construct events.
 */
export function isLedgerEvent(value: unknown): value is LedgerEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isLedgerEventType(v.type) &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}

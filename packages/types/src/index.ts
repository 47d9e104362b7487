/**
 * @vestline/types — Shared domain types for the vesting stack.
 *
 * These types are used across all Vestline packages:
 * - Addresses and sequential record ids
 * - Allocation and vesting schedule records
 * - Ledger events
 * - Capability ports between ledgers
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Ids are branded; 0 is always the "none" sentinel
 */

// Identity
export type { Address, AllocationId, ScheduleId, AirdropId } from "./identity.js";
export {
  toAddress,
  isZeroAddress,
  ZERO_ADDRESS,
  allocationId,
  scheduleId,
  airdropId,
  NO_ALLOCATION,
  NO_AIRDROP,
} from "./identity.js";

// Records
export type {
  Allocation,
  VestingSchedule,
  ScheduleStatus,
  SchedulePhase,
} from "./records.js";
export { isTerminal } from "./records.js";

// Events
export type {
  EventMetadata,
  EventSink,
  LedgerEvent,
  LedgerEventDraft,
  LedgerEventPayloads,
  LedgerEventSource,
  LedgerEventType,
} from "./event.js";

// Ports
export type {
  Clock,
  MintEntry,
  TokenPort,
  ManagerRegistry,
  AllocationPort,
} from "./ports.js";

// Runtime type guards
export {
  isAddress,
  isAmountString,
  isScheduleStatus,
  isLedgerEventSource,
  isLedgerEventType,
  isEventMetadata,
  isLedgerEvent,
} from "./guards.js";

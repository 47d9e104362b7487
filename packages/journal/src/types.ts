/**
 * @vestline/journal — Core types.
 *
 * Design principles:
 * - Entries are immutable after append
 * - Positions are contiguous from 1 with no gaps
 * - Every entry links to its predecessor by hash
 */

import type { LedgerEvent, LedgerEventSource, LedgerEventType } from "@vestline/types";

// =============================================================================
// Entries
// =============================================================================

/**
 * A ledger event as recorded in the journal.
 */
export interface JournalEntry {
  readonly event: LedgerEvent;

  /** Position across the whole journal (1-based) */
  readonly position: number;

  /** Hash of the preceding entry, or GENESIS_HASH */
  readonly previousHash: string;

  /** SHA-256 over the canonical entry content and previousHash */
  readonly hash: string;
}

// =============================================================================
// Reads
// =============================================================================

export type ReadDirection = "forward" | "backward";

/**
 * Filters for reading the journal. All filters combine with AND.
 */
export interface JournalReadOptions {
  /** Start from this position (inclusive). Default: 1, or the head when reading backward */
  readonly fromPosition?: number | undefined;

  readonly maxCount?: number | undefined;

  /** Default: "forward" */
  readonly direction?: ReadDirection | undefined;

  readonly source?: LedgerEventSource | undefined;
  readonly type?: LedgerEventType | undefined;
  readonly correlationId?: string | undefined;

  /** Matches the event's actor */
  readonly actor?: string | undefined;
}

// =============================================================================
// Subscriptions
// =============================================================================

export type JournalHandler = (entry: JournalEntry) => void;

export interface Subscription {
  unsubscribe(): void;
}

/**
 * Called when a subscriber throws. The entry is already recorded.
 */
export type HandlerErrorCallback = (error: unknown, entry: JournalEntry) => void;

export interface EventJournalOptions {
  readonly onHandlerError?: HandlerErrorCallback | undefined;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface JournalIntegrityResult {
  readonly valid: boolean;

  /** Last position whose link and hash both checked out, in an unbroken run from 1 */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type JournalErrorCode = "INVALID_EVENT" | "INVALID_POSITION" | "SUBSCRIBER_FAILED";

export class JournalError extends Error {
  constructor(
    public readonly code: JournalErrorCode,
    message: string,
    public readonly position?: number,
  ) {
    super(message);
    this.name = "JournalError";
  }
}

/**
 * @vestline/journal — Append-only record of ledger events.
 *
 * Provides:
 * - EventJournal: the EventSink the ledgers publish to
 * - Hash chain: RFC 8785 + SHA-256 links between entries
 * - Filtered reads and subscriptions
 */

export { EventJournal } from "./event-journal.js";
export { computeEntryHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export { JournalError } from "./types.js";
export type {
  JournalEntry,
  JournalReadOptions,
  ReadDirection,
  JournalHandler,
  Subscription,
  HandlerErrorCallback,
  EventJournalOptions,
  IntegrityError,
  JournalIntegrityResult,
  JournalErrorCode,
} from "./types.js";

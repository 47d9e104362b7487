/**
 * @vestline/journal — In-memory event journal.
 *
 * The EventSink every ledger publishes to. Appends each event at the
 * next global position, links it into the hash chain and dispatches it
 * synchronously to subscribers.
 *
 * Properties:
 * - O(1) append
 * - O(n) filtered read
 * - Subscribers see entries in position order
 * - A throwing subscriber never un-records an entry
 */

import type { EventSink, LedgerEvent } from "@vestline/types";
import { isLedgerEvent } from "@vestline/types";
import { computeEntryHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type {
  EventJournalOptions,
  HandlerErrorCallback,
  JournalEntry,
  JournalHandler,
  JournalIntegrityResult,
  JournalReadOptions,
  Subscription,
} from "./types.js";
import { JournalError } from "./types.js";

interface Subscriber {
  readonly handler: JournalHandler;
  readonly filter: JournalReadOptions;
}

function matches(entry: JournalEntry, filter: JournalReadOptions): boolean {
  const { event } = entry;
  if (filter.source !== undefined && event.metadata.source !== filter.source) return false;
  if (filter.type !== undefined && event.type !== filter.type) return false;
  if (filter.correlationId !== undefined && event.metadata.correlationId !== filter.correlationId) {
    return false;
  }
  if (filter.actor !== undefined && event.metadata.actor !== filter.actor) return false;
  return true;
}

export class EventJournal implements EventSink {
  private readonly _entries: JournalEntry[] = [];
  private readonly _subscribers = new Set<Subscriber>();
  private readonly _onHandlerError: HandlerErrorCallback | undefined;
  private _lastHash: string = GENESIS_HASH;

  constructor(options: EventJournalOptions = {}) {
    this._onHandlerError = options.onHandlerError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  publish(event: LedgerEvent): void {
    this.append(event);
  }

  append(event: LedgerEvent): JournalEntry {
    if (!isLedgerEvent(event)) {
      throw new JournalError("INVALID_EVENT", "Refusing to record a malformed ledger event");
    }

    const position = this._entries.length + 1;
    const previousHash = this._lastHash;
    const entry: JournalEntry = {
      event,
      position,
      previousHash,
      hash: computeEntryHash(event, position, previousHash),
    };

    this._entries.push(entry);
    this._lastHash = entry.hash;
    this._dispatch(entry);
    return entry;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(options: JournalReadOptions = {}): readonly JournalEntry[] {
    const direction = options.direction ?? "forward";
    const fromPosition =
      options.fromPosition ?? (direction === "forward" ? 1 : this._entries.length);
    if (!Number.isSafeInteger(fromPosition) || fromPosition < 0) {
      throw new JournalError(
        "INVALID_POSITION",
        `fromPosition must be a non-negative integer, got ${fromPosition}`,
      );
    }

    let result =
      direction === "forward"
        ? this._entries.filter((e) => e.position >= fromPosition)
        : this._entries.filter((e) => e.position <= fromPosition).reverse();

    result = result.filter((e) => matches(e, options));

    const { maxCount } = options;
    if (maxCount !== undefined && maxCount >= 0) {
      result = result.slice(0, maxCount);
    }
    return result;
  }

  /** Every recorded event, in position order. */
  events(): readonly LedgerEvent[] {
    return this._entries.map((e) => e.event);
  }

  get(position: number): JournalEntry | undefined {
    return this._entries[position - 1];
  }

  /** Position of the last entry, or 0 when empty. */
  get position(): number {
    return this._entries.length;
  }

  get headHash(): string {
    return this._lastHash;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  /**
   * Receive every future entry matching `filter`.
   */
  subscribe(handler: JournalHandler, filter: JournalReadOptions = {}): Subscription {
    const subscriber: Subscriber = { handler, filter };
    this._subscribers.add(subscriber);
    return {
      unsubscribe: () => {
        this._subscribers.delete(subscriber);
      },
    };
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): JournalIntegrityResult {
    return verifyHashChain(this._entries);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _dispatch(entry: JournalEntry): void {
    const failures: unknown[] = [];
    for (const { handler, filter } of [...this._subscribers]) {
      if (!matches(entry, filter)) continue;
      try {
        handler(entry);
      } catch (error) {
        if (this._onHandlerError === undefined) {
          failures.push(error);
        } else {
          this._onHandlerError(error, entry);
        }
      }
    }

    if (failures.length > 0) {
      throw new JournalError(
        "SUBSCRIBER_FAILED",
        `${failures.length} subscriber(s) failed on entry ${entry.position}`,
        entry.position,
      );
    }
  }
}

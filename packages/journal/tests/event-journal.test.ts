/**
 * Tests for EventJournal — append, filtered reads, subscriptions.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { LedgerEvent } from "@vestline/types";
import { EventJournal } from "../src/event-journal.js";
import { GENESIS_HASH } from "../src/hash-chain.js";
import { JournalError } from "../src/types.js";
import type { JournalEntry } from "../src/types.js";
import { ADMIN, ALICE, allocationCreated, tokenMinted, tokensReleased } from "./fixtures.js";

describe("EventJournal", () => {
  let journal: EventJournal;

  beforeEach(() => {
    journal = new EventJournal();
  });

  // ─── Append ─────────────────────────────────────────────────────────

  describe("append", () => {
    it("assigns contiguous positions from 1", () => {
      const first = journal.append(allocationCreated(1));
      const second = journal.append(allocationCreated(2));
      expect(first.position).toBe(1);
      expect(second.position).toBe(2);
      expect(journal.position).toBe(2);
    });

    it("links each entry to its predecessor", () => {
      const first = journal.append(allocationCreated(1));
      const second = journal.append(allocationCreated(2));
      expect(first.previousHash).toBe(GENESIS_HASH);
      expect(second.previousHash).toBe(first.hash);
      expect(journal.headHash).toBe(second.hash);
    });

    it("is what publish does", () => {
      journal.publish(tokenMinted("5"));
      expect(journal.events().map((e) => e.type)).toEqual(["token.minted"]);
    });

    it("refuses malformed events", () => {
      const bad: LedgerEvent = JSON.parse('{"type":"nope","metadata":{},"payload":{}}');
      expect(() => journal.append(bad)).toThrow(JournalError);
      expect(journal.position).toBe(0);
    });
  });

  // ─── Read ───────────────────────────────────────────────────────────

  describe("read", () => {
    beforeEach(() => {
      journal.append(allocationCreated(1, "corr-1"));
      journal.append(tokenMinted("100", "corr-2"));
      journal.append(tokensReleased("100", "corr-2"));
      journal.append(allocationCreated(2, "corr-3"));
    });

    it("reads everything forward by default", () => {
      expect(journal.read().map((e) => e.position)).toEqual([1, 2, 3, 4]);
    });

    it("reads backward from the head", () => {
      expect(journal.read({ direction: "backward" }).map((e) => e.position)).toEqual([4, 3, 2, 1]);
    });

    it("starts from a position and caps the count", () => {
      expect(journal.read({ fromPosition: 2, maxCount: 2 }).map((e) => e.position)).toEqual([2, 3]);
    });

    it("filters by source, type, correlation id and actor", () => {
      expect(journal.read({ source: "allocation" }).map((e) => e.position)).toEqual([1, 4]);
      expect(journal.read({ type: "token.minted" }).map((e) => e.position)).toEqual([2]);
      expect(journal.read({ correlationId: "corr-2" }).map((e) => e.position)).toEqual([2, 3]);
      expect(journal.read({ actor: ALICE }).map((e) => e.position)).toEqual([3]);
      expect(journal.read({ actor: ADMIN, source: "token" }).map((e) => e.position)).toEqual([2]);
    });

    it("applies maxCount after filtering", () => {
      expect(
        journal.read({ source: "allocation", maxCount: 1, direction: "backward" }).map(
          (e) => e.position,
        ),
      ).toEqual([4]);
    });

    it("rejects a negative start", () => {
      expect(() => journal.read({ fromPosition: -1 })).toThrow(JournalError);
    });

    it("looks entries up by position", () => {
      expect(journal.get(2)?.event.type).toBe("token.minted");
      expect(journal.get(9)).toBeUndefined();
    });
  });

  // ─── Subscriptions ──────────────────────────────────────────────────

  describe("subscribe", () => {
    it("delivers new entries in order", () => {
      const seen: number[] = [];
      journal.subscribe((entry) => seen.push(entry.position));
      journal.append(allocationCreated(1));
      journal.append(allocationCreated(2));
      expect(seen).toEqual([1, 2]);
    });

    it("honors the filter", () => {
      const seen: string[] = [];
      journal.subscribe((entry) => seen.push(entry.event.type), { source: "vesting" });
      journal.append(allocationCreated(1));
      journal.append(tokensReleased("1"));
      expect(seen).toEqual(["vesting.tokens_released"]);
    });

    it("stops after unsubscribe", () => {
      const seen: number[] = [];
      const sub = journal.subscribe((entry) => seen.push(entry.position));
      journal.append(allocationCreated(1));
      sub.unsubscribe();
      journal.append(allocationCreated(2));
      expect(seen).toEqual([1]);
    });

    it("keeps the entry and reports a throwing subscriber", () => {
      const failures: Array<[unknown, JournalEntry]> = [];
      journal = new EventJournal({ onHandlerError: (error, entry) => failures.push([error, entry]) });
      const later: number[] = [];
      journal.subscribe(() => {
        throw new Error("subscriber down");
      });
      journal.subscribe((entry) => later.push(entry.position));

      journal.append(allocationCreated(1));
      expect(journal.position).toBe(1);
      expect(later).toEqual([1]);
      expect(failures).toHaveLength(1);
      expect(failures[0]?.[1].position).toBe(1);
    });

    it("throws after recording when no error callback is set", () => {
      journal.subscribe(() => {
        throw new Error("subscriber down");
      });
      expect(() => journal.append(allocationCreated(1))).toThrow(
        "1 subscriber(s) failed on entry 1",
      );
      expect(journal.position).toBe(1);
    });
  });

  // ─── Integrity ──────────────────────────────────────────────────────

  describe("verifyIntegrity", () => {
    it("is valid for an empty journal", () => {
      expect(journal.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
    });

    it("is valid after appends", () => {
      journal.append(allocationCreated(1));
      journal.append(tokenMinted("1"));
      expect(journal.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 2, errors: [] });
    });
  });
});

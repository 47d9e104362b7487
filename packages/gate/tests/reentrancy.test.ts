/**
 * Tests for ReentrancyGuard and EventOutbox.
 */

import { describe, it, expect } from "vitest";
import { toAddress } from "@vestline/types";
import type { EventSink, LedgerEvent } from "@vestline/types";
import { ReentrancyGuard } from "../src/reentrancy.js";
import { EventOutbox } from "../src/outbox.js";
import { ManualClock } from "../src/clock.js";
import { captureError } from "./helpers.js";

const ALICE = toAddress("0x00000000000000000000000000000000000a11ce");

class ArraySink implements EventSink {
  readonly events: LedgerEvent[] = [];
  publish(event: LedgerEvent): void {
    this.events.push(event);
  }
}

describe("ReentrancyGuard", () => {
  it("returns the operation's result", () => {
    const guard = new ReentrancyGuard();
    expect(guard.enter(() => 42)).toBe(42);
    expect(guard.entered).toBe(false);
  });

  it("rejects nested entry", () => {
    const guard = new ReentrancyGuard();
    expect(captureError(() => guard.enter(() => guard.enter(() => 1)))).toMatchObject({ code: "REENTRANT_CALL" });
  });

  it("releases the lock after a throw", () => {
    const guard = new ReentrancyGuard();
    expect(() =>
      guard.enter(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(guard.entered).toBe(false);
    expect(guard.enter(() => "again")).toBe("again");
  });
});

describe("EventOutbox", () => {
  it("publishes staged events with shared metadata after the operation returns", () => {
    const sink = new ArraySink();
    const outbox = new EventOutbox("allocation", new ManualClock(1_900_000_000), sink);

    outbox.transaction(ALICE, (emit) => {
      emit({ type: "manager.assigned", payload: { account: ALICE } });
      emit({ type: "manager.removed", payload: { account: ALICE } });
      expect(sink.events).toHaveLength(0);
    });

    expect(sink.events).toHaveLength(2);
    const [first, second] = sink.events;
    expect(first!.metadata.correlationId).toBe(second!.metadata.correlationId);
    expect(first!.metadata.eventId).not.toBe(second!.metadata.eventId);
    expect(first!.metadata.actor).toBe(ALICE);
    expect(first!.metadata.source).toBe("allocation");
    expect(first!.metadata.timestamp).toBe("2030-03-17T17:46:40.000Z");
  });

  it("drops staged events when the operation throws", () => {
    const sink = new ArraySink();
    const outbox = new EventOutbox("vesting", new ManualClock(0), sink);

    expect(() =>
      outbox.transaction(ALICE, (emit) => {
        emit({ type: "manager.assigned", payload: { account: ALICE } });
        throw new Error("rolled back");
      }),
    ).toThrow("rolled back");

    expect(sink.events).toHaveLength(0);
  });

  it("works without a sink", () => {
    const outbox = new EventOutbox("token", new ManualClock(0));
    expect(
      outbox.transaction(ALICE, (emit) => {
        emit({ type: "ledger.paused", payload: { ledger: "token" } });
        return "done";
      }),
    ).toBe("done");
  });
});

describe("ManualClock", () => {
  it("moves only when told to", () => {
    const clock = new ManualClock(100);
    expect(clock.now()).toBe(100);
    expect(clock.advance(50)).toBe(150);
    clock.set(10);
    expect(clock.now()).toBe(10);
  });
});

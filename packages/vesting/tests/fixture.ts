/**
 * Shared wiring for vesting tests: a token, an allocation ledger and an
 * engine on one manual clock, all publishing to one sink.
 */

import { toAddress, scheduleId, NO_ALLOCATION } from "@vestline/types";
import type { EventSink, LedgerEvent, VestingSchedule } from "@vestline/types";
import { ManualClock } from "@vestline/gate";
import { InMemoryTokenLedger } from "@vestline/token";
import { AllocationLedger } from "@vestline/allocation";
import { VestingEngine } from "../src/vesting-engine.js";
import type { CreateScheduleParams } from "../src/types.js";

export const T0 = 1_900_000_000;

export const ADMIN = toAddress("0x00000000000000000000000000000000000ad000");
export const ENGINE = toAddress("0x0000000000000000000000000000000000e11e00");
export const VAULT = toAddress("0x000000000000000000000000000000000000fa17");
export const MANAGER = toAddress("0x000000000000000000000000000000000000beef");
export const ALICE = toAddress("0x00000000000000000000000000000000000a11ce");
export const BOB = toAddress("0x0000000000000000000000000000000000000b0b");

export class ArraySink implements EventSink {
  readonly events: LedgerEvent[] = [];
  publish(event: LedgerEvent): void {
    this.events.push(event);
  }
  types(): string[] {
    return this.events.map((e) => e.type);
  }
  clear(): void {
    this.events.length = 0;
  }
}

export interface Fixture {
  readonly clock: ManualClock;
  readonly sink: ArraySink;
  readonly token: InMemoryTokenLedger;
  readonly allocations: AllocationLedger;
  readonly engine: VestingEngine;
}

export function createFixture(): Fixture {
  const clock = new ManualClock(T0);
  const sink = new ArraySink();
  const token = new InMemoryTokenLedger({
    admin: ADMIN,
    symbol: "VEST",
    decimals: 18,
    maxSupply: 10n ** 30n,
    clock,
    events: sink,
  });
  const allocations = new AllocationLedger({
    admin: ADMIN,
    clock,
    token: token.asMinter(VAULT),
    events: sink,
  });
  const engine = new VestingEngine({
    admin: ADMIN,
    clock,
    token: token.asMinter(ENGINE),
    allocations,
    managers: allocations,
    engineAddress: ENGINE,
    events: sink,
  });

  token.grantMinter(ADMIN, ENGINE);
  token.grantMinter(ADMIN, VAULT);
  allocations.addManager(ADMIN, ENGINE);
  allocations.addManager(ADMIN, MANAGER);
  sink.clear();

  return { clock, sink, token, allocations, engine };
}

/** 1000 tokens to ALICE over 1000s from T0, no cliff, unlinked. */
export function scheduleParams(overrides: Partial<CreateScheduleParams> = {}): CreateScheduleParams {
  return {
    beneficiary: ALICE,
    totalAmount: 1000n,
    startTime: T0,
    cliffDuration: 0,
    duration: 1000,
    allocationId: NO_ALLOCATION,
    ...overrides,
  };
}

/** A bare schedule record for the pure math. */
export function schedule(overrides: Partial<VestingSchedule> = {}): VestingSchedule {
  return {
    id: scheduleId(1),
    beneficiary: ALICE,
    totalAmount: 1000n,
    startTime: T0,
    cliffDuration: 0,
    duration: 1000,
    releasedAmount: 0n,
    createdAt: T0,
    allocationId: NO_ALLOCATION,
    status: "active",
    ...overrides,
  };
}

/**
 * Tests for the reporting queries.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { buildClaimHistory, findUnclaimedWallets, summarizeBeneficiary } from "../src/reports.js";
import { ADMIN, ALICE, BOB, MANAGER, T0, createFixture, scheduleParams } from "./fixture.js";
import type { Fixture } from "./fixture.js";

describe("reports", () => {
  let fx: Fixture;

  beforeEach(() => {
    fx = createFixture();
  });

  describe("summarizeBeneficiary", () => {
    it("totals a wallet's schedules", () => {
      const first = fx.engine.createVestingSchedule(ADMIN, scheduleParams());
      fx.engine.createVestingSchedule(ADMIN, scheduleParams({ totalAmount: 500n, cliffDuration: 600 }));
      fx.clock.set(T0 + 400);
      fx.engine.claimVestedTokens(ALICE, first);
      fx.clock.set(T0 + 500);

      const summary = summarizeBeneficiary(fx.engine.listSchedules(), ALICE, fx.clock.now());
      expect(summary).toMatchObject({
        beneficiary: ALICE,
        totalAllocated: 1500n,
        totalClaimed: 400n,
        totalUnclaimed: 1100n,
        claimableAmount: 100n,
        hasUnclaimed: true,
      });
      expect(summary.schedules.map((s) => s.phase)).toEqual(["vesting", "pending"]);
      expect(summary.schedules[1]).toEqual({
        scheduleId: 2,
        totalAmount: 500n,
        releasedAmount: 0n,
        remainingAmount: 500n,
        claimableAmount: 0n,
        phase: "pending",
        startTime: T0,
        cliffEndTime: T0 + 600,
        vestingEndTime: T0 + 1000,
      });
    });

    it("counts only the released part of a revoked schedule", () => {
      const id = fx.engine.createVestingSchedule(ADMIN, scheduleParams());
      fx.clock.set(T0 + 300);
      fx.engine.claimVestedTokens(ALICE, id);
      fx.engine.forceRevokeSchedule(ADMIN, id);

      expect(summarizeBeneficiary(fx.engine.listSchedules(), ALICE, T0 + 900)).toMatchObject({
        totalAllocated: 300n,
        totalClaimed: 300n,
        totalUnclaimed: 0n,
        claimableAmount: 0n,
        hasUnclaimed: false,
      });
    });

    it("returns zeros for an unknown wallet", () => {
      expect(summarizeBeneficiary([], BOB, T0)).toEqual({
        beneficiary: BOB,
        totalAllocated: 0n,
        totalClaimed: 0n,
        totalUnclaimed: 0n,
        claimableAmount: 0n,
        hasUnclaimed: false,
        schedules: [],
      });
    });
  });

  describe("findUnclaimedWallets", () => {
    it("lists wallets with active schedules and no releases", () => {
      const alice = fx.engine.createVestingSchedule(ADMIN, scheduleParams());
      fx.engine.createVestingSchedule(ADMIN, scheduleParams({ beneficiary: BOB }));
      fx.engine.createVestingSchedule(ADMIN, scheduleParams({ beneficiary: MANAGER }));
      fx.clock.set(T0 + 100);
      fx.engine.claimVestedTokens(ALICE, alice);
      fx.engine.batchForceRevoke(ADMIN, [3]);

      const unclaimed = findUnclaimedWallets(fx.engine.listSchedules(), T0 + 100);
      expect(unclaimed.map((w) => w.beneficiary)).toEqual([BOB]);
      expect(unclaimed[0]?.claimableAmount).toBe(100n);
    });

    it("groups interleaved schedules per wallet in first-seen order", () => {
      fx.engine.createVestingSchedule(ADMIN, scheduleParams({ beneficiary: BOB }));
      fx.engine.createVestingSchedule(ADMIN, scheduleParams());
      fx.engine.createVestingSchedule(ADMIN, scheduleParams({ beneficiary: BOB, totalAmount: 2000n }));

      const unclaimed = findUnclaimedWallets(fx.engine.listSchedules(), T0 + 300);
      expect(unclaimed.map((w) => w.beneficiary)).toEqual([BOB, ALICE]);
      expect(unclaimed[0]?.schedules.map((s) => s.scheduleId)).toEqual([1, 3]);
      expect(unclaimed[0]?.totalAllocated).toBe(3000n);
      expect(unclaimed[1]?.totalAllocated).toBe(1000n);
    });

    it("is empty when there are no schedules", () => {
      expect(findUnclaimedWallets([], T0)).toEqual([]);
    });
  });

  describe("buildClaimHistory", () => {
    it("rebuilds claims and unlocks from events", () => {
      const alice = fx.engine.createVestingSchedule(ADMIN, scheduleParams());
      const bob = fx.engine.createVestingSchedule(ADMIN, scheduleParams({ beneficiary: BOB }));
      fx.clock.set(T0 + 200);
      fx.engine.claimVestedTokens(ALICE, alice);
      fx.engine.manualUnlock(MANAGER, bob, 50n);
      fx.clock.set(T0 + 1000);
      fx.engine.claimVestedTokens(ALICE, alice);

      const history = buildClaimHistory(fx.sink.events);
      expect(history.map((h) => [h.kind, h.beneficiary, h.amount, h.completed])).toEqual([
        ["claim", ALICE, 200n, false],
        ["manual_unlock", BOB, 50n, false],
        ["claim", ALICE, 800n, true],
      ]);
      expect(history[1]).toMatchObject({
        scheduleId: 2,
        actor: MANAGER,
        releasedAmount: 50n,
        timestamp: new Date((T0 + 200) * 1000).toISOString(),
      });
    });

    it("filters to one wallet", () => {
      const alice = fx.engine.createVestingSchedule(ADMIN, scheduleParams());
      const bob = fx.engine.createVestingSchedule(ADMIN, scheduleParams({ beneficiary: BOB }));
      fx.clock.set(T0 + 500);
      fx.engine.claimVestedTokens(ALICE, alice);
      fx.engine.claimVestedTokens(BOB, bob);

      const history = buildClaimHistory(fx.sink.events, BOB);
      expect(history).toHaveLength(1);
      expect(history[0]?.scheduleId).toBe(bob);
    });
  });
});

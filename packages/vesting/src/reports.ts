/**
 * Reporting queries.
 *
 * Read-only views over schedules and the event history: who has not
 * claimed, what each wallet is owed, and when claims happened.
 * Every function is pure; callers pass the schedules, events and time.
 */

import type {
  Address,
  LedgerEvent,
  SchedulePhase,
  ScheduleId,
  VestingSchedule,
} from "@vestline/types";
import { isTerminal, toAddress } from "@vestline/types";
import { cliffEnd, computeReleasable, schedulePhase, vestingEnd } from "./releasable.js";

// =============================================================================
// Types
// =============================================================================

export interface ScheduleDetail {
  readonly scheduleId: ScheduleId;
  readonly totalAmount: bigint;
  readonly releasedAmount: bigint;
  readonly remainingAmount: bigint;
  readonly claimableAmount: bigint;
  readonly phase: SchedulePhase;
  readonly startTime: number;
  readonly cliffEndTime: number;
  readonly vestingEndTime: number;
}

export interface BeneficiarySummary {
  readonly beneficiary: Address;
  readonly totalAllocated: bigint;
  readonly totalClaimed: bigint;
  /** Allocated but not yet released, on active schedules only. */
  readonly totalUnclaimed: bigint;
  readonly claimableAmount: bigint;
  readonly hasUnclaimed: boolean;
  readonly schedules: readonly ScheduleDetail[];
}

export type ClaimKind = "claim" | "manual_unlock";

export interface ClaimRecord {
  readonly eventId: string;
  readonly timestamp: string;
  readonly kind: ClaimKind;
  readonly scheduleId: number;
  readonly beneficiary: Address;
  readonly actor: string;
  readonly amount: bigint;
  readonly releasedAmount: bigint;
  readonly completed: boolean;
}

// =============================================================================
// Summaries
// =============================================================================

function detail(schedule: VestingSchedule, now: number): ScheduleDetail {
  return {
    scheduleId: schedule.id,
    totalAmount: schedule.totalAmount,
    releasedAmount: schedule.releasedAmount,
    remainingAmount: schedule.totalAmount - schedule.releasedAmount,
    claimableAmount: computeReleasable(schedule, now),
    phase: schedulePhase(schedule, now),
    startTime: schedule.startTime,
    cliffEndTime: cliffEnd(schedule),
    vestingEndTime: vestingEnd(schedule),
  };
}

/**
 * Totals for one wallet across every schedule it owns. Revoked
 * schedules count their released amount as allocated and nothing as
 * unclaimed.
 */
export function summarizeBeneficiary(
  schedules: readonly VestingSchedule[],
  beneficiary: Address,
  now: number,
): BeneficiarySummary {
  return summarize(
    beneficiary,
    schedules.filter((s) => s.beneficiary === beneficiary),
    now,
  );
}

function summarize(
  beneficiary: Address,
  owned: readonly VestingSchedule[],
  now: number,
): BeneficiarySummary {
  let totalAllocated = 0n;
  let totalClaimed = 0n;
  let totalUnclaimed = 0n;
  let claimableAmount = 0n;
  for (const schedule of owned) {
    totalClaimed += schedule.releasedAmount;
    if (schedule.status === "revoked") {
      totalAllocated += schedule.releasedAmount;
      continue;
    }
    totalAllocated += schedule.totalAmount;
    totalUnclaimed += schedule.totalAmount - schedule.releasedAmount;
    claimableAmount += computeReleasable(schedule, now);
  }

  return {
    beneficiary,
    totalAllocated,
    totalClaimed,
    totalUnclaimed,
    claimableAmount,
    hasUnclaimed: totalUnclaimed > 0n,
    schedules: owned.map((s) => detail(s, now)),
  };
}

/**
 * Wallets holding at least one active schedule that have never
 * released anything, in order of their first schedule.
 */
export function findUnclaimedWallets(
  schedules: readonly VestingSchedule[],
  now: number,
): BeneficiarySummary[] {
  // Map iteration keeps first-insertion order
  const byWallet = new Map<Address, VestingSchedule[]>();
  for (const schedule of schedules) {
    const owned = byWallet.get(schedule.beneficiary);
    if (owned === undefined) byWallet.set(schedule.beneficiary, [schedule]);
    else owned.push(schedule);
  }

  const result: BeneficiarySummary[] = [];
  for (const [wallet, owned] of byWallet) {
    const unclaimed =
      owned.some((s) => !isTerminal(s.status)) && owned.every((s) => s.releasedAmount === 0n);
    if (unclaimed) result.push(summarize(wallet, owned, now));
  }
  return result;
}

// =============================================================================
// Claim history
// =============================================================================

/**
 * Claims and manual unlocks in event order, optionally for one wallet.
 */
export function buildClaimHistory(
  events: readonly LedgerEvent[],
  beneficiary?: Address,
): ClaimRecord[] {
  const history: ClaimRecord[] = [];
  for (const event of events) {
    if (event.type !== "vesting.tokens_released" && event.type !== "vesting.manual_unlock") {
      continue;
    }
    const owner = toAddress(event.payload.beneficiary);
    if (beneficiary !== undefined && owner !== beneficiary) continue;

    history.push({
      eventId: event.metadata.eventId,
      timestamp: event.metadata.timestamp,
      kind: event.type === "vesting.tokens_released" ? "claim" : "manual_unlock",
      scheduleId: event.payload.scheduleId,
      beneficiary: owner,
      actor: event.metadata.actor,
      amount: BigInt(event.payload.amount),
      releasedAmount: BigInt(event.payload.releasedAmount),
      completed: event.payload.completed,
    });
  }
  return history;
}

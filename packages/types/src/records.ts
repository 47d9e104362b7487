/**
 * Ledger Records
 *
 * The two record kinds the core owns: allocations and vesting schedules.
 *
 * Rules:
 * - Amounts are bigint in the token's smallest unit
 * - Times are unix seconds
 * - Records are never deleted; terminal state is a status, not a removal
 */

import type { Address, AirdropId, AllocationId, ScheduleId } from "./identity.js";

/**
 * A reserved, revocable quantity of tokens earmarked for one beneficiary.
 */
export interface Allocation {
  readonly id: AllocationId;

  /** Remaining allocated quantity. Only ever decreases. */
  readonly amount: bigint;

  readonly beneficiary: Address;

  /** Once true the remaining amount is frozen and unusable. */
  readonly revoked: boolean;

  /** Airdrop batch that created this allocation, or 0. */
  readonly airdropId: AirdropId;
}

/**
 * Lifecycle status of a vesting schedule.
 *
 * - active: releases possible (subject to the time curve)
 * - completed: every token has been released
 * - revoked: terminated by an administrator
 */
export type ScheduleStatus = "active" | "completed" | "revoked";

/**
 * Reporting view of where a schedule sits on its curve.
 */
export type SchedulePhase =
  | "pending"
  | "vesting"
  | "fully_vested"
  | "completed"
  | "revoked";

/**
 * A cliff + linear release curve over a fixed total.
 */
export interface VestingSchedule {
  readonly id: ScheduleId;
  readonly beneficiary: Address;
  readonly totalAmount: bigint;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly duration: number;

  /** Monotonically increasing; never exceeds totalAmount. */
  readonly releasedAmount: bigint;

  readonly createdAt: number;

  /** Allocation drawn down by releases, or 0 for a direct mint. */
  readonly allocationId: AllocationId;

  readonly status: ScheduleStatus;
}

/**
 * Completed and revoked schedules accept no further releases.
 */
export function isTerminal(status: ScheduleStatus): boolean {
  return status !== "active";
}

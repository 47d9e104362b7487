/**
 * @vestline/vesting — Types.
 */

import type {
  Address,
  AllocationId,
  AllocationPort,
  Clock,
  EventSink,
  ManagerRegistry,
  SchedulePhase,
  ScheduleId,
  ScheduleStatus,
  TokenPort,
} from "@vestline/types";
import type { AccessGateSnapshot } from "@vestline/gate";

/** Roles the engine recognizes besides admin. */
export type VestingRole = "vesting_admin" | "manual_unlock";

export interface VestingEngineConfig {
  readonly admin: Address;
  readonly clock: Clock;

  /** Mint target, bound to the engine's identity. */
  readonly token: TokenPort;

  readonly allocations: AllocationPort;

  /** Usually the allocation ledger. */
  readonly managers: ManagerRegistry;

  /**
   * Identity the engine presents to the allocation ledger. Must be
   * registered there as a manager for reductions and revocations.
   */
  readonly engineAddress: Address;

  readonly events?: EventSink | undefined;
}

export interface CreateScheduleParams {
  readonly beneficiary: Address;
  readonly totalAmount: bigint;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly duration: number;
  /** Allocation to draw down, or NO_ALLOCATION for a direct mint. */
  readonly allocationId: AllocationId;
}

/**
 * Running totals. Observational only; no control decision reads them.
 */
export interface VestingTotals {
  /** Sum of totalAmount over created schedules, less unvested remainders of revoked ones. */
  readonly totalVested: bigint;
  /** Sum of every amount released by claim or manual unlock. */
  readonly totalClaimed: bigint;
}

/**
 * A release whose linked allocation could not be drawn down.
 * The tokens were minted; the allocation still shows them as reserved.
 */
export interface AllocationDiscrepancy {
  readonly scheduleId: ScheduleId;
  readonly allocationId: AllocationId;
  readonly amount: bigint;
  readonly code: string;
  readonly reason: string;
  readonly recordedAt: number;
}

/**
 * Outcome of keeping a linked allocation in step with a release.
 */
export type AllocationSync =
  | { readonly status: "unlinked" }
  | { readonly status: "reduced" }
  | { readonly status: "failed"; readonly discrepancy: AllocationDiscrepancy };

/**
 * Point-in-time view of one schedule.
 */
export interface VestingInfo {
  readonly scheduleId: ScheduleId;
  readonly beneficiary: Address;
  readonly totalAmount: bigint;
  readonly releasedAmount: bigint;
  readonly vestedAmount: bigint;
  readonly releasableAmount: bigint;
  readonly phase: SchedulePhase;
  readonly cliffEndsAt: number;
  readonly endsAt: number;
  readonly asOf: number;
}

// ─── Snapshot ────────────────────────────────────────────────────────────

export interface SerializedSchedule {
  readonly id: number;
  readonly beneficiary: string;
  readonly totalAmount: string;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly duration: number;
  readonly releasedAmount: string;
  readonly createdAt: number;
  readonly allocationId: number;
  readonly status: ScheduleStatus;
}

export interface SerializedDiscrepancy {
  readonly scheduleId: number;
  readonly allocationId: number;
  readonly amount: string;
  readonly code: string;
  readonly reason: string;
  readonly recordedAt: number;
}

export interface VestingEngineSnapshot {
  readonly version: 1;
  readonly gate: AccessGateSnapshot;
  readonly schedules: readonly SerializedSchedule[];
  readonly totals: {
    readonly totalVested: string;
    readonly totalClaimed: string;
  };
  readonly discrepancies: readonly SerializedDiscrepancy[];
}

/**
 * Response views.
 *
 * Ledger records carry bigint amounts, which JSON cannot encode. Every
 * amount leaves the API as a decimal integer string.
 */

import type { Allocation, VestingSchedule } from "@vestline/types";
import type { AirdropReceipt } from "@vestline/allocation";
import type {
  AllocationDiscrepancy,
  BeneficiarySummary,
  ClaimRecord,
  ScheduleDetail,
  VestingInfo,
  VestingTotals,
} from "@vestline/vesting";
import type { LedgerStats } from "../services/vesting-service.js";

// =============================================================================
// Allocations
// =============================================================================

export interface AllocationView {
  readonly id: number;
  readonly beneficiary: string;
  readonly amount: string;
  readonly revoked: boolean;
  readonly airdropId: number;
}

export function allocationView(allocation: Allocation): AllocationView {
  return {
    id: allocation.id,
    beneficiary: allocation.beneficiary,
    amount: allocation.amount.toString(),
    revoked: allocation.revoked,
    airdropId: allocation.airdropId,
  };
}

export interface AirdropView {
  readonly airdropId: number;
  readonly allocationIds: readonly number[];
  readonly totalAmount: string;
}

export function airdropView(receipt: AirdropReceipt): AirdropView {
  return {
    airdropId: receipt.airdropId,
    allocationIds: [...receipt.allocationIds],
    totalAmount: receipt.totalAmount.toString(),
  };
}

// =============================================================================
// Schedules
// =============================================================================

export interface ScheduleView {
  readonly id: number;
  readonly beneficiary: string;
  readonly totalAmount: string;
  readonly releasedAmount: string;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly duration: number;
  readonly createdAt: number;
  readonly allocationId: number;
  readonly status: VestingSchedule["status"];
}

export function scheduleView(schedule: VestingSchedule): ScheduleView {
  return {
    id: schedule.id,
    beneficiary: schedule.beneficiary,
    totalAmount: schedule.totalAmount.toString(),
    releasedAmount: schedule.releasedAmount.toString(),
    startTime: schedule.startTime,
    cliffDuration: schedule.cliffDuration,
    duration: schedule.duration,
    createdAt: schedule.createdAt,
    allocationId: schedule.allocationId,
    status: schedule.status,
  };
}

export interface VestingInfoView {
  readonly scheduleId: number;
  readonly beneficiary: string;
  readonly totalAmount: string;
  readonly releasedAmount: string;
  readonly vestedAmount: string;
  readonly releasableAmount: string;
  readonly phase: VestingInfo["phase"];
  readonly cliffEndsAt: number;
  readonly endsAt: number;
  readonly asOf: number;
}

export function vestingInfoView(info: VestingInfo): VestingInfoView {
  return {
    scheduleId: info.scheduleId,
    beneficiary: info.beneficiary,
    totalAmount: info.totalAmount.toString(),
    releasedAmount: info.releasedAmount.toString(),
    vestedAmount: info.vestedAmount.toString(),
    releasableAmount: info.releasableAmount.toString(),
    phase: info.phase,
    cliffEndsAt: info.cliffEndsAt,
    endsAt: info.endsAt,
    asOf: info.asOf,
  };
}

// =============================================================================
// Reports
// =============================================================================

function scheduleDetailView(detail: ScheduleDetail) {
  return {
    scheduleId: detail.scheduleId,
    totalAmount: detail.totalAmount.toString(),
    releasedAmount: detail.releasedAmount.toString(),
    remainingAmount: detail.remainingAmount.toString(),
    claimableAmount: detail.claimableAmount.toString(),
    phase: detail.phase,
    startTime: detail.startTime,
    cliffEndTime: detail.cliffEndTime,
    vestingEndTime: detail.vestingEndTime,
  };
}

export function summaryView(summary: BeneficiarySummary) {
  return {
    beneficiary: summary.beneficiary,
    totalAllocated: summary.totalAllocated.toString(),
    totalClaimed: summary.totalClaimed.toString(),
    totalUnclaimed: summary.totalUnclaimed.toString(),
    claimableAmount: summary.claimableAmount.toString(),
    hasUnclaimed: summary.hasUnclaimed,
    schedules: summary.schedules.map(scheduleDetailView),
  };
}

export function claimView(record: ClaimRecord) {
  return {
    ...record,
    amount: record.amount.toString(),
    releasedAmount: record.releasedAmount.toString(),
  };
}

export function discrepancyView(discrepancy: AllocationDiscrepancy) {
  return { ...discrepancy, amount: discrepancy.amount.toString() };
}

export function totalsView(totals: VestingTotals) {
  return {
    totalVested: totals.totalVested.toString(),
    totalClaimed: totals.totalClaimed.toString(),
  };
}

export function statsView(stats: LedgerStats) {
  return { ...stats, totals: totalsView(stats.totals) };
}

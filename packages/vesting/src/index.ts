/**
 * @vestline/vesting — Vesting engine.
 *
 * Cliff + linear release schedules over a fixed total, optionally drawn
 * from an allocation:
 * - VestingEngine: creation, claims, manual unlocks, revocation
 * - Release curve: pure releasable-amount math
 * - Reports: unclaimed wallets, per-wallet summaries, claim history
 */

export { VestingEngine } from "./vesting-engine.js";
export {
  computeReleasable,
  schedulePhase,
  vestedOnCurve,
  cliffEnd,
  vestingEnd,
} from "./releasable.js";
export { summarizeBeneficiary, findUnclaimedWallets, buildClaimHistory } from "./reports.js";

export type {
  VestingRole,
  VestingEngineConfig,
  CreateScheduleParams,
  VestingTotals,
  VestingInfo,
  AllocationDiscrepancy,
  AllocationSync,
  VestingEngineSnapshot,
  SerializedSchedule,
  SerializedDiscrepancy,
} from "./types.js";
export type {
  BeneficiarySummary,
  ScheduleDetail,
  ClaimKind,
  ClaimRecord,
} from "./reports.js";

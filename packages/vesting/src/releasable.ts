/**
 * Release curve.
 *
 * Pure functions of a schedule and a time. Nothing here reads a clock.
 *
 * Curve: nothing before the cliff, everything from the end, and in between
 * floor(total * elapsed / duration). Truncation always rounds the
 * beneficiary's entitlement down.
 */

import type { SchedulePhase, VestingSchedule } from "@vestline/types";
import { isTerminal } from "@vestline/types";

type Curve = Pick<
  VestingSchedule,
  "totalAmount" | "startTime" | "cliffDuration" | "duration"
>;

export function cliffEnd(schedule: Curve): number {
  return schedule.startTime + schedule.cliffDuration;
}

export function vestingEnd(schedule: Curve): number {
  return schedule.startTime + schedule.duration;
}

/**
 * Amount the curve entitles the beneficiary to at `now`, ignoring what
 * has been released and ignoring status.
 */
export function vestedOnCurve(schedule: Curve, now: number): bigint {
  if (now < cliffEnd(schedule)) return 0n;
  if (now >= vestingEnd(schedule)) return schedule.totalAmount;
  const elapsed = BigInt(now - schedule.startTime);
  return (schedule.totalAmount * elapsed) / BigInt(schedule.duration);
}

/**
 * Amount a claim at `now` would release.
 *
 * Zero for terminal schedules. Manual unlocks can put releasedAmount
 * ahead of the curve; the result is then zero, never negative.
 */
export function computeReleasable(schedule: VestingSchedule, now: number): bigint {
  if (isTerminal(schedule.status)) return 0n;
  const vested = vestedOnCurve(schedule, now);
  return vested > schedule.releasedAmount ? vested - schedule.releasedAmount : 0n;
}

export function schedulePhase(schedule: VestingSchedule, now: number): SchedulePhase {
  if (schedule.status === "revoked") return "revoked";
  if (schedule.status === "completed") return "completed";
  if (now < cliffEnd(schedule)) return "pending";
  if (now < vestingEnd(schedule)) return "vesting";
  return "fully_vested";
}

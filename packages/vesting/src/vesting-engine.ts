/**
 * @vestline/vesting — Vesting engine.
 *
 * The schedule state machine. Owns schedule records and the running
 * totals; reaches the allocation ledger, the manager registry and the
 * token only through injected ports.
 *
 * Lifecycle:
 *   active ──(released == total)──→ completed
 *   active ──(revoke / force revoke)──→ revoked
 *
 * Rules:
 * - releasedAmount never exceeds totalAmount and never decreases
 * - Terminal schedules release nothing, even if fully vested
 * - Every mutation runs under one whole-engine reentrancy guard
 * - A failed call leaves schedules, ids and totals untouched
 */

import type {
  Address,
  AllocationId,
  ScheduleId,
  TokenPort,
  AllocationPort,
  ManagerRegistry,
  Clock,
  VestingSchedule,
  ScheduleStatus,
} from "@vestline/types";
import {
  allocationId,
  isAddress,
  isAmountString,
  isScheduleStatus,
  isTerminal,
  isZeroAddress,
  NO_ALLOCATION,
  scheduleId,
} from "@vestline/types";
import type { Emit } from "@vestline/gate";
import {
  AccessGate,
  EventOutbox,
  LedgerError,
  ReentrancyGuard,
  isLedgerError,
} from "@vestline/gate";
import { computeReleasable, schedulePhase, cliffEnd, vestingEnd, vestedOnCurve } from "./releasable.js";
import type {
  AllocationDiscrepancy,
  AllocationSync,
  CreateScheduleParams,
  SerializedSchedule,
  VestingEngineConfig,
  VestingEngineSnapshot,
  VestingInfo,
  VestingRole,
  VestingTotals,
} from "./types.js";

interface ScheduleRecord {
  readonly id: ScheduleId;
  readonly beneficiary: Address;
  readonly totalAmount: bigint;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly duration: number;
  releasedAmount: bigint;
  readonly createdAt: number;
  readonly allocationId: AllocationId;
  status: ScheduleStatus;
}

/**
 * Everything a mutation may touch, held in one place.
 */
interface EngineState {
  /** Append-only; index = id - 1. */
  readonly schedules: ScheduleRecord[];
  readonly byBeneficiary: Map<Address, ScheduleId[]>;
  totalVested: bigint;
  totalClaimed: bigint;
  readonly discrepancies: AllocationDiscrepancy[];
}

type ReleaseKind = "claim" | "manual_unlock";

function toSchedule(record: ScheduleRecord): VestingSchedule {
  return { ...record };
}

function isDuration(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// VestingEngine
// =============================================================================

export class VestingEngine {
  private gate: AccessGate<VestingRole>;
  private readonly guard = new ReentrancyGuard();
  private readonly outbox: EventOutbox;
  private readonly clock: Clock;
  private readonly token: TokenPort;
  private readonly allocations: AllocationPort;
  private readonly managers: ManagerRegistry;
  private readonly engineAddress: Address;
  private readonly state: EngineState = {
    schedules: [],
    byBeneficiary: new Map(),
    totalVested: 0n,
    totalClaimed: 0n,
    discrepancies: [],
  };

  constructor(config: VestingEngineConfig) {
    this.gate = new AccessGate<VestingRole>(config.admin, ["vesting_admin", "manual_unlock"]);
    this.outbox = new EventOutbox("vesting", config.clock, config.events);
    this.clock = config.clock;
    this.token = config.token;
    this.allocations = config.allocations;
    this.managers = config.managers;
    this.engineAddress = config.engineAddress;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Creation
  // ───────────────────────────────────────────────────────────────────────

  createVestingSchedule(caller: Address, params: CreateScheduleParams): ScheduleId {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        this.assertPrivileged(caller, ["vesting_admin"]);

        const { beneficiary, totalAmount, startTime, cliffDuration, duration } = params;
        if (isZeroAddress(beneficiary)) {
          throw new LedgerError("INVALID_BENEFICIARY", "Beneficiary cannot be the zero address");
        }
        if (totalAmount <= 0n) {
          throw new LedgerError("INVALID_AMOUNT", "Total amount must be positive");
        }
        if (!isDuration(duration) || duration === 0) {
          throw new LedgerError("INVALID_DURATION", `Invalid duration: ${String(duration)}`);
        }
        if (!isDuration(cliffDuration)) {
          throw new LedgerError("INVALID_DURATION", `Invalid cliff: ${String(cliffDuration)}`);
        }
        if (cliffDuration > duration) {
          throw new LedgerError(
            "CLIFF_EXCEEDS_DURATION",
            `Cliff ${String(cliffDuration)}s exceeds duration ${String(duration)}s`,
          );
        }
        const now = this.clock.now();
        if (!Number.isSafeInteger(startTime) || startTime < now) {
          throw new LedgerError(
            "START_TIME_IN_PAST",
            `Start time ${String(startTime)} is before now (${String(now)})`,
          );
        }
        if (params.allocationId !== NO_ALLOCATION) {
          this.assertAllocationCovers(params.allocationId, beneficiary, totalAmount);
        }

        const record: ScheduleRecord = {
          id: scheduleId(this.state.schedules.length + 1),
          beneficiary,
          totalAmount,
          startTime,
          cliffDuration,
          duration,
          releasedAmount: 0n,
          createdAt: now,
          allocationId: params.allocationId,
          status: "active",
        };
        this.append(record);
        this.state.totalVested += totalAmount;

        emit({
          type: "vesting.schedule_created",
          payload: {
            scheduleId: record.id,
            beneficiary,
            totalAmount: totalAmount.toString(),
            startTime,
            cliffDuration,
            duration,
            allocationId: record.allocationId,
          },
        });
        this.emitTotals(emit);
        return record.id;
      }),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Releases
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Release everything currently vested and unclaimed to the beneficiary.
   *
   * @returns the amount released
   */
  claimVestedTokens(caller: Address, id: ScheduleId): bigint {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        const record = this.resolve(id);
        if (record.beneficiary !== caller) {
          throw new LedgerError(
            "NOT_BENEFICIARY",
            `${caller} is not the beneficiary of schedule ${String(id)}`,
          );
        }
        this.assertActive(record);

        const releasable = computeReleasable(record, this.clock.now());
        if (releasable === 0n) {
          throw new LedgerError("NO_TOKENS_DUE", `No tokens due on schedule ${String(id)}`);
        }

        this.release(record, releasable, "claim", emit);
        return releasable;
      }),
    );
  }

  /**
   * Release an arbitrary amount outside the curve.
   */
  manualUnlock(caller: Address, id: ScheduleId, amount: bigint): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        this.assertPrivileged(caller, ["manual_unlock"]);
        if (amount <= 0n) {
          throw new LedgerError("INVALID_AMOUNT", "Unlock amount must be positive");
        }
        const record = this.resolve(id);
        this.assertActive(record);

        const remaining = record.totalAmount - record.releasedAmount;
        if (amount > remaining) {
          throw new LedgerError(
            "AMOUNT_EXCEEDS_REMAINING",
            `Unlock of ${amount.toString()} exceeds remaining ${remaining.toString()}`,
          );
        }

        this.release(record, amount, "manual_unlock", emit);
        return true;
      }),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Revocation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Terminate a schedule and revoke its linked allocation.
   *
   * The allocation is revoked first. If the allocation ledger refuses,
   * its error propagates and the schedule stays active; use
   * forceRevokeSchedule when the allocation side is already revoked.
   *
   * @returns the unreleased remainder taken out of totalVested
   */
  revokeSchedule(caller: Address, id: ScheduleId): bigint {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        this.assertPrivileged(caller, ["vesting_admin"]);
        const record = this.resolve(id);
        this.assertActive(record);

        const unvested = record.totalAmount - record.releasedAmount;
        if (unvested === 0n) {
          throw new LedgerError("NOTHING_TO_REVOKE", `Schedule ${String(id)} has nothing left to revoke`);
        }

        if (record.allocationId !== NO_ALLOCATION) {
          this.allocations.revokeAllocation(this.engineAddress, record.allocationId);
        }

        this.terminate(record, false, emit);
        this.emitTotals(emit);
        return unvested;
      }),
    );
  }

  /**
   * Terminate a schedule without touching the allocation ledger. Admin only.
   */
  forceRevokeSchedule(caller: Address, id: ScheduleId): bigint {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        this.gate.assertAdmin(caller);
        const record = this.resolve(id);
        this.assertActive(record);

        const unvested = this.terminate(record, true, emit);
        this.emitTotals(emit);
        return unvested;
      }),
    );
  }

  /**
   * Force-revoke every active schedule in `ids`. Zero, unknown and
   * terminal ids are skipped, not failed.
   *
   * @returns how many schedules were revoked
   */
  batchForceRevoke(caller: Address, ids: readonly number[]): number {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        this.gate.assertAdmin(caller);

        let revoked = 0;
        for (const candidate of ids) {
          const record = this.lookup(candidate);
          if (record === undefined || isTerminal(record.status)) continue;
          this.terminate(record, true, emit);
          revoked += 1;
        }

        if (revoked > 0) this.emitTotals(emit);
        return revoked;
      }),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Roles and pause
  // ───────────────────────────────────────────────────────────────────────

  grantRole(caller: Address, role: VestingRole | "admin", account: Address): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        const changed = this.gate.grantRole(caller, role, account);
        if (changed) emit({ type: "role.granted", payload: { role, account } });
        return changed;
      }),
    );
  }

  revokeRole(caller: Address, role: VestingRole | "admin", account: Address): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        const changed = this.gate.revokeRole(caller, role, account);
        if (changed) emit({ type: "role.revoked", payload: { role, account } });
        return changed;
      }),
    );
  }

  hasRole(role: VestingRole | "admin", account: Address): boolean {
    return this.gate.hasRole(role, account);
  }

  pause(caller: Address): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        const changed = this.gate.pause(caller);
        if (changed) emit({ type: "ledger.paused", payload: { ledger: "vesting" } });
        return changed;
      }),
    );
  }

  unpause(caller: Address): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        const changed = this.gate.unpause(caller);
        if (changed) emit({ type: "ledger.unpaused", payload: { ledger: "vesting" } });
        return changed;
      }),
    );
  }

  get paused(): boolean {
    return this.gate.paused;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /** @throws LedgerError INVALID_SCHEDULE_ID for 0 or unknown ids */
  getSchedule(id: ScheduleId): VestingSchedule {
    return toSchedule(this.resolve(id));
  }

  getSchedulesForBeneficiary(beneficiary: Address): readonly VestingSchedule[] {
    return (this.state.byBeneficiary.get(beneficiary) ?? []).map((id) => this.getSchedule(id));
  }

  listSchedules(): readonly VestingSchedule[] {
    return this.state.schedules.map(toSchedule);
  }

  computeReleasable(id: ScheduleId, now: number = this.clock.now()): bigint {
    return computeReleasable(this.resolve(id), now);
  }

  getVestingInfo(id: ScheduleId, now: number = this.clock.now()): VestingInfo {
    const record = this.resolve(id);
    const vested =
      record.status === "revoked" ? record.releasedAmount : vestedOnCurve(record, now);
    return {
      scheduleId: record.id,
      beneficiary: record.beneficiary,
      totalAmount: record.totalAmount,
      releasedAmount: record.releasedAmount,
      vestedAmount: vested > record.releasedAmount ? vested : record.releasedAmount,
      releasableAmount: computeReleasable(record, now),
      phase: schedulePhase(record, now),
      cliffEndsAt: cliffEnd(record),
      endsAt: vestingEnd(record),
      asOf: now,
    };
  }

  get totals(): VestingTotals {
    return { totalVested: this.state.totalVested, totalClaimed: this.state.totalClaimed };
  }

  get scheduleCount(): number {
    return this.state.schedules.length;
  }

  /** Releases whose linked allocation could not be drawn down. */
  getDiscrepancies(): readonly AllocationDiscrepancy[] {
    return [...this.state.discrepancies];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): VestingEngineSnapshot {
    return {
      version: 1,
      gate: this.gate.snapshot(),
      schedules: this.state.schedules.map(
        (record): SerializedSchedule => ({
          id: record.id,
          beneficiary: record.beneficiary,
          totalAmount: record.totalAmount.toString(),
          startTime: record.startTime,
          cliffDuration: record.cliffDuration,
          duration: record.duration,
          releasedAmount: record.releasedAmount.toString(),
          createdAt: record.createdAt,
          allocationId: record.allocationId,
          status: record.status,
        }),
      ),
      totals: {
        totalVested: this.state.totalVested.toString(),
        totalClaimed: this.state.totalClaimed.toString(),
      },
      discrepancies: this.state.discrepancies.map((d) => ({
        scheduleId: d.scheduleId,
        allocationId: d.allocationId,
        amount: d.amount.toString(),
        code: d.code,
        reason: d.reason,
        recordedAt: d.recordedAt,
      })),
    };
  }

  static fromSnapshot(
    snapshot: VestingEngineSnapshot,
    config: Omit<VestingEngineConfig, "admin">,
  ): VestingEngine {
    const gate = AccessGate.fromSnapshot<VestingRole>(snapshot.gate, [
      "vesting_admin",
      "manual_unlock",
    ]);
    const admin = gate.holders("admin")[0];
    if (admin === undefined) {
      throw new LedgerError("INVALID_ADDRESS", "Snapshot has no admin");
    }

    const engine = new VestingEngine({ ...config, admin });
    engine.gate = gate;

    snapshot.schedules.forEach((entry, index) => {
      if (entry.id !== index + 1) {
        throw new LedgerError(
          "INVALID_SCHEDULE_ID",
          `Snapshot schedule ${String(entry.id)} is out of sequence`,
        );
      }
      if (!isAddress(entry.beneficiary)) {
        throw new LedgerError(
          "INVALID_BENEFICIARY",
          `Invalid beneficiary in snapshot: "${entry.beneficiary}"`,
        );
      }
      const label = `snapshot schedule ${String(entry.id)}`;
      if (!isAmountString(entry.totalAmount) || !isAmountString(entry.releasedAmount)) {
        throw new LedgerError("INVALID_AMOUNT", `Invalid amount in ${label}`);
      }
      const totalAmount = BigInt(entry.totalAmount);
      const releasedAmount = BigInt(entry.releasedAmount);
      if (totalAmount === 0n || releasedAmount > totalAmount) {
        throw new LedgerError(
          "INVALID_AMOUNT",
          `Released ${entry.releasedAmount} of ${entry.totalAmount} in ${label}`,
        );
      }
      if (!isDuration(entry.duration) || entry.duration === 0 || !isDuration(entry.cliffDuration)) {
        throw new LedgerError("INVALID_DURATION", `Invalid duration or cliff in ${label}`);
      }
      if (entry.cliffDuration > entry.duration) {
        throw new LedgerError("CLIFF_EXCEEDS_DURATION", `Cliff exceeds duration in ${label}`);
      }
      if (!Number.isSafeInteger(entry.startTime) || !Number.isSafeInteger(entry.createdAt)) {
        throw new LedgerError("INVALID_DURATION", `Invalid timestamps in ${label}`);
      }
      if (!isScheduleStatus(entry.status)) {
        throw new LedgerError("INVALID_STATUS", `Invalid status in ${label}`);
      }
      // Fully released means completed unless it was revoked first
      const fullyReleased = releasedAmount === totalAmount;
      if (
        (entry.status === "active" && fullyReleased) ||
        (entry.status === "completed" && !fullyReleased)
      ) {
        throw new LedgerError(
          "INVALID_STATUS",
          `Status ${entry.status} does not match released amount in ${label}`,
        );
      }
      engine.append({
        id: scheduleId(entry.id),
        beneficiary: entry.beneficiary,
        totalAmount,
        startTime: entry.startTime,
        cliffDuration: entry.cliffDuration,
        duration: entry.duration,
        releasedAmount,
        createdAt: entry.createdAt,
        allocationId: allocationId(entry.allocationId),
        status: entry.status,
      });
    });

    for (const d of snapshot.discrepancies) {
      if (!isAmountString(d.amount)) {
        throw new LedgerError("INVALID_AMOUNT", `Invalid discrepancy amount in snapshot: "${d.amount}"`);
      }
      engine.state.discrepancies.push({
        scheduleId: scheduleId(d.scheduleId),
        allocationId: allocationId(d.allocationId),
        amount: BigInt(d.amount),
        code: d.code,
        reason: d.reason,
        recordedAt: d.recordedAt,
      });
    }

    const { totalVested, totalClaimed } = snapshot.totals;
    if (!isAmountString(totalVested) || !isAmountString(totalClaimed)) {
      throw new LedgerError("INVALID_AMOUNT", "Invalid totals in snapshot");
    }
    engine.state.totalVested = BigInt(totalVested);
    engine.state.totalClaimed = BigInt(totalClaimed);
    return engine;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private assertPrivileged(caller: Address, roles: readonly VestingRole[]): void {
    if (this.gate.hasAnyRole(caller, roles) || this.managers.isManager(caller)) return;
    throw new LedgerError("NOT_AUTHORIZED", `${caller} may not perform this operation`);
  }

  private assertActive(record: ScheduleRecord): void {
    if (isTerminal(record.status)) {
      throw new LedgerError(
        "SCHEDULE_TERMINATED",
        `Schedule ${String(record.id)} is ${record.status}`,
      );
    }
  }

  private assertAllocationCovers(id: AllocationId, beneficiary: Address, totalAmount: bigint): void {
    const allocation = this.allocations.getAllocation(id);
    if (allocation.beneficiary !== beneficiary) {
      throw new LedgerError(
        "ALLOCATION_BENEFICIARY_MISMATCH",
        `Allocation ${String(id)} belongs to ${allocation.beneficiary}`,
      );
    }
    if (allocation.revoked) {
      throw new LedgerError("ALLOCATION_REVOKED", `Allocation ${String(id)} is revoked`);
    }
    if (allocation.amount < totalAmount) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOCATION",
        `Allocation ${String(id)} has ${allocation.amount.toString()}, schedule needs ${totalAmount.toString()}`,
      );
    }
  }

  private lookup(id: number): ScheduleRecord | undefined {
    return Number.isSafeInteger(id) && id > 0 ? this.state.schedules[id - 1] : undefined;
  }

  private resolve(id: ScheduleId): ScheduleRecord {
    const record = this.lookup(id);
    if (record === undefined) {
      throw new LedgerError("INVALID_SCHEDULE_ID", `Schedule not found: ${String(id)}`);
    }
    return record;
  }

  private append(record: ScheduleRecord): void {
    this.state.schedules.push(record);
    const ids = this.state.byBeneficiary.get(record.beneficiary);
    if (ids === undefined) {
      this.state.byBeneficiary.set(record.beneficiary, [record.id]);
    } else {
      ids.push(record.id);
    }
  }

  /**
   * Shared bookkeeping of claim and manual unlock.
   *
   * Schedule and totals are updated before the mint. A throwing mint
   * restores them and propagates. Allocation sync runs after the mint
   * and never undoes it.
   */
  private release(record: ScheduleRecord, amount: bigint, kind: ReleaseKind, emit: Emit): void {
    const before = { releasedAmount: record.releasedAmount, status: record.status };

    record.releasedAmount += amount;
    this.state.totalClaimed += amount;
    if (record.releasedAmount >= record.totalAmount) {
      record.status = "completed";
    }

    try {
      this.token.mint(record.beneficiary, amount);
    } catch (error) {
      record.releasedAmount = before.releasedAmount;
      record.status = before.status;
      this.state.totalClaimed -= amount;
      throw error;
    }

    const sync = this.syncAllocation(record, amount);
    if (sync.status === "failed") {
      const { discrepancy } = sync;
      this.state.discrepancies.push(discrepancy);
      emit({
        type: "vesting.allocation_sync_failed",
        payload: {
          scheduleId: discrepancy.scheduleId,
          allocationId: discrepancy.allocationId,
          amount: discrepancy.amount.toString(),
          code: discrepancy.code,
          reason: discrepancy.reason,
        },
      });
    }

    const payload = {
      scheduleId: record.id,
      beneficiary: record.beneficiary,
      amount: amount.toString(),
      releasedAmount: record.releasedAmount.toString(),
      completed: record.status === "completed",
    };
    if (kind === "claim") {
      emit({ type: "vesting.tokens_released", payload });
    } else {
      emit({ type: "vesting.manual_unlock", payload });
    }
    this.emitTotals(emit);
  }

  /**
   * Draw the linked allocation down by a released amount. The
   * allocation is only touched when it is live and covers the amount;
   * anything else comes back as a failed sync instead of a throw.
   */
  private syncAllocation(record: ScheduleRecord, amount: bigint): AllocationSync {
    if (record.allocationId === NO_ALLOCATION) return { status: "unlinked" };

    const failed = (code: string, reason: string): AllocationSync => ({
      status: "failed",
      discrepancy: {
        scheduleId: record.id,
        allocationId: record.allocationId,
        amount,
        code,
        reason,
        recordedAt: this.clock.now(),
      },
    });

    try {
      const allocation = this.allocations.getAllocation(record.allocationId);
      if (allocation.revoked) {
        return failed("ALLOCATION_REVOKED", `Allocation ${String(allocation.id)} is revoked`);
      }
      if (allocation.amount < amount) {
        return failed(
          "INSUFFICIENT_ALLOCATION",
          `Allocation ${String(allocation.id)} has ${allocation.amount.toString()} remaining`,
        );
      }
      this.allocations.reduceAllocation(this.engineAddress, record.allocationId, amount);
      return { status: "reduced" };
    } catch (error) {
      return failed(
        isLedgerError(error) ? error.code : "UNKNOWN",
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  /** Mark revoked and take the unreleased remainder out of totalVested. */
  private terminate(record: ScheduleRecord, forced: boolean, emit: Emit): bigint {
    const unvested = record.totalAmount - record.releasedAmount;
    record.status = "revoked";
    this.state.totalVested -= unvested;
    emit({
      type: "vesting.schedule_revoked",
      payload: {
        scheduleId: record.id,
        beneficiary: record.beneficiary,
        unvestedAmount: unvested.toString(),
        forced,
      },
    });
    return unvested;
  }

  private emitTotals(emit: Emit): void {
    emit({
      type: "vesting.totals_updated",
      payload: {
        totalVested: this.state.totalVested.toString(),
        totalClaimed: this.state.totalClaimed.toString(),
      },
    });
  }
}

/**
 * VestingService — Composition root for the ledgers.
 *
 * Route handlers delegate to this service; they never wire domain
 * packages themselves. One instance owns one token, one allocation
 * ledger, one vesting engine and the journal all three publish to.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  Address,
  Allocation,
  AllocationId,
  Clock,
  ScheduleId,
  VestingSchedule,
} from "@vestline/types";
import { allocationId, scheduleId } from "@vestline/types";
import { systemClock } from "@vestline/gate";
import { InMemoryTokenLedger } from "@vestline/token";
import { AllocationLedger } from "@vestline/allocation";
import type { AirdropReceipt } from "@vestline/allocation";
import {
  VestingEngine,
  buildClaimHistory,
  findUnclaimedWallets,
  summarizeBeneficiary,
} from "@vestline/vesting";
import type {
  AllocationDiscrepancy,
  BeneficiarySummary,
  ClaimRecord,
  CreateScheduleParams,
  VestingInfo,
  VestingTotals,
} from "@vestline/vesting";
import { EventJournal } from "@vestline/journal";
import type {
  JournalEntry,
  JournalIntegrityResult,
  JournalReadOptions,
  Subscription,
} from "@vestline/journal";
import type { LedgerName, RoleChangeDto } from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface TokenSettings {
  readonly symbol: string;
  readonly decimals: number;
  readonly maxSupply: bigint;
}

export interface VestingServiceConfig {
  readonly admin: Address;

  /** Identity the vesting engine mints as and presents to the allocation ledger. */
  readonly engineAddress: Address;

  /** Identity the allocation ledger mints airdrops as. */
  readonly ledgerAddress: Address;

  readonly token: TokenSettings;
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
}

export interface LedgerStats {
  readonly totals: VestingTotals;
  readonly scheduleCount: number;
  readonly allocationCount: number;
  readonly airdropCount: number;
  readonly managerCount: number;
  readonly discrepancyCount: number;
  readonly journalPosition: number;
  readonly paused: Readonly<Record<LedgerName, boolean>>;
}

// =============================================================================
// Service
// =============================================================================

export class VestingService {
  readonly clock: Clock;
  readonly journal: EventJournal;
  readonly token: InMemoryTokenLedger;
  readonly allocations: AllocationLedger;
  readonly engine: VestingEngine;
  readonly admin: Address;

  private readonly logger: Logger;
  private readonly subscriptions: Subscription[] = [];

  constructor(config: VestingServiceConfig) {
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? pino({ level: "silent" });
    this.admin = config.admin;

    this.journal = new EventJournal({
      onHandlerError: (error, entry) => {
        this.logger.error(
          { err: error, position: entry.position, type: entry.event.type },
          "Journal subscriber failed",
        );
      },
    });

    this.token = new InMemoryTokenLedger({
      admin: config.admin,
      symbol: config.token.symbol,
      decimals: config.token.decimals,
      maxSupply: config.token.maxSupply,
      clock: this.clock,
      events: this.journal,
    });

    this.allocations = new AllocationLedger({
      admin: config.admin,
      clock: this.clock,
      token: this.token.asMinter(config.ledgerAddress),
      events: this.journal,
    });

    this.engine = new VestingEngine({
      admin: config.admin,
      clock: this.clock,
      token: this.token.asMinter(config.engineAddress),
      allocations: this.allocations,
      managers: this.allocations,
      engineAddress: config.engineAddress,
      events: this.journal,
    });

    // ─── Bootstrap wiring ───────────────────────────────────────────
    this.token.grantMinter(config.admin, config.ledgerAddress);
    this.token.grantMinter(config.admin, config.engineAddress);
    if (config.engineAddress !== config.admin) {
      this.allocations.addManager(config.admin, config.engineAddress);
    }

    this.subscriptions.push(
      this.journal.subscribe(
        (entry) => {
          const { event } = entry;
          if (event.type !== "vesting.allocation_sync_failed") return;
          this.logger.warn(
            { position: entry.position, correlationId: event.metadata.correlationId, ...event.payload },
            "Release minted but allocation was not reduced",
          );
        },
        { type: "vesting.allocation_sync_failed" },
      ),
    );

    this.logger.debug(
      { admin: config.admin, engine: config.engineAddress, ledger: config.ledgerAddress },
      "Ledgers wired",
    );
  }

  // ─── Allocations ───────────────────────────────────────────────────

  createAllocation(caller: Address, beneficiary: Address, amount: bigint): Allocation {
    const id = this.allocations.createAllocation(caller, beneficiary, amount);
    return this.allocations.getAllocation(id);
  }

  getAllocation(id: number): Allocation {
    return this.allocations.getAllocation(allocationId(id));
  }

  revokeAllocation(caller: Address, id: number): Allocation {
    const target: AllocationId = allocationId(id);
    this.allocations.revokeAllocation(caller, target);
    return this.allocations.getAllocation(target);
  }

  reduceAllocation(caller: Address, id: number, amount: bigint): Allocation {
    const target: AllocationId = allocationId(id);
    this.allocations.reduceAllocation(caller, target, amount);
    return this.allocations.getAllocation(target);
  }

  allocationsFor(beneficiary: Address): readonly Allocation[] {
    return this.allocations.getAllocationsForBeneficiary(beneficiary);
  }

  executeAirdrop(
    caller: Address,
    beneficiaries: readonly Address[],
    amounts: readonly bigint[],
  ): AirdropReceipt {
    return this.allocations.executeAirdrop(caller, beneficiaries, amounts);
  }

  // ─── Managers ──────────────────────────────────────────────────────

  addManager(caller: Address, account: Address): boolean {
    return this.allocations.addManager(caller, account);
  }

  removeManager(caller: Address, account: Address): boolean {
    return this.allocations.removeManager(caller, account);
  }

  managers(): readonly Address[] {
    return this.allocations.getManagers();
  }

  // ─── Schedules ─────────────────────────────────────────────────────

  createSchedule(caller: Address, params: CreateScheduleParams): VestingSchedule {
    const id = this.engine.createVestingSchedule(caller, params);
    return this.engine.getSchedule(id);
  }

  getSchedule(id: number): VestingSchedule {
    return this.engine.getSchedule(scheduleId(id));
  }

  listSchedules(): readonly VestingSchedule[] {
    return this.engine.listSchedules();
  }

  schedulesFor(beneficiary: Address): readonly VestingSchedule[] {
    return this.engine.getSchedulesForBeneficiary(beneficiary);
  }

  vestingInfo(id: number, at?: number): VestingInfo {
    return this.engine.getVestingInfo(scheduleId(id), at ?? this.clock.now());
  }

  claim(caller: Address, id: number): { readonly amount: bigint; readonly schedule: VestingSchedule } {
    const target: ScheduleId = scheduleId(id);
    const amount = this.engine.claimVestedTokens(caller, target);
    return { amount, schedule: this.engine.getSchedule(target) };
  }

  manualUnlock(caller: Address, id: number, amount: bigint): VestingSchedule {
    const target: ScheduleId = scheduleId(id);
    this.engine.manualUnlock(caller, target, amount);
    return this.engine.getSchedule(target);
  }

  revokeSchedule(
    caller: Address,
    id: number,
    force: boolean,
  ): { readonly unvestedAmount: bigint; readonly schedule: VestingSchedule } {
    const target: ScheduleId = scheduleId(id);
    const unvestedAmount = force
      ? this.engine.forceRevokeSchedule(caller, target)
      : this.engine.revokeSchedule(caller, target);
    return { unvestedAmount, schedule: this.engine.getSchedule(target) };
  }

  batchForceRevoke(caller: Address, ids: readonly number[]): number {
    return this.engine.batchForceRevoke(caller, ids);
  }

  // ─── Reports ───────────────────────────────────────────────────────

  beneficiarySummary(beneficiary: Address, at?: number): BeneficiarySummary {
    return summarizeBeneficiary(this.engine.listSchedules(), beneficiary, at ?? this.clock.now());
  }

  unclaimedWallets(at?: number): BeneficiarySummary[] {
    return findUnclaimedWallets(this.engine.listSchedules(), at ?? this.clock.now());
  }

  claimHistory(beneficiary?: Address): ClaimRecord[] {
    return buildClaimHistory(this.journal.events(), beneficiary);
  }

  discrepancies(): readonly AllocationDiscrepancy[] {
    return this.engine.getDiscrepancies();
  }

  stats(): LedgerStats {
    return {
      totals: this.engine.totals,
      scheduleCount: this.engine.scheduleCount,
      allocationCount: this.allocations.allocationCount,
      airdropCount: this.allocations.airdropCount,
      managerCount: this.allocations.getManagers().length,
      discrepancyCount: this.engine.getDiscrepancies().length,
      journalPosition: this.journal.position,
      paused: this.pauseState(),
    };
  }

  // ─── Events ────────────────────────────────────────────────────────

  readEvents(options?: JournalReadOptions): readonly JournalEntry[] {
    return this.journal.read(options);
  }

  verifyJournal(): JournalIntegrityResult {
    return this.journal.verifyIntegrity();
  }

  // ─── Administration ────────────────────────────────────────────────

  setPaused(caller: Address, ledger: LedgerName, paused: boolean): boolean {
    switch (ledger) {
      case "allocation":
        return paused ? this.allocations.pause(caller) : this.allocations.unpause(caller);
      case "vesting":
        return paused ? this.engine.pause(caller) : this.engine.unpause(caller);
      case "token":
        return paused ? this.token.pause(caller) : this.token.unpause(caller);
    }
  }

  pauseState(): Readonly<Record<LedgerName, boolean>> {
    return {
      allocation: this.allocations.paused,
      vesting: this.engine.paused,
      token: this.token.paused,
    };
  }

  /**
   * Grant or revoke a role on one ledger. Returns false when nothing changed.
   */
  changeRole(caller: Address, change: RoleChangeDto, grant: boolean): boolean {
    switch (change.ledger) {
      case "allocation":
        return grant
          ? this.allocations.grantRole(caller, change.role, change.account)
          : this.allocations.revokeRole(caller, change.role, change.account);
      case "vesting":
        return grant
          ? this.engine.grantRole(caller, change.role, change.account)
          : this.engine.revokeRole(caller, change.role, change.account);
      case "token":
        return grant
          ? this.token.grantMinter(caller, change.account)
          : this.token.revokeMinter(caller, change.account);
    }
  }

  isReady(): boolean {
    return this.journal.verifyIntegrity().valid;
  }

  close(): void {
    for (const subscription of this.subscriptions.splice(0)) {
      subscription.unsubscribe();
    }
  }
}

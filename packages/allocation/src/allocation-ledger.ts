/**
 * @vestline/allocation — Allocation ledger.
 *
 * Owns allocation records: bookkeeping reservations of tokens for one
 * beneficiary. Creating an allocation moves no tokens; airdrops are the
 * one path that mints.
 *
 * Also hosts the manager registry. The vesting engine queries it through
 * ManagerRegistry, so one list of managers governs both ledgers.
 *
 * Rules:
 * - Ids are sequential from 1; 0 never names an allocation
 * - An allocation's amount only decreases
 * - Records are never deleted; revocation is a flag
 * - Airdrops are all-or-nothing
 */

import type {
  Address,
  AirdropId,
  Allocation,
  AllocationId,
  AllocationPort,
  ManagerRegistry,
  TokenPort,
} from "@vestline/types";
import {
  airdropId,
  allocationId,
  isAddress,
  isAmountString,
  isZeroAddress,
  NO_AIRDROP,
} from "@vestline/types";
import type { AdminRole, Emit } from "@vestline/gate";
import { AccessGate, EventOutbox, LedgerError, ReentrancyGuard } from "@vestline/gate";
import type {
  AirdropReceipt,
  AllocationLedgerConfig,
  AllocationLedgerSnapshot,
  SerializedAllocation,
} from "./types.js";

interface AllocationRecord {
  readonly id: AllocationId;
  amount: bigint;
  readonly beneficiary: Address;
  revoked: boolean;
  readonly airdropId: AirdropId;
}

function toAllocation(record: AllocationRecord): Allocation {
  return {
    id: record.id,
    amount: record.amount,
    beneficiary: record.beneficiary,
    revoked: record.revoked,
    airdropId: record.airdropId,
  };
}

// =============================================================================
// AllocationLedger
// =============================================================================

export class AllocationLedger implements AllocationPort, ManagerRegistry {
  private gate: AccessGate;
  private readonly guard = new ReentrancyGuard();
  private readonly outbox: EventOutbox;
  private readonly token: TokenPort;

  /** Append-only table; index = id - 1. */
  private readonly records: AllocationRecord[] = [];
  private readonly byBeneficiary = new Map<Address, AllocationId[]>();
  private readonly managers = new Set<Address>();
  private _airdropCount = 0;

  constructor(config: AllocationLedgerConfig) {
    this.gate = new AccessGate(config.admin);
    this.outbox = new EventOutbox("allocation", config.clock, config.events);
    this.token = config.token;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Allocations
  // ───────────────────────────────────────────────────────────────────────

  createAllocation(caller: Address, beneficiary: Address, amount: bigint): AllocationId {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        this.assertPrivileged(caller);
        this.assertEntry(beneficiary, amount);
        return this.insert(beneficiary, amount, NO_AIRDROP, emit).id;
      }),
    );
  }

  /**
   * Revoke an allocation. The remaining amount is kept for the record
   * but can no longer be reduced or referenced by a new schedule.
   */
  revokeAllocation(caller: Address, id: AllocationId): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        this.assertPrivileged(caller);
        const record = this.resolve(id);
        if (record.revoked) {
          throw new LedgerError(
            "ALLOCATION_ALREADY_REVOKED",
            `Allocation ${String(id)} is already revoked`,
          );
        }

        record.revoked = true;
        emit({
          type: "allocation.revoked",
          payload: {
            allocationId: record.id,
            beneficiary: record.beneficiary,
            remainingAmount: record.amount.toString(),
          },
        });
        return true;
      }),
    );
  }

  /**
   * Draw an allocation down by what has been minted against it.
   */
  reduceAllocation(caller: Address, id: AllocationId, amount: bigint): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        this.assertPrivileged(caller);
        if (amount <= 0n) {
          throw new LedgerError("INVALID_AMOUNT", "Reduction amount must be positive");
        }
        const record = this.resolve(id);
        if (record.revoked) {
          throw new LedgerError("ALLOCATION_REVOKED", `Allocation ${String(id)} is revoked`);
        }
        if (amount > record.amount) {
          throw new LedgerError(
            "INSUFFICIENT_ALLOCATION",
            `Allocation ${String(id)} has ${record.amount.toString()} remaining, cannot reduce by ${amount.toString()}`,
          );
        }

        this.reduce(record, amount, emit);
        return true;
      }),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Airdrops
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create one fully consumed allocation per entry and mint each amount
   * directly to its beneficiary.
   *
   * The whole batch is validated before anything is written. Records are
   * written first and the amounts then go to the token in a single batch
   * mint; if the token refuses any entry, nothing is minted, every record
   * this call wrote is removed and the error propagates.
   */
  executeAirdrop(
    caller: Address,
    beneficiaries: readonly Address[],
    amounts: readonly bigint[],
  ): AirdropReceipt {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        this.assertPrivileged(caller);
        if (beneficiaries.length === 0) {
          throw new LedgerError("EMPTY_BATCH", "Airdrop has no beneficiaries");
        }
        if (beneficiaries.length !== amounts.length) {
          throw new LedgerError(
            "ARRAYS_LENGTH_MISMATCH",
            `${String(beneficiaries.length)} beneficiaries but ${String(amounts.length)} amounts`,
          );
        }
        const entries = beneficiaries.map((beneficiary, index) => {
          const amount = amounts[index] ?? 0n;
          this.assertEntry(beneficiary, amount);
          return { beneficiary, amount };
        });

        const recordsBefore = this.records.length;
        const id = airdropId(this._airdropCount + 1);
        const allocationIds: AllocationId[] = [];
        let totalAmount = 0n;

        try {
          for (const { beneficiary, amount } of entries) {
            const record = this.insert(beneficiary, amount, id, emit);
            this.reduce(record, amount, emit);
            allocationIds.push(record.id);
            totalAmount += amount;
          }
          this.token.mintBatch(
            entries.map(({ beneficiary, amount }) => ({ to: beneficiary, amount })),
          );
        } catch (error) {
          this.truncate(recordsBefore);
          throw error;
        }

        this._airdropCount += 1;
        emit({
          type: "airdrop.executed",
          payload: {
            airdropId: id,
            recipientCount: entries.length,
            totalAmount: totalAmount.toString(),
            allocationIds,
          },
        });
        return { airdropId: id, allocationIds, totalAmount };
      }),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Manager registry
  // ───────────────────────────────────────────────────────────────────────

  /** Returns false if the account was already a manager. */
  addManager(caller: Address, account: Address): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.assertPrivileged(caller);
        if (isZeroAddress(account)) {
          throw new LedgerError("INVALID_ADDRESS", "Manager cannot be the zero address");
        }
        if (account === caller) {
          throw new LedgerError("CANNOT_ADD_SELF", "Caller cannot add themselves as manager");
        }
        if (this.managers.has(account)) return false;

        this.managers.add(account);
        emit({ type: "manager.assigned", payload: { account } });
        return true;
      }),
    );
  }

  /** Returns false if the account was not a manager. */
  removeManager(caller: Address, account: Address): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.assertPrivileged(caller);
        if (account === caller) {
          throw new LedgerError("CANNOT_REMOVE_SELF", "Caller cannot remove themselves as manager");
        }
        if (!this.managers.delete(account)) return false;

        emit({ type: "manager.removed", payload: { account } });
        return true;
      }),
    );
  }

  /** Registered managers and admins. */
  isManager(account: Address): boolean {
    return this.managers.has(account) || this.gate.isAdmin(account);
  }

  /** Registered managers in the order they were added. Admins are not listed. */
  getManagers(): readonly Address[] {
    return [...this.managers];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Roles and pause
  // ───────────────────────────────────────────────────────────────────────

  grantRole(caller: Address, role: AdminRole, account: Address): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        const changed = this.gate.grantRole(caller, role, account);
        if (changed) emit({ type: "role.granted", payload: { role, account } });
        return changed;
      }),
    );
  }

  revokeRole(caller: Address, role: AdminRole, account: Address): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        const changed = this.gate.revokeRole(caller, role, account);
        if (changed) emit({ type: "role.revoked", payload: { role, account } });
        return changed;
      }),
    );
  }

  hasRole(role: AdminRole, account: Address): boolean {
    return this.gate.hasRole(role, account);
  }

  pause(caller: Address): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        const changed = this.gate.pause(caller);
        if (changed) emit({ type: "ledger.paused", payload: { ledger: "allocation" } });
        return changed;
      }),
    );
  }

  unpause(caller: Address): boolean {
    return this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        const changed = this.gate.unpause(caller);
        if (changed) emit({ type: "ledger.unpaused", payload: { ledger: "allocation" } });
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

  /** @throws LedgerError INVALID_ALLOCATION_ID for 0 or unknown ids */
  getAllocation(id: AllocationId): Allocation {
    return toAllocation(this.resolve(id));
  }

  getAllocationsForBeneficiary(beneficiary: Address): readonly Allocation[] {
    return (this.byBeneficiary.get(beneficiary) ?? []).map((id) => this.getAllocation(id));
  }

  get allocationCount(): number {
    return this.records.length;
  }

  get airdropCount(): number {
    return this._airdropCount;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): AllocationLedgerSnapshot {
    return {
      version: 1,
      gate: this.gate.snapshot(),
      managers: [...this.managers],
      allocations: this.records.map(
        (record): SerializedAllocation => ({
          id: record.id,
          amount: record.amount.toString(),
          beneficiary: record.beneficiary,
          revoked: record.revoked,
          airdropId: record.airdropId,
        }),
      ),
      airdropCount: this._airdropCount,
    };
  }

  /**
   * Restore a ledger. Allocation ids must be contiguous from 1.
   */
  static fromSnapshot(
    snapshot: AllocationLedgerSnapshot,
    config: Omit<AllocationLedgerConfig, "admin">,
  ): AllocationLedger {
    const gate = AccessGate.fromSnapshot<AdminRole>(snapshot.gate);
    const admin = gate.holders("admin")[0];
    if (admin === undefined) {
      throw new LedgerError("INVALID_ADDRESS", "Snapshot has no admin");
    }

    const ledger = new AllocationLedger({ ...config, admin });
    ledger.gate = gate;

    for (const manager of snapshot.managers) {
      if (!isAddress(manager)) {
        throw new LedgerError("INVALID_ADDRESS", `Invalid manager in snapshot: "${manager}"`);
      }
      ledger.managers.add(manager);
    }

    const airdropCount = snapshot.airdropCount;
    if (!Number.isSafeInteger(airdropCount) || airdropCount < 0) {
      throw new LedgerError(
        "INVALID_AIRDROP_ID",
        `Invalid airdrop count in snapshot: ${String(airdropCount)}`,
      );
    }

    snapshot.allocations.forEach((entry, index) => {
      if (entry.id !== index + 1) {
        throw new LedgerError(
          "INVALID_ALLOCATION_ID",
          `Snapshot allocation ${String(entry.id)} is out of sequence`,
        );
      }
      if (!isAddress(entry.beneficiary)) {
        throw new LedgerError(
          "INVALID_BENEFICIARY",
          `Invalid beneficiary in snapshot: "${entry.beneficiary}"`,
        );
      }
      if (!isAmountString(entry.amount)) {
        throw new LedgerError("INVALID_AMOUNT", `Invalid amount in snapshot: "${entry.amount}"`);
      }
      if (typeof entry.revoked !== "boolean") {
        throw new LedgerError(
          "INVALID_STATUS",
          `Invalid revoked flag in snapshot allocation ${String(entry.id)}`,
        );
      }
      if (
        !Number.isSafeInteger(entry.airdropId) ||
        entry.airdropId < 0 ||
        entry.airdropId > airdropCount
      ) {
        throw new LedgerError(
          "INVALID_AIRDROP_ID",
          `Snapshot allocation ${String(entry.id)} names airdrop ${String(entry.airdropId)} of ${String(airdropCount)}`,
        );
      }
      ledger.append({
        id: allocationId(entry.id),
        amount: BigInt(entry.amount),
        beneficiary: entry.beneficiary,
        revoked: entry.revoked,
        airdropId: airdropId(entry.airdropId),
      });
    });

    ledger._airdropCount = airdropCount;
    return ledger;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private assertPrivileged(caller: Address): void {
    if (!this.isManager(caller)) {
      throw new LedgerError("NOT_AUTHORIZED", `${caller} is neither admin nor manager`);
    }
  }

  private assertEntry(beneficiary: Address, amount: bigint): void {
    if (isZeroAddress(beneficiary)) {
      throw new LedgerError("INVALID_BENEFICIARY", "Beneficiary cannot be the zero address");
    }
    if (amount <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", "Allocation amount must be positive");
    }
  }

  private resolve(id: AllocationId): AllocationRecord {
    const record = id > 0 ? this.records[id - 1] : undefined;
    if (record === undefined) {
      throw new LedgerError("INVALID_ALLOCATION_ID", `Allocation not found: ${String(id)}`);
    }
    return record;
  }

  private insert(
    beneficiary: Address,
    amount: bigint,
    airdrop: AirdropId,
    emit: Emit,
  ): AllocationRecord {
    const record: AllocationRecord = {
      id: allocationId(this.records.length + 1),
      amount,
      beneficiary,
      revoked: false,
      airdropId: airdrop,
    };
    this.append(record);
    emit({
      type: "allocation.created",
      payload: {
        allocationId: record.id,
        beneficiary,
        amount: amount.toString(),
        airdropId: airdrop,
      },
    });
    return record;
  }

  private append(record: AllocationRecord): void {
    this.records.push(record);
    const ids = this.byBeneficiary.get(record.beneficiary);
    if (ids === undefined) {
      this.byBeneficiary.set(record.beneficiary, [record.id]);
    } else {
      ids.push(record.id);
    }
  }

  private reduce(record: AllocationRecord, amount: bigint, emit: Emit): void {
    record.amount -= amount;
    emit({
      type: "allocation.reduced",
      payload: {
        allocationId: record.id,
        amount: amount.toString(),
        remainingAmount: record.amount.toString(),
      },
    });
  }

  /** Drop every record past `length`, newest first. */
  private truncate(length: number): void {
    while (this.records.length > length) {
      const record = this.records.pop();
      if (record === undefined) break;
      const ids = this.byBeneficiary.get(record.beneficiary);
      ids?.pop();
      if (ids !== undefined && ids.length === 0) {
        this.byBeneficiary.delete(record.beneficiary);
      }
    }
  }
}

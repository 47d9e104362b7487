/**
 * Capability Ports
 *
 * The interfaces one ledger consumes from another. Ledgers receive these
 * by injection and never import each other, so each can be tested against
 * a stub.
 */

import type { Address, AllocationId } from "./identity.js";
import type { Allocation } from "./records.js";

/**
 * Source of the current time, in unix seconds.
 */
export interface Clock {
  now(): number;
}

export interface MintEntry {
  readonly to: Address;
  readonly amount: bigint;
}

/**
 * The external token ledger, bound to the identity of the ledger using it.
 *
 * Minting is the only mutation the core performs. The core never reads
 * balances to make decisions; `balanceOf` exists for inspection.
 */
export interface TokenPort {
  mint(to: Address, amount: bigint): void;

  /** Mint every entry, or none of them if any one fails. */
  mintBatch(entries: readonly MintEntry[]): void;

  balanceOf(account: Address): bigint;
}

/**
 * Answers whether an address may act as a manager.
 * Hosted by the allocation ledger, queried by the vesting engine.
 */
export interface ManagerRegistry {
  isManager(account: Address): boolean;
}

/**
 * The slice of the allocation ledger the vesting engine calls into.
 */
export interface AllocationPort {
  /** @throws if the id is zero or unknown */
  getAllocation(id: AllocationId): Allocation;
  reduceAllocation(caller: Address, id: AllocationId, amount: bigint): boolean;
  revokeAllocation(caller: Address, id: AllocationId): boolean;
}

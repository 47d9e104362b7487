/**
 * @vestline/allocation — Types.
 */

import type {
  Address,
  AirdropId,
  AllocationId,
  Clock,
  EventSink,
  TokenPort,
} from "@vestline/types";
import type { AccessGateSnapshot } from "@vestline/gate";

export interface AllocationLedgerConfig {
  readonly admin: Address;
  readonly clock: Clock;

  /** Mint target for airdrops, bound to this ledger's identity. */
  readonly token: TokenPort;

  readonly events?: EventSink | undefined;
}

/**
 * JSON-safe form of an allocation.
 */
export interface SerializedAllocation {
  readonly id: number;
  readonly amount: string;
  readonly beneficiary: string;
  readonly revoked: boolean;
  readonly airdropId: number;
}

export interface AllocationLedgerSnapshot {
  readonly version: 1;
  readonly gate: AccessGateSnapshot;
  readonly managers: readonly string[];
  readonly allocations: readonly SerializedAllocation[];
  readonly airdropCount: number;
}

/**
 * Result of an airdrop: the batch id and the allocations it created.
 */
export interface AirdropReceipt {
  readonly airdropId: AirdropId;
  readonly allocationIds: readonly AllocationId[];
  readonly totalAmount: bigint;
}

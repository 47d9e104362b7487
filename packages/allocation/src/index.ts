/**
 * @vestline/allocation — Allocation ledger.
 *
 * Grants of tokens to beneficiaries, revocable until consumed, plus the
 * manager registry the vesting engine delegates to and all-or-nothing
 * airdrops.
 */

export { AllocationLedger } from "./allocation-ledger.js";
export type {
  AllocationLedgerConfig,
  AllocationLedgerSnapshot,
  SerializedAllocation,
  AirdropReceipt,
} from "./types.js";

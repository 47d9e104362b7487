/**
 * Identity Types
 *
 * Addresses and sequential record identifiers.
 *
 * Rules:
 * - Addresses are 0x-prefixed, 20-byte hex, stored lower-cased
 * - Record ids are 1-based safe integers; 0 is the "none" sentinel
 * - Ids are branded so an AllocationId can never be passed as a ScheduleId
 */

/**
 * A beneficiary, manager or admin address.
 * Always lower-case; build one with `toAddress()`.
 */
export type Address = string & { readonly __brand: "Address" };

/** Identifier of an allocation. 0 means "no allocation". */
export type AllocationId = number & { readonly __brand: "AllocationId" };

/** Identifier of a vesting schedule. 0 is never assigned. */
export type ScheduleId = number & { readonly __brand: "ScheduleId" };

/** Identifier of an airdrop batch. 0 means "not part of an airdrop". */
export type AirdropId = number & { readonly __brand: "AirdropId" };

const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;

function isAddressValue(value: string): value is Address {
  return ADDRESS_PATTERN.test(value);
}

/**
 * Normalize and validate a raw address string.
 *
 * @throws {TypeError} if the value is not a 20-byte hex address
 */
export function toAddress(raw: string): Address {
  const normalized = raw.trim().toLowerCase();
  if (!isAddressValue(normalized)) {
    throw new TypeError(`Invalid address: "${raw}"`);
  }
  return normalized;
}

export const ZERO_ADDRESS: Address = toAddress(
  "0x0000000000000000000000000000000000000000",
);

export function isZeroAddress(address: Address): boolean {
  return address === ZERO_ADDRESS;
}

// ─── Sequential ids ──────────────────────────────────────────────────────

function isSequenceValue(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function isAllocationIdValue(value: number): value is AllocationId {
  return isSequenceValue(value);
}

function isScheduleIdValue(value: number): value is ScheduleId {
  return isSequenceValue(value);
}

function isAirdropIdValue(value: number): value is AirdropId {
  return isSequenceValue(value);
}

export function allocationId(value: number): AllocationId {
  if (!isAllocationIdValue(value)) {
    throw new TypeError(`Invalid allocation id: ${String(value)}`);
  }
  return value;
}

export function scheduleId(value: number): ScheduleId {
  if (!isScheduleIdValue(value)) {
    throw new TypeError(`Invalid schedule id: ${String(value)}`);
  }
  return value;
}

export function airdropId(value: number): AirdropId {
  if (!isAirdropIdValue(value)) {
    throw new TypeError(`Invalid airdrop id: ${String(value)}`);
  }
  return value;
}

/** Sentinel for a schedule that mints directly instead of drawing on an allocation. */
export const NO_ALLOCATION: AllocationId = allocationId(0);

/** Sentinel for an allocation created outside any airdrop. */
export const NO_AIRDROP: AirdropId = airdropId(0);

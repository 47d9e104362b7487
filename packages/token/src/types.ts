/**
 * @vestline/token — Types.
 */

import type { Address, Clock, EventSink } from "@vestline/types";

/** Roles the token recognizes besides admin. */
export type TokenRole = "minter";

export interface TokenConfig {
  readonly admin: Address;
  readonly symbol: string;
  readonly decimals: number;
  /** Hard cap on total supply, in the smallest unit. */
  readonly maxSupply: bigint;
  readonly clock: Clock;
  readonly events?: EventSink | undefined;
}

/**
 * Called after a mint has been applied, inside the token's own guard.
 * Models a recipient callback; used to exercise reentrancy protection.
 */
export type MintHook = (to: Address, amount: bigint) => void;

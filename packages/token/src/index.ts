/**
 * @vestline/token — Token ledger.
 *
 * The vesting core treats the token as an external collaborator reached
 * through TokenPort. This package provides the in-memory ledger used by
 * the service and the tests: capped supply, minter role, pause, burn.
 */

export { InMemoryTokenLedger } from "./token-ledger.js";
export type { TokenConfig, TokenRole, MintHook } from "./types.js";

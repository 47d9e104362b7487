/**
 * Authentication types.
 *
 * Every API key maps to exactly one ledger address. Authorization is not
 * decided here: the ledgers check the caller's roles themselves.
 */

import type { Address } from "@vestline/types";

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "header" | "anonymous";
  readonly address: Address;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly address: Address;
}

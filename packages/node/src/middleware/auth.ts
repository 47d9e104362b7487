/**
 * Caller resolution middleware.
 *
 * Every ledger operation takes the caller's address first. Two modes:
 * 1. Secured: X-Api-Key header → the address configured for that key
 * 2. Unsecured (tests, dev): X-Caller-Address header, or the zero
 *    address when absent
 *
 * Both set `auth` and `caller` in context. Roles are not checked here;
 * the ledgers reject callers that lack them.
 */

import type { MiddlewareHandler } from "hono";
import { ZERO_ADDRESS } from "@vestline/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import { AddressSchema } from "../types/dto.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller-Address";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

// =============================================================================
// Secured mode
// =============================================================================

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    const auth: AuthContext = { type: "api-key", address: record.address };
    c.set("auth", auth);
    c.set("caller", auth.address);
    return next();
  };
}

// =============================================================================
// Unsecured mode
// =============================================================================

export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(CALLER_HEADER);

    let auth: AuthContext;
    if (header === undefined) {
      auth = { type: "anonymous", address: ZERO_ADDRESS };
    } else {
      const parsed = AddressSchema.safeParse(header);
      if (!parsed.success) {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", `Invalid ${CALLER_HEADER} header`),
          400,
        );
      }
      auth = { type: "header", address: parsed.data };
    }

    c.set("auth", auth);
    c.set("caller", auth.address);
    return next();
  };
}

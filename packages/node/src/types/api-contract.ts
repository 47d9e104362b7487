/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "@vestline/types";
import type { VestingService } from "../services/vesting-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the Vestline app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The ledger service every route delegates to */
    service: VestingService;

    /** Authentication context (set by auth middleware) */
    auth: AuthContext;

    /** Ledger caller for this request; the zero address when anonymous */
    caller: Address;
  };
}

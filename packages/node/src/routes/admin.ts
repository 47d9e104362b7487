/**
 * Administration routes.
 *
 * POST /api/v1/admin/:ledger/pause    — Pause one ledger
 * POST /api/v1/admin/:ledger/unpause  — Resume one ledger
 * POST /api/v1/admin/roles/grant      — Grant a role on one ledger
 * POST /api/v1/admin/roles/revoke     — Revoke a role on one ledger
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { LedgerNameSchema, RoleChangeSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/roles/grant", validateBody(RoleChangeSchema), (c) => {
    const change = c.get("validatedBody");
    const changed = c.get("service").changeRole(c.get("caller"), change, true);
    return c.json({ data: { ...change, changed } });
  });

  routes.post("/roles/revoke", validateBody(RoleChangeSchema), (c) => {
    const change = c.get("validatedBody");
    const changed = c.get("service").changeRole(c.get("caller"), change, false);
    return c.json({ data: { ...change, changed } });
  });

  routes.post("/:ledger/pause", (c) => {
    const ledger = LedgerNameSchema.parse(c.req.param("ledger"));
    const changed = c.get("service").setPaused(c.get("caller"), ledger, true);
    return c.json({ data: { ledger, paused: true, changed } });
  });

  routes.post("/:ledger/unpause", (c) => {
    const ledger = LedgerNameSchema.parse(c.req.param("ledger"));
    const changed = c.get("service").setPaused(c.get("caller"), ledger, false);
    return c.json({ data: { ledger, paused: false, changed } });
  });

  return routes;
}

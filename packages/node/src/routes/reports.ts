/**
 * Reporting routes.
 *
 * GET /api/v1/reports/unclaimed?at=                 — Wallets that never claimed
 * GET /api/v1/reports/beneficiaries/:address?at=    — One wallet's position
 * GET /api/v1/reports/claims?beneficiary=           — Claim and unlock history
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, AsOfQuerySchema, ClaimHistoryQuerySchema } from "../types/dto.js";
import { claimView, summaryView } from "../types/views.js";

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/unclaimed", (c) => {
    const { at } = AsOfQuerySchema.parse(c.req.query());
    const wallets = c.get("service").unclaimedWallets(at);
    return c.json({ data: wallets.map(summaryView) });
  });

  routes.get("/beneficiaries/:address", (c) => {
    const beneficiary = AddressSchema.parse(c.req.param("address"));
    const { at } = AsOfQuerySchema.parse(c.req.query());
    return c.json({ data: summaryView(c.get("service").beneficiarySummary(beneficiary, at)) });
  });

  routes.get("/claims", (c) => {
    const { beneficiary } = ClaimHistoryQuerySchema.parse(c.req.query());
    return c.json({ data: c.get("service").claimHistory(beneficiary).map(claimView) });
  });

  return routes;
}

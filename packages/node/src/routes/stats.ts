/**
 * Statistics routes.
 *
 * GET /api/v1/stats                — Totals, counters and pause flags
 * GET /api/v1/stats/discrepancies  — Releases whose allocation was not drawn down
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { discrepancyView, statsView } from "../types/views.js";

export function createStatsRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: statsView(c.get("service").stats()) });
  });

  routes.get("/discrepancies", (c) => {
    return c.json({ data: c.get("service").discrepancies().map(discrepancyView) });
  });

  return routes;
}

/**
 * Event journal routes.
 *
 * GET /api/v1/events            — Journal entries (cursor pagination, filters)
 * GET /api/v1/events/integrity  — Verify the hash chain
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { paginate } from "../types/pagination.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = ListEventsQuerySchema.parse(c.req.query());
    const entries = c.get("service").readEvents({
      fromPosition: query.afterPosition !== undefined ? query.afterPosition + 1 : undefined,
      source: query.source,
      type: query.type,
      correlationId: query.correlationId,
    });

    return c.json(
      paginate(entries, { cursor: query.cursor, limit: query.limit }, (e) => e.position, "position"),
    );
  });

  routes.get("/integrity", (c) => {
    const result = c.get("service").verifyJournal();
    return c.json({ data: result }, result.valid ? 200 : 409);
  });

  return routes;
}

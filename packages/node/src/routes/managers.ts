/**
 * Manager registry routes.
 *
 * GET    /api/v1/managers           — List registered managers
 * POST   /api/v1/managers           — Register a manager
 * DELETE /api/v1/managers/:address  — Remove a manager
 *
 * Adding an existing manager or removing a non-manager is a no-op;
 * the response reports `changed: false`.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, ManagerSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createManagerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").managers() });
  });

  routes.post("/", validateBody(ManagerSchema), (c) => {
    const { account } = c.get("validatedBody");
    const changed = c.get("service").addManager(c.get("caller"), account);
    return c.json({ data: { account, changed } }, changed ? 201 : 200);
  });

  routes.delete("/:address", (c) => {
    const account = AddressSchema.parse(c.req.param("address"));
    const changed = c.get("service").removeManager(c.get("caller"), account);
    return c.json({ data: { account, changed } });
  });

  return routes;
}

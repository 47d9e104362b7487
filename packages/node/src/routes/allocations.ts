/**
 * Allocation routes.
 *
 * POST /api/v1/allocations                       — Create an allocation
 * GET  /api/v1/allocations/:id                   — Get one allocation
 * POST /api/v1/allocations/:id/revoke            — Revoke an allocation
 * POST /api/v1/allocations/:id/reduce            — Draw an allocation down
 * GET  /api/v1/allocations/beneficiary/:address  — Allocations of one wallet
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  AmountBodySchema,
  CreateAllocationSchema,
  IdParamSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { allocationView } from "../types/views.js";

export function createAllocationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateAllocationSchema), (c) => {
    const body = c.get("validatedBody");
    const allocation = c
      .get("service")
      .createAllocation(c.get("caller"), body.beneficiary, body.amount);
    return c.json({ data: allocationView(allocation) }, 201);
  });

  routes.get("/beneficiary/:address", (c) => {
    const beneficiary = AddressSchema.parse(c.req.param("address"));
    const allocations = c.get("service").allocationsFor(beneficiary);
    return c.json({ data: allocations.map(allocationView) });
  });

  routes.get("/:id", (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    return c.json({ data: allocationView(c.get("service").getAllocation(id)) });
  });

  routes.post("/:id/revoke", (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    const allocation = c.get("service").revokeAllocation(c.get("caller"), id);
    return c.json({ data: allocationView(allocation) });
  });

  routes.post("/:id/reduce", validateBody(AmountBodySchema), (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    const { amount } = c.get("validatedBody");
    const allocation = c.get("service").reduceAllocation(c.get("caller"), id, amount);
    return c.json({ data: allocationView(allocation) });
  });

  return routes;
}

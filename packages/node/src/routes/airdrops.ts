/**
 * Airdrop routes.
 *
 * POST /api/v1/airdrops — Allocate and mint to many wallets at once
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AirdropSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { airdropView } from "../types/views.js";

export function createAirdropRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(AirdropSchema), (c) => {
    const { beneficiaries, amounts } = c.get("validatedBody");
    const receipt = c
      .get("service")
      .executeAirdrop(c.get("caller"), beneficiaries, amounts);
    return c.json({ data: airdropView(receipt) }, 201);
  });

  return routes;
}

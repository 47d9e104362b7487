/**
 * Token routes.
 *
 * GET /api/v1/token                     — Supply and pause state
 * GET /api/v1/token/balances/:address   — Balance of one wallet
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema } from "../types/dto.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { token } = c.get("service");
    return c.json({
      data: {
        symbol: token.symbol,
        decimals: token.decimals,
        maxSupply: token.maxSupply.toString(),
        totalSupply: token.totalSupply.toString(),
        totalMinted: token.totalMinted.toString(),
        paused: token.paused,
      },
    });
  });

  routes.get("/balances/:address", (c) => {
    const account = AddressSchema.parse(c.req.param("address"));
    const balance = c.get("service").token.balanceOf(account);
    return c.json({ data: { account, balance: balance.toString() } });
  });

  return routes;
}

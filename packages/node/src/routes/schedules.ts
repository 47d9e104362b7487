/**
 * Vesting schedule routes.
 *
 * POST /api/v1/schedules                         — Create a schedule
 * GET  /api/v1/schedules                         — List schedules (cursor pagination)
 * POST /api/v1/schedules/batch-force-revoke      — Force-revoke many schedules
 * GET  /api/v1/schedules/beneficiary/:address    — Schedules of one wallet
 * GET  /api/v1/schedules/:id                     — Get one schedule
 * GET  /api/v1/schedules/:id/info?at=            — Vested / releasable view
 * POST /api/v1/schedules/:id/claim               — Beneficiary claims what is due
 * POST /api/v1/schedules/:id/manual-unlock       — Release ahead of the curve
 * POST /api/v1/schedules/:id/revoke              — Revoke (and its allocation)
 * POST /api/v1/schedules/:id/force-revoke        — Revoke without touching the allocation
 */

import { Hono } from "hono";
import { allocationId } from "@vestline/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  AmountBodySchema,
  AsOfQuerySchema,
  BatchForceRevokeSchema,
  CreateScheduleSchema,
  IdParamSchema,
  PaginationQuerySchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { paginate } from "../types/pagination.js";
import { scheduleView, vestingInfoView } from "../types/views.js";

export function createScheduleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateScheduleSchema), (c) => {
    const body = c.get("validatedBody");
    const schedule = c.get("service").createSchedule(c.get("caller"), {
      beneficiary: body.beneficiary,
      totalAmount: body.totalAmount,
      startTime: body.startTime,
      cliffDuration: body.cliffDuration,
      duration: body.duration,
      allocationId: allocationId(body.allocationId),
    });
    return c.json({ data: scheduleView(schedule) }, 201);
  });

  routes.get("/", (c) => {
    const query = PaginationQuerySchema.parse(c.req.query());
    const page = paginate(c.get("service").listSchedules(), query, (s) => s.id, "id");
    return c.json({ data: page.data.map(scheduleView), pagination: page.pagination });
  });

  routes.post("/batch-force-revoke", validateBody(BatchForceRevokeSchema), (c) => {
    const { scheduleIds } = c.get("validatedBody");
    const revoked = c.get("service").batchForceRevoke(c.get("caller"), scheduleIds);
    return c.json({ data: { requested: scheduleIds.length, revoked } });
  });

  routes.get("/beneficiary/:address", (c) => {
    const beneficiary = AddressSchema.parse(c.req.param("address"));
    const schedules = c.get("service").schedulesFor(beneficiary);
    return c.json({ data: schedules.map(scheduleView) });
  });

  routes.get("/:id", (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    return c.json({ data: scheduleView(c.get("service").getSchedule(id)) });
  });

  routes.get("/:id/info", (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    const { at } = AsOfQuerySchema.parse(c.req.query());
    return c.json({ data: vestingInfoView(c.get("service").vestingInfo(id, at)) });
  });

  routes.post("/:id/claim", (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    const { amount, schedule } = c.get("service").claim(c.get("caller"), id);
    return c.json({ data: { amount: amount.toString(), schedule: scheduleView(schedule) } });
  });

  routes.post("/:id/manual-unlock", validateBody(AmountBodySchema), (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    const { amount } = c.get("validatedBody");
    const schedule = c.get("service").manualUnlock(c.get("caller"), id, amount);
    return c.json({ data: { amount: amount.toString(), schedule: scheduleView(schedule) } });
  });

  routes.post("/:id/revoke", (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    const { unvestedAmount, schedule } = c
      .get("service")
      .revokeSchedule(c.get("caller"), id, false);
    return c.json({
      data: { unvestedAmount: unvestedAmount.toString(), schedule: scheduleView(schedule) },
    });
  });

  routes.post("/:id/force-revoke", (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    const { unvestedAmount, schedule } = c
      .get("service")
      .revokeSchedule(c.get("caller"), id, true);
    return c.json({
      data: { unvestedAmount: unvestedAmount.toString(), schedule: scheduleView(schedule) },
    });
  });

  return routes;
}

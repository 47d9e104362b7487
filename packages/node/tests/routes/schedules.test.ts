/**
 * Tests for vesting schedule routes.
 *
 * The default schedule starts one day after T0 with a 10-day cliff and
 * runs 100 days over 100000 units, so every day past the start vests 1000.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Address } from "@vestline/types";
import type { AllocationView, ScheduleView, VestingInfoView } from "../../src/types/views.js";
import {
  ADMIN,
  ALICE,
  BOB,
  DAY,
  MANAGER,
  T0,
  as,
  createTestApp,
  jsonRequest,
  scheduleBody,
} from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";

const START = T0 + DAY;

const INVALID_CASES: Array<[string, Record<string, unknown>]> = [
  ["START_TIME_IN_PAST", { startTime: T0 - 1 }],
  ["CLIFF_EXCEEDS_DURATION", { cliffDuration: 101 * DAY }],
  ["INVALID_DURATION", { duration: 0, cliffDuration: 0 }],
  ["INVALID_AMOUNT", { totalAmount: "0" }],
  ["INVALID_BENEFICIARY", { beneficiary: "0x0000000000000000000000000000000000000000" }],
];

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

function post(path: string, caller: Address, body?: unknown): Response | Promise<Response> {
  return instance.app.request(jsonRequest(path, "POST", body, as(caller)));
}

async function createSchedule(overrides: Record<string, unknown> = {}): Promise<ScheduleView> {
  const res = await post("/api/v1/schedules", ADMIN, scheduleBody(overrides));
  expect(res.status).toBe(201);
  const body = (await res.json()) as { data: ScheduleView };
  return body.data;
}

async function errorCode(res: Response): Promise<string> {
  const body = (await res.json()) as ErrorBody;
  return body.error.code;
}

// =============================================================================
// Creation
// =============================================================================

describe("POST /api/v1/schedules", () => {
  it("creates an unlinked schedule", async () => {
    const schedule = await createSchedule();

    expect(schedule).toEqual({
      id: 1,
      beneficiary: ALICE,
      totalAmount: "100000",
      releasedAmount: "0",
      startTime: START,
      cliffDuration: 10 * DAY,
      duration: 100 * DAY,
      createdAt: T0,
      allocationId: 0,
      status: "active",
    });
  });

  it.each(INVALID_CASES)("rejects %s", async (code, overrides) => {
    const res = await post("/api/v1/schedules", ADMIN, scheduleBody(overrides));

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe(code);
    expect(instance.service.engine.scheduleCount).toBe(0);
  });

  it("rejects callers without a vesting role", async () => {
    const res = await post("/api/v1/schedules", BOB, scheduleBody());

    expect(res.status).toBe(403);
    expect(await errorCode(res)).toBe("NOT_AUTHORIZED");
  });

  it("accepts registered managers", async () => {
    await post("/api/v1/managers", ADMIN, { account: MANAGER });
    const res = await post("/api/v1/schedules", MANAGER, scheduleBody());

    expect(res.status).toBe(201);
  });

  it("checks a linked allocation belongs to the beneficiary", async () => {
    await post("/api/v1/allocations", ADMIN, { beneficiary: BOB, amount: "100000" });
    const res = await post("/api/v1/schedules", ADMIN, scheduleBody({ allocationId: 1 }));

    expect(res.status).toBe(404);
    expect(await errorCode(res)).toBe("ALLOCATION_BENEFICIARY_MISMATCH");
  });

  it("checks a linked allocation covers the total", async () => {
    await post("/api/v1/allocations", ADMIN, { beneficiary: ALICE, amount: "500" });
    const res = await post("/api/v1/schedules", ADMIN, scheduleBody({ allocationId: 1 }));

    expect(res.status).toBe(409);
    expect(await errorCode(res)).toBe("INSUFFICIENT_ALLOCATION");
  });
});

// =============================================================================
// Reads
// =============================================================================

describe("schedule reads", () => {
  it("returns 404 for an unknown schedule", async () => {
    const res = await instance.app.request("/api/v1/schedules/3");

    expect(res.status).toBe(404);
    expect(await errorCode(res)).toBe("INVALID_SCHEDULE_ID");
  });

  it("reports vesting info at a given time", async () => {
    await createSchedule();
    const at = START + 20 * DAY;
    const res = await instance.app.request(`/api/v1/schedules/1/info?at=${String(at)}`);

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: VestingInfoView };
    expect(body.data).toEqual({
      scheduleId: 1,
      beneficiary: ALICE,
      totalAmount: "100000",
      releasedAmount: "0",
      vestedAmount: "20000",
      releasableAmount: "20000",
      phase: "vesting",
      cliffEndsAt: START + 10 * DAY,
      endsAt: START + 100 * DAY,
      asOf: at,
    });
  });

  it("defaults vesting info to the current time", async () => {
    await createSchedule();
    const res = await instance.app.request("/api/v1/schedules/1/info");

    const body = (await res.json()) as { data: VestingInfoView };
    expect(body.data.asOf).toBe(T0);
    expect(body.data.phase).toBe("pending");
    expect(body.data.releasableAmount).toBe("0");
  });

  it("pages through schedules by id", async () => {
    await createSchedule();
    await createSchedule({ beneficiary: BOB });
    await createSchedule();

    const first = await instance.app.request("/api/v1/schedules?limit=2");
    const page1 = (await first.json()) as {
      data: ScheduleView[];
      pagination: { cursor: string | null; hasMore: boolean };
    };
    expect(page1.data.map((s) => s.id)).toEqual([1, 2]);
    expect(page1.pagination.hasMore).toBe(true);

    const cursor = page1.pagination.cursor ?? "";
    const second = await instance.app.request(`/api/v1/schedules?limit=2&cursor=${cursor}`);
    const page2 = (await second.json()) as {
      data: ScheduleView[];
      pagination: { cursor: string | null; hasMore: boolean };
    };
    expect(page2.data.map((s) => s.id)).toEqual([3]);
    expect(page2.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("lists schedules by beneficiary", async () => {
    await createSchedule();
    await createSchedule({ beneficiary: BOB });
    await createSchedule();

    const res = await instance.app.request(`/api/v1/schedules/beneficiary/${ALICE}`);
    const body = (await res.json()) as { data: ScheduleView[] };
    expect(body.data.map((s) => s.id)).toEqual([1, 3]);
  });
});

// =============================================================================
// Claims and manual unlocks
// =============================================================================

describe("POST /api/v1/schedules/:id/claim", () => {
  it("has nothing due before the cliff", async () => {
    await createSchedule();
    instance.clock.set(START + 10 * DAY - 1);
    const res = await post("/api/v1/schedules/1/claim", ALICE);

    expect(res.status).toBe(409);
    expect(await errorCode(res)).toBe("NO_TOKENS_DUE");
  });

  it("only the beneficiary may claim", async () => {
    await createSchedule();
    instance.clock.set(START + 50 * DAY);
    const res = await post("/api/v1/schedules/1/claim", ADMIN);

    expect(res.status).toBe(403);
    expect(await errorCode(res)).toBe("NOT_BENEFICIARY");
  });

  it("releases the vested amount and mints it", async () => {
    await createSchedule();
    instance.clock.set(START + 50 * DAY);
    const res = await post("/api/v1/schedules/1/claim", ALICE);

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { amount: string; schedule: ScheduleView } };
    expect(body.data.amount).toBe("50000");
    expect(body.data.schedule.releasedAmount).toBe("50000");
    expect(body.data.schedule.status).toBe("active");
    expect(instance.service.token.balanceOf(ALICE)).toBe(50_000n);

    const again = await post("/api/v1/schedules/1/claim", ALICE);
    expect(await errorCode(again)).toBe("NO_TOKENS_DUE");
  });

  it("completes the schedule and draws down a linked allocation", async () => {
    await post("/api/v1/allocations", ADMIN, { beneficiary: ALICE, amount: "150000" });
    await createSchedule({ allocationId: 1 });
    instance.clock.set(START + 100 * DAY);

    const res = await post("/api/v1/schedules/1/claim", ALICE);
    const body = (await res.json()) as { data: { amount: string; schedule: ScheduleView } };
    expect(body.data.amount).toBe("100000");
    expect(body.data.schedule.status).toBe("completed");

    const allocation = await instance.app.request("/api/v1/allocations/1");
    const view = (await allocation.json()) as { data: AllocationView };
    expect(view.data.amount).toBe("50000");
  });

  it("is refused while the engine is paused", async () => {
    await createSchedule();
    instance.clock.set(START + 50 * DAY);
    await post("/api/v1/admin/vesting/pause", ADMIN);

    const res = await post("/api/v1/schedules/1/claim", ALICE);
    expect(res.status).toBe(503);
    expect(await errorCode(res)).toBe("LEDGER_PAUSED");
  });
});

describe("POST /api/v1/schedules/:id/manual-unlock", () => {
  it("releases ahead of the curve and completes at the total", async () => {
    await createSchedule();
    const res = await post("/api/v1/schedules/1/manual-unlock", ADMIN, { amount: "100000" });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { amount: string; schedule: ScheduleView } };
    expect(body.data.schedule.status).toBe("completed");
    expect(instance.service.token.balanceOf(ALICE)).toBe(100_000n);

    const claim = await post("/api/v1/schedules/1/claim", ALICE);
    expect(await errorCode(claim)).toBe("SCHEDULE_TERMINATED");
  });

  it("refuses more than the remainder", async () => {
    await createSchedule();
    await post("/api/v1/schedules/1/manual-unlock", ADMIN, { amount: "60000" });
    const res = await post("/api/v1/schedules/1/manual-unlock", ADMIN, { amount: "40001" });

    expect(res.status).toBe(409);
    expect(await errorCode(res)).toBe("AMOUNT_EXCEEDS_REMAINING");
  });

  it("honors the manual_unlock role", async () => {
    await createSchedule();
    const denied = await post("/api/v1/schedules/1/manual-unlock", BOB, { amount: "1" });
    expect(denied.status).toBe(403);

    await post("/api/v1/admin/roles/grant", ADMIN, {
      ledger: "vesting",
      role: "manual_unlock",
      account: BOB,
    });
    const allowed = await post("/api/v1/schedules/1/manual-unlock", BOB, { amount: "1" });
    expect(allowed.status).toBe(200);
  });
});

// =============================================================================
// Revocation
// =============================================================================

describe("revocation routes", () => {
  it("revokes a schedule and its allocation", async () => {
    await post("/api/v1/allocations", ADMIN, { beneficiary: ALICE, amount: "100000" });
    await createSchedule({ allocationId: 1 });

    const res = await post("/api/v1/schedules/1/revoke", ADMIN);
    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      data: { unvestedAmount: string; schedule: ScheduleView };
    };
    expect(body.data.unvestedAmount).toBe("100000");
    expect(body.data.schedule.status).toBe("revoked");
    expect(instance.service.getAllocation(1).revoked).toBe(true);

    const again = await post("/api/v1/schedules/1/revoke", ADMIN);
    expect(again.status).toBe(409);
    expect(await errorCode(again)).toBe("SCHEDULE_TERMINATED");
  });

  it("leaves the schedule active when the allocation refuses, until forced", async () => {
    await post("/api/v1/allocations", ADMIN, { beneficiary: ALICE, amount: "100000" });
    await createSchedule({ allocationId: 1 });
    await post("/api/v1/allocations/1/revoke", ADMIN);

    const refused = await post("/api/v1/schedules/1/revoke", ADMIN);
    expect(refused.status).toBe(409);
    expect(await errorCode(refused)).toBe("ALLOCATION_ALREADY_REVOKED");
    expect(instance.service.getSchedule(1).status).toBe("active");

    const forced = await post("/api/v1/schedules/1/force-revoke", ADMIN);
    expect(forced.status).toBe(200);
    expect(instance.service.getSchedule(1).status).toBe("revoked");
  });

  it("restricts force-revoke to admins", async () => {
    await post("/api/v1/managers", ADMIN, { account: MANAGER });
    await createSchedule();

    const res = await post("/api/v1/schedules/1/force-revoke", MANAGER);
    expect(res.status).toBe(403);
  });

  it("batch force-revokes active schedules and skips the rest", async () => {
    await createSchedule();
    await createSchedule({ beneficiary: BOB });

    const res = await post("/api/v1/schedules/batch-force-revoke", ADMIN, {
      scheduleIds: [1, 2, 99, 0],
    });
    expect(await res.json()).toEqual({ data: { requested: 4, revoked: 2 } });

    const repeat = await post("/api/v1/schedules/batch-force-revoke", ADMIN, {
      scheduleIds: [1, 2],
    });
    expect(await repeat.json()).toEqual({ data: { requested: 2, revoked: 0 } });
  });

  it("accepts an empty batch force-revoke", async () => {
    const res = await post("/api/v1/schedules/batch-force-revoke", ADMIN, { scheduleIds: [] });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { requested: 0, revoked: 0 } });
  });
});

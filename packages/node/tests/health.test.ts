/**
 * Tests for health check endpoints.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(typeof body.timestamp).toBe("string");
  });

  it("preserves a well-formed incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces a malformed X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "bad id with spaces" }),
    );

    const id = res.headers.get("X-Request-Id");
    expect(id).not.toBe("bad id with spaces");
    expect(id).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("GET /ready", () => {
  it("reports ready with the journal head and pause flags", async () => {
    const { app, service } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);

    const body = (await res.json()) as {
      status: string;
      journal: { position: number; lastVerifiedPosition: number; errors: number };
      paused: Record<string, boolean>;
    };
    expect(body.status).toBe("ready");
    expect(body.journal).toEqual({
      position: service.journal.position,
      lastVerifiedPosition: service.journal.position,
      errors: 0,
    });
    expect(body.paused).toEqual({ allocation: false, vesting: false, token: false });
  });
});

describe("unknown routes", () => {
  it("return a NOT_FOUND envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nothing-here");

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "NOT_FOUND",
      message: "No route for GET /api/v1/nothing-here",
    });
  });
});

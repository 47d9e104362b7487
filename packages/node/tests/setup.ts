/**
 * Test helpers for @vestline/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server, on a manual clock.
 */

import type { Address } from "@vestline/types";
import { toAddress } from "@vestline/types";
import { ManualClock } from "@vestline/gate";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import type { VestingServiceConfig } from "../src/services/vesting-service.js";

export const T0 = 1_900_000_000;
export const DAY = 86_400;

export const ADMIN = toAddress("0x000000000000000000000000000000000000ad01");
export const ENGINE = toAddress("0x00000000000000000000000000000000000e0001");
export const LEDGER = toAddress("0x00000000000000000000000000000000000a0001");
export const MANAGER = toAddress("0x000000000000000000000000000000000000ba5e");
export const ALICE = toAddress("0x00000000000000000000000000000000000a11ce");
export const BOB = toAddress("0x0000000000000000000000000000000000000b0b");

export interface TestApp extends AppInstance {
  readonly clock: ManualClock;
}

export function testServiceConfig(clock: ManualClock): VestingServiceConfig {
  return {
    admin: ADMIN,
    engineAddress: ENGINE,
    ledgerAddress: LEDGER,
    token: { symbol: "VEST", decimals: 18, maxSupply: 1_000_000n },
    clock,
  };
}

/**
 * Create a test app in unsecured mode at T0.
 */
export function createTestApp(
  options: Omit<CreateAppOptions, "serviceConfig"> = {},
): TestApp {
  const clock = new ManualClock(T0);
  return { ...createApp({ ...options, serviceConfig: testServiceConfig(clock) }), clock };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/** Header that makes the unsecured app act as `caller`. */
export function as(caller: Address): Record<string, string> {
  return { "X-Caller-Address": caller };
}

export interface ErrorBody {
  error: { code: string; message: string; category?: string; details?: Record<string, unknown> };
}

/** Schedule body starting at T0 + 1 day with a 10-day cliff over 100 days. */
export function scheduleBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    beneficiary: ALICE,
    totalAmount: "100000",
    startTime: T0 + DAY,
    cliffDuration: 10 * DAY,
    duration: 100 * DAY,
    ...overrides,
  };
}

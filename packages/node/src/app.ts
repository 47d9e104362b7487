/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Tests call createApp() directly; main.ts adds the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { VestingService } from "./services/vesting-service.js";
import type { VestingServiceConfig } from "./services/vesting-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { UnexpectedErrorCallback } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, callerHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createErrorEnvelope } from "./types/error.js";
import {
  createAdminRoutes,
  createAirdropRoutes,
  createAllocationRoutes,
  createEventRoutes,
  createHealthRoutes,
  createManagerRoutes,
  createReportRoutes,
  createScheduleRoutes,
  createStatsRoutes,
  createTokenRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: VestingServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Called for errors that are not ledger or validation failures. */
  readonly onUnexpectedError?: UnexpectedErrorCallback | undefined;
  /** Auth configuration. When provided, API keys are required under /api. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VestingService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new VestingService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Caller-Address header or anonymous
    app.use("/api/*", callerHeaderMiddleware());
  }

  app.route("/api/v1/allocations", createAllocationRoutes());
  app.route("/api/v1/airdrops", createAirdropRoutes());
  app.route("/api/v1/managers", createManagerRoutes());
  app.route("/api/v1/schedules", createScheduleRoutes());
  app.route("/api/v1/stats", createStatsRoutes());
  app.route("/api/v1/reports", createReportRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/token", createTokenRoutes());

  return { app, service };
}

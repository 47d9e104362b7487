/**
 * Request logging middleware.
 *
 * Emits one entry per request after the response is produced. The sink
 * is a plain callback; main.ts binds it to the pino logger.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@vestline/types";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Unset for routes outside /api, which never resolve a caller. */
  readonly caller?: Address | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      caller: c.var.auth?.address,
    });
  };
}

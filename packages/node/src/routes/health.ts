/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (audit log chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { YieldSplitService } from "../services/yieldsplit-service.js";

export function createHealthRoutes(service: YieldSplitService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      paused: service.distributor.paused,
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyIntegrity();
    if (!integrity.valid) {
      return c.json(
        {
          status: "not_ready",
          detail: `chainValid=false, errors=${integrity.errors.length}`,
          timestamp: new Date().toISOString(),
        },
        503,
      );
    }
    return c.json({
      status: "ready",
      events: service.eventStore.globalPosition(),
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}

/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests can build the app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { YieldSplitService } from "./services/yieldsplit-service.js";
import type { YieldSplitServiceConfig } from "./services/yieldsplit-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { actorHeaderMiddleware, authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createShareRoutes } from "./routes/shares.js";
import { createPreferenceRoutes } from "./routes/preferences.js";
import { createCustodyRoutes } from "./routes/custody.js";
import { createDistributionRoutes } from "./routes/distributions.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createEventRoutes } from "./routes/events.js";

export interface CreateAppOptions {
  readonly serviceConfig: YieldSplitServiceConfig;
  /** Request logger. No request logging when omitted. */
  readonly logger?: Logger;
  /** When provided, API keys are required; otherwise X-Actor is trusted. */
  readonly auth?: AuthConfig;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: YieldSplitService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new YieldSplitService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use(
    "/api/*",
    options.auth !== undefined ? authMiddleware(options.auth) : actorHeaderMiddleware(),
  );
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/shares", createShareRoutes());
  app.route("/api/v1/preferences", createPreferenceRoutes());
  app.route("/api/v1/custody", createCustodyRoutes());
  app.route("/api/v1/distributions", createDistributionRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}

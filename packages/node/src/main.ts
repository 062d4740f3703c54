/**
 * HTTP server entry point.
 *
 * Loads configuration, builds the app, mirrors every audit event to the
 * logger and serves until SIGTERM or SIGINT.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { createApp } from "./app.js";
import { loadConfig, parseApiKeys, toServiceConfig } from "./config.js";

async function main(): Promise<void> {
  const config = loadConfig();

  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty", options: { colorize: true } } }
      : {}),
  });

  const apiKeys = config.API_KEYS !== undefined ? parseApiKeys(config.API_KEYS) : new Map<string, string>();
  if (apiKeys.size === 0) {
    logger.warn("API_KEYS not set; trusting the X-Actor header");
  }

  const audit = logger.child({ component: "audit" });
  const { app, service } = createApp({
    serviceConfig: {
      ...toServiceConfig(config),
      onAuditSubscriberError: (err, record) => {
        audit.error(
          { err, type: record.event.type, position: record.globalPosition },
          "audit subscriber failed",
        );
      },
    },
    logger,
    ...(apiKeys.size > 0 ? { auth: { apiKeys } } : {}),
  });

  const subscription = service.eventStore.subscribeAll((stored) => {
    audit.info(
      { type: stored.event.type, streamId: stored.streamId, payload: stored.event.payload },
      "audit event",
    );
  });

  const server = serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST }, (info) => {
    logger.info(
      { port: info.port, host: config.HOST, events: service.eventStore.globalPosition() },
      "yieldsplit node started",
    );
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "shutting down");
    subscription.unsubscribe();
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "error during shutdown");
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("Fatal error during startup:", err);
  process.exit(1);
});

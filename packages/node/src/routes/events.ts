/**
 * Audit log routes.
 *
 * GET /api/v1/events            — All events, or one stream with ?stream=
 * GET /api/v1/events/integrity  — Recompute the hash chain
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(ListEventsQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.get("validatedQuery");
    const events = service.readEvents(query);
    const last = events[events.length - 1];
    const next =
      last === undefined
        ? null
        : query.stream !== undefined
          ? last.version + 1
          : last.globalPosition + 1;

    return c.json({
      data: events,
      pagination: { next: events.length === query.limit ? next : null },
    });
  });

  routes.get("/integrity", (c) => {
    const service = c.get("service");
    const result = service.verifyIntegrity();
    return c.json({ data: { ...result, events: service.eventStore.globalPosition() } });
  });

  return routes;
}

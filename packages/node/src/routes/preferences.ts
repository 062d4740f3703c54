/**
 * Allocation preference routes. The acting address is the stakeholder.
 *
 * PUT    /api/v1/preferences               — Set beneficiary and split
 * DELETE /api/v1/preferences               — Clear
 * GET    /api/v1/preferences/:stakeholder  — Read (empty sentinel when unset)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SetPreferenceSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createPreferenceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.put("/", validateBody(SetPreferenceSchema), (c) => {
    const { distributor } = c.get("service");
    const body = c.get("validatedBody");

    const preference = distributor.setPreference(
      c.get("actor"),
      body.beneficiary,
      body.splitPercent,
    );

    return c.json({ data: preference });
  });

  routes.delete("/", (c) => {
    const { distributor } = c.get("service");
    const cleared = distributor.clearPreference(c.get("actor"));
    return c.json({ data: { cleared } });
  });

  routes.get("/:stakeholder", (c) => {
    const { distributor } = c.get("service");
    const stakeholder = c.req.param("stakeholder");
    return c.json({ data: { stakeholder, ...distributor.getPreference(stakeholder) } });
  });

  return routes;
}

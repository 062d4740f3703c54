/**
 * Share ledger routes.
 *
 * PUT /api/v1/shares                      — Report a stakeholder's new share balance
 * GET /api/v1/shares/:asset               — Total and active stakeholders
 * GET /api/v1/shares/:asset/:stakeholder  — One stakeholder's shares
 */

import { Hono } from "hono";
import { formatUnits } from "@yieldsplit/types";
import type { AppEnv } from "../types/api-contract.js";
import { SetSharesSchema } from "../types/dto.js";
import { toShareUpdateView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

export function createShareRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.put("/", validateBody(SetSharesSchema), (c) => {
    const { distributor } = c.get("service");
    const body = c.get("validatedBody");

    const update = distributor.setShares(c.get("actor"), body.stakeholder, body.asset, body.amount);

    return c.json({ data: toShareUpdateView(update) });
  });

  routes.get("/:asset", (c) => {
    const { distributor } = c.get("service");
    const asset = c.req.param("asset");

    return c.json({
      data: {
        asset,
        totalShares: formatUnits(distributor.getTotalShares(asset)),
        stakeholders: distributor.getActiveStakeholders(asset).map((stakeholder) => ({
          stakeholder,
          shares: formatUnits(distributor.getShares(stakeholder, asset)),
        })),
      },
    });
  });

  routes.get("/:asset/:stakeholder", (c) => {
    const { distributor } = c.get("service");
    const asset = c.req.param("asset");
    const stakeholder = c.req.param("stakeholder");

    return c.json({
      data: {
        asset,
        stakeholder,
        shares: formatUnits(distributor.getShares(stakeholder, asset)),
      },
    });
  });

  return routes;
}

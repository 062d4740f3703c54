/**
 * Distribution routes.
 *
 * POST /api/v1/distributions/single          — Pay the default beneficiary
 * POST /api/v1/distributions/equal-split     — Split across a list
 * POST /api/v1/distributions/proportional    — Split by shares and preferences
 * GET  /api/v1/distributions/preview/:asset  — Fee and allocation plan, no transfers
 * GET  /api/v1/distributions/stats/:asset    — Running counters
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DistributeEqualSplitSchema,
  DistributeSchema,
  PreviewQuerySchema,
} from "../types/dto.js";
import { toFeePreviewView, toPlanView, toResultView, toStatsView } from "../types/views.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

export function createDistributionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/single", validateBody(DistributeSchema), (c) => {
    const { distributor } = c.get("service");
    const body = c.get("validatedBody");
    const result = distributor.distributeSingle(c.get("actor"), body.asset, body.amount);
    return c.json({ data: toResultView(result) });
  });

  routes.post("/equal-split", validateBody(DistributeEqualSplitSchema), (c) => {
    const { distributor } = c.get("service");
    const body = c.get("validatedBody");
    const result = distributor.distributeEqualSplit(
      c.get("actor"),
      body.asset,
      body.amount,
      body.beneficiaries,
    );
    return c.json({ data: toResultView(result) });
  });

  routes.post("/proportional", validateBody(DistributeSchema), (c) => {
    const { distributor } = c.get("service");
    const body = c.get("validatedBody");
    const result = distributor.distributeProportional(c.get("actor"), body.asset, body.amount);
    return c.json({ data: toResultView(result) });
  });

  routes.get("/preview/:asset", validateQuery(PreviewQuerySchema), (c) => {
    const { distributor } = c.get("service");
    const { amount } = c.get("validatedQuery");

    return c.json({
      data: {
        fee: toFeePreviewView(distributor.previewFee(amount)),
        plan: toPlanView(distributor.previewProportional(c.req.param("asset"), amount)),
      },
    });
  });

  routes.get("/stats/:asset", (c) => {
    const { distributor } = c.get("service");
    return c.json({ data: toStatsView(distributor.getDistributionStats(c.req.param("asset"))) });
  });

  return routes;
}

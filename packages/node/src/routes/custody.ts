/**
 * Custody routes.
 *
 * POST /api/v1/custody/deposits  — Record yield arriving in custody
 * GET  /api/v1/custody/:asset    — Distributor's custody balance
 */

import { Hono } from "hono";
import { formatUnits } from "@yieldsplit/types";
import type { AppEnv } from "../types/api-contract.js";
import { DepositSchema } from "../types/dto.js";
import { toTransferView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

export function createCustodyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposits", validateBody(DepositSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const transfer = service.deposit(c.get("actor"), body.asset, body.amount);

    return c.json({ data: toTransferView(transfer) }, 201);
  });

  routes.get("/:asset", (c) => {
    const service = c.get("service");
    const asset = c.req.param("asset");

    return c.json({
      data: {
        asset,
        holder: service.custodyAddress,
        balance: formatUnits(service.custodyBalance(asset)),
      },
    });
  });

  return routes;
}

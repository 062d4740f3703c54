/**
 * Administrative routes. Each requires the matching role on the acting
 * address; the Distributor enforces it.
 *
 * GET  /api/v1/admin/config              — Fee config, accepted splits, pause flag
 * PUT  /api/v1/admin/fee-config          — fee-admin
 * PUT  /api/v1/admin/treasury            — fee-admin
 * PUT  /api/v1/admin/accepted-splits     — fee-admin
 * PUT  /api/v1/admin/authorized-callers  — caller-admin
 * POST /api/v1/admin/pause               — pauser
 * POST /api/v1/admin/unpause             — pauser
 * POST /api/v1/admin/emergency-withdraw  — emergency-admin, allowed while paused
 */

import { Hono } from "hono";
import { formatUnits } from "@yieldsplit/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  AcceptedSplitsSchema,
  AuthorizedCallerSchema,
  EmergencyWithdrawSchema,
  FeeConfigSchema,
  TreasurySchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/config", (c) => {
    const { distributor } = c.get("service");
    return c.json({
      data: {
        fees: distributor.getFeeConfig(),
        acceptedSplits: distributor.getAcceptedSplits(),
        paused: distributor.paused,
      },
    });
  });

  routes.put("/fee-config", validateBody(FeeConfigSchema), (c) => {
    const { distributor } = c.get("service");
    const body = c.get("validatedBody");
    const fees = distributor.updateFeeConfig(c.get("actor"), body.feeRecipient, body.feeBps);
    return c.json({ data: fees });
  });

  routes.put("/treasury", validateBody(TreasurySchema), (c) => {
    const { distributor } = c.get("service");
    const fees = distributor.setTreasury(c.get("actor"), c.get("validatedBody").treasury);
    return c.json({ data: fees });
  });

  routes.put("/accepted-splits", validateBody(AcceptedSplitsSchema), (c) => {
    const { distributor } = c.get("service");
    const splits = distributor.setAcceptedSplits(c.get("actor"), c.get("validatedBody").splits);
    return c.json({ data: { acceptedSplits: splits } });
  });

  routes.put("/authorized-callers", validateBody(AuthorizedCallerSchema), (c) => {
    const { distributor } = c.get("service");
    const body = c.get("validatedBody");
    distributor.setAuthorizedCaller(c.get("actor"), body.caller, body.authorized);
    return c.json({
      data: { caller: body.caller, authorized: distributor.isAuthorizedCaller(body.caller) },
    });
  });

  routes.post("/pause", (c) => {
    const { distributor } = c.get("service");
    distributor.pause(c.get("actor"));
    return c.json({ data: { paused: distributor.paused } });
  });

  routes.post("/unpause", (c) => {
    const { distributor } = c.get("service");
    distributor.unpause(c.get("actor"));
    return c.json({ data: { paused: distributor.paused } });
  });

  routes.post("/emergency-withdraw", validateBody(EmergencyWithdrawSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");
    service.distributor.emergencyWithdraw(c.get("actor"), body.asset, body.to, body.amount);
    return c.json({
      data: {
        asset: body.asset,
        to: body.to,
        amount: formatUnits(body.amount),
        remaining: formatUnits(service.custodyBalance(body.asset)),
      },
    });
  });

  return routes;
}

/**
 * Tests for distribution routes.
 *
 * Setup for the proportional cases: ALICE holds 300 and BOB 700 shares
 * of USDC, ALICE routes 50% to CHARITY, protocol fee is 250 bps.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  createTestApp,
  jsonRequest,
  ALICE,
  BOB,
  CHARITY,
  FEE_RECIPIENT,
  OWNER,
  PROTOCOL,
  SCHOOL,
  VAULT,
} from "./setup.js";
import type { ErrorBody } from "./setup.js";
import type { AppInstance } from "../src/app.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

async function call(path: string, method: string, body?: unknown, actor: string = VAULT) {
  return instance.app.request(jsonRequest(path, method, body, actor));
}

async function deposit(amount: string): Promise<void> {
  await call("/api/v1/custody/deposits", "POST", { asset: "USDC", amount });
}

async function seedShares(): Promise<void> {
  await call("/api/v1/shares", "PUT", { stakeholder: ALICE, asset: "USDC", amount: "300" });
  await call("/api/v1/shares", "PUT", { stakeholder: BOB, asset: "USDC", amount: "700" });
  await call("/api/v1/preferences", "PUT", { beneficiary: CHARITY, splitPercent: 50 }, ALICE);
}

// =============================================================================
// Single
// =============================================================================

describe("POST /api/v1/distributions/single", () => {
  it("pays the default beneficiary net of the fee", async () => {
    await deposit("1000");

    const res = await call("/api/v1/distributions/single", "POST", { asset: "USDC", amount: "1000" });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: Record<string, unknown> };
    expect(body.data["mode"]).toBe("single");
    expect(body.data["payouts"]).toEqual([
      { recipient: CHARITY, kind: "beneficiary", amount: "990", fee: "10" },
    ]);
    expect(body.data["distributed"]).toBe("1000");
    expect(body.data["dust"]).toBe("0");
    expect(body.data["distributionCount"]).toBe(1);
    expect(body.data["allocations"]).toBeUndefined();
    expect(instance.service.custody.balanceOf(CHARITY, "USDC")).toBe(990n);
    expect(instance.service.custody.balanceOf(FEE_RECIPIENT, "USDC")).toBe(10n);
  });

  it("returns 422 when custody holds too little", async () => {
    await deposit("5");

    const res = await call("/api/v1/distributions/single", "POST", { asset: "USDC", amount: "6" });

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INSUFFICIENT_BALANCE");
    expect(body.error.details).toEqual({ category: "domain" });
    expect(instance.service.custodyBalance("USDC")).toBe(5n);
  });

  it("returns 400 for a zero amount", async () => {
    const res = await call("/api/v1/distributions/single", "POST", { asset: "USDC", amount: "0" });

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("ZERO_AMOUNT");
  });
});

// =============================================================================
// Equal split
// =============================================================================

describe("POST /api/v1/distributions/equal-split", () => {
  it("gives the remainder to the first beneficiary", async () => {
    await deposit("101");

    const res = await call("/api/v1/distributions/equal-split", "POST", {
      asset: "USDC",
      amount: "101",
      beneficiaries: [CHARITY, SCHOOL],
    });

    // fee 1, net 100 → 50 / 50
    const body = (await res.json()) as { data: { payouts: unknown; distributionCount: number } };
    expect(body.data.payouts).toEqual([
      { recipient: CHARITY, kind: "beneficiary", amount: "50", fee: "1" },
      { recipient: SCHOOL, kind: "beneficiary", amount: "50", fee: "0" },
    ]);
    expect(body.data.distributionCount).toBe(2);
  });

  it("returns 400 for an empty list", async () => {
    await deposit("10");

    const res = await call("/api/v1/distributions/equal-split", "POST", {
      asset: "USDC",
      amount: "10",
      beneficiaries: [],
    });

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("EMPTY_BENEFICIARY_LIST");
  });
});

// =============================================================================
// Proportional
// =============================================================================

describe("POST /api/v1/distributions/proportional", () => {
  it("splits by shares and preferences", async () => {
    await seedShares();
    await deposit("1000");

    const res = await call("/api/v1/distributions/proportional", "POST", {
      asset: "USDC",
      amount: "1000",
    });

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      data: { payouts: unknown; allocations: unknown; distributed: string; dust: string };
    };
    expect(body.data.allocations).toEqual([
      {
        stakeholder: ALICE,
        shares: "300",
        beneficiary: CHARITY,
        userYield: "300",
        protocolAmount: "7",
        beneficiaryAmount: "146",
        treasuryAmount: "147",
      },
      {
        stakeholder: BOB,
        shares: "700",
        beneficiary: "",
        userYield: "700",
        protocolAmount: "17",
        beneficiaryAmount: "0",
        treasuryAmount: "683",
      },
    ]);
    expect(body.data.payouts).toEqual([
      { recipient: PROTOCOL, kind: "protocol", amount: "24", fee: "0" },
      { recipient: CHARITY, kind: "beneficiary", amount: "146", fee: "0" },
      { recipient: FEE_RECIPIENT, kind: "treasury", amount: "830", fee: "0" },
    ]);
    expect(body.data.distributed).toBe("1000");
    expect(body.data.dust).toBe("0");
  });

  it("returns 503 while paused and moves nothing", async () => {
    await deposit("1000");
    await call("/api/v1/admin/pause", "POST", undefined, OWNER);

    const res = await call("/api/v1/distributions/proportional", "POST", {
      asset: "USDC",
      amount: "1000",
    });

    expect(res.status).toBe(503);
    expect(instance.service.custodyBalance("USDC")).toBe(1000n);
  });
});

// =============================================================================
// Preview and stats
// =============================================================================

describe("GET /api/v1/distributions/preview/:asset", () => {
  it("returns the fee and the plan without moving funds", async () => {
    await seedShares();

    const res = await call("/api/v1/distributions/preview/USDC?amount=1000", "GET");

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      data: { fee: unknown; plan: Record<string, unknown> };
    };
    expect(body.data.fee).toEqual({
      amount: "1000",
      fee: "10",
      net: "990",
      feeBps: 100,
      feeRecipient: FEE_RECIPIENT,
    });
    expect(body.data.plan["protocolTotal"]).toBe("24");
    expect(body.data.plan["treasuryTotal"]).toBe("830");
    expect(body.data.plan["beneficiaryTotals"]).toEqual({ [CHARITY]: "146" });
    expect(body.data.plan["totalShares"]).toBe("1000");
    expect(instance.service.eventStore.read("distribution-USDC")).toHaveLength(0);
  });

  it("returns 400 without an amount", async () => {
    const res = await call("/api/v1/distributions/preview/USDC", "GET");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/distributions/stats/:asset", () => {
  it("reports running counters", async () => {
    await seedShares();
    await deposit("1000");
    await call("/api/v1/distributions/proportional", "POST", { asset: "USDC", amount: "1000" });

    const res = await call("/api/v1/distributions/stats/USDC", "GET");

    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      asset: "USDC",
      totalDistributions: 1,
      totalDonated: "146",
      totalFeeCollected: "830",
      totalProtocolFees: "24",
      defaultBeneficiary: CHARITY,
      feeRecipient: FEE_RECIPIENT,
      feeBps: 100,
    });
  });
});

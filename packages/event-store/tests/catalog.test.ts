/**
 * Tests for EventCatalog and the distributor event definitions.
 *
 * Verifies:
 * - Schema registration and lookup
 * - Payload validation against zod schemas
 * - Distributor catalog factory (all event types)
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { EventCatalog, CatalogError } from "../src/catalog.js";
import type { EventSchema } from "../src/catalog.js";
import { DISTRIBUTOR_EVENTS, createDistributorCatalog } from "../src/distributor-events.js";

function makeSchema(type: string, source: EventSchema["source"] = "config"): EventSchema {
  return {
    type,
    description: `Schema for ${type}`,
    source,
    payload: z.object({ id: z.string() }),
  };
}

// =============================================================================
// Registration
// =============================================================================

describe("registration", () => {
  it("registers and looks up a schema", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("test.created"));

    expect(catalog.has("test.created")).toBe(true);
    expect(catalog.getSchema("test.created")?.description).toBe("Schema for test.created");
    expect(catalog.size).toBe(1);
  });

  it("rejects a duplicate type", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("test.created"));

    expect(() => catalog.register(makeSchema("test.created"))).toThrow(CatalogError);
  });

  it("lists types sorted and filters by source", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("b.second", "shares"));
    catalog.register(makeSchema("a.first", "guard"));
    catalog.register(makeSchema("c.third", "shares"));

    expect(catalog.listTypes()).toEqual(["a.first", "b.second", "c.third"]);
    expect(catalog.listBySource("shares").map((s) => s.type)).toEqual(["b.second", "c.third"]);
    expect(catalog.listBySource("distribution")).toEqual([]);
  });
});

// =============================================================================
// Validation
// =============================================================================

describe("validate", () => {
  const catalog = new EventCatalog();
  catalog.register(makeSchema("test.created"));

  it("accepts a matching payload", () => {
    expect(catalog.validate("test.created", { id: "x" })).toBe(true);
  });

  it("rejects a mismatched payload", () => {
    expect(catalog.validate("test.created", { id: 42 })).toBe(false);
  });

  it("rejects an unregistered type", () => {
    expect(catalog.validate("test.unknown", { id: "x" })).toBe(false);
  });
});

// =============================================================================
// Distributor catalog
// =============================================================================

describe("createDistributorCatalog", () => {
  const catalog = createDistributorCatalog();

  it("registers every distributor event", () => {
    expect(catalog.size).toBe(Object.keys(DISTRIBUTOR_EVENTS).length);
    for (const type of Object.values(DISTRIBUTOR_EVENTS)) {
      expect(catalog.has(type)).toBe(true);
    }
  });

  it("groups configuration events under config", () => {
    expect(catalog.listBySource("config").map((s) => s.type).sort()).toEqual([
      DISTRIBUTOR_EVENTS.FEE_CONFIG_CHANGED,
      DISTRIBUTOR_EVENTS.TREASURY_CHANGED,
    ]);
  });

  it("accepts a well-formed shares update", () => {
    expect(
      catalog.validate(DISTRIBUTOR_EVENTS.SHARES_UPDATED, {
        stakeholder: "0xa1",
        asset: "USDC",
        previousShares: "0",
        newShares: "1000",
        totalShares: "1000",
      }),
    ).toBe(true);
  });

  it("rejects amounts that are not digit strings", () => {
    const payload = {
      stakeholder: "0xa1",
      asset: "USDC",
      previousShares: "0",
      newShares: "-5",
      totalShares: "1000",
    };
    expect(catalog.validate(DISTRIBUTOR_EVENTS.SHARES_UPDATED, payload)).toBe(false);
    expect(
      catalog.validate(DISTRIBUTOR_EVENTS.SHARES_UPDATED, { ...payload, newShares: 1000 }),
    ).toBe(false);
  });

  it("rejects an unknown payout kind", () => {
    expect(
      catalog.validate(DISTRIBUTOR_EVENTS.PAYOUT_SENT, {
        passId: "pass-1",
        asset: "USDC",
        recipient: "0xb1",
        kind: "bonus",
        amount: "10",
        fee: "0",
        distributionCount: 1,
      }),
    ).toBe(false);
  });

  it("rejects a split percent above 100", () => {
    expect(
      catalog.validate(DISTRIBUTOR_EVENTS.PREFERENCE_CHANGED, {
        stakeholder: "0xa1",
        beneficiary: "0xb1",
        splitPercent: 150,
        lastUpdated: "2026-01-01T00:00:00.000Z",
      }),
    ).toBe(false);
  });
});

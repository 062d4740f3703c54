/**
 * Tests for audit log routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, jsonRequest, ALICE, BOB, OWNER, VAULT } from "./setup.js";
import type { ErrorBody } from "./setup.js";
import type { AppInstance } from "../src/app.js";
import type { StoredEvent } from "@yieldsplit/event-store";

let instance: AppInstance;

interface EventsBody {
  data: StoredEvent[];
  pagination: { next: number | null };
}

beforeEach(async () => {
  instance = createTestApp();
  const { app } = instance;
  await app.request(
    jsonRequest("/api/v1/shares", "PUT", { stakeholder: ALICE, asset: "USDC", amount: "10" }, VAULT),
  );
  await app.request(
    jsonRequest("/api/v1/shares", "PUT", { stakeholder: BOB, asset: "USDC", amount: "20" }, VAULT),
  );
  await app.request(jsonRequest("/api/v1/admin/pause", "POST", undefined, OWNER));
});

describe("GET /api/v1/events", () => {
  it("lists all events in global order", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/events", "GET", undefined, ALICE));

    expect(res.status).toBe(200);
    const body = (await res.json()) as EventsBody;
    expect(body.data.map((e) => e.event.type)).toEqual([
      "distributor.shares.updated",
      "distributor.shares.updated",
      "distributor.pause.changed",
    ]);
    expect(body.data.map((e) => e.globalPosition)).toEqual([1, 2, 3]);
    expect(body.pagination.next).toBeNull();
  });

  it("pages with from and limit", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/events?from=2&limit=1", "GET", undefined, ALICE),
    );

    const body = (await res.json()) as EventsBody;
    expect(body.data).toHaveLength(1);
    expect(body.data[0]?.globalPosition).toBe(2);
    expect(body.pagination.next).toBe(3);
  });

  it("reads one stream", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/events?stream=shares-USDC", "GET", undefined, ALICE),
    );

    const body = (await res.json()) as EventsBody;
    expect(body.data.map((e) => e.version)).toEqual([1, 2]);
    expect(body.data[1]?.event.payload).toEqual({
      stakeholder: BOB,
      asset: "USDC",
      previousShares: "0",
      newShares: "20",
      totalShares: "30",
    });
  });

  it("returns 400 for a bad limit", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/events?limit=0", "GET", undefined, ALICE),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/events/integrity", () => {
  it("reports an intact chain", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/events/integrity", "GET", undefined, ALICE),
    );

    const body = (await res.json()) as { data: { valid: boolean; events: number } };
    expect(body.data.valid).toBe(true);
    expect(body.data.events).toBe(3);
  });
});

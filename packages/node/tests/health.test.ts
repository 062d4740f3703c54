/**
 * Tests for health check routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, OWNER } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 without authentication", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; paused: boolean };
    expect(body.status).toBe("ok");
    expect(body.paused).toBe(false);
  });

  it("reports the pause flag", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/admin/pause", "POST", undefined, OWNER));

    const body = (await (await app.request("/health")).json()) as { paused: boolean };
    expect(body.paused).toBe(true);
  });
});

describe("GET /ready", () => {
  it("is ready with an intact audit log", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/admin/pause", "POST", undefined, OWNER));

    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; events: number };
    expect(body.status).toBe("ready");
    expect(body.events).toBe(1);
  });
});

/**
 * Tests for actor resolution.
 */

import { describe, it, expect } from "vitest";
import { createApp } from "../../src/app.js";
import { createTestApp, jsonRequest, testServiceConfig, ALICE, VAULT } from "../setup.js";
import type { ErrorBody } from "../setup.js";

function securedApp() {
  return createApp({
    serviceConfig: testServiceConfig(),
    auth: { apiKeys: new Map([["test-vault-key", VAULT]]) },
  });
}

describe("API key mode", () => {
  it("acts as the address bound to the key", async () => {
    const { app, service } = securedApp();

    const res = await app.request(
      jsonRequest(
        "/api/v1/shares",
        "PUT",
        { stakeholder: ALICE, asset: "USDC", amount: "5" },
        undefined,
        { "X-Api-Key": "test-vault-key" },
      ),
    );

    expect(res.status).toBe(200);
    expect(service.eventStore.read("shares-USDC")[0]?.event.metadata.actor).toBe(VAULT);
  });

  it("ignores X-Actor", async () => {
    const { app } = securedApp();

    const res = await app.request(jsonRequest("/api/v1/admin/config", "GET", undefined, VAULT));

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Authentication required" });
  });

  it("rejects an unknown key", async () => {
    const { app } = securedApp();

    const res = await app.request(
      jsonRequest("/api/v1/admin/config", "GET", undefined, undefined, { "X-Api-Key": "nope" }),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid API key");
  });

  it("leaves /health open", async () => {
    const { app } = securedApp();
    expect((await app.request("/health")).status).toBe(200);
  });
});

describe("X-Actor mode", () => {
  it("requires the header on API routes", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/admin/config"));

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("X-Actor header required");
  });
});

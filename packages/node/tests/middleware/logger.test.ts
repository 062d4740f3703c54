/**
 * Tests for request logging.
 */

import { describe, it, expect } from "vitest";
import { pino } from "pino";
import { createTestApp, jsonRequest, ALICE } from "../setup.js";

function capture() {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "info", base: null, timestamp: false },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg) as Record<string, unknown>);
      },
    },
  );
  return { logger, lines };
}

describe("loggerMiddleware", () => {
  it("logs method, path, status and request id", async () => {
    const { logger, lines } = capture();
    const { app } = createTestApp({ logger });

    await app.request(jsonRequest("/health", "GET", undefined, undefined, { "X-Request-Id": "req-1" }));

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "request",
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-1",
    });
    expect(typeof lines[0]?.["durationMs"]).toBe("number");
  });

  it("logs rejected requests at warn", async () => {
    const { logger, lines } = capture();
    const { app } = createTestApp({ logger });

    await app.request(
      jsonRequest("/api/v1/distributions/single", "POST", { asset: "USDC", amount: "1" }, ALICE),
    );

    expect(lines[0]).toMatchObject({ level: 40, msg: "request rejected", status: 403 });
  });
});

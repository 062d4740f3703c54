/**
 * Test helpers for @yieldsplit/node.
 *
 * Builds the Hono app with all middleware and routes, but no HTTP
 * server, over a fixed clock and sequential ids.
 */

import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import type { YieldSplitServiceConfig } from "../src/services/yieldsplit-service.js";

export const OWNER = "0xowner";
export const VAULT = "0xvault";
export const ALICE = "0xalice";
export const BOB = "0xbob";
export const CHARITY = "0xcharity";
export const SCHOOL = "0xschool";
export const FEE_RECIPIENT = "0xfees";
export const PROTOCOL = "0xprotocol";
export const CUSTODY = "custody";
export const NOW = "2026-05-01T00:00:00.000Z";

export function testServiceConfig(
  overrides: Partial<YieldSplitServiceConfig> = {},
): YieldSplitServiceConfig {
  let seq = 0;
  return {
    custodyAddress: CUSTODY,
    fees: {
      feeRecipient: FEE_RECIPIENT,
      feeBps: 100,
      feeBpsCeiling: 1_000,
      protocolTreasury: PROTOCOL,
      protocolFeeBps: 250,
    },
    roles: {
      "fee-admin": [OWNER],
      "caller-admin": [OWNER],
      "emergency-admin": [OWNER],
      pauser: [OWNER],
    },
    authorizedCallers: [VAULT],
    approvedBeneficiaries: [CHARITY, SCHOOL],
    defaultBeneficiary: CHARITY,
    now: () => NOW,
    nextId: () => `id-${++seq}`,
    ...overrides,
  };
}

/**
 * Create a test app in unsecured mode (X-Actor header).
 */
export function createTestApp(options: Partial<CreateAppOptions> = {}): AppInstance {
  return createApp({ serviceConfig: testServiceConfig(), ...options });
}

/**
 * JSON request helper. `actor` goes in X-Actor.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  actor?: string,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...(actor !== undefined ? { "X-Actor": actor } : {}),
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

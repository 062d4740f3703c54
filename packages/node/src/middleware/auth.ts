/**
 * Actor resolution middleware.
 *
 * Secured mode: X-Api-Key is looked up in the configured key registry and
 * the request acts as the address bound to that key.
 * Unsecured mode (tests, dev): the X-Actor header names the address.
 *
 * On success, sets `c.set("actor", address)`. Otherwise returns 401.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@yieldsplit/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACTOR_HEADER = "X-Actor";

export interface AuthConfig {
  /** Map of API key → acting address */
  readonly apiKeys: ReadonlyMap<string, Address>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const actor = config.apiKeys.get(apiKey);
    if (actor === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("actor", actor);
    return next();
  };
}

export function actorHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const actor = c.req.header(ACTOR_HEADER)?.trim();
    if (actor === undefined || actor.length === 0) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `${ACTOR_HEADER} header required`),
        401,
      );
    }
    c.set("actor", actor);
    return next();
  };
}

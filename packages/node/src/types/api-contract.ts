/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { Address } from "@yieldsplit/types";
import type { YieldSplitService } from "../services/yieldsplit-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The service every route delegates to */
    service: YieldSplitService;

    /** Address the request acts as (set by auth middleware) */
    actor: Address;
  };
}

/** AppEnv plus the parsed body placed by validateBody. */
export type ValidatedEnv<T> = AppEnv & { Variables: { validatedBody: T } };

/** AppEnv plus the parsed query placed by validateQuery. */
export type QueryEnv<T> = AppEnv & { Variables: { validatedQuery: T } };

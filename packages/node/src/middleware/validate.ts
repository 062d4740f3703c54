/**
 * Zod validation middleware for request bodies and query strings.
 *
 * The parsed output (amounts already bigint) lands in `validatedBody` or
 * `validatedQuery`; failures short-circuit with a 400 VALIDATION_ERROR.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodType, ZodTypeDef } from "zod";
import type { QueryEnv, ValidatedEnv } from "../types/api-contract.js";
import { validationEnvelope } from "../types/error.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export function validateBody<T>(schema: Schema<T>): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(validationEnvelope("Invalid JSON in request body"), 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(validationEnvelope("Request body validation failed", result.error), 400);
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

export function validateQuery<T>(schema: Schema<T>): MiddlewareHandler<QueryEnv<T>> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return c.json(validationEnvelope("Invalid query parameters", result.error), 400);
    }

    c.set("validatedQuery", result.data);
    return next();
  };
}

/**
 * Global error handler.
 *
 * Maps domain errors to HTTP statuses and writes the error envelope.
 * Distributor errors map by category; custody and event store errors
 * by code. Anything else is a 500 with no internal detail.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { DistributorError } from "@yieldsplit/distributor";
import type { DistributorErrorCategory } from "@yieldsplit/distributor";
import { CustodyError } from "@yieldsplit/custody";
import type { CustodyErrorCode } from "@yieldsplit/custody";
import { EventStoreError } from "@yieldsplit/event-store";
import type { EventStoreErrorCode } from "@yieldsplit/event-store";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorEnvelope } from "../types/error.js";

const CATEGORY_STATUS: Record<DistributorErrorCategory, ContentfulStatusCode> = {
  input: 400,
  authorization: 403,
  domain: 422,
  system: 503,
};

const CUSTODY_STATUS: Record<CustodyErrorCode, ContentfulStatusCode> = {
  INVALID_AMOUNT: 400,
  ZERO_ADDRESS: 400,
  BALANCE_OVERFLOW: 400,
  INSUFFICIENT_FUNDS: 422,
  TRANSFER_REJECTED: 422,
  SESSION_CLOSED: 500,
};

const EVENT_STORE_STATUS: Record<EventStoreErrorCode, ContentfulStatusCode> = {
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 500,
  INVALID_VERSION: 500,
  UNKNOWN_EVENT_TYPE: 500,
  INVALID_PAYLOAD: 500,
};

interface MappedError {
  readonly status: ContentfulStatusCode;
  readonly envelope: ErrorEnvelope;
}

export function mapError(err: Error): MappedError {
  if (err instanceof DistributorError) {
    return {
      status: CATEGORY_STATUS[err.category],
      envelope: createErrorEnvelope(err.code, err.message, { category: err.category }),
    };
  }
  if (err instanceof CustodyError) {
    return expose(CUSTODY_STATUS[err.code], err.code, err.message);
  }
  if (err instanceof EventStoreError) {
    return expose(EVENT_STORE_STATUS[err.code], err.code, err.message);
  }
  return expose(500, "INTERNAL_ERROR", err.message);
}

function expose(status: ContentfulStatusCode, code: string, message: string): MappedError {
  // Don't leak internal details
  const text = status === 500 ? "Internal server error" : message;
  return { status, envelope: createErrorEnvelope(status === 500 ? "INTERNAL_ERROR" : code, text) };
}

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const { status, envelope } = mapError(err);
  return c.json(envelope, status);
}

/**
 * Runtime Type Guards
 *
 * Narrowing functions for yieldsplit domain types, used at system
 * boundaries (HTTP bodies, JSONL replay, external integrations).
 */

import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import { isUnitAmount, isZeroAddress } from "./primitives.js";

// =============================================================================
// Primitive guards
// =============================================================================

/** A non-empty address that is not the zero address. */
export function isAddress(value: unknown): value is string {
  return typeof value === "string" && value.length > 0 && !isZeroAddress(value);
}

/** A base-10 unit amount string ("0", "1500", ...). */
export function isUnitAmountString(value: unknown): value is string {
  return typeof value === "string" && isUnitAmount(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>([
  "shares",
  "preferences",
  "config",
  "distribution",
  "guard",
]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}

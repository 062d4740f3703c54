/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state change in the distributor is captured as a DomainEvent so an
 * auditor can rebuild all money movement from the log alone.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Payload amounts are digit strings, never numbers or bigints
 * - No UPDATE, no DELETE — only new events
 */

/**
 * Which component emitted an event.
 */
export type EventSource =
  | "shares"
  | "preferences"
  | "config"
  | "distribution"
  | "guard";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address of the caller that caused this event */
  readonly actor: string;

  /** ID for grouping events produced by one call (e.g. a distribution pass) */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`
 * (e.g. "distributor.shares.updated", "distributor.payout.sent").
 */
export interface DomainEvent {
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}

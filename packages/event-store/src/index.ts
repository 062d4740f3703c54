/**
 * @yieldsplit/event-store — Append-only, hash-chained audit log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - EventCatalog for payload validation
 * - Distributor domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export type { UnhashedEvent } from "./hash-chain.js";

// Implementations
export { EventLog } from "./event-log.js";
export type { EventLogOptions } from "./event-log.js";
export { InMemoryEventStore } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Distributor domain events
export {
  DISTRIBUTOR_EVENTS,
  createDistributorCatalog,
  readDistributionCompleted,
  readPayoutSent,
} from "./distributor-events.js";
export type {
  DistributorEventType,
  DistributorEventPayloads,
  DistributionMode,
  PayoutKind,
  PreferenceChangedPayload,
  AcceptedSplitsChangedPayload,
  SharesUpdatedPayload,
  FeeConfigChangedPayload,
  TreasuryChangedPayload,
  AuthorizedCallerChangedPayload,
  PauseChangedPayload,
  AllocationComputedPayload,
  PayoutSentPayload,
  DistributionCompletedPayload,
  EmergencyWithdrawnPayload,
} from "./distributor-events.js";

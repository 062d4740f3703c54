/**
 * Builds distributor domain events and appends them to the audit log.
 *
 * Stream layout:
 * - shares-<asset>            share changes
 * - preferences-<stakeholder> preference changes
 * - config                    fee, treasury and accepted-split changes
 * - guard                     callers, pause, emergency withdrawals
 * - distribution-<asset>      allocations, payouts, completions
 */

import type { Address, AssetId, DomainEvent, EventSource } from "@yieldsplit/types";
import type {
  DistributorEventPayloads,
  DistributorEventType,
  EventStore,
} from "@yieldsplit/event-store";

export const STREAMS = {
  shares: (asset: AssetId) => `shares-${asset}`,
  preferences: (stakeholder: Address) => `preferences-${stakeholder}`,
  config: "config",
  guard: "guard",
  distribution: (asset: AssetId) => `distribution-${asset}`,
} as const;

const SOURCES: Readonly<Record<DistributorEventType, EventSource>> = {
  "distributor.preference.changed": "preferences",
  "distributor.accepted-splits.changed": "preferences",
  "distributor.shares.updated": "shares",
  "distributor.fee-config.changed": "config",
  "distributor.treasury.changed": "config",
  "distributor.authorized-caller.changed": "guard",
  "distributor.pause.changed": "guard",
  "distributor.allocation.computed": "distribution",
  "distributor.payout.sent": "distribution",
  "distributor.distribution.completed": "distribution",
  "distributor.emergency.withdrawn": "guard",
};

export class AuditTrail {
  constructor(
    private readonly store: EventStore,
    private readonly now: () => string,
    private readonly nextId: () => string,
  ) {}

  /** Fresh ID for grouping the events of one call. */
  correlationId(): string {
    return this.nextId();
  }

  event<K extends DistributorEventType>(
    type: K,
    payload: DistributorEventPayloads[K],
    actor: Address,
    correlationId: string,
  ): DomainEvent {
    return {
      type,
      metadata: {
        eventId: this.nextId(),
        timestamp: this.now(),
        actor,
        correlationId,
        source: SOURCES[type],
      },
      payload,
    };
  }

  /** Build and append a single event with its own correlation ID. */
  record<K extends DistributorEventType>(
    streamId: string,
    type: K,
    payload: DistributorEventPayloads[K],
    actor: Address,
  ): void {
    this.store.append(streamId, [this.event(type, payload, actor, this.correlationId())]);
  }

  append(streamId: string, events: readonly DomainEvent[]): void {
    if (events.length > 0) {
      this.store.append(streamId, events);
    }
  }
}

/**
 * @yieldsplit/event-store — Shared append-only log engine.
 *
 * Holds the stream index, the global log and the hash chain head.
 * Concrete stores only decide how a batch is persisted:
 * - InMemoryEventStore keeps nothing outside the process
 * - JsonlEventStore writes and fsyncs one line per record
 *
 * A batch is persisted before it is indexed, so a failed write leaves
 * the in-memory view untouched. Subscribers run synchronously, after
 * the batch is indexed, in global order. Once a batch is indexed the
 * append has succeeded: a throwing subscriber is reported through
 * `onSubscriberError` and never fails the append.
 */

import type { DomainEvent } from "@yieldsplit/types";
import type { EventCatalog } from "./catalog.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";

export interface EventLogOptions {
  /** When set, every appended event must be registered and valid. */
  readonly catalog?: EventCatalog;

  /**
   * Receives errors thrown by subscribers. Default: rethrown from a
   * microtask, outside the append.
   */
  readonly onSubscriberError?: (error: unknown, record: StoredEvent) => void;
}

export abstract class EventLog implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _catalog: EventCatalog | undefined;
  private readonly _onSubscriberError: (error: unknown, record: StoredEvent) => void;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: EventLogOptions) {
    this._catalog = options?.catalog;
    this._onSubscriberError = options?.onSubscriberError ?? rethrowLater;
  }

  /** Durably record a batch. Throwing aborts the append. */
  protected abstract persist(records: readonly StoredEvent[]): void;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    for (const event of events) {
      this._assertCataloged(streamId, event);
    }

    const fromVersion = this.streamVersion(streamId) + 1;
    const appendedAt = new Date().toISOString();
    const records: StoredEvent[] = [];
    let previousHash = this._lastHash;

    events.forEach((event, i) => {
      const base = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      records.push({ ...base, hash, previousHash });
      previousHash = hash;
    });

    this.persist(records);

    for (const record of records) {
      this.index(record);
    }
    this._dispatch(records);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return limit(stream.slice(fromVersion - 1), options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = Math.max(options?.fromPosition ?? 1, 1);
    return limit(this._globalLog.slice(fromPosition - 1), options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /** Add an already-persisted record to the in-memory view. */
  protected index(record: StoredEvent): void {
    let stream = this._streams.get(record.streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(record.streamId, stream);
    }
    stream.push(record);
    this._globalLog.push(record);
    this._lastHash = record.hash;
  }

  private _dispatch(records: readonly StoredEvent[]): void {
    for (const handler of this._subscribers) {
      for (const record of records) {
        try {
          handler(record);
        } catch (err) {
          this._onSubscriberError(err, record);
        }
      }
    }
  }

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _assertCataloged(streamId: string, event: DomainEvent): void {
    if (this._catalog === undefined) {
      return;
    }
    if (!this._catalog.has(event.type)) {
      throw new EventStoreError(
        "UNKNOWN_EVENT_TYPE",
        `Event type "${event.type}" is not registered`,
        streamId,
      );
    }
    if (!this._catalog.validate(event.type, event.payload)) {
      throw new EventStoreError(
        "INVALID_PAYLOAD",
        `Payload does not match schema for "${event.type}"`,
        streamId,
      );
    }
  }
}

function rethrowLater(error: unknown): void {
  queueMicrotask(() => {
    throw error;
  });
}

function limit(
  records: readonly StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? records.slice(0, maxCount) : records;
}

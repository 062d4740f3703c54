/**
 * @yieldsplit/event-store — Event Catalog.
 *
 * The registry of every domain event type the system may append:
 * - Documentation: what events exist and which component emits them
 * - Validation: runtime payload checking against a zod schema
 * - Discovery: listing known event types
 *
 * Unknown types are rejected by stores that are given a catalog.
 */

import type { ZodType } from "zod";
import type { EventSource } from "@yieldsplit/types";

export interface EventSchema {
  /** Event type string (e.g., "distributor.shares.updated") */
  readonly type: string;

  /** Human-readable description of this event */
  readonly description: string;

  /** Which component emits this event */
  readonly source: EventSource;

  readonly payload: ZodType;
}

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * @throws CatalogError if the type is already registered
   */
  register(schema: EventSchema): void {
    if (this._schemas.has(schema.type)) {
      throw new CatalogError(`Event type "${schema.type}" is already registered`);
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate a payload against its registered schema.
   * Returns false for unregistered types.
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      return false;
    }
    return schema.payload.safeParse(payload).success;
  }

  get size(): number {
    return this._schemas.size;
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

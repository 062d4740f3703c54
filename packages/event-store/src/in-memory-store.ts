/**
 * @yieldsplit/event-store — In-memory EventStore implementation.
 *
 * Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * All state is lost on process exit.
 */

import { EventLog } from "./event-log.js";

export class InMemoryEventStore extends EventLog {
  protected persist(): void {
    // Nothing outside the in-memory index.
  }
}

/**
 * @yieldsplit/event-store — Hash chain for the tamper-evident audit log.
 *
 * Each record is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * chained to the previous record's hash:
 *
 *   record[1].hash = sha256(canonicalize(record[1]) + "genesis")
 *   record[n].hash = sha256(canonicalize(record[n]) + record[n-1].hash)
 *
 * Any modification to any record breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

/** The hashed part of a record: everything except the chain fields. */
export type UnhashedEvent = Omit<StoredEvent, "hash" | "previousHash">;

/**
 * Compute the hex SHA-256 hash of a record given its predecessor's hash.
 */
export function computeEventHash(
  record: UnhashedEvent,
  previousHash: string,
): string {
  const content = canonicalize({
    event: record.event,
    streamId: record.streamId,
    version: record.version,
    globalPosition: record.globalPosition,
    appendedAt: record.appendedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify a sequence of records in global position order.
 */
export function verifyHashChain(
  records: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const record of records) {
    if (record.previousHash !== previousHash) {
      errors.push({
        position: record.globalPosition,
        reason: `previousHash mismatch at position ${record.globalPosition}: expected "${previousHash}", got "${record.previousHash}"`,
      });
    }

    const expected = computeEventHash(record, record.previousHash);
    if (record.hash !== expected) {
      errors.push({
        position: record.globalPosition,
        reason: `Hash mismatch at position ${record.globalPosition}`,
      });
    }

    if (errors.length === 0) {
      lastVerifiedPosition = record.globalPosition;
    }
    previousHash = record.hash;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}

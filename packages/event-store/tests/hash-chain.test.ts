/**
 * Tests for the hash chain.
 *
 * Verifies:
 * - Hashes are deterministic and key-order independent
 * - Tampering with a payload, a link, or the order is detected
 * - lastVerifiedPosition stops before the first broken record
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@yieldsplit/types";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "../src/hash-chain.js";
import type { UnhashedEvent } from "../src/hash-chain.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import type { StoredEvent } from "../src/types.js";

function makeEvent(type: string, payload: Record<string, unknown>): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "0xowner",
      correlationId: "corr-1",
      source: "distribution",
    },
    payload,
  };
}

function unhashed(payload: Record<string, unknown>): UnhashedEvent {
  return {
    event: makeEvent("test.payout", payload),
    streamId: "distribution-USDC",
    version: 1,
    globalPosition: 1,
    appendedAt: "2026-01-01T00:00:00.000Z",
  };
}

function buildLog(count: number): StoredEvent[] {
  const store = new InMemoryEventStore();
  for (let i = 0; i < count; i++) {
    store.append("distribution-USDC", [makeEvent("test.payout", { amount: String(i * 100) })]);
  }
  return [...store.readAll()];
}

describe("computeEventHash", () => {
  it("is deterministic", () => {
    const record = unhashed({ amount: "1000" });
    expect(computeEventHash(record, GENESIS_HASH)).toBe(computeEventHash(record, GENESIS_HASH));
  });

  it("ignores payload key order", () => {
    const a = unhashed({ amount: "1000", recipient: "0xb1" });
    const b = unhashed({ recipient: "0xb1", amount: "1000" });
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("depends on the previous hash", () => {
    const record = unhashed({ amount: "1000" });
    expect(computeEventHash(record, GENESIS_HASH)).not.toBe(computeEventHash(record, "abc"));
  });

  it("depends on the payload", () => {
    expect(computeEventHash(unhashed({ amount: "1000" }), GENESIS_HASH)).not.toBe(
      computeEventHash(unhashed({ amount: "1001" }), GENESIS_HASH),
    );
  });
});

describe("verifyHashChain", () => {
  it("accepts an empty log", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("accepts an untouched log", () => {
    const result = verifyHashChain(buildLog(4));
    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(4);
  });

  it("detects a rewritten payload", () => {
    const log = buildLog(4);
    const target = log[2];
    if (target === undefined) throw new Error("missing record");
    log[2] = { ...target, event: makeEvent("test.payout", { amount: "999999" }) };

    const result = verifyHashChain(log);

    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(2);
    expect(result.errors).toEqual([
      { position: 3, reason: "Hash mismatch at position 3" },
    ]);
  });

  it("detects a removed record", () => {
    const log = buildLog(4);
    log.splice(1, 1);

    const result = verifyHashChain(log);

    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors[0]?.position).toBe(3);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 3/);
  });

  it("detects swapped records", () => {
    const log = buildLog(3);
    const [a, b, c] = log;
    if (a === undefined || b === undefined || c === undefined) throw new Error("short log");

    const result = verifyHashChain([b, a, c]);

    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(0);
  });
});

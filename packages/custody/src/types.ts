/**
 * @yieldsplit/custody — Types for the in-process custody ledger.
 *
 * Rules:
 * - Balances are per (holder, asset) and never negative
 * - Every movement is a single debit/credit pair recorded in the journal
 * - Money leaves a holder only through a transfer session
 */

import type { Address, AssetId } from "@yieldsplit/types";

// ─── Journal ─────────────────────────────────────────────────────────────

/** A committed movement between two holders. */
export interface CustodyTransfer {
  readonly id: string;
  readonly correlationId: string;
  readonly asset: AssetId;
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
  readonly timestamp: string;
}

/** A movement staged inside an open session. */
export interface StagedTransfer {
  readonly asset: AssetId;
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

export interface JournalFilter {
  readonly holder?: Address;
  readonly asset?: AssetId;
  readonly correlationId?: string;
}

/**
 * Called when a transfer to the hooked address is staged.
 * Throwing rejects the transfer.
 */
export type ReceiverHook = (transfer: StagedTransfer) => void;

// ─── Ports ───────────────────────────────────────────────────────────────

/**
 * A group of outgoing transfers applied all at once on commit.
 * After commit or abort the session is closed.
 */
export interface TransferSession {
  readonly correlationId: string;

  /** @throws CustodyError when funds are short or the receiver rejects */
  transfer(asset: AssetId, to: Address, amount: bigint): void;

  pending(): readonly StagedTransfer[];

  commit(): readonly CustodyTransfer[];

  abort(): void;
}

/** One holder's view of custody: its balances and its outgoing transfers. */
export interface CustodyPort {
  readonly holder: Address;

  balanceOf(asset: AssetId): bigint;

  begin(correlationId: string): TransferSession;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type CustodyErrorCode =
  | "INVALID_AMOUNT"
  | "ZERO_ADDRESS"
  | "INSUFFICIENT_FUNDS"
  | "TRANSFER_REJECTED"
  | "BALANCE_OVERFLOW"
  | "SESSION_CLOSED";

export class CustodyError extends Error {
  constructor(
    public readonly code: CustodyErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CustodyError";
  }
}

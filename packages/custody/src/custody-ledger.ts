/**
 * @yieldsplit/custody — Custody ledger.
 *
 * Holds pooled assets on behalf of addresses and moves them between holders.
 * Deposits arrive from the EXTERNAL account; everything else moves through
 * a TransferSession obtained from a holder's CustodyPort.
 *
 * Sessions stage transfers against the holder's balance minus what is
 * already staged, and against the receiver's balance plus what is already
 * staged to it, run the receiver hook at staging time, and apply the whole
 * batch on commit. A batch that staged cleanly commits cleanly unless
 * balances moved outside the session in between. Abort discards the
 * batch; nothing was applied.
 */

import { MAX_AMOUNT, isZeroAddress } from "@yieldsplit/types";
import type { Address, AssetId } from "@yieldsplit/types";
import type {
  CustodyPort,
  CustodyTransfer,
  JournalFilter,
  ReceiverHook,
  StagedTransfer,
  TransferSession,
} from "./types.js";
import { CustodyError } from "./types.js";

/** Source of deposits. Never holds a balance. */
export const EXTERNAL: Address = "external";

export interface CustodyLedgerOptions {
  /** ISO timestamp source. Default: wall clock */
  readonly now?: () => string;
}

export class CustodyLedger {
  private readonly _balances = new Map<Address, Map<AssetId, bigint>>();
  private readonly _journal: CustodyTransfer[] = [];
  private readonly _hooks = new Map<Address, ReceiverHook>();
  private readonly _now: () => string;
  private _seq = 0;

  constructor(options?: CustodyLedgerOptions) {
    this._now = options?.now ?? (() => new Date().toISOString());
  }

  // ─── Deposits ────────────────────────────────────────────────────────

  /**
   * Credit `to` with funds arriving from outside custody.
   */
  deposit(to: Address, asset: AssetId, amount: bigint, correlationId?: string): CustodyTransfer {
    assertAmount(amount);
    if (isZeroAddress(to)) {
      throw new CustodyError("ZERO_ADDRESS", "Cannot deposit to the zero address");
    }
    this._assertCreditFits(to, asset, amount);

    const transfer = this._record({
      asset,
      from: EXTERNAL,
      to,
      amount,
      correlationId: correlationId ?? `deposit-${this._seq + 1}`,
    });
    this._credit(to, asset, amount);
    return transfer;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(holder: Address, asset: AssetId): bigint {
    return this._balances.get(holder)?.get(asset) ?? 0n;
  }

  journal(filter?: JournalFilter): readonly CustodyTransfer[] {
    if (filter === undefined) {
      return [...this._journal];
    }
    return this._journal.filter((t) => {
      if (filter.holder !== undefined && t.from !== filter.holder && t.to !== filter.holder) {
        return false;
      }
      if (filter.asset !== undefined && t.asset !== filter.asset) {
        return false;
      }
      if (filter.correlationId !== undefined && t.correlationId !== filter.correlationId) {
        return false;
      }
      return true;
    });
  }

  // ─── Receiver hooks ──────────────────────────────────────────────────

  /** Install (or with `undefined`, remove) the hook for an address. */
  setReceiverHook(address: Address, hook: ReceiverHook | undefined): void {
    if (hook === undefined) {
      this._hooks.delete(address);
    } else {
      this._hooks.set(address, hook);
    }
  }

  // ─── Ports ───────────────────────────────────────────────────────────

  accountFor(holder: Address): CustodyPort {
    return {
      holder,
      balanceOf: (asset) => this.balanceOf(holder, asset),
      begin: (correlationId) => new StagedSession(this, holder, correlationId),
    };
  }

  // ─── Internal (used by sessions) ─────────────────────────────────────

  /** @internal */
  notifyReceiver(transfer: StagedTransfer): void {
    const hook = this._hooks.get(transfer.to);
    if (hook === undefined) {
      return;
    }
    try {
      hook(transfer);
    } catch (err) {
      if (err instanceof CustodyError) {
        throw err;
      }
      throw new CustodyError(
        "TRANSFER_REJECTED",
        `Receiver ${transfer.to} rejected ${transfer.amount.toString()} ${transfer.asset}`,
        { cause: err },
      );
    }
  }

  /**
   * Apply a staged batch. Funds and caps are re-checked for the whole
   * batch before anything moves.
   *
   * @internal
   */
  applyBatch(correlationId: string, batch: readonly StagedTransfer[]): readonly CustodyTransfer[] {
    const delta = new Map<string, bigint>();
    const key = (holder: Address, asset: AssetId) => `${holder}\u0000${asset}`;
    for (const t of batch) {
      delta.set(key(t.from, t.asset), (delta.get(key(t.from, t.asset)) ?? 0n) - t.amount);
      delta.set(key(t.to, t.asset), (delta.get(key(t.to, t.asset)) ?? 0n) + t.amount);
    }
    for (const t of batch) {
      const after = this.balanceOf(t.from, t.asset) + (delta.get(key(t.from, t.asset)) ?? 0n);
      if (after < 0n) {
        throw new CustodyError(
          "INSUFFICIENT_FUNDS",
          `${t.from} holds ${this.balanceOf(t.from, t.asset).toString()} ${t.asset}, batch needs more`,
        );
      }
      const credited = this.balanceOf(t.to, t.asset) + (delta.get(key(t.to, t.asset)) ?? 0n);
      if (credited > MAX_AMOUNT) {
        throw new CustodyError("BALANCE_OVERFLOW", `Balance of ${t.to} would exceed uint256`);
      }
    }

    return batch.map((t) => {
      this._credit(t.from, t.asset, -t.amount);
      this._credit(t.to, t.asset, t.amount);
      return this._record({ ...t, correlationId });
    });
  }

  private _assertCreditFits(to: Address, asset: AssetId, amount: bigint): void {
    if (this.balanceOf(to, asset) + amount > MAX_AMOUNT) {
      throw new CustodyError("BALANCE_OVERFLOW", `Balance of ${to} would exceed uint256`);
    }
  }

  private _credit(holder: Address, asset: AssetId, amount: bigint): void {
    let assets = this._balances.get(holder);
    if (assets === undefined) {
      assets = new Map();
      this._balances.set(holder, assets);
    }
    assets.set(asset, (assets.get(asset) ?? 0n) + amount);
  }

  private _record(t: StagedTransfer & { correlationId: string }): CustodyTransfer {
    this._seq += 1;
    const transfer: CustodyTransfer = {
      id: `ctx-${this._seq}`,
      correlationId: t.correlationId,
      asset: t.asset,
      from: t.from,
      to: t.to,
      amount: t.amount,
      timestamp: this._now(),
    };
    this._journal.push(transfer);
    return transfer;
  }
}

class StagedSession implements TransferSession {
  private readonly _staged: StagedTransfer[] = [];
  private _closed = false;

  constructor(
    private readonly _ledger: CustodyLedger,
    private readonly _holder: Address,
    readonly correlationId: string,
  ) {}

  transfer(asset: AssetId, to: Address, amount: bigint): void {
    this._assertOpen();
    assertAmount(amount);
    if (isZeroAddress(to)) {
      throw new CustodyError("ZERO_ADDRESS", "Cannot transfer to the zero address");
    }

    const available = this._ledger.balanceOf(this._holder, asset) - this._stagedOut(asset);
    if (amount > available) {
      throw new CustodyError(
        "INSUFFICIENT_FUNDS",
        `${this._holder} has ${available.toString()} ${asset} available, transfer needs ${amount.toString()}`,
      );
    }

    const credited = this._ledger.balanceOf(to, asset) + this._stagedIn(to, asset) + amount;
    if (to !== this._holder && credited > MAX_AMOUNT) {
      throw new CustodyError("BALANCE_OVERFLOW", `Balance of ${to} would exceed uint256`);
    }

    const staged: StagedTransfer = { asset, from: this._holder, to, amount };
    this._ledger.notifyReceiver(staged);
    this._staged.push(staged);
  }

  pending(): readonly StagedTransfer[] {
    return [...this._staged];
  }

  commit(): readonly CustodyTransfer[] {
    this._assertOpen();
    this._closed = true;
    return this._ledger.applyBatch(this.correlationId, this._staged);
  }

  abort(): void {
    this._closed = true;
    this._staged.length = 0;
  }

  private _stagedIn(to: Address, asset: AssetId): bigint {
    let total = 0n;
    for (const t of this._staged) {
      if (t.asset === asset && t.to === to) total += t.amount;
    }
    return total;
  }

  private _stagedOut(asset: AssetId): bigint {
    let total = 0n;
    for (const t of this._staged) {
      if (t.asset === asset) total += t.amount;
    }
    return total;
  }

  private _assertOpen(): void {
    if (this._closed) {
      throw new CustodyError("SESSION_CLOSED", `Session ${this.correlationId} is closed`);
    }
  }
}

function assertAmount(amount: bigint): void {
  if (amount <= 0n || amount > MAX_AMOUNT) {
    throw new CustodyError("INVALID_AMOUNT", `Amount must be in [1, 2^256 - 1], got ${amount.toString()}`);
  }
}

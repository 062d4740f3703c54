/**
 * Share Ledger.
 *
 * Per asset: each stakeholder's share balance, the running total, and the
 * Active Index of stakeholders with a nonzero balance.
 *
 * Invariants (per asset):
 * - totalShares == sum of balances
 * - a stakeholder is in the Active Index exactly once iff its balance > 0
 */

import { MAX_AMOUNT, formatUnits, isZeroAddress } from "@yieldsplit/types";
import type { Address, AssetId } from "@yieldsplit/types";
import { DISTRIBUTOR_EVENTS } from "@yieldsplit/event-store";
import type { AuditTrail } from "./audit.js";
import { STREAMS } from "./audit.js";
import { DistributorError } from "./errors.js";

// =============================================================================
// Active Index
// =============================================================================

/**
 * Dense member array plus position map. Add, remove and lookup are O(1);
 * removal swaps the last member into the freed slot.
 */
export class ActiveIndex {
  private readonly members: Address[] = [];
  private readonly positions = new Map<Address, number>();

  has(member: Address): boolean {
    return this.positions.has(member);
  }

  /** No-op when already present. */
  add(member: Address): void {
    if (this.positions.has(member)) {
      return;
    }
    this.positions.set(member, this.members.length);
    this.members.push(member);
  }

  /** No-op when absent. */
  remove(member: Address): void {
    const position = this.positions.get(member);
    if (position === undefined) {
      return;
    }
    const last = this.members.pop();
    this.positions.delete(member);
    if (last !== undefined && last !== member) {
      this.members[position] = last;
      this.positions.set(last, position);
    }
  }

  get size(): number {
    return this.members.length;
  }

  list(): readonly Address[] {
    return [...this.members];
  }
}

// =============================================================================
// Share Ledger
// =============================================================================

export interface ShareUpdate {
  readonly stakeholder: Address;
  readonly asset: AssetId;
  readonly previousShares: bigint;
  readonly newShares: bigint;
  readonly totalShares: bigint;
}

export class ShareLedger {
  private readonly balances = new Map<AssetId, Map<Address, bigint>>();
  private readonly totals = new Map<AssetId, bigint>();
  private readonly indexes = new Map<AssetId, ActiveIndex>();

  constructor(private readonly audit: AuditTrail) {}

  /**
   * Set a stakeholder's absolute share balance. Authorization is the
   * caller's concern; this validates and applies.
   */
  setShares(actor: Address, stakeholder: Address, asset: AssetId, newShares: bigint): ShareUpdate {
    if (isZeroAddress(stakeholder)) {
      throw new DistributorError("ZERO_ADDRESS", "Stakeholder cannot be the zero address");
    }
    if (asset.length === 0) {
      throw new DistributorError("ZERO_ADDRESS", "Asset cannot be empty");
    }
    if (newShares < 0n || newShares > MAX_AMOUNT) {
      throw new DistributorError(
        "AMOUNT_OUT_OF_RANGE",
        `Share amount must be in [0, 2^256 - 1], got ${newShares.toString()}`,
      );
    }

    const previousShares = this.getShares(stakeholder, asset);
    const totalShares = this.getTotalShares(asset) - previousShares + newShares;
    if (totalShares < 0n) {
      throw new DistributorError(
        "SHARE_UNDERFLOW",
        `Total shares for ${asset} would drop below zero`,
      );
    }
    if (totalShares > MAX_AMOUNT) {
      throw new DistributorError(
        "AMOUNT_OUT_OF_RANGE",
        `Total shares for ${asset} would exceed 2^256 - 1`,
      );
    }

    this.audit.record(
      STREAMS.shares(asset),
      DISTRIBUTOR_EVENTS.SHARES_UPDATED,
      {
        stakeholder,
        asset,
        previousShares: formatUnits(previousShares),
        newShares: formatUnits(newShares),
        totalShares: formatUnits(totalShares),
      },
      actor,
    );

    this._apply(stakeholder, asset, newShares, totalShares);
    return { stakeholder, asset, previousShares, newShares, totalShares };
  }

  getShares(stakeholder: Address, asset: AssetId): bigint {
    return this.balances.get(asset)?.get(stakeholder) ?? 0n;
  }

  getTotalShares(asset: AssetId): bigint {
    return this.totals.get(asset) ?? 0n;
  }

  getActiveStakeholders(asset: AssetId): readonly Address[] {
    return this.indexes.get(asset)?.list() ?? [];
  }

  listAssets(): readonly AssetId[] {
    return [...this.totals.keys()];
  }

  private _apply(stakeholder: Address, asset: AssetId, newShares: bigint, totalShares: bigint): void {
    let balances = this.balances.get(asset);
    let index = this.indexes.get(asset);
    if (balances === undefined || index === undefined) {
      balances = new Map();
      index = new ActiveIndex();
      this.balances.set(asset, balances);
      this.indexes.set(asset, index);
    }

    if (newShares === 0n) {
      balances.delete(stakeholder);
      index.remove(stakeholder);
    } else {
      balances.set(stakeholder, newShares);
      index.add(stakeholder);
    }
    this.totals.set(asset, totalShares);
  }
}

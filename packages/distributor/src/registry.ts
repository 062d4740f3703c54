/**
 * In-memory beneficiary registry.
 *
 * Stands in for the external registry in tests and in the node service.
 */

import { isZeroAddress } from "@yieldsplit/types";
import type { Address, AssetId } from "@yieldsplit/types";
import type { BeneficiaryRegistry } from "./types.js";

export interface Receipt {
  readonly beneficiary: Address;
  readonly asset: AssetId;
  readonly amount: bigint;
}

export class InMemoryBeneficiaryRegistry implements BeneficiaryRegistry {
  private readonly approved = new Set<Address>();
  private readonly received: Receipt[] = [];
  private _default: Address | undefined;

  constructor(approved: readonly Address[] = [], defaultBeneficiary?: Address) {
    for (const b of approved) this.approve(b);
    if (defaultBeneficiary !== undefined && !isZeroAddress(defaultBeneficiary)) {
      this._default = defaultBeneficiary;
    }
  }

  approve(beneficiary: Address): void {
    if (isZeroAddress(beneficiary)) {
      throw new RangeError("Cannot approve the zero address");
    }
    this.approved.add(beneficiary);
  }

  revoke(beneficiary: Address): void {
    this.approved.delete(beneficiary);
  }

  setDefault(beneficiary: Address | undefined): void {
    this._default = beneficiary;
  }

  isApproved(beneficiary: Address): boolean {
    return this.approved.has(beneficiary);
  }

  defaultBeneficiary(): Address | undefined {
    return this._default;
  }

  recordReceipt(beneficiary: Address, amount: bigint, asset: AssetId): void {
    this.received.push({ beneficiary, asset, amount });
  }

  receipts(beneficiary?: Address): readonly Receipt[] {
    return beneficiary === undefined
      ? [...this.received]
      : this.received.filter((r) => r.beneficiary === beneficiary);
  }
}

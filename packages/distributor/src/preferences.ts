/**
 * Allocation Preference Store.
 *
 * Each stakeholder may name one approved beneficiary and the percentage of
 * their net yield that goes to it. Without a preference, net yield goes to
 * the fallback treasury.
 */

import { isZeroAddress } from "@yieldsplit/types";
import type { Address } from "@yieldsplit/types";
import { DISTRIBUTOR_EVENTS } from "@yieldsplit/event-store";
import type { AuditTrail } from "./audit.js";
import { STREAMS } from "./audit.js";
import { DistributorError } from "./errors.js";
import type { AllocationPreference, BeneficiaryRegistry } from "./types.js";

export const DEFAULT_ACCEPTED_SPLITS: readonly number[] = [50, 75, 100];

/** What `get` returns for a stakeholder that never set a preference. */
export const EMPTY_PREFERENCE: AllocationPreference = Object.freeze({
  beneficiary: "",
  splitPercent: 0,
  lastUpdated: "",
});

export class PreferenceStore {
  private readonly preferences = new Map<Address, AllocationPreference>();
  private acceptedSplits: readonly number[];

  constructor(
    private readonly registry: BeneficiaryRegistry,
    private readonly audit: AuditTrail,
    private readonly now: () => string,
    acceptedSplits: readonly number[] = DEFAULT_ACCEPTED_SPLITS,
  ) {
    this.acceptedSplits = validateSplits(acceptedSplits);
  }

  set(stakeholder: Address, beneficiary: Address, splitPercent: number): AllocationPreference {
    if (isZeroAddress(beneficiary)) {
      throw new DistributorError("ZERO_ADDRESS", "Beneficiary cannot be the zero address");
    }
    if (!this.registry.isApproved(beneficiary)) {
      throw new DistributorError(
        "UNAPPROVED_BENEFICIARY",
        `Beneficiary ${beneficiary} is not approved`,
      );
    }
    if (!this.acceptedSplits.includes(splitPercent)) {
      throw new DistributorError(
        "INVALID_SPLIT_PERCENT",
        `Split ${String(splitPercent)} is not one of ${this.acceptedSplits.join(", ")}`,
      );
    }

    const preference: AllocationPreference = {
      beneficiary,
      splitPercent,
      lastUpdated: this.now(),
    };
    this.audit.record(
      STREAMS.preferences(stakeholder),
      DISTRIBUTOR_EVENTS.PREFERENCE_CHANGED,
      { stakeholder, ...preference },
      stakeholder,
    );
    this.preferences.set(stakeholder, preference);
    return preference;
  }

  /** Returns false when there was nothing to clear. */
  clear(stakeholder: Address): boolean {
    if (!this.preferences.has(stakeholder)) {
      return false;
    }
    this.audit.record(
      STREAMS.preferences(stakeholder),
      DISTRIBUTOR_EVENTS.PREFERENCE_CHANGED,
      { stakeholder, beneficiary: "", splitPercent: 0, lastUpdated: this.now() },
      stakeholder,
    );
    this.preferences.delete(stakeholder);
    return true;
  }

  get(stakeholder: Address): AllocationPreference {
    return this.preferences.get(stakeholder) ?? EMPTY_PREFERENCE;
  }

  // ─── Accepted splits ────────────────────────────────────────────────

  getAcceptedSplits(): readonly number[] {
    return [...this.acceptedSplits];
  }

  /**
   * Replace the accepted set. Stored preferences keep their percent
   * even when it is no longer accepted.
   */
  setAcceptedSplits(actor: Address, percents: readonly number[]): readonly number[] {
    const current = validateSplits(percents);
    this.audit.record(
      STREAMS.config,
      DISTRIBUTOR_EVENTS.ACCEPTED_SPLITS_CHANGED,
      { previous: [...this.acceptedSplits], current: [...current] },
      actor,
    );
    this.acceptedSplits = current;
    return this.getAcceptedSplits();
  }
}

function validateSplits(percents: readonly number[]): readonly number[] {
  if (percents.length === 0) {
    throw new DistributorError("CONFIG_OUT_OF_BOUNDS", "Accepted splits cannot be empty");
  }
  for (const p of percents) {
    if (!Number.isInteger(p) || p < 1 || p > 100) {
      throw new DistributorError(
        "CONFIG_OUT_OF_BOUNDS",
        `Accepted split ${String(p)} must be an integer in 1..100`,
      );
    }
  }
  return [...new Set(percents)].sort((a, b) => a - b);
}

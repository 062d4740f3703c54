/**
 * @yieldsplit/event-store — Distributor Domain Event Definitions.
 *
 * Naming convention: `distributor.<entity>.<action>`
 *
 * Together these events are enough to reconstruct every share change,
 * configuration change and unit of money moved, without reading storage.
 * All amounts are base-10 digit strings.
 */

import { z } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import type { DomainEvent } from "@yieldsplit/types";
import { EventCatalog } from "./catalog.js";

const amount = z.string().regex(/^(0|[1-9]\d*)$/);
const address = z.string();

// =============================================================================
// Payloads
// =============================================================================

// Object type aliases, not interfaces: they must be assignable to
// DomainEvent["payload"], which has an index signature.

export type PreferenceChangedPayload = {
  readonly stakeholder: string;
  /** Empty when the preference was cleared */
  readonly beneficiary: string;
  /** 0 when the preference was cleared */
  readonly splitPercent: number;
  readonly lastUpdated: string;
};

export type AcceptedSplitsChangedPayload = {
  readonly previous: readonly number[];
  readonly current: readonly number[];
};

export type SharesUpdatedPayload = {
  readonly stakeholder: string;
  readonly asset: string;
  readonly previousShares: string;
  readonly newShares: string;
  readonly totalShares: string;
};

export type FeeConfigChangedPayload = {
  readonly oldRecipient: string;
  readonly newRecipient: string;
  readonly oldFeeBps: number;
  readonly newFeeBps: number;
};

export type TreasuryChangedPayload = {
  readonly oldTreasury: string;
  readonly newTreasury: string;
};

export type AuthorizedCallerChangedPayload = {
  readonly caller: string;
  readonly authorized: boolean;
};

export type PauseChangedPayload = {
  readonly paused: boolean;
};

export type AllocationComputedPayload = {
  readonly passId: string;
  readonly asset: string;
  readonly stakeholder: string;
  /** Empty when the net yield fell back to the treasury */
  readonly beneficiary: string;
  readonly userYield: string;
  readonly protocolAmount: string;
  readonly beneficiaryAmount: string;
  readonly treasuryAmount: string;
};

export type PayoutKind = "beneficiary" | "treasury" | "protocol";

export type PayoutSentPayload = {
  readonly passId: string;
  readonly asset: string;
  readonly recipient: string;
  readonly kind: PayoutKind;
  readonly amount: string;
  /** Fee portion attributed to this payout ("0" when none) */
  readonly fee: string;
  /** Running `totalDistributions` after this payout was counted */
  readonly distributionCount: number;
};

export type DistributionMode = "single" | "equal-split" | "proportional";

export type DistributionCompletedPayload = {
  readonly passId: string;
  readonly asset: string;
  readonly mode: DistributionMode;
  readonly amount: string;
  readonly distributed: string;
  /** Rounding remainder kept in custody */
  readonly dust: string;
  readonly distributionCount: number;
};

export type EmergencyWithdrawnPayload = {
  readonly asset: string;
  readonly to: string;
  readonly amount: string;
};

// =============================================================================
// Event Type Registry
// =============================================================================

export const DISTRIBUTOR_EVENTS = {
  PREFERENCE_CHANGED: "distributor.preference.changed",
  ACCEPTED_SPLITS_CHANGED: "distributor.accepted-splits.changed",
  SHARES_UPDATED: "distributor.shares.updated",
  FEE_CONFIG_CHANGED: "distributor.fee-config.changed",
  TREASURY_CHANGED: "distributor.treasury.changed",
  AUTHORIZED_CALLER_CHANGED: "distributor.authorized-caller.changed",
  PAUSE_CHANGED: "distributor.pause.changed",
  ALLOCATION_COMPUTED: "distributor.allocation.computed",
  PAYOUT_SENT: "distributor.payout.sent",
  DISTRIBUTION_COMPLETED: "distributor.distribution.completed",
  EMERGENCY_WITHDRAWN: "distributor.emergency.withdrawn",
} as const;

export type DistributorEventType =
  (typeof DISTRIBUTOR_EVENTS)[keyof typeof DISTRIBUTOR_EVENTS];

/** Payload shape for each distributor event type. */
export type DistributorEventPayloads = {
  "distributor.preference.changed": PreferenceChangedPayload;
  "distributor.accepted-splits.changed": AcceptedSplitsChangedPayload;
  "distributor.shares.updated": SharesUpdatedPayload;
  "distributor.fee-config.changed": FeeConfigChangedPayload;
  "distributor.treasury.changed": TreasuryChangedPayload;
  "distributor.authorized-caller.changed": AuthorizedCallerChangedPayload;
  "distributor.pause.changed": PauseChangedPayload;
  "distributor.allocation.computed": AllocationComputedPayload;
  "distributor.payout.sent": PayoutSentPayload;
  "distributor.distribution.completed": DistributionCompletedPayload;
  "distributor.emergency.withdrawn": EmergencyWithdrawnPayload;
};

// =============================================================================
// Settlement payloads
// =============================================================================

const payoutSentSchema: ZodType<PayoutSentPayload, ZodTypeDef, unknown> = z.object({
  passId: z.string(),
  asset: z.string(),
  recipient: address,
  kind: z.enum(["beneficiary", "treasury", "protocol"]),
  amount,
  fee: amount,
  distributionCount: z.number().int().min(0),
});

const distributionCompletedSchema: ZodType<DistributionCompletedPayload, ZodTypeDef, unknown> =
  z.object({
    passId: z.string(),
    asset: z.string(),
    mode: z.enum(["single", "equal-split", "proportional"]),
    amount,
    distributed: amount,
    dust: amount,
    distributionCount: z.number().int().min(0),
  });

/** The payout carried by a stored event, or undefined for any other event. */
export function readPayoutSent(event: DomainEvent): PayoutSentPayload | undefined {
  if (event.type !== DISTRIBUTOR_EVENTS.PAYOUT_SENT) return undefined;
  const parsed = payoutSentSchema.safeParse(event.payload);
  return parsed.success ? parsed.data : undefined;
}

/** The completed pass carried by a stored event, or undefined for any other event. */
export function readDistributionCompleted(
  event: DomainEvent,
): DistributionCompletedPayload | undefined {
  if (event.type !== DISTRIBUTOR_EVENTS.DISTRIBUTION_COMPLETED) return undefined;
  const parsed = distributionCompletedSchema.safeParse(event.payload);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Build a catalog with every distributor event registered.
 */
export function createDistributorCatalog(): EventCatalog {
  const catalog = new EventCatalog();

  catalog.register({
    type: DISTRIBUTOR_EVENTS.PREFERENCE_CHANGED,
    description: "A stakeholder set or cleared their allocation preference",
    source: "preferences",
    payload: z.object({
      stakeholder: address,
      beneficiary: address,
      splitPercent: z.number().int().min(0).max(100),
      lastUpdated: z.string(),
    }),
  });

  catalog.register({
    type: DISTRIBUTOR_EVENTS.ACCEPTED_SPLITS_CHANGED,
    description: "The accepted split percentages were replaced",
    source: "preferences",
    payload: z.object({
      previous: z.array(z.number().int()),
      current: z.array(z.number().int()),
    }),
  });

  catalog.register({
    type: DISTRIBUTOR_EVENTS.SHARES_UPDATED,
    description: "Custody reported a stakeholder's new share balance",
    source: "shares",
    payload: z.object({
      stakeholder: address,
      asset: z.string(),
      previousShares: amount,
      newShares: amount,
      totalShares: amount,
    }),
  });

  catalog.register({
    type: DISTRIBUTOR_EVENTS.FEE_CONFIG_CHANGED,
    description: "Fee recipient and fee rate were swapped",
    source: "config",
    payload: z.object({
      oldRecipient: address,
      newRecipient: address,
      oldFeeBps: z.number().int(),
      newFeeBps: z.number().int(),
    }),
  });

  catalog.register({
    type: DISTRIBUTOR_EVENTS.TREASURY_CHANGED,
    description: "The protocol treasury address was replaced",
    source: "config",
    payload: z.object({ oldTreasury: address, newTreasury: address }),
  });

  catalog.register({
    type: DISTRIBUTOR_EVENTS.AUTHORIZED_CALLER_CHANGED,
    description: "A custody caller was authorized or deauthorized",
    source: "guard",
    payload: z.object({ caller: address, authorized: z.boolean() }),
  });

  catalog.register({
    type: DISTRIBUTOR_EVENTS.PAUSE_CHANGED,
    description: "The global pause switch was flipped",
    source: "guard",
    payload: z.object({ paused: z.boolean() }),
  });

  catalog.register({
    type: DISTRIBUTOR_EVENTS.ALLOCATION_COMPUTED,
    description: "One stakeholder's split within a proportional pass",
    source: "distribution",
    payload: z.object({
      passId: z.string(),
      asset: z.string(),
      stakeholder: address,
      beneficiary: address,
      userYield: amount,
      protocolAmount: amount,
      beneficiaryAmount: amount,
      treasuryAmount: amount,
    }),
  });

  catalog.register({
    type: DISTRIBUTOR_EVENTS.PAYOUT_SENT,
    description: "A transfer out of custody within a distribution pass",
    source: "distribution",
    payload: payoutSentSchema,
  });

  catalog.register({
    type: DISTRIBUTOR_EVENTS.DISTRIBUTION_COMPLETED,
    description: "A distribution pass settled",
    source: "distribution",
    payload: distributionCompletedSchema,
  });

  catalog.register({
    type: DISTRIBUTOR_EVENTS.EMERGENCY_WITHDRAWN,
    description: "Stranded custody balance was moved out manually",
    source: "guard",
    payload: z.object({ asset: z.string(), to: address, amount }),
  });

  return catalog;
}

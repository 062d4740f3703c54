/**
 * Distributor types.
 *
 * All amounts are bigints in the asset's smallest unit. Conversion to
 * digit strings happens only when events are built and at the HTTP edge.
 */

import type { Address, AssetId } from "@yieldsplit/types";
import type { CustodyPort } from "@yieldsplit/custody";
import type { DistributionMode, EventStore, PayoutKind } from "@yieldsplit/event-store";

// =============================================================================
// Roles
// =============================================================================

export type Role = "fee-admin" | "caller-admin" | "emergency-admin" | "pauser";

export const ROLES: readonly Role[] = ["fee-admin", "caller-admin", "emergency-admin", "pauser"];

/** Addresses holding each role. Fixed for the lifetime of a Distributor. */
export type RoleAssignments = Readonly<Partial<Record<Role, readonly Address[]>>>;

// =============================================================================
// Preferences
// =============================================================================

export interface AllocationPreference {
  readonly beneficiary: Address;
  /** Percent of net yield routed to the beneficiary (from the accepted set) */
  readonly splitPercent: number;
  /** ISO timestamp of the last change, "" when never set */
  readonly lastUpdated: string;
}

// =============================================================================
// Fees
// =============================================================================

export interface FeeConfig {
  /** Receives the distribution fee; doubles as the fallback treasury */
  readonly feeRecipient: Address;
  readonly feeBps: number;
  /** Upper bound for feeBps, immutable */
  readonly feeBpsCeiling: number;
  /** Receives the protocol cut of proportional passes */
  readonly protocolTreasury: Address;
  /** Immutable */
  readonly protocolFeeBps: number;
}

export interface FeeSplit {
  readonly fee: bigint;
  readonly net: bigint;
}

export interface FeePreview extends FeeSplit {
  readonly amount: bigint;
  readonly feeBps: number;
  readonly feeRecipient: Address;
}

// =============================================================================
// Beneficiary registry port
// =============================================================================

/**
 * The external list of approved beneficiaries.
 */
export interface BeneficiaryRegistry {
  isApproved(beneficiary: Address): boolean;

  /** Target of single-mode passes; undefined when none is configured */
  defaultBeneficiary(): Address | undefined;

  /** Called once per committed beneficiary transfer. */
  recordReceipt(beneficiary: Address, amount: bigint, asset: AssetId): void;
}

// =============================================================================
// Distribution
// =============================================================================

/** One stakeholder's split within a proportional pass. */
export interface Allocation {
  readonly stakeholder: Address;
  readonly shares: bigint;
  /** "" when the net yield goes to the treasury */
  readonly beneficiary: Address;
  readonly userYield: bigint;
  readonly protocolAmount: bigint;
  readonly beneficiaryAmount: bigint;
  readonly treasuryAmount: bigint;
}

export interface AllocationPlan {
  readonly asset: AssetId;
  readonly totalYield: bigint;
  readonly totalShares: bigint;
  readonly allocations: readonly Allocation[];
  readonly protocolTotal: bigint;
  readonly treasuryTotal: bigint;
  /** Aggregate per beneficiary, in first-seen order */
  readonly beneficiaryTotals: ReadonlyMap<Address, bigint>;
  readonly dust: bigint;
}

export interface Payout {
  readonly recipient: Address;
  readonly kind: PayoutKind;
  readonly amount: bigint;
  /** Fee attributed to this payout (0n when none) */
  readonly fee: bigint;
}

export interface DistributionResult {
  readonly passId: string;
  readonly asset: AssetId;
  readonly mode: DistributionMode;
  readonly amount: bigint;
  readonly payouts: readonly Payout[];
  /** Present for proportional passes over a non-empty share set */
  readonly allocations?: readonly Allocation[];
  readonly distributed: bigint;
  /** Rounding remainder left in custody */
  readonly dust: bigint;
  /** totalDistributions after this pass */
  readonly distributionCount: number;
}

export interface AssetCounters {
  readonly totalDonated: bigint;
  readonly totalFeeCollected: bigint;
  readonly totalProtocolFees: bigint;
}

export interface DistributionStats extends AssetCounters {
  readonly asset: AssetId;
  readonly totalDistributions: number;
  readonly defaultBeneficiary: Address | undefined;
  readonly feeRecipient: Address;
  readonly feeBps: number;
}

// =============================================================================
// Construction
// =============================================================================

export interface DistributorConfig {
  readonly custody: CustodyPort;
  readonly registry: BeneficiaryRegistry;
  readonly eventStore: EventStore;
  readonly roles: RoleAssignments;
  readonly fees: FeeConfig;
  /** Default: [50, 75, 100] */
  readonly acceptedSplits?: readonly number[];
  readonly authorizedCallers?: readonly Address[];
  /** ISO timestamp source. Default: wall clock */
  readonly now?: () => string;
  /** Event and pass ID source. Default: random UUID */
  readonly nextId?: () => string;
}

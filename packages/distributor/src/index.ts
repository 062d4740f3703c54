/**
 * @yieldsplit/distributor — Proportional yield allocation and distribution.
 *
 * @packageDocumentation
 */

// Coordinator
export { Distributor } from "./distributor.js";

// Components
export { ShareLedger, ActiveIndex } from "./share-ledger.js";
export type { ShareUpdate } from "./share-ledger.js";
export { PreferenceStore, DEFAULT_ACCEPTED_SPLITS, EMPTY_PREFERENCE } from "./preferences.js";
export { FeeConfiguration } from "./fee-config.js";
export { DistributionEngine } from "./distribution.js";
export type { DistributionEngineDeps } from "./distribution.js";
export { SafetyGuard } from "./guard.js";
export { AuditTrail, STREAMS } from "./audit.js";
export { InMemoryBeneficiaryRegistry } from "./registry.js";
export type { Receipt } from "./registry.js";

// Arithmetic
export { applyFee, splitEqually, proportionalShare, allocateYield } from "./fee-math.js";
export type { YieldAllocation } from "./fee-math.js";

// Errors
export { DistributorError, ERROR_CATEGORIES } from "./errors.js";
export type { DistributorErrorCode, DistributorErrorCategory } from "./errors.js";

// Types
export { ROLES } from "./types.js";
export type {
  Role,
  RoleAssignments,
  AllocationPreference,
  FeeConfig,
  FeeSplit,
  FeePreview,
  BeneficiaryRegistry,
  Allocation,
  AllocationPlan,
  Payout,
  DistributionResult,
  AssetCounters,
  DistributionStats,
  DistributorConfig,
} from "./types.js";

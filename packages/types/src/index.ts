/**
 * @yieldsplit/types — Shared domain types for the yieldsplit stack.
 *
 * - Primitives (addresses, assets, unit amounts)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Primitives
export type { Address, AssetId } from "./primitives.js";
export {
  ZERO_ADDRESS,
  MAX_AMOUNT,
  BPS_DENOMINATOR,
  isZeroAddress,
  isUnitAmount,
  parseUnits,
  formatUnits,
} from "./primitives.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isUnitAmountString,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";

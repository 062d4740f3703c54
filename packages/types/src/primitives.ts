/**
 * Primitive Types
 *
 * Identifiers and integer amounts shared by every yieldsplit package.
 *
 * Rules:
 * - Addresses and assets are opaque strings; meaning lives in consuming code
 * - Amounts are unsigned integers in the asset's smallest unit
 * - In memory an amount is a bigint; on the wire it is a base-10 digit string
 */

/** An account identifier (stakeholder, beneficiary, treasury, caller). */
export type Address = string;

/** A pooled asset identifier. Used as an index key only. */
export type AssetId = string;

/** Canonical zero address. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/** Largest representable amount (uint256). */
export const MAX_AMOUNT: bigint = (1n << 256n) - 1n;

/** Basis-point denominator (10000 bps = 100%). */
export const BPS_DENOMINATOR = 10_000n;

const ZERO_ADDRESS_PATTERN = /^0x0{40}$/i;
const UNIT_AMOUNT_PATTERN = /^(0|[1-9]\d*)$/;

/**
 * True for the empty string and for `0x` followed by forty zeros.
 */
export function isZeroAddress(address: Address): boolean {
  return address.trim() === "" || ZERO_ADDRESS_PATTERN.test(address);
}

/**
 * Check that a string is an unsigned base-10 integer without leading zeros.
 *
 * "0", "42", "1000000" → true
 * "-1", "1.5", "007", "" → false
 */
export function isUnitAmount(value: string): boolean {
  return UNIT_AMOUNT_PATTERN.test(value);
}

/**
 * Parse a wire amount into a bigint. Throws RangeError on malformed input
 * or a value above MAX_AMOUNT.
 */
export function parseUnits(value: string): bigint {
  if (!isUnitAmount(value)) {
    throw new RangeError(`Invalid unit amount: "${value}"`);
  }
  const parsed = BigInt(value);
  if (parsed > MAX_AMOUNT) {
    throw new RangeError(`Unit amount exceeds uint256: "${value}"`);
  }
  return parsed;
}

/**
 * Format a bigint amount for the wire.
 */
export function formatUnits(value: bigint): string {
  return value.toString(10);
}

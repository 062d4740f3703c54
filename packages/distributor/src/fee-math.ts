/**
 * Fee and split arithmetic shared by every distribution mode.
 *
 * Pure functions over bigint. Every division truncates toward zero,
 * so each split never hands out more than its input.
 */

import { BPS_DENOMINATOR } from "@yieldsplit/types";
import type { FeeSplit } from "./types.js";

const PERCENT_DENOMINATOR = 100n;

/**
 * fee = floor(amount * bps / 10000), net = amount - fee.
 */
export function applyFee(amount: bigint, bps: number): FeeSplit {
  const fee = (amount * BigInt(bps)) / BPS_DENOMINATOR;
  return { fee, net: amount - fee };
}

/**
 * Split `amount` into `n` equal parts. The remainder goes to index 0.
 */
export function splitEqually(amount: bigint, n: number): bigint[] {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`Cannot split into ${String(n)} parts`);
  }
  const count = BigInt(n);
  const part = amount / count;
  const parts = Array.from({ length: n }, () => part);
  parts[0] = part + (amount - part * count);
  return parts;
}

/**
 * floor(totalYield * shares / totalShares). Zero when there are no shares.
 */
export function proportionalShare(totalYield: bigint, shares: bigint, totalShares: bigint): bigint {
  if (totalShares === 0n) {
    return 0n;
  }
  return (totalYield * shares) / totalShares;
}

export interface YieldAllocation {
  readonly protocolAmount: bigint;
  readonly beneficiaryAmount: bigint;
  readonly treasuryAmount: bigint;
}

/**
 * Split one stakeholder's yield between the protocol, their beneficiary
 * and the treasury. A splitPercent of 0 sends the whole net to the treasury.
 */
export function allocateYield(
  userYield: bigint,
  protocolFeeBps: number,
  splitPercent: number,
): YieldAllocation {
  const { fee: protocolAmount, net } = applyFee(userYield, protocolFeeBps);
  const beneficiaryAmount = (net * BigInt(splitPercent)) / PERCENT_DENOMINATOR;
  return {
    protocolAmount,
    beneficiaryAmount,
    treasuryAmount: net - beneficiaryAmount,
  };
}

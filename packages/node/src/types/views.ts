/**
 * Response views.
 *
 * Domain results carry bigint amounts, which JSON cannot encode. These
 * functions turn them into digit strings at the edge.
 */

import { formatUnits } from "@yieldsplit/types";
import type { CustodyTransfer } from "@yieldsplit/custody";
import type {
  Allocation,
  AllocationPlan,
  DistributionResult,
  DistributionStats,
  FeePreview,
  ShareUpdate,
} from "@yieldsplit/distributor";

export function toAllocationView(a: Allocation) {
  return {
    stakeholder: a.stakeholder,
    shares: formatUnits(a.shares),
    beneficiary: a.beneficiary,
    userYield: formatUnits(a.userYield),
    protocolAmount: formatUnits(a.protocolAmount),
    beneficiaryAmount: formatUnits(a.beneficiaryAmount),
    treasuryAmount: formatUnits(a.treasuryAmount),
  };
}

export function toPlanView(plan: AllocationPlan) {
  return {
    asset: plan.asset,
    totalYield: formatUnits(plan.totalYield),
    totalShares: formatUnits(plan.totalShares),
    allocations: plan.allocations.map(toAllocationView),
    protocolTotal: formatUnits(plan.protocolTotal),
    treasuryTotal: formatUnits(plan.treasuryTotal),
    beneficiaryTotals: Object.fromEntries(
      [...plan.beneficiaryTotals].map(([b, amount]) => [b, formatUnits(amount)]),
    ),
    dust: formatUnits(plan.dust),
  };
}

export function toResultView(result: DistributionResult) {
  return {
    passId: result.passId,
    asset: result.asset,
    mode: result.mode,
    amount: formatUnits(result.amount),
    payouts: result.payouts.map((p) => ({
      recipient: p.recipient,
      kind: p.kind,
      amount: formatUnits(p.amount),
      fee: formatUnits(p.fee),
    })),
    ...(result.allocations !== undefined
      ? { allocations: result.allocations.map(toAllocationView) }
      : {}),
    distributed: formatUnits(result.distributed),
    dust: formatUnits(result.dust),
    distributionCount: result.distributionCount,
  };
}

export function toStatsView(stats: DistributionStats) {
  return {
    asset: stats.asset,
    totalDistributions: stats.totalDistributions,
    totalDonated: formatUnits(stats.totalDonated),
    totalFeeCollected: formatUnits(stats.totalFeeCollected),
    totalProtocolFees: formatUnits(stats.totalProtocolFees),
    defaultBeneficiary: stats.defaultBeneficiary ?? null,
    feeRecipient: stats.feeRecipient,
    feeBps: stats.feeBps,
  };
}

export function toFeePreviewView(preview: FeePreview) {
  return {
    amount: formatUnits(preview.amount),
    fee: formatUnits(preview.fee),
    net: formatUnits(preview.net),
    feeBps: preview.feeBps,
    feeRecipient: preview.feeRecipient,
  };
}

export function toTransferView(t: CustodyTransfer) {
  return {
    id: t.id,
    correlationId: t.correlationId,
    asset: t.asset,
    from: t.from,
    to: t.to,
    amount: formatUnits(t.amount),
    timestamp: t.timestamp,
  };
}

export function toShareUpdateView(u: ShareUpdate) {
  return {
    stakeholder: u.stakeholder,
    asset: u.asset,
    previousShares: formatUnits(u.previousShares),
    newShares: formatUnits(u.newShares),
    totalShares: formatUnits(u.totalShares),
  };
}

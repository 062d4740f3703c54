/**
 * Distribution Engine.
 *
 * Three ways to pay out yield held in custody:
 * - single: fee to the fee recipient, net to the registry's default beneficiary
 * - equal-split: fee once, net in equal parts over a caller-supplied list
 * - proportional: per stakeholder by shares, with protocol cut and preference split
 *
 * Every pass runs inside one custody session. Transfers, events and
 * counter changes are buffered; a failure aborts the session and leaves
 * no trace. The log is written ahead: events are appended before the
 * session commits, so a failed append aborts the pass. Then commit,
 * counters and registry receipts.
 */

import { MAX_AMOUNT, formatUnits, isZeroAddress, parseUnits } from "@yieldsplit/types";
import type { Address, AssetId, DomainEvent } from "@yieldsplit/types";
import { CustodyError } from "@yieldsplit/custody";
import type { CustodyPort, TransferSession } from "@yieldsplit/custody";
import {
  DISTRIBUTOR_EVENTS,
  readDistributionCompleted,
  readPayoutSent,
} from "@yieldsplit/event-store";
import type { DistributionMode, PayoutKind, StoredEvent } from "@yieldsplit/event-store";
import type { AuditTrail } from "./audit.js";
import { STREAMS } from "./audit.js";
import { DistributorError } from "./errors.js";
import type { FeeConfiguration } from "./fee-config.js";
import { allocateYield, applyFee, proportionalShare, splitEqually } from "./fee-math.js";
import type { PreferenceStore } from "./preferences.js";
import type { ShareLedger } from "./share-ledger.js";
import type {
  Allocation,
  AllocationPlan,
  AssetCounters,
  BeneficiaryRegistry,
  DistributionResult,
  DistributionStats,
  FeePreview,
  Payout,
} from "./types.js";

const ZERO_COUNTERS: AssetCounters = {
  totalDonated: 0n,
  totalFeeCollected: 0n,
  totalProtocolFees: 0n,
};

export interface DistributionEngineDeps {
  readonly shares: ShareLedger;
  readonly preferences: PreferenceStore;
  readonly fees: FeeConfiguration;
  readonly registry: BeneficiaryRegistry;
  readonly custody: CustodyPort;
  readonly audit: AuditTrail;
}

// =============================================================================
// Pass
// =============================================================================

/** Buffered state of one distribution pass. */
class Pass {
  readonly events: DomainEvent[] = [];
  readonly payouts: Payout[] = [];
  readonly receipts: Array<readonly [Address, bigint]> = [];
  donated = 0n;
  feeCollected = 0n;
  protocolFees = 0n;
  distributed = 0n;
  dust = 0n;
  allocations: readonly Allocation[] | undefined;
  private counted = 0;

  constructor(
    readonly id: string,
    readonly asset: AssetId,
    readonly actor: Address,
    private readonly session: TransferSession,
    private readonly audit: AuditTrail,
    private readonly baseCount: number,
  ) {}

  get distributionCount(): number {
    return this.baseCount + this.counted;
  }

  countDistribution(): void {
    this.counted += 1;
  }

  /** Stage a transfer. Zero amounts are not transferred. */
  send(to: Address, amount: bigint): void {
    if (amount === 0n) return;
    this.session.transfer(this.asset, to, amount);
    this.distributed += amount;
  }

  payout(recipient: Address, kind: PayoutKind, amount: bigint, fee: bigint): void {
    this.payouts.push({ recipient, kind, amount, fee });
    this.events.push(
      this.audit.event(
        DISTRIBUTOR_EVENTS.PAYOUT_SENT,
        {
          passId: this.id,
          asset: this.asset,
          recipient,
          kind,
          amount: formatUnits(amount),
          fee: formatUnits(fee),
          distributionCount: this.distributionCount,
        },
        this.actor,
        this.id,
      ),
    );
    if (kind === "beneficiary" && amount > 0n) {
      this.receipts.push([recipient, amount]);
    }
  }

  allocation(a: Allocation): void {
    this.events.push(
      this.audit.event(
        DISTRIBUTOR_EVENTS.ALLOCATION_COMPUTED,
        {
          passId: this.id,
          asset: this.asset,
          stakeholder: a.stakeholder,
          beneficiary: a.beneficiary,
          userYield: formatUnits(a.userYield),
          protocolAmount: formatUnits(a.protocolAmount),
          beneficiaryAmount: formatUnits(a.beneficiaryAmount),
          treasuryAmount: formatUnits(a.treasuryAmount),
        },
        this.actor,
        this.id,
      ),
    );
  }

  commit(): void {
    this.session.commit();
  }

  abort(): void {
    this.session.abort();
  }
}

// =============================================================================
// Engine
// =============================================================================

export class DistributionEngine {
  private readonly counters = new Map<AssetId, AssetCounters>();
  private _totalDistributions = 0;

  constructor(private readonly deps: DistributionEngineDeps) {}

  get totalDistributions(): number {
    return this._totalDistributions;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Modes
  // ───────────────────────────────────────────────────────────────────────

  distributeSingle(actor: Address, asset: AssetId, amount: bigint): DistributionResult {
    return this.runPass(actor, asset, amount, "single", (pass) => {
      const beneficiary = this.requireDefaultBeneficiary();
      this.payDefault(pass, amount, beneficiary);
    });
  }

  distributeEqualSplit(
    actor: Address,
    asset: AssetId,
    amount: bigint,
    beneficiaries: readonly Address[],
  ): DistributionResult {
    return this.runPass(actor, asset, amount, "equal-split", (pass) => {
      if (beneficiaries.length === 0) {
        throw new DistributorError("EMPTY_BENEFICIARY_LIST", "Beneficiary list is empty");
      }
      for (const b of beneficiaries) {
        this.requireApproved(b);
      }

      const { feeRecipient, feeBps } = this.deps.fees.get();
      const { fee, net } = applyFee(amount, feeBps);
      const parts = splitEqually(net, beneficiaries.length);

      pass.send(feeRecipient, fee);
      beneficiaries.forEach((beneficiary, i) => {
        const part = parts[i] ?? 0n;
        pass.send(beneficiary, part);
        pass.countDistribution();
        pass.payout(beneficiary, "beneficiary", part, i === 0 ? fee : 0n);
        pass.donated += part;
      });
      pass.feeCollected += fee;
    });
  }

  distributeProportional(actor: Address, asset: AssetId, totalYield: bigint): DistributionResult {
    return this.runPass(actor, asset, totalYield, "proportional", (pass) => {
      if (this.deps.shares.getTotalShares(asset) === 0n) {
        this.payDefaultOrTreasury(pass, totalYield);
        return;
      }

      const plan = this.planProportional(asset, totalYield);
      const { feeRecipient, protocolTreasury } = this.deps.fees.get();

      pass.countDistribution();
      for (const a of plan.allocations) {
        pass.allocation(a);
      }

      if (plan.protocolTotal > 0n) {
        pass.send(protocolTreasury, plan.protocolTotal);
        pass.payout(protocolTreasury, "protocol", plan.protocolTotal, 0n);
      }
      for (const [beneficiary, total] of plan.beneficiaryTotals) {
        pass.send(beneficiary, total);
        pass.payout(beneficiary, "beneficiary", total, 0n);
        pass.donated += total;
      }
      if (plan.treasuryTotal > 0n) {
        pass.send(feeRecipient, plan.treasuryTotal);
        pass.payout(feeRecipient, "treasury", plan.treasuryTotal, 0n);
      }

      pass.feeCollected += plan.treasuryTotal;
      pass.protocolFees += plan.protocolTotal;
      pass.dust = plan.dust;
      pass.allocations = plan.allocations;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Emergency
  // ───────────────────────────────────────────────────────────────────────

  /** Move custody balance out in one committed transfer. */
  withdraw(actor: Address, asset: AssetId, to: Address, amount: bigint): void {
    if (isZeroAddress(to)) {
      throw new DistributorError("ZERO_ADDRESS", "Withdrawal target cannot be the zero address");
    }
    this.assertFunded(asset, amount);

    const { audit, custody } = this.deps;
    const correlationId = audit.correlationId();
    const session = custody.begin(correlationId);
    try {
      session.transfer(asset, to, amount);
      audit.append(STREAMS.guard, [
        audit.event(
          DISTRIBUTOR_EVENTS.EMERGENCY_WITHDRAWN,
          { asset, to, amount: formatUnits(amount) },
          actor,
          correlationId,
        ),
      ]);
    } catch (err) {
      session.abort();
      throw toDistributorError(err);
    }
    session.commit();
  }

  /**
   * Seed the counters from settled passes already in the audit log, so
   * counts continue where a previous process stopped.
   */
  restore(history: readonly StoredEvent[]): void {
    for (const { event } of history) {
      const payout = readPayoutSent(event);
      if (payout !== undefined) {
        const amount = parseUnits(payout.amount);
        this.addCounters(
          payout.asset,
          payout.kind === "beneficiary" ? amount : 0n,
          parseUnits(payout.fee) + (payout.kind === "treasury" ? amount : 0n),
          payout.kind === "protocol" ? amount : 0n,
        );
        continue;
      }
      const completed = readDistributionCompleted(event);
      if (completed !== undefined && completed.distributionCount > this._totalDistributions) {
        this._totalDistributions = completed.distributionCount;
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  /**
   * The allocation table a proportional pass would produce right now,
   * without touching custody.
   */
  planProportional(asset: AssetId, totalYield: bigint): AllocationPlan {
    const { shares, preferences, registry, fees } = this.deps;
    const totalShares = shares.getTotalShares(asset);
    const { protocolFeeBps } = fees.get();

    const allocations: Allocation[] = [];
    const beneficiaryTotals = new Map<Address, bigint>();
    let protocolTotal = 0n;
    let treasuryTotal = 0n;
    let allocated = 0n;

    for (const stakeholder of shares.getActiveStakeholders(asset)) {
      const held = shares.getShares(stakeholder, asset);
      const userYield = proportionalShare(totalYield, held, totalShares);
      if (userYield === 0n) continue;

      const preference = preferences.get(stakeholder);
      const routed = preference.beneficiary !== "" && registry.isApproved(preference.beneficiary);
      const split = allocateYield(userYield, protocolFeeBps, routed ? preference.splitPercent : 0);
      const beneficiary = routed ? preference.beneficiary : "";

      allocations.push({ stakeholder, shares: held, beneficiary, userYield, ...split });
      allocated += userYield;
      protocolTotal += split.protocolAmount;
      treasuryTotal += split.treasuryAmount;
      if (split.beneficiaryAmount > 0n) {
        beneficiaryTotals.set(
          beneficiary,
          (beneficiaryTotals.get(beneficiary) ?? 0n) + split.beneficiaryAmount,
        );
      }
    }

    return {
      asset,
      totalYield,
      totalShares,
      allocations,
      protocolTotal,
      treasuryTotal,
      beneficiaryTotals,
      dust: totalYield - allocated,
    };
  }

  /** What a single-mode pass of `amount` would charge. */
  previewFee(amount: bigint): FeePreview {
    if (amount < 0n || amount > MAX_AMOUNT) {
      throw new DistributorError(
        "AMOUNT_OUT_OF_RANGE",
        `Amount must be in [0, 2^256 - 1], got ${amount.toString()}`,
      );
    }
    const { feeRecipient, feeBps } = this.deps.fees.get();
    return { amount, feeBps, feeRecipient, ...applyFee(amount, feeBps) };
  }

  getCounters(asset: AssetId): AssetCounters {
    return this.counters.get(asset) ?? ZERO_COUNTERS;
  }

  getStats(asset: AssetId): DistributionStats {
    const { feeRecipient, feeBps } = this.deps.fees.get();
    return {
      asset,
      totalDistributions: this._totalDistributions,
      ...this.getCounters(asset),
      defaultBeneficiary: this.deps.registry.defaultBeneficiary(),
      feeRecipient,
      feeBps,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private runPass(
    actor: Address,
    asset: AssetId,
    amount: bigint,
    mode: DistributionMode,
    body: (pass: Pass) => void,
  ): DistributionResult {
    this.assertFunded(asset, amount);

    const { custody, audit, registry } = this.deps;
    const passId = audit.correlationId();
    const pass = new Pass(
      passId,
      asset,
      actor,
      custody.begin(passId),
      audit,
      this._totalDistributions,
    );

    try {
      body(pass);
      pass.events.push(
        audit.event(
          DISTRIBUTOR_EVENTS.DISTRIBUTION_COMPLETED,
          {
            passId,
            asset,
            mode,
            amount: formatUnits(amount),
            distributed: formatUnits(pass.distributed),
            dust: formatUnits(pass.dust),
            distributionCount: pass.distributionCount,
          },
          actor,
          passId,
        ),
      );
      // A receiver hook may have moved funds after its transfer was staged.
      const balance = custody.balanceOf(asset);
      if (balance < pass.distributed) {
        throw new DistributorError(
          "INSUFFICIENT_BALANCE",
          `Custody holds ${balance.toString()} ${asset}, pass needs ${pass.distributed.toString()}`,
        );
      }
      audit.append(STREAMS.distribution(asset), pass.events);
    } catch (err) {
      pass.abort();
      throw toDistributorError(err);
    }

    // Staging checked funds and caps for the whole batch.
    pass.commit();
    this.addCounters(asset, pass.donated, pass.feeCollected, pass.protocolFees);
    this._totalDistributions = pass.distributionCount;

    for (const [beneficiary, received] of pass.receipts) {
      registry.recordReceipt(beneficiary, received, asset);
    }

    return {
      passId,
      asset,
      mode,
      amount,
      payouts: pass.payouts,
      ...(pass.allocations !== undefined ? { allocations: pass.allocations } : {}),
      distributed: pass.distributed,
      dust: pass.dust,
      distributionCount: pass.distributionCount,
    };
  }

  private addCounters(
    asset: AssetId,
    donated: bigint,
    feeCollected: bigint,
    protocolFees: bigint,
  ): void {
    const counters = this.getCounters(asset);
    this.counters.set(asset, {
      totalDonated: counters.totalDonated + donated,
      totalFeeCollected: counters.totalFeeCollected + feeCollected,
      totalProtocolFees: counters.totalProtocolFees + protocolFees,
    });
  }

  private payDefault(pass: Pass, amount: bigint, beneficiary: Address): void {
    const { feeRecipient, feeBps } = this.deps.fees.get();
    const { fee, net } = applyFee(amount, feeBps);

    pass.send(feeRecipient, fee);
    pass.send(beneficiary, net);
    pass.countDistribution();
    pass.payout(beneficiary, "beneficiary", net, fee);
    pass.donated += net;
    pass.feeCollected += fee;
  }

  /** Single-mode semantics, but a missing default routes net to the fee recipient. */
  private payDefaultOrTreasury(pass: Pass, amount: bigint): void {
    const { registry, fees } = this.deps;
    const candidate = registry.defaultBeneficiary();
    if (candidate !== undefined && !isZeroAddress(candidate) && registry.isApproved(candidate)) {
      this.payDefault(pass, amount, candidate);
      return;
    }

    const { feeRecipient, feeBps } = fees.get();
    const { fee, net } = applyFee(amount, feeBps);
    pass.send(feeRecipient, fee + net);
    pass.countDistribution();
    pass.payout(feeRecipient, "treasury", net, fee);
    pass.feeCollected += fee + net;
  }

  private requireDefaultBeneficiary(): Address {
    const beneficiary = this.deps.registry.defaultBeneficiary();
    if (beneficiary === undefined || isZeroAddress(beneficiary)) {
      throw new DistributorError(
        "NO_BENEFICIARY_CONFIGURED",
        "No default beneficiary is configured",
      );
    }
    this.requireApproved(beneficiary);
    return beneficiary;
  }

  private requireApproved(beneficiary: Address): void {
    if (isZeroAddress(beneficiary)) {
      throw new DistributorError("ZERO_ADDRESS", "Beneficiary cannot be the zero address");
    }
    if (!this.deps.registry.isApproved(beneficiary)) {
      throw new DistributorError(
        "UNAPPROVED_BENEFICIARY",
        `Beneficiary ${beneficiary} is not approved`,
      );
    }
  }

  private assertFunded(asset: AssetId, amount: bigint): void {
    if (amount < 0n || amount > MAX_AMOUNT) {
      throw new DistributorError(
        "AMOUNT_OUT_OF_RANGE",
        `Amount must be in [1, 2^256 - 1], got ${amount.toString()}`,
      );
    }
    if (amount === 0n) {
      throw new DistributorError("ZERO_AMOUNT", "Amount must be positive");
    }
    const balance = this.deps.custody.balanceOf(asset);
    if (balance < amount) {
      throw new DistributorError(
        "INSUFFICIENT_BALANCE",
        `Custody holds ${balance.toString()} ${asset}, ${amount.toString()} requested`,
      );
    }
  }
}

/**
 * Custody failures inside a pass: short funds surface as
 * INSUFFICIENT_BALANCE, everything else as TRANSFER_FAILED.
 */
function toDistributorError(err: unknown): unknown {
  if (!(err instanceof CustodyError)) {
    return err;
  }
  if (err.code === "INSUFFICIENT_FUNDS") {
    return new DistributorError("INSUFFICIENT_BALANCE", err.message, { cause: err });
  }
  return new DistributorError("TRANSFER_FAILED", err.message, { cause: err });
}

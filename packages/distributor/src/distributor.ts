/**
 * Distributor — Top-level coordinator for yield distribution.
 *
 * Composes:
 * - ShareLedger: stakeholder claims and the Active Index
 * - PreferenceStore: beneficiary and split per stakeholder
 * - FeeConfiguration: fee recipient, fee rate, protocol treasury
 * - DistributionEngine: single, equal-split and proportional passes
 * - SafetyGuard: roles, authorized callers, pause, re-entrancy latch
 *
 * Every mutating entry point runs under the re-entrancy latch and takes
 * the acting address as its first argument. Reads are always available.
 *
 * Distribution counters resume from the settled passes already in the
 * event store it is given.
 */

import { randomUUID } from "node:crypto";
import type { Address, AssetId } from "@yieldsplit/types";
import { AuditTrail } from "./audit.js";
import { DistributionEngine } from "./distribution.js";
import { FeeConfiguration } from "./fee-config.js";
import { SafetyGuard } from "./guard.js";
import { PreferenceStore } from "./preferences.js";
import { ShareLedger } from "./share-ledger.js";
import type { ShareUpdate } from "./share-ledger.js";
import type {
  AllocationPlan,
  AllocationPreference,
  DistributionResult,
  DistributionStats,
  DistributorConfig,
  FeeConfig,
  FeePreview,
  Role,
} from "./types.js";

export class Distributor {
  private readonly guard: SafetyGuard;
  private readonly shares: ShareLedger;
  private readonly preferences: PreferenceStore;
  private readonly fees: FeeConfiguration;
  private readonly engine: DistributionEngine;

  constructor(config: DistributorConfig) {
    const now = config.now ?? (() => new Date().toISOString());
    const audit = new AuditTrail(config.eventStore, now, config.nextId ?? randomUUID);

    this.guard = new SafetyGuard(config.roles, config.authorizedCallers ?? [], audit);
    this.fees = new FeeConfiguration(config.fees, audit);
    this.shares = new ShareLedger(audit);
    this.preferences = new PreferenceStore(config.registry, audit, now, config.acceptedSplits);
    this.engine = new DistributionEngine({
      shares: this.shares,
      preferences: this.preferences,
      fees: this.fees,
      registry: config.registry,
      custody: config.custody,
      audit,
    });
    this.engine.restore(config.eventStore.readAll());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Shares
  // ───────────────────────────────────────────────────────────────────────

  setShares(caller: Address, stakeholder: Address, asset: AssetId, amount: bigint): ShareUpdate {
    return this.guard.nonReentrant(() => {
      this.guard.requireAuthorizedCaller(caller);
      this.guard.requireNotPaused();
      return this.shares.setShares(caller, stakeholder, asset, amount);
    });
  }

  /** Custody-facing name for setShares. */
  reportShareChange(
    caller: Address,
    stakeholder: Address,
    asset: AssetId,
    amount: bigint,
  ): ShareUpdate {
    return this.setShares(caller, stakeholder, asset, amount);
  }

  getShares(stakeholder: Address, asset: AssetId): bigint {
    return this.shares.getShares(stakeholder, asset);
  }

  getTotalShares(asset: AssetId): bigint {
    return this.shares.getTotalShares(asset);
  }

  getActiveStakeholders(asset: AssetId): readonly Address[] {
    return this.shares.getActiveStakeholders(asset);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Preferences
  // ───────────────────────────────────────────────────────────────────────

  setPreference(caller: Address, beneficiary: Address, splitPercent: number): AllocationPreference {
    return this.guard.nonReentrant(() => {
      this.guard.requireNotPaused();
      return this.preferences.set(caller, beneficiary, splitPercent);
    });
  }

  clearPreference(caller: Address): boolean {
    return this.guard.nonReentrant(() => {
      this.guard.requireNotPaused();
      return this.preferences.clear(caller);
    });
  }

  getPreference(stakeholder: Address): AllocationPreference {
    return this.preferences.get(stakeholder);
  }

  setAcceptedSplits(caller: Address, percents: readonly number[]): readonly number[] {
    return this.guard.nonReentrant(() => {
      this.guard.requireRole("fee-admin", caller);
      return this.preferences.setAcceptedSplits(caller, percents);
    });
  }

  getAcceptedSplits(): readonly number[] {
    return this.preferences.getAcceptedSplits();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Fee configuration
  // ───────────────────────────────────────────────────────────────────────

  updateFeeConfig(caller: Address, newRecipient: Address, newFeeBps: number): FeeConfig {
    return this.guard.nonReentrant(() => {
      this.guard.requireRole("fee-admin", caller);
      return this.fees.update(caller, newRecipient, newFeeBps);
    });
  }

  setTreasury(caller: Address, newTreasury: Address): FeeConfig {
    return this.guard.nonReentrant(() => {
      this.guard.requireRole("fee-admin", caller);
      return this.fees.setTreasury(caller, newTreasury);
    });
  }

  getFeeConfig(): FeeConfig {
    return this.fees.get();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Distribution
  // ───────────────────────────────────────────────────────────────────────

  distributeSingle(caller: Address, asset: AssetId, amount: bigint): DistributionResult {
    return this.guarded(caller, () => this.engine.distributeSingle(caller, asset, amount));
  }

  distributeEqualSplit(
    caller: Address,
    asset: AssetId,
    amount: bigint,
    beneficiaries: readonly Address[],
  ): DistributionResult {
    return this.guarded(caller, () =>
      this.engine.distributeEqualSplit(caller, asset, amount, beneficiaries),
    );
  }

  distributeProportional(caller: Address, asset: AssetId, totalYield: bigint): DistributionResult {
    return this.guarded(caller, () => this.engine.distributeProportional(caller, asset, totalYield));
  }

  /** Custody-facing name for distributeProportional, used after a harvest. */
  triggerDistribution(caller: Address, asset: AssetId, totalYield: bigint): DistributionResult {
    return this.distributeProportional(caller, asset, totalYield);
  }

  previewFee(amount: bigint): FeePreview {
    return this.engine.previewFee(amount);
  }

  previewProportional(asset: AssetId, totalYield: bigint): AllocationPlan {
    return this.engine.planProportional(asset, totalYield);
  }

  getDistributionStats(asset: AssetId): DistributionStats {
    return this.engine.getStats(asset);
  }

  get totalDistributions(): number {
    return this.engine.totalDistributions;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Guard
  // ───────────────────────────────────────────────────────────────────────

  setAuthorizedCaller(caller: Address, target: Address, allowed: boolean): void {
    this.guard.nonReentrant(() => this.guard.setAuthorizedCaller(caller, target, allowed));
  }

  isAuthorizedCaller(target: Address): boolean {
    return this.guard.isAuthorizedCaller(target);
  }

  hasRole(role: Role, address: Address): boolean {
    return this.guard.hasRole(role, address);
  }

  pause(caller: Address): void {
    this.guard.nonReentrant(() => this.guard.pause(caller));
  }

  unpause(caller: Address): void {
    this.guard.nonReentrant(() => this.guard.unpause(caller));
  }

  get paused(): boolean {
    return this.guard.paused;
  }

  /** Allowed while paused. */
  emergencyWithdraw(caller: Address, asset: AssetId, to: Address, amount: bigint): void {
    this.guard.nonReentrant(() => {
      this.guard.requireRole("emergency-admin", caller);
      this.engine.withdraw(caller, asset, to, amount);
    });
  }

  private guarded<T>(caller: Address, fn: () => T): T {
    return this.guard.nonReentrant(() => {
      this.guard.requireAuthorizedCaller(caller);
      this.guard.requireNotPaused();
      return fn();
    });
  }
}

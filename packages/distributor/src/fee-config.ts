/**
 * Fee & Recipient Configuration.
 *
 * The fee recipient and rate change together. The ceiling and the
 * protocol rate are fixed when the configuration is created.
 */

import { isZeroAddress } from "@yieldsplit/types";
import type { Address } from "@yieldsplit/types";
import { DISTRIBUTOR_EVENTS } from "@yieldsplit/event-store";
import type { AuditTrail } from "./audit.js";
import { STREAMS } from "./audit.js";
import { DistributorError } from "./errors.js";
import type { FeeConfig } from "./types.js";

const MAX_BPS = 10_000;

export class FeeConfiguration {
  private config: FeeConfig;

  constructor(
    initial: FeeConfig,
    private readonly audit: AuditTrail,
  ) {
    assertBps("feeBpsCeiling", initial.feeBpsCeiling, MAX_BPS);
    assertBps("protocolFeeBps", initial.protocolFeeBps, MAX_BPS);
    assertBps("feeBps", initial.feeBps, initial.feeBpsCeiling);
    assertAddress("feeRecipient", initial.feeRecipient);
    assertAddress("protocolTreasury", initial.protocolTreasury);
    this.config = { ...initial };
  }

  get(): FeeConfig {
    return this.config;
  }

  update(actor: Address, newRecipient: Address, newFeeBps: number): FeeConfig {
    assertAddress("feeRecipient", newRecipient);
    assertBps("feeBps", newFeeBps, this.config.feeBpsCeiling);

    const previous = this.config;
    this.audit.record(
      STREAMS.config,
      DISTRIBUTOR_EVENTS.FEE_CONFIG_CHANGED,
      {
        oldRecipient: previous.feeRecipient,
        newRecipient,
        oldFeeBps: previous.feeBps,
        newFeeBps,
      },
      actor,
    );
    this.config = { ...previous, feeRecipient: newRecipient, feeBps: newFeeBps };
    return this.config;
  }

  setTreasury(actor: Address, newTreasury: Address): FeeConfig {
    assertAddress("protocolTreasury", newTreasury);

    this.audit.record(
      STREAMS.config,
      DISTRIBUTOR_EVENTS.TREASURY_CHANGED,
      { oldTreasury: this.config.protocolTreasury, newTreasury },
      actor,
    );
    this.config = { ...this.config, protocolTreasury: newTreasury };
    return this.config;
  }
}

function assertAddress(field: string, address: Address): void {
  if (isZeroAddress(address)) {
    throw new DistributorError("ZERO_ADDRESS", `${field} cannot be the zero address`);
  }
}

function assertBps(field: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new DistributorError(
      "CONFIG_OUT_OF_BOUNDS",
      `${field} must be an integer in [0, ${String(max)}], got ${String(value)}`,
    );
  }
}

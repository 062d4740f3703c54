/**
 * YieldSplitService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never build domain
 * objects themselves. One instance owns one custody ledger, one
 * beneficiary registry, one audit log and the Distributor that ties
 * them together. With an audit log path, distribution counters resume
 * from the passes already recorded in the file.
 */

import type { Address, AssetId } from "@yieldsplit/types";
import { CustodyLedger } from "@yieldsplit/custody";
import type { CustodyTransfer } from "@yieldsplit/custody";
import {
  InMemoryEventStore,
  JsonlEventStore,
  createDistributorCatalog,
} from "@yieldsplit/event-store";
import type {
  EventStore,
  EventStoreIntegrityResult,
  StoredEvent,
} from "@yieldsplit/event-store";
import {
  Distributor,
  DistributorError,
  InMemoryBeneficiaryRegistry,
} from "@yieldsplit/distributor";
import type { FeeConfig, RoleAssignments } from "@yieldsplit/distributor";

// =============================================================================
// Configuration
// =============================================================================

export interface YieldSplitServiceConfig {
  /** Custody account the Distributor pays from */
  readonly custodyAddress: Address;
  readonly fees: FeeConfig;
  readonly roles: RoleAssignments;
  readonly authorizedCallers: readonly Address[];
  readonly acceptedSplits?: readonly number[] | undefined;
  readonly approvedBeneficiaries: readonly Address[];
  readonly defaultBeneficiary?: Address | undefined;
  /** JSONL audit log; in-memory when omitted */
  readonly auditLogPath?: string | undefined;
  /** Receives errors thrown by audit log subscribers */
  readonly onAuditSubscriberError?: (error: unknown, record: StoredEvent) => void;
  readonly now?: () => string;
  readonly nextId?: () => string;
}

export interface EventQuery {
  readonly stream?: string | undefined;
  readonly from?: number | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class YieldSplitService {
  readonly custody: CustodyLedger;
  readonly registry: InMemoryBeneficiaryRegistry;
  readonly eventStore: EventStore;
  readonly distributor: Distributor;
  readonly custodyAddress: Address;

  constructor(config: YieldSplitServiceConfig) {
    const storeOptions = {
      catalog: createDistributorCatalog(),
      ...(config.onAuditSubscriberError !== undefined
        ? { onSubscriberError: config.onAuditSubscriberError }
        : {}),
    };
    this.eventStore =
      config.auditLogPath !== undefined
        ? new JsonlEventStore({ ...storeOptions, filePath: config.auditLogPath })
        : new InMemoryEventStore(storeOptions);

    this.custodyAddress = config.custodyAddress;
    this.custody = new CustodyLedger(config.now !== undefined ? { now: config.now } : undefined);
    this.registry = new InMemoryBeneficiaryRegistry(
      config.approvedBeneficiaries,
      config.defaultBeneficiary,
    );

    this.distributor = new Distributor({
      custody: this.custody.accountFor(config.custodyAddress),
      registry: this.registry,
      eventStore: this.eventStore,
      roles: config.roles,
      fees: config.fees,
      acceptedSplits: config.acceptedSplits,
      authorizedCallers: config.authorizedCallers,
      now: config.now,
      nextId: config.nextId,
    });
  }

  // ─── Custody ──────────────────────────────────────────────────────

  /**
   * Record yield arriving in custody. Only authorized callers (vaults,
   * strategies) may report deposits.
   */
  deposit(caller: Address, asset: AssetId, amount: bigint): CustodyTransfer {
    if (!this.distributor.isAuthorizedCaller(caller)) {
      throw new DistributorError("UNAUTHORIZED_CALLER", `${caller} may not report deposits`);
    }
    return this.custody.deposit(this.custodyAddress, asset, amount);
  }

  custodyBalance(asset: AssetId): bigint {
    return this.custody.balanceOf(this.custodyAddress, asset);
  }

  // ─── Audit log ────────────────────────────────────────────────────

  readEvents(query: EventQuery): readonly StoredEvent[] {
    if (query.stream !== undefined) {
      return this.eventStore.read(query.stream, {
        fromVersion: query.from,
        maxCount: query.limit,
      });
    }
    return this.eventStore.readAll({ fromPosition: query.from, maxCount: query.limit });
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}

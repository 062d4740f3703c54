/**
 * Authorization & Safety Guard.
 *
 * - Roles are fixed at construction
 * - The authorized-caller set is managed by caller-admins
 * - A global pause blocks distribution and share/preference writes
 * - A non-reentrant latch wraps every mutating entry point
 */

import { isZeroAddress } from "@yieldsplit/types";
import type { Address } from "@yieldsplit/types";
import { DISTRIBUTOR_EVENTS } from "@yieldsplit/event-store";
import type { AuditTrail } from "./audit.js";
import { STREAMS } from "./audit.js";
import { DistributorError } from "./errors.js";
import type { Role, RoleAssignments } from "./types.js";
import { ROLES } from "./types.js";

export class SafetyGuard {
  private readonly roles: ReadonlyMap<Role, ReadonlySet<Address>>;
  private readonly callers: Set<Address>;
  private _paused = false;
  private _entered = false;

  constructor(
    roles: RoleAssignments,
    authorizedCallers: readonly Address[],
    private readonly audit: AuditTrail,
  ) {
    this.roles = new Map(ROLES.map((role) => [role, new Set(roles[role] ?? [])]));
    this.callers = new Set(authorizedCallers);
  }

  // ─── Roles ──────────────────────────────────────────────────────────

  hasRole(role: Role, address: Address): boolean {
    return this.roles.get(role)?.has(address) ?? false;
  }

  requireRole(role: Role, caller: Address): void {
    if (!this.hasRole(role, caller)) {
      throw new DistributorError("MISSING_ROLE", `${caller} lacks role "${role}"`);
    }
  }

  // ─── Authorized callers ─────────────────────────────────────────────

  isAuthorizedCaller(target: Address): boolean {
    return this.callers.has(target);
  }

  requireAuthorizedCaller(caller: Address): void {
    if (!this.callers.has(caller)) {
      throw new DistributorError("UNAUTHORIZED_CALLER", `${caller} is not an authorized caller`);
    }
  }

  setAuthorizedCaller(caller: Address, target: Address, allowed: boolean): void {
    this.requireRole("caller-admin", caller);
    if (isZeroAddress(target)) {
      throw new DistributorError("ZERO_ADDRESS", "Authorized caller cannot be the zero address");
    }

    this.audit.record(
      STREAMS.guard,
      DISTRIBUTOR_EVENTS.AUTHORIZED_CALLER_CHANGED,
      { caller: target, authorized: allowed },
      caller,
    );
    if (allowed) {
      this.callers.add(target);
    } else {
      this.callers.delete(target);
    }
  }

  listAuthorizedCallers(): readonly Address[] {
    return [...this.callers];
  }

  // ─── Pause ──────────────────────────────────────────────────────────

  get paused(): boolean {
    return this._paused;
  }

  pause(caller: Address): void {
    this._setPaused(caller, true);
  }

  unpause(caller: Address): void {
    this._setPaused(caller, false);
  }

  requireNotPaused(): void {
    if (this._paused) {
      throw new DistributorError("SYSTEM_PAUSED", "Distributor is paused");
    }
  }

  // ─── Re-entrancy latch ──────────────────────────────────────────────

  /**
   * Run `fn` with the latch held. A call that arrives while the latch
   * is held fails REENTRANT_CALL. The latch is released on success and
   * on failure.
   */
  nonReentrant<T>(fn: () => T): T {
    if (this._entered) {
      throw new DistributorError("REENTRANT_CALL", "Re-entrant call rejected");
    }
    this._entered = true;
    try {
      return fn();
    } finally {
      this._entered = false;
    }
  }

  private _setPaused(caller: Address, paused: boolean): void {
    this.requireRole("pauser", caller);
    this.audit.record(STREAMS.guard, DISTRIBUTOR_EVENTS.PAUSE_CHANGED, { paused }, caller);
    this._paused = paused;
  }
}

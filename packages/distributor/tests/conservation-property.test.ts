/**
 * Property-based tests for proportional passes.
 *
 * For random share sets, preferences, protocol rates and yields:
 * 1. transferred + dust == totalYield
 * 2. dust < number of active stakeholders, and stays in custody
 * 3. stakeholders without an approved preference send nothing to beneficiaries
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { CHARITY, DISTRIBUTOR, SCHOOL, VAULT, createHarness } from "./harness.js";

const STAKEHOLDERS = ["0xs1", "0xs2", "0xs3", "0xs4", "0xs5", "0xs6"];

const arbPreference = fc.oneof(
  fc.constant(undefined),
  fc.record({
    beneficiary: fc.constantFrom(CHARITY, SCHOOL),
    split: fc.constantFrom(50, 75, 100),
  }),
);

const arbScenario = fc.record({
  holdings: fc.array(
    fc.tuple(fc.constantFrom(...STAKEHOLDERS), fc.bigInt({ min: 1n, max: 10n ** 24n }), arbPreference),
    { minLength: 1, maxLength: 12 },
  ),
  protocolFeeBps: fc.integer({ min: 0, max: 10_000 }),
  totalYield: fc.bigInt({ min: 1n, max: 10n ** 30n }),
  revokeSchool: fc.boolean(),
});

describe("proportional pass properties", () => {
  it("conserves the yield and keeps dust below the stakeholder count", () => {
    fc.assert(
      fc.property(arbScenario, ({ holdings, protocolFeeBps, totalYield, revokeSchool }) => {
        const h = createHarness({ protocolFeeBps });
        for (const [stakeholder, shares, preference] of holdings) {
          h.distributor.setShares(VAULT, stakeholder, "X", shares);
          if (preference !== undefined) {
            h.distributor.setPreference(stakeholder, preference.beneficiary, preference.split);
          }
        }
        if (revokeSchool) h.registry.revoke(SCHOOL);
        h.fund("X", totalYield);
        const active = h.distributor.getActiveStakeholders("X").length;

        const result = h.distributor.distributeProportional(VAULT, "X", totalYield);

        const moved = h.custody
          .journal({ correlationId: result.passId })
          .reduce((sum, t) => sum + t.amount, 0n);
        expect(moved).toBe(result.distributed);
        expect(result.distributed + result.dust).toBe(totalYield);
        expect(result.dust < BigInt(active)).toBe(true);
        expect(h.balance(DISTRIBUTOR, "X")).toBe(result.dust);
      }),
      { numRuns: 100 },
    );
  });

  it("never routes to a beneficiary without an approved preference", () => {
    fc.assert(
      fc.property(arbScenario, ({ holdings, protocolFeeBps, totalYield, revokeSchool }) => {
        const h = createHarness({ protocolFeeBps });
        for (const [stakeholder, shares, preference] of holdings) {
          h.distributor.setShares(VAULT, stakeholder, "X", shares);
          if (preference !== undefined) {
            h.distributor.setPreference(stakeholder, preference.beneficiary, preference.split);
          }
        }
        if (revokeSchool) h.registry.revoke(SCHOOL);
        h.fund("X", totalYield);

        const plan = h.distributor.previewProportional("X", totalYield);

        for (const a of plan.allocations) {
          const pref = h.distributor.getPreference(a.stakeholder);
          const approved = pref.beneficiary !== "" && h.registry.isApproved(pref.beneficiary);
          if (!approved) {
            expect(a.beneficiaryAmount).toBe(0n);
            expect(a.treasuryAmount).toBe(a.userYield - a.protocolAmount);
          }
        }
      }),
      { numRuns: 100 },
    );
  });
});

/**
 * Tests for the Allocation Preference Store (through the Distributor).
 */

import { describe, it, expect } from "vitest";
import { EMPTY_PREFERENCE } from "../src/preferences.js";
import { ALICE, CHARITY, NOW, OWNER, SCHOOL, createHarness, errorCode } from "./harness.js";

describe("setPreference", () => {
  it("stores beneficiary, split and timestamp", () => {
    const { distributor } = createHarness();

    const pref = distributor.setPreference(ALICE, CHARITY, 75);

    expect(pref).toEqual({ beneficiary: CHARITY, splitPercent: 75, lastUpdated: NOW });
    expect(distributor.getPreference(ALICE)).toEqual(pref);
  });

  it("overwrites the previous preference", () => {
    const { distributor } = createHarness();
    distributor.setPreference(ALICE, CHARITY, 75);
    distributor.setPreference(ALICE, SCHOOL, 50);

    expect(distributor.getPreference(ALICE).beneficiary).toBe(SCHOOL);
    expect(distributor.getPreference(ALICE).splitPercent).toBe(50);
  });

  it("rejects the zero address", () => {
    const { distributor } = createHarness();
    expect(errorCode(() => distributor.setPreference(ALICE, "", 50))).toBe("ZERO_ADDRESS");
    expect(
      errorCode(() =>
        distributor.setPreference(ALICE, "0x0000000000000000000000000000000000000000", 50),
      ),
    ).toBe("ZERO_ADDRESS");
  });

  it("rejects an unapproved beneficiary", () => {
    const { distributor } = createHarness();
    expect(errorCode(() => distributor.setPreference(ALICE, "0xrandom", 50))).toBe(
      "UNAPPROVED_BENEFICIARY",
    );
  });

  it("rejects a split outside the accepted set", () => {
    const { distributor } = createHarness();
    expect(errorCode(() => distributor.setPreference(ALICE, CHARITY, 60))).toBe(
      "INVALID_SPLIT_PERCENT",
    );
    expect(distributor.getPreference(ALICE)).toEqual(EMPTY_PREFERENCE);
  });

  it("emits a preference event on the stakeholder's stream", () => {
    const { distributor, store } = createHarness();
    distributor.setPreference(ALICE, CHARITY, 100);

    const [record] = store.read(`preferences-${ALICE}`);
    expect(record?.event.payload).toEqual({
      stakeholder: ALICE,
      beneficiary: CHARITY,
      splitPercent: 100,
      lastUpdated: NOW,
    });
    expect(record?.event.metadata.source).toBe("preferences");
  });
});

describe("getPreference", () => {
  it("returns the sentinel when never set", () => {
    const { distributor } = createHarness();
    expect(distributor.getPreference(ALICE)).toEqual({
      beneficiary: "",
      splitPercent: 0,
      lastUpdated: "",
    });
  });
});

describe("clearPreference", () => {
  it("removes the preference and logs an empty one", () => {
    const { distributor, store } = createHarness();
    distributor.setPreference(ALICE, CHARITY, 50);

    expect(distributor.clearPreference(ALICE)).toBe(true);

    expect(distributor.getPreference(ALICE)).toEqual(EMPTY_PREFERENCE);
    const records = store.read(`preferences-${ALICE}`);
    expect(records).toHaveLength(2);
    expect(records[1]?.event.payload).toMatchObject({ beneficiary: "", splitPercent: 0 });
  });

  it("returns false when there is nothing to clear", () => {
    const { distributor, store } = createHarness();
    expect(distributor.clearPreference(ALICE)).toBe(false);
    expect(store.globalPosition()).toBe(0);
  });
});

describe("accepted splits", () => {
  it("defaults to 50, 75 and 100", () => {
    const { distributor } = createHarness();
    expect(distributor.getAcceptedSplits()).toEqual([50, 75, 100]);
  });

  it("can be replaced by a fee-admin, sorted and deduplicated", () => {
    const { distributor } = createHarness();

    expect(distributor.setAcceptedSplits(OWNER, [60, 25, 60])).toEqual([25, 60]);
    expect(distributor.setPreference(ALICE, CHARITY, 60).splitPercent).toBe(60);
    expect(errorCode(() => distributor.setPreference(ALICE, CHARITY, 75))).toBe(
      "INVALID_SPLIT_PERCENT",
    );
  });

  it("keeps existing preferences when their split is dropped", () => {
    const { distributor } = createHarness();
    distributor.setPreference(ALICE, CHARITY, 75);
    distributor.setAcceptedSplits(OWNER, [50]);

    expect(distributor.getPreference(ALICE).splitPercent).toBe(75);
  });

  it("rejects an empty list and values outside 1..100", () => {
    const { distributor } = createHarness();
    expect(errorCode(() => distributor.setAcceptedSplits(OWNER, []))).toBe("CONFIG_OUT_OF_BOUNDS");
    expect(errorCode(() => distributor.setAcceptedSplits(OWNER, [0]))).toBe("CONFIG_OUT_OF_BOUNDS");
    expect(errorCode(() => distributor.setAcceptedSplits(OWNER, [101]))).toBe(
      "CONFIG_OUT_OF_BOUNDS",
    );
    expect(errorCode(() => distributor.setAcceptedSplits(OWNER, [12.5]))).toBe(
      "CONFIG_OUT_OF_BOUNDS",
    );
  });

  it("requires the fee-admin role", () => {
    const { distributor } = createHarness();
    expect(errorCode(() => distributor.setAcceptedSplits(ALICE, [50]))).toBe("MISSING_ROLE");
  });
});

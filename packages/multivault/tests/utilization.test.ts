/**
 * Tests for the utilization ledger: lazy rollover and fee settlement.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MULTIVAULT_EVENTS } from "@termvault/event-store";
import { EpochBondingSink } from "@termvault/periphery";
import { AssetLedger } from "../src/asset-ledger.js";
import type { MultiVaultConfig } from "../src/config.js";
import { EventRecorder } from "../src/events.js";
import { Journal } from "../src/journal.js";
import { UtilizationLedger } from "../src/utilization.js";
import { ALICE, BOB, CAROL, FIXED_NOW, SINK, TREASURY, baseConfig } from "./fixtures.js";

describe("UtilizationLedger", () => {
  let epoch: number;
  let config: MultiVaultConfig;
  let deferred: Array<() => void>;
  let recorder: EventRecorder;
  let assets: AssetLedger;
  let sink: EpochBondingSink;
  let ledger: UtilizationLedger;

  function flush(): void {
    for (const effect of deferred.splice(0)) effect();
  }

  beforeEach(() => {
    epoch = 1;
    config = baseConfig();
    deferred = [];
    const journal = new Journal();
    recorder = new EventRecorder({ now: FIXED_NOW, generateId: () => "id" });
    recorder.begin(ALICE);
    assets = new AssetLedger(journal);
    sink = new EpochBondingSink(SINK, { currentEpoch: () => epoch });
    ledger = new UtilizationLedger({
      journal,
      recorder,
      assets,
      sink,
      config: () => config,
      defer: (effect) => {
        deferred.push(effect);
      },
    });

    // Fee pot funding held in custody
    assets.mint(ALICE, 10_000n);
    assets.pull(ALICE, 10_000n);
  });

  it("sets the pointer on an account's first action", () => {
    ledger.addUtilization(ALICE, 500n);
    expect(ledger.getUserLastActiveEpoch(ALICE)).toBe(1);
    expect(ledger.getUserUtilizationForEpoch(ALICE, 1)).toBe(500n);
    expect(ledger.getTotalUtilizationForEpoch(1)).toBe(500n);
  });

  it("adds within the same epoch without rolling over", () => {
    ledger.addUtilization(ALICE, 500n);
    ledger.addUtilization(ALICE, 200n);
    ledger.addUtilization(ALICE, -100n);
    expect(ledger.getUserUtilizationForEpoch(ALICE, 1)).toBe(600n);
    expect(ledger.getTotalUtilizationForEpoch(1)).toBe(600n);
  });

  it("carries personal and global totals into a later epoch", () => {
    ledger.addUtilization(ALICE, 500n);
    ledger.addUtilization(BOB, 300n);

    epoch = 3;
    ledger.addUtilization(ALICE, -200n);

    expect(ledger.getTotalUtilizationForEpoch(3)).toBe(600n);
    expect(ledger.getUserUtilizationForEpoch(ALICE, 3)).toBe(300n);
    expect(ledger.getUserLastActiveEpoch(ALICE)).toBe(3);

    // Bob has not acted yet in epoch 3
    expect(ledger.getUserUtilizationForEpoch(BOB, 3)).toBe(0n);
    expect(ledger.getUserLastActiveEpoch(BOB)).toBe(1);

    ledger.addUtilization(BOB, 50n);
    expect(ledger.getUserUtilizationForEpoch(BOB, 3)).toBe(350n);
    expect(ledger.getTotalUtilizationForEpoch(3)).toBe(650n);
  });

  it("seeds a new epoch exactly once across accounts", () => {
    ledger.addUtilization(ALICE, 1000n);
    epoch = 2;
    ledger.addUtilization(BOB, 10n);
    ledger.addUtilization(CAROL, 20n);
    ledger.addUtilization(ALICE, 30n);
    expect(ledger.getTotalUtilizationForEpoch(2)).toBe(1060n);
  });

  it("accrues protocol fees per epoch", () => {
    ledger.accrueProtocolFee(ALICE, 70n);
    ledger.accrueProtocolFee(BOB, 30n);
    expect(ledger.accumulatedProtocolFees(1)).toBe(100n);
  });

  it("settles the previous epoch to the treasury when distribution is off", () => {
    ledger.accrueProtocolFee(ALICE, 100n);
    epoch = 2;
    ledger.addUtilization(BOB, 1n);
    flush();

    expect(ledger.accumulatedProtocolFees(1)).toBe(0n);
    expect(assets.balanceOf(TREASURY)).toBe(100n);
    expect(sink.registeredEpochs()).toEqual([]);

    const settled = recorder.drain().find((e) => e.type === MULTIVAULT_EVENTS.PROTOCOL_FEE_SETTLED);
    expect(settled?.payload).toMatchObject({
      epoch: 1,
      amount: "100",
      destination: TREASURY,
      distributed: false,
    });
  });

  it("settles to the sink when the epoch's snapshot enables distribution", () => {
    config = { ...config, general: { ...config.general, protocolFeeDistributionEnabled: true } };
    ledger.accrueProtocolFee(ALICE, 100n);

    // A later flip does not change the snapshot of epoch 1
    config = { ...config, general: { ...config.general, protocolFeeDistributionEnabled: false } };
    epoch = 2;
    ledger.accrueProtocolFee(BOB, 5n);

    expect(deferred).toHaveLength(1);
    flush();
    expect(sink.maxClaimableProtocolFeesForEpoch(1)).toBe(100n);
    expect(assets.balanceOf(SINK)).toBe(100n);
    expect(ledger.isProtocolFeeDistributionEnabledAtEpoch(1)).toBe(true);
    expect(ledger.isProtocolFeeDistributionEnabledAtEpoch(2)).toBe(false);
    expect(ledger.accumulatedProtocolFees(2)).toBe(5n);
  });

  it("skips settlement of an empty pot", () => {
    ledger.addUtilization(ALICE, 1n);
    epoch = 2;
    ledger.addUtilization(ALICE, 1n);
    const types = recorder.drain().map((e) => e.type);
    expect(types).not.toContain(MULTIVAULT_EVENTS.PROTOCOL_FEE_SETTLED);
  });

  it("carries from the last seeded epoch across skipped epochs", () => {
    ledger.addUtilization(ALICE, 400n);
    ledger.accrueProtocolFee(ALICE, 9n);
    epoch = 5;
    ledger.addUtilization(BOB, 100n);
    expect(ledger.getTotalUtilizationForEpoch(5)).toBe(500n);
    expect(ledger.getTotalUtilizationForEpoch(3)).toBe(0n);
    expect(assets.balanceOf(TREASURY)).toBe(9n);
    expect(ledger.lastSeededEpoch()).toBe(5);
  });
});

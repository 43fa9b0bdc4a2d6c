/**
 * Tests for redemptions: exit fees, the ghost-share floor, pause
 * behavior and redeeming on behalf of another account.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MULTIVAULT_EVENTS } from "@termvault/event-store";
import type { TermId } from "@termvault/types";
import type { MultiVault } from "../src/multivault.js";
import {
  ADMIN,
  ALICE,
  ALT_CURVE,
  ATOM_COST,
  BOB,
  DEFAULT_CURVE,
  atomData,
  codeOf,
  createHarness,
} from "./fixtures.js";

describe("MultiVault — redeem", () => {
  let vault: MultiVault;
  let atomId: TermId;

  beforeEach(() => {
    ({ vault } = createHarness());
    atomId = vault.createAtom(ALICE, atomData("d1"), ATOM_COST + 1000n);
    vault.deposit(BOB, { receiver: BOB, termId: atomId, curveId: DEFAULT_CURVE, assets: 1000n });
  });

  it("pays out net of protocol and exit fees", () => {
    // (2960, 2910): raw 930 * 2960 / 2910 = 945; protocol 10, exit 48
    const preview = vault.previewRedeem(atomId, DEFAULT_CURVE, 930n);
    const assets = vault.redeem(BOB, { receiver: BOB, termId: atomId, curveId: DEFAULT_CURVE, shares: 930n });

    expect(preview).toMatchObject({ assets: 887n, rawAssets: 945n });
    expect(assets).toBe(887n);
    expect(vault.getShares(BOB, atomId, DEFAULT_CURVE)).toBe(0n);
    expect(vault.getVault(atomId, DEFAULT_CURVE)).toMatchObject({
      totalAssets: 2063n,
      totalShares: 1980n,
    });
    expect(vault.assetBalanceOf(BOB)).toBe(999_000n + 887n);
    expect(vault.accumulatedProtocolFees(1)).toBe(530n);
  });

  it("subtracts the raw redeemed value from the owner's utilization", () => {
    vault.redeem(BOB, { receiver: BOB, termId: atomId, curveId: DEFAULT_CURVE, shares: 930n });
    expect(vault.getUserUtilizationForEpoch(BOB, 1)).toBe(1000n - 945n);
  });

  it("reports the redemption in one event", () => {
    vault.redeem(BOB, { receiver: BOB, termId: atomId, curveId: DEFAULT_CURVE, shares: 930n });
    const redeemed = vault.events
      .readAll()
      .find((e) => e.event.type === MULTIVAULT_EVENTS.REDEEMED);
    expect(redeemed?.event.payload).toMatchObject({
      sender: BOB,
      receiver: BOB,
      shares: "930",
      receiverShares: "0",
      assets: "887",
      fees: { entry: "0", exit: "48", protocol: "10", atomWallet: "0", atomDepositFraction: "0" },
      totalsBefore: { totalAssets: "2960", totalShares: "2910" },
      totalsAfter: { totalAssets: "2063", totalShares: "1980" },
    });
  });

  it("waives the exit fee when only ghost shares remain", () => {
    // ALICE's 980 shares of (1980, 1980) after BOB leaves
    vault.redeem(BOB, { receiver: BOB, termId: atomId, curveId: DEFAULT_CURVE, shares: 930n });
    const totals = vault.getVault(atomId, DEFAULT_CURVE);
    expect(totals.totalShares).toBe(1980n);

    // 980 * 2063 / 1980 = 1021; protocol 11, exit 0
    const assets = vault.redeem(ALICE, { receiver: ALICE, termId: atomId, curveId: DEFAULT_CURVE, shares: 980n });
    expect(assets).toBe(1010n);
    expect(vault.getVault(atomId, DEFAULT_CURVE)).toMatchObject({
      totalAssets: 2063n - 1021n,
      totalShares: 1000n,
    });
  });

  it("never lets the supply drop below the ghost shares", () => {
    vault.redeem(BOB, { receiver: BOB, termId: atomId, curveId: DEFAULT_CURVE, shares: 930n });
    expect(
      codeOf(() => vault.redeem(ADMIN, { receiver: ADMIN, termId: atomId, curveId: DEFAULT_CURVE, shares: 981n })),
    ).toBe("INSUFFICIENT_REMAINING_SHARES");
  });

  it("charges no fees while paused", () => {
    vault.setPaused(ADMIN, true);
    // 930 * 2960 / 2910 = 945, paid in full
    const assets = vault.redeem(BOB, { receiver: BOB, termId: atomId, curveId: DEFAULT_CURVE, shares: 930n });
    expect(assets).toBe(945n);
    expect(vault.accumulatedProtocolFees(1)).toBe(520n);
  });

  it("rejects zero shares and more than the balance", () => {
    expect(
      codeOf(() => vault.redeem(BOB, { receiver: BOB, termId: atomId, curveId: DEFAULT_CURVE, shares: 0n })),
    ).toBe("ZERO_SHARES");
    expect(
      codeOf(() => vault.redeem(BOB, { receiver: BOB, termId: atomId, curveId: DEFAULT_CURVE, shares: 931n })),
    ).toBe("INSUFFICIENT_BALANCE");
  });

  it("enforces the asset slippage bound", () => {
    expect(
      codeOf(() =>
        vault.redeem(BOB, {
          receiver: BOB,
          termId: atomId,
          curveId: DEFAULT_CURVE,
          shares: 930n,
          minAssets: 888n,
        }),
      ),
    ).toBe("SLIPPAGE_EXCEEDED");
    expect(vault.getShares(BOB, atomId, DEFAULT_CURVE)).toBe(930n);
  });

  it("redeems for an owner who approved the sender", () => {
    expect(
      codeOf(() => vault.redeem(BOB, { receiver: ALICE, termId: atomId, curveId: DEFAULT_CURVE, shares: 100n })),
    ).toBe("SENDER_NOT_APPROVED");

    vault.approve(ALICE, BOB, "redemption");
    const before = vault.assetBalanceOf(ALICE);
    const assets = vault.redeem(BOB, { receiver: ALICE, termId: atomId, curveId: DEFAULT_CURVE, shares: 100n });

    expect(vault.getShares(ALICE, atomId, DEFAULT_CURVE)).toBe(880n);
    expect(vault.assetBalanceOf(ALICE)).toBe(before + assets);
    expect(vault.assetBalanceOf(BOB)).toBe(999_000n);
  });

  it("does not accept a deposit approval for redemption", () => {
    vault.approve(ALICE, BOB, "deposit");
    expect(
      codeOf(() => vault.redeem(BOB, { receiver: ALICE, termId: atomId, curveId: DEFAULT_CURVE, shares: 100n })),
    ).toBe("SENDER_NOT_APPROVED");
  });

  it("moves the exit fee to the default-curve vault on an alternate curve", () => {
    vault.deposit(BOB, { receiver: BOB, termId: atomId, curveId: ALT_CURVE, assets: 3000n });
    // (2960, 2960): raw 960; protocol 10, exit 48
    const assets = vault.redeem(BOB, { receiver: BOB, termId: atomId, curveId: ALT_CURVE, shares: 960n });

    expect(assets).toBe(902n);
    expect(vault.getVault(atomId, ALT_CURVE)).toMatchObject({
      totalAssets: 2000n,
      totalShares: 2000n,
    });
    expect(vault.getVault(atomId, DEFAULT_CURVE).totalAssets).toBe(2960n + 48n);
  });
});

/**
 * Tests for approvals, atom wallet claims and administration.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MULTIVAULT_EVENTS } from "@termvault/event-store";
import type { MultiVault } from "../src/multivault.js";
import type { DeterministicAtomWalletFactory } from "@termvault/periphery";
import {
  ADMIN,
  ALICE,
  ATOM_COST,
  BOB,
  CAROL,
  DEFAULT_CURVE,
  WALLET_OWNER,
  atomData,
  baseConfigInput,
  codeOf,
  createHarness,
  eventTypes,
} from "./fixtures.js";

describe("MultiVault — approvals", () => {
  let vault: MultiVault;

  beforeEach(() => {
    ({ vault } = createHarness());
  });

  it("records and replaces an approval", () => {
    expect(vault.getApproval(ALICE, BOB)).toBe("none");
    vault.approve(ALICE, BOB, "both");
    expect(vault.getApproval(ALICE, BOB)).toBe("both");
    vault.approve(ALICE, BOB, "none");
    expect(vault.getApproval(ALICE, BOB)).toBe("none");
  });

  it("is directional", () => {
    vault.approve(ALICE, BOB, "deposit");
    expect(vault.getApproval(BOB, ALICE)).toBe("none");
  });

  it("rejects self-approval", () => {
    expect(codeOf(() => vault.approve(ALICE, ALICE, "both"))).toBe("CANNOT_APPROVE_SELF");
  });

  it("lets a 'both' approval deposit and redeem", () => {
    const atomId = vault.createAtom(CAROL, atomData("d1"), ATOM_COST);
    vault.approve(ALICE, BOB, "both");
    const shares = vault.deposit(BOB, { receiver: ALICE, termId: atomId, curveId: DEFAULT_CURVE, assets: 1000n });
    const assets = vault.redeem(BOB, { receiver: ALICE, termId: atomId, curveId: DEFAULT_CURVE, shares });
    expect(assets).toBeGreaterThan(0n);
    expect(vault.getShares(ALICE, atomId, DEFAULT_CURVE)).toBe(0n);
  });
});

describe("MultiVault — atom wallet fees", () => {
  let vault: MultiVault;
  let wallets: DeterministicAtomWalletFactory;

  beforeEach(() => {
    ({ vault, wallets } = createHarness());
  });

  it("pays the accrued fees to the wallet owner once", () => {
    const atomId = vault.createAtom(ALICE, atomData("d1"), ATOM_COST + 1000n);
    const wallet = vault.computeAtomWalletAddr(atomId);

    expect(vault.claimAtomWalletDepositFees(wallet, atomId)).toBe(10n);
    expect(vault.assetBalanceOf(WALLET_OWNER)).toBe(10n);
    expect(vault.accumulatedAtomWalletDepositFees(wallet)).toBe(0n);
    expect(codeOf(() => vault.claimAtomWalletDepositFees(wallet, atomId))).toBe("NOTHING_TO_CLAIM");
  });

  it("follows a transfer of the wallet's ownership", () => {
    const atomId = vault.createAtom(ALICE, atomData("d1"), ATOM_COST + 1000n);
    wallets.transferWalletOwnership(atomId, CAROL);
    vault.claimAtomWalletDepositFees(vault.computeAtomWalletAddr(atomId), atomId);
    expect(vault.assetBalanceOf(CAROL)).toBe(1_000_010n);
  });

  it("accepts the wallet address in any letter case", () => {
    const atomId = vault.createAtom(ALICE, atomData("d1"), ATOM_COST + 1000n);
    const wallet = vault.computeAtomWalletAddr(atomId);
    expect(vault.accumulatedAtomWalletDepositFees(`0x${wallet.slice(2).toLowerCase()}`)).toBe(10n);
  });

  it("only lets the wallet claim", () => {
    const atomId = vault.createAtom(ALICE, atomData("d1"), ATOM_COST + 1000n);
    expect(codeOf(() => vault.claimAtomWalletDepositFees(ALICE, atomId))).toBe("UNAUTHORIZED");
  });

  it("rejects claims for unknown atoms", () => {
    expect(codeOf(() => vault.claimAtomWalletDepositFees(ALICE, atomData("missing")))).toBe(
      "ATOM_DOES_NOT_EXIST",
    );
  });
});

describe("MultiVault — administration", () => {
  let vault: MultiVault;

  beforeEach(() => {
    ({ vault } = createHarness());
  });

  it("toggles the pause flag for the admin only", () => {
    expect(codeOf(() => vault.setPaused(ALICE, true))).toBe("UNAUTHORIZED");
    vault.setPaused(ADMIN, true);
    expect(vault.isPaused()).toBe(true);
    vault.setPaused(ADMIN, false);
    expect(vault.isPaused()).toBe(false);
    expect(eventTypes(vault).filter((t) => t === MULTIVAULT_EVENTS.PAUSE_CHANGED)).toHaveLength(2);
  });

  it("accepts the admin address in any letter case", () => {
    vault.setPaused(`0x${"AA".repeat(20)}`, true);
    expect(vault.isPaused()).toBe(true);
  });

  it("syncs a newer configuration", () => {
    const input = baseConfigInput();
    const next = vault.syncConfig(ADMIN, {
      ...input,
      version: 2,
      atom: { ...input.atom, atomCreationProtocolFee: 700 },
    });

    expect(next.version).toBe(2);
    expect(vault.getConfig().atom.atomCreationProtocolFee).toBe(700n);
    expect(vault.getAtomCost()).toBe(1700n);
  });

  it("rejects a stale configuration", () => {
    expect(codeOf(() => vault.syncConfig(ADMIN, baseConfigInput()))).toBe("STALE_CONFIG");
  });

  it("rejects an invalid configuration", () => {
    const input = baseConfigInput();
    expect(
      codeOf(() =>
        vault.syncConfig(ADMIN, { ...input, version: 2, vaultFees: { ...input.vaultFees, entryFee: 20_000 } }),
      ),
    ).toBe("INVALID_CONFIG");
    expect(codeOf(() => vault.syncConfig(ADMIN, { version: 2 }))).toBe("INVALID_CONFIG");
  });

  it("rejects configuration from anyone but the admin", () => {
    expect(codeOf(() => vault.syncConfig(BOB, { ...baseConfigInput(), version: 2 }))).toBe("UNAUTHORIZED");
  });

  it("mints base assets for the admin only", () => {
    vault.mintAssets(ADMIN, BOB, 5n);
    expect(vault.assetBalanceOf(BOB)).toBe(1_000_005n);
    expect(codeOf(() => vault.mintAssets(BOB, BOB, 5n))).toBe("UNAUTHORIZED");
  });
});

describe("MultiVault — account identity", () => {
  const MIXED = `0x${"Ab".repeat(20)}` as const;
  const LOWER = `0x${"ab".repeat(20)}` as const;

  it("keeps one asset balance for an address in any letter case", () => {
    const { vault } = createHarness();
    vault.mintAssets(ADMIN, MIXED, 10_000n);
    expect(vault.assetBalanceOf(LOWER)).toBe(10_000n);

    vault.createAtom(LOWER, atomData("d1"), ATOM_COST + 1000n);
    expect(vault.assetBalanceOf(MIXED)).toBe(7_500n);
    expect(vault.assetBalanceOf(LOWER)).toBe(7_500n);
  });

  it("merges shares acquired under different letter cases", () => {
    const { vault } = createHarness();
    vault.mintAssets(ADMIN, MIXED, 10_000n);
    const atomId = vault.createAtom(MIXED, atomData("d1"), ATOM_COST + 1000n);
    vault.deposit(LOWER, { receiver: LOWER, termId: atomId, curveId: DEFAULT_CURVE, assets: 1000n });

    expect(vault.getShares(MIXED, atomId, DEFAULT_CURVE)).toBe(1910n);
    expect(vault.getUserLastActiveEpoch(MIXED)).toBe(1);
  });

  it("records addresses in lowercase", () => {
    const { vault } = createHarness();
    vault.mintAssets(ADMIN, MIXED, 10_000n);

    const minted = vault.events
      .readAll()
      .filter((e) => e.event.type === MULTIVAULT_EVENTS.ASSETS_MINTED)
      .at(-1);
    expect(minted?.event.payload).toMatchObject({ to: LOWER, amount: "10000" });
  });
});

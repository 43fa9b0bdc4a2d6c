/**
 * Tests for atom and triple creation.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { toHex } from "viem";
import { MULTIVAULT_EVENTS } from "@termvault/event-store";
import type { TermId } from "@termvault/types";
import {
  calculateAtomId,
  calculateCounterTripleId,
  calculateTripleId,
} from "../src/identity.js";
import type { MultiVault } from "../src/multivault.js";
import {
  ADMIN,
  ALICE,
  ATOM_COST,
  BOB,
  DEFAULT_CURVE,
  MIN_SHARE,
  TRIPLE_COST,
  atomData,
  codeOf,
  createAtoms,
  createHarness,
  eventTypes,
} from "./fixtures.js";

describe("MultiVault — atom creation", () => {
  let vault: MultiVault;

  beforeEach(() => {
    ({ vault } = createHarness());
  });

  it("creates an atom at exactly its cost", () => {
    const atomId = vault.createAtom(ALICE, atomData("d1"), ATOM_COST);

    expect(atomId).toBe(calculateAtomId(toHex("d1")));
    expect(vault.isAtom(atomId)).toBe(true);
    expect(vault.isTermCreated(atomId)).toBe(true);
    expect(vault.getVaultType(atomId)).toBe("atom");
    expect(vault.getAtom(atomId)).toBe(toHex("d1"));
    expect(vault.getTermIndex(atomId)).toBe(1);
    expect(vault.totalTermsCreated()).toBe(1);

    expect(vault.getVault(atomId, DEFAULT_CURVE)).toMatchObject({
      totalAssets: MIN_SHARE,
      totalShares: MIN_SHARE,
    });
    expect(vault.getShares(ADMIN, atomId, DEFAULT_CURVE)).toBe(MIN_SHARE);
    expect(vault.getShares(ALICE, atomId, DEFAULT_CURVE)).toBe(0n);
    expect(vault.accumulatedProtocolFees(1)).toBe(500n);
    expect(vault.assetBalanceOf(ALICE)).toBe(1_000_000n - ATOM_COST);
  });

  it("deposits the value above the cost for the creator, entry fee waived", () => {
    const atomId = vault.createAtom(ALICE, atomData("d1"), ATOM_COST + 1000n);

    // net 1000: protocol 10, wallet 10, entry 0 → 980 shares at 1:1
    expect(vault.getShares(ALICE, atomId, DEFAULT_CURVE)).toBe(980n);
    expect(vault.getShares(ADMIN, atomId, DEFAULT_CURVE)).toBe(MIN_SHARE);
    expect(vault.getVault(atomId, DEFAULT_CURVE)).toMatchObject({
      totalAssets: 1980n,
      totalShares: 1980n,
    });
    expect(vault.accumulatedProtocolFees(1)).toBe(510n);

    const wallet = vault.computeAtomWalletAddr(atomId);
    expect(vault.accumulatedAtomWalletDepositFees(wallet)).toBe(10n);
    expect(vault.heldAssets()).toBe(2500n);
  });

  it("records the creator's utilization", () => {
    vault.createAtom(ALICE, atomData("d1"), 2500n);
    expect(vault.getUserUtilizationForEpoch(ALICE, 1)).toBe(2500n);
    expect(vault.getTotalUtilizationForEpoch(1)).toBe(2500n);
  });

  it("emits the creation events in order", () => {
    vault.createAtom(ALICE, atomData("d1"), 2500n);
    expect(eventTypes(vault).slice(3)).toEqual([
      MULTIVAULT_EVENTS.PROTOCOL_FEE_ACCRUED,
      MULTIVAULT_EVENTS.TOTALS_CHANGED,
      MULTIVAULT_EVENTS.SHARES_MINTED,
      MULTIVAULT_EVENTS.ATOM_CREATED,
      MULTIVAULT_EVENTS.TOTALS_CHANGED,
      MULTIVAULT_EVENTS.SHARES_MINTED,
      MULTIVAULT_EVENTS.PROTOCOL_FEE_ACCRUED,
      MULTIVAULT_EVENTS.ATOM_WALLET_FEE_ACCRUED,
      MULTIVAULT_EVENTS.DEPOSITED,
      MULTIVAULT_EVENTS.UTILIZATION_CHANGED,
    ]);
  });

  it("binds the creation event to the atom wallet", () => {
    const atomId = vault.createAtom(ALICE, atomData("d1"), ATOM_COST);
    const created = vault.events
      .readAll()
      .find((e) => e.event.type === MULTIVAULT_EVENTS.ATOM_CREATED);
    expect(created?.event.payload).toMatchObject({
      creator: ALICE,
      termId: atomId,
      atomData: toHex("d1"),
      atomWallet: vault.computeAtomWalletAddr(atomId),
      termIndex: 1,
    });
  });

  it("rejects duplicate data", () => {
    vault.createAtom(ALICE, atomData("d1"), ATOM_COST);
    expect(codeOf(() => vault.createAtom(BOB, atomData("d1"), ATOM_COST))).toBe("ATOM_EXISTS");
  });

  it("rejects data over the length limit", () => {
    const data = toHex(new Uint8Array(65));
    expect(codeOf(() => vault.createAtom(ALICE, data, ATOM_COST))).toBe("ATOM_DATA_TOO_LONG");
  });

  it("rejects value below the cost", () => {
    expect(codeOf(() => vault.createAtom(ALICE, atomData("d1"), ATOM_COST - 1n))).toBe(
      "INSUFFICIENT_CREATION_ASSETS",
    );
  });

  it("rejects a sender who cannot fund the creation", () => {
    expect(codeOf(() => vault.createAtom(ADMIN, atomData("d1"), ATOM_COST))).toBe(
      "INSUFFICIENT_ASSETS",
    );
  });

  it("creates a batch and rolls the whole batch back on one failure", () => {
    const ids = vault.createAtoms(ALICE, [atomData("x"), atomData("y")], [ATOM_COST, ATOM_COST]);
    expect(ids).toHaveLength(2);
    expect(vault.totalTermsCreated()).toBe(2);

    expect(
      codeOf(() =>
        vault.createAtoms(ALICE, [atomData("z"), atomData("x")], [ATOM_COST, ATOM_COST]),
      ),
    ).toBe("ATOM_EXISTS");
    expect(vault.isAtom(calculateAtomId(atomData("z")))).toBe(false);
    expect(vault.totalTermsCreated()).toBe(2);
    expect(vault.assetBalanceOf(ALICE)).toBe(1_000_000n - 2n * ATOM_COST);
  });

  it("rejects malformed batches", () => {
    expect(codeOf(() => vault.createAtoms(ALICE, [atomData("x")], []))).toBe(
      "ARRAYS_LENGTH_MISMATCH",
    );
    expect(codeOf(() => vault.createAtoms(ALICE, [], []))).toBe("EMPTY_ARRAY");
  });

  it("rejects creation while paused", () => {
    vault.setPaused(ADMIN, true);
    expect(codeOf(() => vault.createAtom(ALICE, atomData("d1"), ATOM_COST))).toBe("PAUSED");
  });
});

describe("MultiVault — triple creation", () => {
  let vault: MultiVault;
  let atoms: [TermId, TermId, TermId];

  beforeEach(() => {
    ({ vault } = createHarness());
    atoms = createAtoms(vault);
  });

  it("opens the triple and counter vaults with ghost shares", () => {
    const [s, p, o] = atoms;
    const tripleId = vault.createTriple(ALICE, s, p, o, TRIPLE_COST);
    const counterId = calculateCounterTripleId(tripleId);

    expect(tripleId).toBe(calculateTripleId(s, p, o));
    expect(vault.isTriple(tripleId)).toBe(true);
    expect(vault.isTriple(counterId)).toBe(true);
    expect(vault.isCounterTriple(counterId)).toBe(true);
    expect(vault.isCounterTriple(tripleId)).toBe(false);
    expect(vault.getVaultType(counterId)).toBe("counter_triple");
    expect(vault.getCounterIdFromTripleId(tripleId)).toBe(counterId);
    expect(vault.getTripleIdFromCounterId(counterId)).toBe(tripleId);
    expect(vault.getTriple(counterId)).toEqual({ subjectId: s, predicateId: p, objectId: o });

    for (const termId of [tripleId, counterId]) {
      expect(vault.getVault(termId, DEFAULT_CURVE)).toMatchObject({
        totalAssets: MIN_SHARE,
        totalShares: MIN_SHARE,
      });
      expect(vault.getShares(ADMIN, termId, DEFAULT_CURVE)).toBe(MIN_SHARE);
    }
    expect(vault.totalTermsCreated()).toBe(4);
  });

  it("spreads the static atom deposit over the three atoms without minting", () => {
    const [s, p, o] = atoms;
    vault.createTriple(ALICE, s, p, o, TRIPLE_COST);
    for (const atomId of atoms) {
      expect(vault.getVault(atomId, DEFAULT_CURVE)).toMatchObject({
        totalAssets: 1100n,
        totalShares: 1000n,
      });
    }
  });

  it("fans the creation deposit's fraction out to the atoms for the creator", () => {
    const [s, p, o] = atoms;
    const tripleId = vault.createTriple(ALICE, s, p, o, TRIPLE_COST + 1000n);

    // net 1000: protocol 10, fraction 30 → 960 shares
    expect(vault.getShares(ALICE, tripleId, DEFAULT_CURVE)).toBe(960n);
    expect(vault.getVault(tripleId, DEFAULT_CURVE)).toMatchObject({
      totalAssets: 1960n,
      totalShares: 1960n,
    });

    // 10 per atom at (1100, 1000): 10 * 1000 / 1100 = 9 shares
    for (const atomId of atoms) {
      expect(vault.getShares(ALICE, atomId, DEFAULT_CURVE)).toBe(9n);
      expect(vault.getVault(atomId, DEFAULT_CURVE)).toMatchObject({
        totalAssets: 1110n,
        totalShares: 1009n,
      });
    }
    expect(vault.accumulatedProtocolFees(1)).toBe(3n * 500n + 600n + 10n);
  });

  it("rejects a triple over a missing atom", () => {
    const [s, p] = atoms;
    const missing = calculateAtomId(atomData("missing"));
    expect(codeOf(() => vault.createTriple(ALICE, s, p, missing, TRIPLE_COST))).toBe(
      "ATOM_DOES_NOT_EXIST",
    );
  });

  it("rejects a triple built on another triple", () => {
    const [s, p, o] = atoms;
    const tripleId = vault.createTriple(ALICE, s, p, o, TRIPLE_COST);
    expect(codeOf(() => vault.createTriple(ALICE, tripleId, p, o, TRIPLE_COST))).toBe(
      "ATOM_DOES_NOT_EXIST",
    );
  });

  it("rejects a duplicate triple", () => {
    const [s, p, o] = atoms;
    vault.createTriple(ALICE, s, p, o, TRIPLE_COST);
    expect(codeOf(() => vault.createTriple(BOB, s, p, o, TRIPLE_COST))).toBe("TRIPLE_EXISTS");
  });

  it("rejects value below the cost", () => {
    const [s, p, o] = atoms;
    expect(codeOf(() => vault.createTriple(ALICE, s, p, o, TRIPLE_COST - 1n))).toBe(
      "INSUFFICIENT_CREATION_ASSETS",
    );
  });

  it("treats swapped atoms as a different triple", () => {
    const [s, p, o] = atoms;
    const forward = vault.createTriple(ALICE, s, p, o, TRIPLE_COST);
    const reversed = vault.createTriple(ALICE, o, p, s, TRIPLE_COST);
    expect(forward).not.toBe(reversed);
  });
});

/**
 * Tests for DeterministicAtomWalletFactory.
 */

import { describe, it, expect } from "vitest";
import { getContractAddress, keccak256, toHex } from "viem";
import { DeterministicAtomWalletFactory } from "../src/atom-wallet-factory.js";

const FACTORY = `0x${"fa".repeat(20)}` as const;
const OWNER = `0x${"0a".repeat(20)}` as const;
const OTHER = `0x${"0b".repeat(20)}` as const;
const INIT_CODE_HASH = keccak256(toHex("atom-wallet-init-code"));
const ATOM_A = keccak256(toHex("atom-a"));
const ATOM_B = keccak256(toHex("atom-b"));

function createFactory(): DeterministicAtomWalletFactory {
  return new DeterministicAtomWalletFactory({
    factory: FACTORY,
    initCodeHash: INIT_CODE_HASH,
    defaultOwner: OWNER,
  });
}

describe("DeterministicAtomWalletFactory", () => {
  it("derives the CREATE2 address of the atom", () => {
    const expected = getContractAddress({
      opcode: "CREATE2",
      from: FACTORY,
      salt: ATOM_A,
      bytecodeHash: INIT_CODE_HASH,
    });
    expect(createFactory().computeAtomWalletAddr(ATOM_A)).toBe(expected);
  });

  it("is stable across instances", () => {
    expect(createFactory().computeAtomWalletAddr(ATOM_B)).toBe(
      createFactory().computeAtomWalletAddr(ATOM_B),
    );
  });

  it("gives different atoms different wallets", () => {
    const factory = createFactory();
    expect(factory.computeAtomWalletAddr(ATOM_A)).not.toBe(factory.computeAtomWalletAddr(ATOM_B));
  });

  it("returns 20-byte addresses", () => {
    expect(createFactory().computeAtomWalletAddr(ATOM_A)).toMatch(/^0x[0-9a-fA-F]{40}$/);
  });

  it("reports the default owner until ownership moves", () => {
    const factory = createFactory();
    expect(factory.atomWalletOwner(ATOM_A)).toBe(OWNER);

    factory.transferWalletOwnership(ATOM_A, OTHER);
    expect(factory.atomWalletOwner(ATOM_A)).toBe(OTHER);
    expect(factory.atomWalletOwner(ATOM_B)).toBe(OWNER);
  });
});

/**
 * Shared fixtures for multivault tests.
 *
 * Fee rates are over 10 000:
 *   entry 5%, exit 5%, protocol 1%, atom wallet 1%, triple fraction 3%
 *
 *   atom cost   = 500 + 1000           = 1500
 *   triple cost = 600 + 300 + 2 * 1000 = 2900
 */

import { keccak256, toHex } from "viem";
import { CurveRegistry, LinearCurve } from "@termvault/curves";
import { DeterministicAtomWalletFactory, EpochBondingSink } from "@termvault/periphery";
import type { Address, Hex, TermId } from "@termvault/types";
import type { MultiVaultConfig, MultiVaultConfigInput } from "../src/config.js";
import { parseMultiVaultConfig } from "../src/config.js";
import { MultiVault } from "../src/multivault.js";
import { MultiVaultError } from "../src/types.js";

export const ADMIN = `0x${"aa".repeat(20)}` as const;
export const TREASURY = `0x${"cc".repeat(20)}` as const;
export const SINK = `0x${"5e".repeat(20)}` as const;
export const ALICE = `0x${"a1".repeat(20)}` as const;
export const BOB = `0x${"b0".repeat(20)}` as const;
export const CAROL = `0x${"c0".repeat(20)}` as const;
export const WALLET_OWNER = `0x${"0e".repeat(20)}` as const;
export const FACTORY = `0x${"fa".repeat(20)}` as const;
export const INIT_CODE_HASH = keccak256(toHex("atom-wallet-init-code"));

export const MIN_SHARE = 1000n;
export const ATOM_COST = 1500n;
export const TRIPLE_COST = 2900n;

/** Default (signal) curve and an alternate curve. */
export const DEFAULT_CURVE = 1;
export const ALT_CURVE = 2;

export const FIXED_NOW = (): string => "2026-01-01T00:00:00.000Z";

export function baseConfigInput(): MultiVaultConfigInput {
  return {
    version: 1,
    general: {
      admin: ADMIN,
      protocolMultisig: TREASURY,
      feeDenominator: 10_000,
      minDeposit: 100,
      minShare: 1000,
      atomDataMaxLength: 64,
      protocolFeeDistributionEnabled: false,
    },
    atom: {
      atomCreationProtocolFee: 500,
      atomWalletDepositFee: 100,
    },
    triple: {
      tripleCreationProtocolFee: 600,
      totalAtomDepositsOnTripleCreation: 300,
      atomDepositFractionForTriple: 300,
    },
    vaultFees: {
      entryFee: 500,
      exitFee: 500,
      protocolFee: 100,
    },
    bondingCurve: {
      defaultCurveId: DEFAULT_CURVE,
    },
  };
}

export function baseConfig(): MultiVaultConfig {
  return parseMultiVaultConfig(baseConfigInput());
}

export interface Harness {
  readonly vault: MultiVault;
  readonly sink: EpochBondingSink;
  readonly wallets: DeterministicAtomWalletFactory;
  readonly curves: CurveRegistry;
  /** Set the epoch the sink reports */
  setEpoch(epoch: number): void;
}

export interface HarnessOptions {
  readonly config?: MultiVaultConfig;
  readonly altCurveMaxAssets?: bigint;
  /** Base assets minted to ALICE, BOB and CAROL */
  readonly funding?: bigint;
}

export function createHarness(options?: HarnessOptions): Harness {
  let epoch = 1;
  const curves = new CurveRegistry();
  curves.register(new LinearCurve({ name: "linear" }));
  curves.register(new LinearCurve({ name: "alt", maxAssets: options?.altCurveMaxAssets }));

  const sink = new EpochBondingSink(SINK, { currentEpoch: () => epoch });
  const wallets = new DeterministicAtomWalletFactory({
    factory: FACTORY,
    initCodeHash: INIT_CODE_HASH,
    defaultOwner: WALLET_OWNER,
  });

  let nextId = 0;
  const vault = new MultiVault({
    config: options?.config ?? baseConfig(),
    curves,
    walletFactory: wallets,
    sink,
    now: FIXED_NOW,
    generateId: () => {
      nextId += 1;
      return `id-${String(nextId)}`;
    },
  });

  const funding = options?.funding ?? 1_000_000n;
  for (const account of [ALICE, BOB, CAROL]) {
    vault.mintAssets(ADMIN, account, funding);
  }

  return {
    vault,
    sink,
    wallets,
    curves,
    setEpoch: (next) => {
      epoch = next;
    },
  };
}

export function atomData(label: string): Hex {
  return toHex(label);
}

/** Create three atoms funded at exactly their cost. */
export function createAtoms(vault: MultiVault, sender: Address = ALICE): [TermId, TermId, TermId] {
  return [
    vault.createAtom(sender, atomData("subject"), ATOM_COST),
    vault.createAtom(sender, atomData("predicate"), ATOM_COST),
    vault.createAtom(sender, atomData("object"), ATOM_COST),
  ];
}

export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof MultiVaultError) return err.code;
    throw err;
  }
  return undefined;
}

export function eventTypes(vault: MultiVault): string[] {
  return vault.events.readAll().map((e) => e.event.type);
}

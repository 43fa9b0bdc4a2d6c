/**
 * Response views.
 *
 * The engine works in bigint, which JSON cannot carry. Every amount
 * leaves the API as a base-10 string.
 */

import type {
  AtomCreationPreview,
  DepositPreview,
  FeesBreakdown,
  MultiVaultConfig,
  RedeemPreview,
  VaultState,
} from "@termvault/multivault";
import type { CurveId, TermId, VaultType } from "@termvault/types";

export interface FeesView {
  readonly entryFee: string;
  readonly exitFee: string;
  readonly protocolFee: string;
  readonly atomWalletFee: string;
  readonly atomDepositFraction: string;
}

export function feesView(fees: FeesBreakdown): FeesView {
  return {
    entryFee: fees.entryFee.toString(),
    exitFee: fees.exitFee.toString(),
    protocolFee: fees.protocolFee.toString(),
    atomWalletFee: fees.atomWalletFee.toString(),
    atomDepositFraction: fees.atomDepositFraction.toString(),
  };
}

export interface VaultView {
  readonly termId: TermId;
  readonly curveId: CurveId;
  readonly vaultType: VaultType;
  readonly totalAssets: string;
  readonly totalShares: string;
  readonly sharePrice: string;
}

export function vaultView(state: VaultState, sharePrice: bigint): VaultView {
  return {
    termId: state.termId,
    curveId: state.curveId,
    vaultType: state.vaultType,
    totalAssets: state.totalAssets.toString(),
    totalShares: state.totalShares.toString(),
    sharePrice: sharePrice.toString(),
  };
}

export interface CreationPreviewView {
  readonly shares: string;
  readonly assetsAfterFixedFees: string;
  readonly assetsAfterFees: string;
  readonly fees: FeesView;
}

export function creationPreviewView(preview: AtomCreationPreview): CreationPreviewView {
  return {
    shares: preview.shares.toString(),
    assetsAfterFixedFees: preview.assetsAfterFixedFees.toString(),
    assetsAfterFees: preview.assetsAfterFees.toString(),
    fees: feesView(preview.fees),
  };
}

export interface DepositPreviewView {
  readonly shares: string;
  readonly assetsAfterFees: string;
  readonly ghostAssets: string;
  readonly fees: FeesView;
}

export function depositPreviewView(preview: DepositPreview): DepositPreviewView {
  return {
    shares: preview.shares.toString(),
    assetsAfterFees: preview.assetsAfterFees.toString(),
    ghostAssets: preview.ghostAssets.toString(),
    fees: feesView(preview.fees),
  };
}

export interface RedeemPreviewView {
  readonly assets: string;
  readonly rawAssets: string;
  readonly fees: FeesView;
}

export function redeemPreviewView(preview: RedeemPreview): RedeemPreviewView {
  return {
    assets: preview.assets.toString(),
    rawAssets: preview.rawAssets.toString(),
    fees: feesView(preview.fees),
  };
}

/** Snapshot in the same shape the config file takes, so it can be edited and synced back. */
export function configView(config: MultiVaultConfig): Record<string, unknown> {
  const { general, atom, triple, vaultFees } = config;
  return {
    version: config.version,
    general: {
      admin: general.admin,
      protocolMultisig: general.protocolMultisig,
      feeDenominator: general.feeDenominator.toString(),
      minDeposit: general.minDeposit.toString(),
      minShare: general.minShare.toString(),
      atomDataMaxLength: general.atomDataMaxLength,
      protocolFeeDistributionEnabled: general.protocolFeeDistributionEnabled,
    },
    atom: {
      atomCreationProtocolFee: atom.atomCreationProtocolFee.toString(),
      atomWalletDepositFee: atom.atomWalletDepositFee.toString(),
    },
    triple: {
      tripleCreationProtocolFee: triple.tripleCreationProtocolFee.toString(),
      totalAtomDepositsOnTripleCreation: triple.totalAtomDepositsOnTripleCreation.toString(),
      atomDepositFractionForTriple: triple.atomDepositFractionForTriple.toString(),
    },
    vaultFees: {
      entryFee: vaultFees.entryFee.toString(),
      exitFee: vaultFees.exitFee.toString(),
      protocolFee: vaultFees.protocolFee.toString(),
    },
    bondingCurve: { defaultCurveId: config.bondingCurve.defaultCurveId },
  };
}

export function amounts(values: readonly bigint[]): string[] {
  return values.map((v) => v.toString());
}

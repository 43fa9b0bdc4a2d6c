/**
 * @termvault/multivault — Fee engine.
 *
 * Every fee and share figure of a deposit or redemption comes from
 * `computeFeesAndShares`. Entry points, previews and the triple
 * fan-out all call it; nothing else computes a fee.
 *
 * Deposit:
 *   protocol  = ceil(raw * protocolFee / denominator)
 *   wallet    = ceil(raw * atomWalletDepositFee / denominator)         atoms only
 *   fraction  = ceil(raw * atomDepositFractionForTriple / denominator) triples only
 *   entry     = ceil(raw * entryFee / denominator), 0 while shares <= minShare
 *   net       = raw - protocol - wallet - fraction - entry
 *
 * An underlying atom leg (a triple's fraction pushed into one of its
 * atoms) pays the entry fee only.
 *
 * Redeem:
 *   paused    → no fees, the receiver gets raw
 *   protocol  = ceil(raw * protocolFee / denominator)
 *   exit      = ceil(raw * exitFee / denominator), 0 if the redemption leaves shares <= minShare
 *   assets    = raw - protocol - exit
 *
 * On the default curve the entry/exit fee stays in the vault; on any
 * other curve it leaves the vault (the caller moves it to the default
 * curve's vault).
 */

import type { CurveId, CurveProvider, TermId, VaultTotals, VaultType } from "@termvault/types";
import type { MultiVaultConfig } from "./config.js";
import { feeOnRaw, sum } from "./fee-math.js";
import type { TermRegistry } from "./term-registry.js";
import type { FeesAndShares, FeesBreakdown } from "./types.js";
import { MultiVaultError, ZERO_FEES } from "./types.js";
import type { VaultStore } from "./vault-store.js";

// =============================================================================
// Pure computation
// =============================================================================

export interface FeeInputs {
  readonly rawAmount: bigint;
  readonly vaultType: VaultType;
  readonly curveId: CurveId;
  readonly isDefaultCurve: boolean;
  /** Vault totals before the call */
  readonly totals: VaultTotals;
  readonly isDeposit: boolean;
  readonly isUnderlyingAtomLeg: boolean;
  /** Redeem only: shares being burned */
  readonly sharesToRedeem: bigint;
  readonly paused: boolean;
  readonly config: MultiVaultConfig;
  readonly curves: CurveProvider;
}

export function computeFeesAndShares(inputs: FeeInputs): FeesAndShares {
  return inputs.isDeposit ? depositFees(inputs) : redeemFees(inputs);
}

function depositFees(inputs: FeeInputs): FeesAndShares {
  const { rawAmount, totals, config, curves, curveId } = inputs;
  const denominator = config.general.feeDenominator;
  const minShare = config.general.minShare;

  const entryFee =
    totals.totalShares <= minShare ? 0n : feeOnRaw(rawAmount, config.vaultFees.entryFee, denominator);

  let fees: FeesBreakdown;
  if (inputs.isUnderlyingAtomLeg) {
    fees = { ...ZERO_FEES, entryFee };
  } else {
    fees = {
      entryFee,
      exitFee: 0n,
      protocolFee: feeOnRaw(rawAmount, config.vaultFees.protocolFee, denominator),
      atomWalletFee:
        inputs.vaultType === "atom"
          ? feeOnRaw(rawAmount, config.atom.atomWalletDepositFee, denominator)
          : 0n,
      atomDepositFraction:
        inputs.vaultType === "atom"
          ? 0n
          : feeOnRaw(rawAmount, config.triple.atomDepositFractionForTriple, denominator),
    };
  }

  const net =
    rawAmount -
    sum([fees.entryFee, fees.protocolFee, fees.atomWalletFee, fees.atomDepositFraction]);
  if (net < 0n) {
    throw new MultiVaultError(
      "INSUFFICIENT_ASSETS",
      `Fees exceed the deposited amount ${rawAmount.toString()}`,
    );
  }

  const assetsDelta = inputs.isDefaultCurve ? net + fees.entryFee : net;
  const maxAssets = curves.getCurveMaxAssets(curveId);
  if (totals.totalAssets + assetsDelta > maxAssets) {
    throw new MultiVaultError(
      "CURVE_MAX_ASSETS_EXCEEDED",
      `Curve ${String(curveId)} holds at most ${maxAssets.toString()} assets per vault`,
    );
  }

  return {
    shares: curves.previewDeposit(curveId, net, totals),
    assets: net,
    assetsDelta,
    fees,
  };
}

function redeemFees(inputs: FeeInputs): FeesAndShares {
  const { rawAmount, totals, config, sharesToRedeem } = inputs;

  if (inputs.paused) {
    return { shares: sharesToRedeem, assets: rawAmount, assetsDelta: rawAmount, fees: ZERO_FEES };
  }

  const denominator = config.general.feeDenominator;
  const protocolFee = feeOnRaw(rawAmount, config.vaultFees.protocolFee, denominator);
  const exitFee =
    totals.totalShares - sharesToRedeem <= config.general.minShare
      ? 0n
      : feeOnRaw(rawAmount, config.vaultFees.exitFee, denominator);

  const assets = rawAmount - protocolFee - exitFee;
  if (assets < 0n) {
    throw new MultiVaultError(
      "ZERO_ASSETS",
      `Fees consume the whole redemption of ${rawAmount.toString()} assets`,
    );
  }

  return {
    shares: sharesToRedeem,
    assets,
    assetsDelta: inputs.isDefaultCurve ? rawAmount - exitFee : rawAmount,
    fees: { ...ZERO_FEES, protocolFee, exitFee },
  };
}

// =============================================================================
// Engine-bound wrapper
// =============================================================================

export interface FeeRequest {
  readonly rawAmount: bigint;
  readonly termId: TermId;
  readonly curveId: CurveId;
  readonly isDeposit: boolean;
  readonly isUnderlyingAtomLeg?: boolean;
  readonly sharesToRedeem?: bigint;
  /** Totals to price against instead of the stored ones (previews of unopened vaults) */
  readonly totals?: VaultTotals;
}

export interface FeeEngineDeps {
  readonly registry: TermRegistry;
  readonly vaults: VaultStore;
  readonly curves: CurveProvider;
  readonly config: () => MultiVaultConfig;
  readonly paused: () => boolean;
}

/**
 * Binds the pure computation to live engine state.
 */
export class FeeEngine {
  constructor(private readonly deps: FeeEngineDeps) {}

  computeFeesAndShares(request: FeeRequest): FeesAndShares {
    const config = this.deps.config();
    return computeFeesAndShares({
      rawAmount: request.rawAmount,
      vaultType: this.deps.registry.getVaultType(request.termId),
      curveId: request.curveId,
      isDefaultCurve: request.curveId === config.bondingCurve.defaultCurveId,
      totals: request.totals ?? this.deps.vaults.getTotals(request.termId, request.curveId),
      isDeposit: request.isDeposit,
      isUnderlyingAtomLeg: request.isUnderlyingAtomLeg ?? false,
      sharesToRedeem: request.sharesToRedeem ?? 0n,
      paused: this.deps.paused(),
      config,
      curves: this.deps.curves,
    });
  }
}

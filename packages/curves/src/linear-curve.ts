/**
 * @termvault/curves — Linear (pro-rata) curve.
 *
 * Classic vault share math: shares and assets convert at the vault's
 * current assets-per-share ratio. An empty vault converts 1:1.
 *
 *   shares = assets * totalShares / totalAssets   (floor)
 *   assets = shares * totalAssets / totalShares   (floor)
 *
 * Mint/withdraw previews round up so the vault never gives away
 * the rounding unit.
 */

import { ONE_SHARE, mulDiv, mulDivUp } from "@termvault/types";
import type { VaultTotals } from "@termvault/types";
import type { BondingCurve } from "./types.js";
import { CurveError, MAX_UINT256 } from "./types.js";

function assertNonNegative(label: string, value: bigint): void {
  if (value < 0n) {
    throw new CurveError("NEGATIVE_AMOUNT", `${label} must be non-negative, got ${value.toString()}`);
  }
}

export interface LinearCurveOptions {
  readonly name?: string;
  readonly maxAssets?: bigint;
  readonly maxShares?: bigint;
}

export class LinearCurve implements BondingCurve {
  readonly name: string;
  readonly maxAssets: bigint;
  readonly maxShares: bigint;

  constructor(options?: LinearCurveOptions) {
    this.name = options?.name ?? "linear";
    this.maxAssets = options?.maxAssets ?? MAX_UINT256;
    this.maxShares = options?.maxShares ?? MAX_UINT256;
  }

  previewDeposit(assets: bigint, totals: VaultTotals): bigint {
    assertNonNegative("assets", assets);
    if (totals.totalAssets + assets > this.maxAssets) {
      throw new CurveError(
        "MAX_ASSETS_EXCEEDED",
        `Curve "${this.name}" holds at most ${this.maxAssets.toString()} assets`,
      );
    }
    const shares = this.convertToShares(assets, totals);
    if (totals.totalShares + shares > this.maxShares) {
      throw new CurveError(
        "MAX_SHARES_EXCEEDED",
        `Curve "${this.name}" issues at most ${this.maxShares.toString()} shares`,
      );
    }
    return shares;
  }

  previewRedeem(shares: bigint, totals: VaultTotals): bigint {
    assertNonNegative("shares", shares);
    return this.convertToAssets(shares, totals);
  }

  previewMint(shares: bigint, totals: VaultTotals): bigint {
    assertNonNegative("shares", shares);
    if (totals.totalShares === 0n) {
      return shares;
    }
    return mulDivUp(shares, totals.totalAssets, totals.totalShares);
  }

  previewWithdraw(assets: bigint, totals: VaultTotals): bigint {
    assertNonNegative("assets", assets);
    if (totals.totalAssets === 0n) {
      return assets;
    }
    return mulDivUp(assets, totals.totalShares, totals.totalAssets);
  }

  convertToShares(assets: bigint, totals: VaultTotals): bigint {
    if (totals.totalShares === 0n || totals.totalAssets === 0n) {
      return assets;
    }
    return mulDiv(assets, totals.totalShares, totals.totalAssets);
  }

  convertToAssets(shares: bigint, totals: VaultTotals): bigint {
    if (totals.totalShares === 0n) {
      return shares;
    }
    return mulDiv(shares, totals.totalAssets, totals.totalShares);
  }

  currentPrice(totals: VaultTotals): bigint {
    if (totals.totalShares === 0n) {
      return ONE_SHARE;
    }
    return mulDiv(totals.totalAssets, ONE_SHARE, totals.totalShares);
  }
}

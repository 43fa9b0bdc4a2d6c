/**
 * @termvault/curves — Curve types.
 *
 * A bonding curve turns a vault's (totalAssets, totalShares) into
 * conversion rates. Curves are stateless: the registry hands them the
 * vault totals on every call.
 */

import type { VaultTotals } from "@termvault/types";

export { ONE_SHARE } from "@termvault/types";

/** Largest uint256, the default asset/share ceiling. */
export const MAX_UINT256 = 2n ** 256n - 1n;

/**
 * A single pricing function.
 */
export interface BondingCurve {
  /** Human-readable, unique within a registry */
  readonly name: string;

  previewDeposit(assets: bigint, totals: VaultTotals): bigint;
  previewRedeem(shares: bigint, totals: VaultTotals): bigint;
  previewMint(shares: bigint, totals: VaultTotals): bigint;
  previewWithdraw(assets: bigint, totals: VaultTotals): bigint;
  convertToShares(assets: bigint, totals: VaultTotals): bigint;
  convertToAssets(shares: bigint, totals: VaultTotals): bigint;
  currentPrice(totals: VaultTotals): bigint;

  readonly maxAssets: bigint;
  readonly maxShares: bigint;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type CurveErrorCode =
  | "CURVE_NOT_FOUND"
  | "DUPLICATE_CURVE_NAME"
  | "NEGATIVE_AMOUNT"
  | "MAX_ASSETS_EXCEEDED"
  | "MAX_SHARES_EXCEEDED";

export class CurveError extends Error {
  public readonly code: CurveErrorCode;

  constructor(code: CurveErrorCode, message: string) {
    super(message);
    this.name = "CurveError";
    this.code = code;
  }
}

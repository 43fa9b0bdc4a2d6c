/**
 * Collaborator Interfaces
 *
 * Capabilities the multivault engine consumes but does not own.
 * The engine depends only on these shapes; concrete implementations
 * live in @termvault/curves and @termvault/periphery (or elsewhere).
 *
 * Rules:
 * - Collaborators are consulted by value: they never hold a reference
 *   back into engine state
 * - Curve math must be pure and deterministic given its inputs
 */

import type { Address, CurveId, TermId, VaultTotals } from "./term.js";

// =============================================================================
// Bonding curves
// =============================================================================

/**
 * Pricing capability addressed by integer curve id.
 *
 * Every conversion receives the vault's current totals explicitly,
 * so implementations keep no per-vault state.
 */
export interface CurveProvider {
  /** Number of registered curves. Valid ids are 1..count(). */
  count(): number;

  /** Whether `curveId` addresses a registered curve. */
  isCurveIdValid(curveId: CurveId): boolean;

  /** Shares minted for depositing `assets` into a vault with `totals`. */
  previewDeposit(curveId: CurveId, assets: bigint, totals: VaultTotals): bigint;

  /** Assets released for redeeming `shares` from a vault with `totals`. */
  previewRedeem(curveId: CurveId, shares: bigint, totals: VaultTotals): bigint;

  /** Assets required to mint exactly `shares` (rounded up). */
  previewMint(curveId: CurveId, shares: bigint, totals: VaultTotals): bigint;

  /** Shares that must be burned to withdraw exactly `assets` (rounded up). */
  previewWithdraw(curveId: CurveId, assets: bigint, totals: VaultTotals): bigint;

  convertToShares(curveId: CurveId, assets: bigint, totals: VaultTotals): bigint;

  convertToAssets(curveId: CurveId, shares: bigint, totals: VaultTotals): bigint;

  /** Marginal price of one share at the given totals, scaled by ONE_SHARE. */
  currentPrice(curveId: CurveId, totals: VaultTotals): bigint;

  /** Largest `totalAssets` a vault on this curve may hold. */
  getCurveMaxAssets(curveId: CurveId): bigint;
}

// =============================================================================
// Atom wallets
// =============================================================================

/**
 * Derives the deterministic receiving account of an atom.
 */
export interface AtomWalletFactory {
  /** Address of the atom's wallet. Computing it has no side effect. */
  computeAtomWalletAddr(atomId: TermId): Address;

  /** Account that controls the atom's wallet and receives its claimed fees. */
  atomWalletOwner(atomId: TermId): Address;
}

// =============================================================================
// Epoch clock & protocol-fee sink
// =============================================================================

/**
 * Epoch source and destination of settled protocol fees.
 */
export interface BondingSink {
  /** Account that receives distributed protocol fees. */
  readonly address: Address;

  /** Current accounting epoch (non-decreasing). */
  currentEpoch(): number;

  /**
   * Register the most that can be claimed for `epoch` before the
   * matching amount is transferred in. An accounting cross-check only.
   */
  setMaxClaimableProtocolFees(epoch: number, amount: bigint): void;
}

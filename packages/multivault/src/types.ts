/**
 * @termvault/multivault — Engine types.
 *
 * Structures used by the vault ledger and its fee engine. Quantities
 * are bigint throughout; conversion to strings happens only when a
 * value leaves the engine as an event payload.
 *
 * Rules:
 * - All types are readonly
 * - Every rejection is a MultiVaultError with a specific code
 */

import type { Address, CurveId, TermId, VaultType } from "@termvault/types";

// ─── Fees ────────────────────────────────────────────────────────────────

/**
 * The five fee components of one deposit or redemption.
 *
 * Exactly one of entryFee/exitFee can be non-zero. atomWalletFee and
 * atomDepositFraction are exclusive by term kind.
 */
export interface FeesBreakdown {
  readonly entryFee: bigint;
  readonly exitFee: bigint;
  readonly protocolFee: bigint;
  readonly atomWalletFee: bigint;
  readonly atomDepositFraction: bigint;
}

/**
 * Output of the fee engine for one call.
 */
export interface FeesAndShares {
  /** Deposit: shares minted to the receiver. Redeem: shares burned. */
  readonly shares: bigint;

  /** Deposit: assets converted to shares. Redeem: assets paid to the receiver. */
  readonly assets: bigint;

  /** Change applied to the vault's total assets (added on deposit, removed on redeem) */
  readonly assetsDelta: bigint;

  readonly fees: FeesBreakdown;
}

export const ZERO_FEES: FeesBreakdown = {
  entryFee: 0n,
  exitFee: 0n,
  protocolFee: 0n,
  atomWalletFee: 0n,
  atomDepositFraction: 0n,
};

// ─── Approvals ───────────────────────────────────────────────────────────

/** What an account lets another account do on its behalf. */
export type ApprovalType = "none" | "deposit" | "redemption" | "both";

// ─── Requests ────────────────────────────────────────────────────────────

export interface DepositRequest {
  readonly receiver: Address;
  readonly termId: TermId;
  readonly curveId: CurveId;
  readonly assets: bigint;
  /** Reject if fewer shares would be minted. Default: 0 */
  readonly minShares?: bigint;
}

export interface RedeemRequest {
  /** Owner of the shares and recipient of the assets */
  readonly receiver: Address;
  readonly termId: TermId;
  readonly curveId: CurveId;
  readonly shares: bigint;
  /** Reject if fewer assets would be paid out. Default: 0 */
  readonly minAssets?: bigint;
}

/** Parallel arrays, one entry per vault. */
export interface DepositBatchRequest {
  readonly receiver: Address;
  readonly termIds: readonly TermId[];
  readonly curveIds: readonly CurveId[];
  readonly assets: readonly bigint[];
  readonly minShares: readonly bigint[];
}

export interface RedeemBatchRequest {
  readonly receiver: Address;
  readonly termIds: readonly TermId[];
  readonly curveIds: readonly CurveId[];
  readonly shares: readonly bigint[];
  readonly minAssets: readonly bigint[];
}

// ─── Views ───────────────────────────────────────────────────────────────

export interface VaultState {
  readonly termId: TermId;
  readonly curveId: CurveId;
  readonly vaultType: VaultType;
  readonly totalAssets: bigint;
  readonly totalShares: bigint;
}

/**
 * Full state of one vault, including every non-zero share balance.
 */
export interface VaultSnapshot {
  readonly termId: TermId;
  readonly curveId: CurveId;
  readonly totalAssets: bigint;
  readonly totalShares: bigint;
  readonly balances: ReadonlyMap<Address, bigint>;
}

export interface AtomCreationPreview {
  readonly shares: bigint;
  /** Value left after the static atom cost */
  readonly assetsAfterFixedFees: bigint;
  /** Value left after the percentage fees as well */
  readonly assetsAfterFees: bigint;
  readonly fees: FeesBreakdown;
}

export type TripleCreationPreview = AtomCreationPreview;

export interface DepositPreview {
  readonly shares: bigint;
  readonly assetsAfterFees: bigint;
  /** Assets spent opening an unopened vault's ghost shares */
  readonly ghostAssets: bigint;
  readonly fees: FeesBreakdown;
}

export interface RedeemPreview {
  readonly assets: bigint;
  readonly rawAssets: bigint;
  readonly fees: FeesBreakdown;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type MultiVaultErrorCode =
  | "ATOM_EXISTS"
  | "TRIPLE_EXISTS"
  | "ATOM_DOES_NOT_EXIST"
  | "TERM_DOES_NOT_EXIST"
  | "INVALID_CURVE_ID"
  | "ATOM_DATA_TOO_LONG"
  | "DEPOSIT_BELOW_MINIMUM"
  | "INSUFFICIENT_CREATION_ASSETS"
  | "DEPOSIT_TOO_SMALL_FOR_GHOST_SHARES"
  | "ZERO_SHARES"
  | "ZERO_ASSETS"
  | "SLIPPAGE_EXCEEDED"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_REMAINING_SHARES"
  | "INSUFFICIENT_ASSETS"
  | "CURVE_MAX_ASSETS_EXCEEDED"
  | "HAS_COUNTER_STAKE"
  | "CANNOT_APPROVE_SELF"
  | "SENDER_NOT_APPROVED"
  | "UNAUTHORIZED"
  | "PAUSED"
  | "REENTRANT_CALL"
  | "ARRAYS_LENGTH_MISMATCH"
  | "EMPTY_ARRAY"
  | "STALE_CONFIG"
  | "INVALID_CONFIG"
  | "NOTHING_TO_CLAIM"
  | "INVALID_EVENT_LOG";

/**
 * Structured error from the multivault engine.
 * Thrown after the failed call's state has been rolled back.
 */
export class MultiVaultError extends Error {
  public readonly code: MultiVaultErrorCode;

  constructor(code: MultiVaultErrorCode, message: string) {
    super(message);
    this.name = "MultiVaultError";
    this.code = code;
  }
}

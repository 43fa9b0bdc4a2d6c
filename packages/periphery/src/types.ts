/**
 * @termvault/periphery — Shared types.
 */

import type { Address } from "@termvault/types";

/**
 * Configuration for a wall-clock epoch schedule.
 */
export interface EpochClockConfig {
  /** Unix seconds at which epoch 0 begins */
  readonly startTimestamp: number;

  /** Epoch length in seconds */
  readonly epochLength: number;

  /** Millisecond clock. Default: Date.now */
  readonly now?: () => number;
}

/**
 * Configuration for the deterministic atom wallet factory.
 */
export interface AtomWalletFactoryConfig {
  /** Deployer address wallets are derived from */
  readonly factory: Address;

  /** keccak256 of the wallet init code */
  readonly initCodeHash: `0x${string}`;

  /** Owner of every wallet until ownership is transferred */
  readonly defaultOwner: Address;
}

export type PeripheryErrorCode =
  | "INVALID_EPOCH_LENGTH"
  | "INVALID_START_TIMESTAMP"
  | "EPOCH_NOT_ENDED"
  | "NEGATIVE_AMOUNT"
  | "MAX_CLAIMABLE_ALREADY_SET";

export class PeripheryError extends Error {
  public readonly code: PeripheryErrorCode;

  constructor(code: PeripheryErrorCode, message: string) {
    super(message);
    this.name = "PeripheryError";
    this.code = code;
  }
}

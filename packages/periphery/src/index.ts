/**
 * @termvault/periphery — In-process collaborators of the multivault.
 *
 * Provides:
 * - EpochClock for fixed-length accounting epochs
 * - EpochBondingSink, the epoch source and protocol-fee destination
 * - DeterministicAtomWalletFactory for per-atom receiving accounts
 *
 * @packageDocumentation
 */

export { EpochClock } from "./epoch-clock.js";
export { EpochBondingSink } from "./bonding-sink.js";
export type { EpochSource } from "./bonding-sink.js";
export { DeterministicAtomWalletFactory } from "./atom-wallet-factory.js";
export { PeripheryError } from "./types.js";
export type {
  EpochClockConfig,
  AtomWalletFactoryConfig,
  PeripheryErrorCode,
} from "./types.js";

/**
 * Epoch Bonding Sink
 *
 * In-process destination for settled protocol fees. Tracks, per epoch,
 * the maximum claimable amount registered by the multivault before it
 * transfers the matching fees in.
 *
 * Rules:
 * - Only ended epochs can be registered
 * - Each epoch is registered at most once
 * - Amounts are non-negative
 */

import type { Address, BondingSink } from "@termvault/types";
import { PeripheryError } from "./types.js";

/** Anything that can tell the current epoch, e.g. an EpochClock. */
export interface EpochSource {
  currentEpoch(): number;
}

export class EpochBondingSink implements BondingSink {
  readonly address: Address;
  private readonly clock: EpochSource;
  private readonly maxClaimable: Map<number, bigint> = new Map();

  constructor(address: Address, clock: EpochSource) {
    this.address = address;
    this.clock = clock;
  }

  currentEpoch(): number {
    return this.clock.currentEpoch();
  }

  setMaxClaimableProtocolFees(epoch: number, amount: bigint): void {
    if (amount < 0n) {
      throw new PeripheryError("NEGATIVE_AMOUNT", `Claimable amount must be non-negative, got ${amount.toString()}`);
    }
    const current = this.currentEpoch();
    if (epoch >= current) {
      throw new PeripheryError(
        "EPOCH_NOT_ENDED",
        `Epoch ${String(epoch)} has not ended (current epoch is ${String(current)})`,
      );
    }
    if (this.maxClaimable.has(epoch)) {
      throw new PeripheryError(
        "MAX_CLAIMABLE_ALREADY_SET",
        `Claimable protocol fees for epoch ${String(epoch)} are already registered`,
      );
    }
    this.maxClaimable.set(epoch, amount);
  }

  maxClaimableProtocolFeesForEpoch(epoch: number): bigint {
    return this.maxClaimable.get(epoch) ?? 0n;
  }

  /** Epochs with a registered amount, ascending. */
  registeredEpochs(): readonly number[] {
    return [...this.maxClaimable.keys()].sort((a, b) => a - b);
  }
}

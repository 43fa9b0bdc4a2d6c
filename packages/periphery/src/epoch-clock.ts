/**
 * Epoch Clock
 *
 * Slices wall-clock time into fixed-length accounting epochs.
 *
 *   epoch(t) = floor((t - start) / length)     for t >= start
 *   epoch(t) = 0                               before start
 */

import type { EpochClockConfig } from "./types.js";
import { PeripheryError } from "./types.js";

export class EpochClock {
  readonly startTimestamp: number;
  readonly epochLength: number;
  private readonly now: () => number;

  constructor(config: EpochClockConfig) {
    if (!Number.isInteger(config.epochLength) || config.epochLength <= 0) {
      throw new PeripheryError(
        "INVALID_EPOCH_LENGTH",
        `Epoch length must be a positive integer of seconds, got ${String(config.epochLength)}`,
      );
    }
    if (!Number.isInteger(config.startTimestamp) || config.startTimestamp < 0) {
      throw new PeripheryError(
        "INVALID_START_TIMESTAMP",
        `Start timestamp must be a non-negative integer, got ${String(config.startTimestamp)}`,
      );
    }
    this.startTimestamp = config.startTimestamp;
    this.epochLength = config.epochLength;
    this.now = config.now ?? Date.now;
  }

  /** Current time in unix seconds. */
  timestamp(): number {
    return Math.floor(this.now() / 1000);
  }

  epochAtTimestamp(timestamp: number): number {
    if (timestamp < this.startTimestamp) {
      return 0;
    }
    return Math.floor((timestamp - this.startTimestamp) / this.epochLength);
  }

  currentEpoch(): number {
    return this.epochAtTimestamp(this.timestamp());
  }

  previousEpoch(): number {
    const current = this.currentEpoch();
    return current === 0 ? 0 : current - 1;
  }

  /** Unix seconds at which `epoch` ends (exclusive). */
  epochTimestampEnd(epoch: number): number {
    return this.startTimestamp + (epoch + 1) * this.epochLength;
  }
}

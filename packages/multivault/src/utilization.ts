/**
 * @termvault/multivault — Utilization ledger.
 *
 * Per-epoch net flow (deposits minus redemptions), system-wide and
 * per account, with lazy rollover:
 *
 * - Global: the first action of an epoch carries the last seeded
 *   epoch's total forward, snapshots the fee-distribution flag for the
 *   new epoch and settles the last seeded epoch's protocol fees. This
 *   happens once per epoch, whoever acts.
 * - Personal: an account's first action in a later epoch carries its
 *   own last bucket forward and advances its pointer.
 *
 * Settlement goes to the bonding sink when the settled epoch's
 * snapshot enables distribution, to the protocol multisig otherwise.
 * The sink is told about the amount through a deferred call that runs
 * at the end of the engine call.
 */

import { MULTIVAULT_EVENTS } from "@termvault/event-store";
import type { Address, BondingSink } from "@termvault/types";
import type { AssetLedger } from "./asset-ledger.js";
import type { MultiVaultConfig } from "./config.js";
import type { EventRecorder } from "./events.js";
import type { Journal } from "./journal.js";
import { JournaledCell, JournaledMap } from "./journal.js";

export interface UtilizationLedgerDeps {
  readonly journal: Journal;
  readonly recorder: EventRecorder;
  readonly assets: AssetLedger;
  readonly sink: BondingSink;
  readonly config: () => MultiVaultConfig;
  /** Schedule an outbound call for the end of the current engine call */
  readonly defer: (effect: () => void) => void;
}

function personalKey(account: Address, epoch: number): string {
  return `${account.toLowerCase()}|${String(epoch)}`;
}

export class UtilizationLedger {
  private readonly totalUtilization: JournaledMap<number, bigint>;
  private readonly personalUtilization: JournaledMap<string, bigint>;
  private readonly lastActiveEpoch: JournaledMap<string, number>;
  private readonly distributionSnapshot: JournaledMap<number, boolean>;
  private readonly protocolFees: JournaledMap<number, bigint>;
  private readonly lastGlobalEpoch: JournaledCell<number | undefined>;
  private readonly deps: UtilizationLedgerDeps;

  constructor(deps: UtilizationLedgerDeps) {
    this.deps = deps;
    this.totalUtilization = new JournaledMap(deps.journal);
    this.personalUtilization = new JournaledMap(deps.journal);
    this.lastActiveEpoch = new JournaledMap(deps.journal);
    this.distributionSnapshot = new JournaledMap(deps.journal);
    this.protocolFees = new JournaledMap(deps.journal);
    this.lastGlobalEpoch = new JournaledCell<number | undefined>(deps.journal, undefined);
  }

  currentEpoch(): number {
    return this.deps.sink.currentEpoch();
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  /** Add a protocol fee paid by `sender` to the current epoch's pot. */
  accrueProtocolFee(sender: Address, amount: bigint): void {
    const epoch = this.seedEpoch();
    if (amount === 0n) return;
    this.protocolFees.set(epoch, this.accumulatedProtocolFees(epoch) + amount);
    this.deps.recorder.emit(MULTIVAULT_EVENTS.PROTOCOL_FEE_ACCRUED, {
      epoch,
      sender,
      amount: amount.toString(),
    });
  }

  /** Apply a signed flow to `account` and to the system total. */
  addUtilization(account: Address, delta: bigint): void {
    const epoch = this.seedEpoch();
    this.rollPersonal(account, epoch);

    const key = personalKey(account, epoch);
    const personalTotal = (this.personalUtilization.get(key) ?? 0n) + delta;
    const globalTotal = this.getTotalUtilizationForEpoch(epoch) + delta;
    this.personalUtilization.set(key, personalTotal);
    this.totalUtilization.set(epoch, globalTotal);

    this.deps.recorder.emit(MULTIVAULT_EVENTS.UTILIZATION_CHANGED, {
      account,
      epoch,
      delta: delta.toString(),
      personalTotal: personalTotal.toString(),
      globalTotal: globalTotal.toString(),
    });
  }

  // ─── Rollover ───────────────────────────────────────────────────────

  /**
   * Seed the current epoch if no action has touched it yet.
   * Returns the current epoch.
   */
  private seedEpoch(): number {
    const epoch = this.currentEpoch();
    const previous = this.lastGlobalEpoch.get();
    if (previous === epoch) {
      return epoch;
    }

    this.distributionSnapshot.set(epoch, this.deps.config().general.protocolFeeDistributionEnabled);
    if (previous !== undefined) {
      this.totalUtilization.set(epoch, this.getTotalUtilizationForEpoch(previous));
      this.settle(previous);
    }
    this.lastGlobalEpoch.set(epoch);
    return epoch;
  }

  private rollPersonal(account: Address, epoch: number): void {
    const accountKey = account.toLowerCase();
    const last = this.lastActiveEpoch.get(accountKey);
    if (last === epoch) {
      return;
    }
    if (last !== undefined) {
      const carried = this.personalUtilization.get(personalKey(account, last)) ?? 0n;
      this.personalUtilization.set(personalKey(account, epoch), carried);
    }
    this.lastActiveEpoch.set(accountKey, epoch);
  }

  private settle(epoch: number): void {
    const amount = this.accumulatedProtocolFees(epoch);
    if (amount === 0n) return;

    const distributed = this.isProtocolFeeDistributionEnabledAtEpoch(epoch);
    const { sink } = this.deps;
    const destination = distributed ? sink.address : this.deps.config().general.protocolMultisig;
    if (distributed) {
      this.deps.defer(() => {
        sink.setMaxClaimableProtocolFees(epoch, amount);
      });
    }

    this.protocolFees.set(epoch, 0n);
    this.deps.assets.pay(destination, amount);
    this.deps.recorder.emit(MULTIVAULT_EVENTS.PROTOCOL_FEE_SETTLED, {
      epoch,
      amount: amount.toString(),
      destination,
      distributed,
    });
  }

  // ─── Views ──────────────────────────────────────────────────────────

  getUserUtilizationForEpoch(account: Address, epoch: number): bigint {
    return this.personalUtilization.get(personalKey(account, epoch)) ?? 0n;
  }

  getTotalUtilizationForEpoch(epoch: number): bigint {
    return this.totalUtilization.get(epoch) ?? 0n;
  }

  /** Epoch of the account's last action, 0 if it never acted. */
  getUserLastActiveEpoch(account: Address): number {
    return this.lastActiveEpoch.get(account.toLowerCase()) ?? 0;
  }

  accumulatedProtocolFees(epoch: number): bigint {
    return this.protocolFees.get(epoch) ?? 0n;
  }

  isProtocolFeeDistributionEnabledAtEpoch(epoch: number): boolean {
    return this.distributionSnapshot.get(epoch) ?? false;
  }

  /** Last epoch any action touched, undefined before the first action. */
  lastSeededEpoch(): number | undefined {
    return this.lastGlobalEpoch.get();
  }
}

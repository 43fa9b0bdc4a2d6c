/**
 * @termvault/multivault — The multivault engine.
 *
 * Term creation, deposits, redemptions, approvals and administration
 * over many (term, curve) vaults of one base asset.
 *
 * Every mutating entry point runs through `execute`:
 *   1. The reentrancy guard rejects nested calls.
 *   2. All writes go through the journal; a throw undoes them.
 *   3. Outbound collaborator calls queued with `defer` run at the end
 *      of the call, still under the guard and the journal.
 *   4. Events raised during the call are appended to the event store
 *      in one batch after it commits, and dropped if it fails.
 */

import { size } from "viem";
import {
  InMemoryEventStore,
  MULTIVAULT_EVENTS,
  MULTIVAULT_STREAM,
} from "@termvault/event-store";
import type { EventStore } from "@termvault/event-store";
import type {
  Address,
  AtomWalletFactory,
  BondingSink,
  CurveId,
  CurveProvider,
  Hex,
  TermId,
  TripleAtoms,
  VaultTotals,
  VaultType,
} from "@termvault/types";
import { canonicalAddress } from "@termvault/types";
import { ApprovalRegistry } from "./approvals.js";
import { AssetLedger } from "./asset-ledger.js";
import type { MultiVaultConfig } from "./config.js";
import { atomCost, parseMultiVaultConfig, tripleCost } from "./config.js";
import { EventRecorder, feesPayload, totalsPayload } from "./events.js";
import { FeeEngine, computeFeesAndShares } from "./fee-engine.js";
import { sum } from "./fee-math.js";
import {
  calculateAtomId,
  calculateCounterTripleId,
  calculateTripleId,
} from "./identity.js";
import { Journal, JournaledCell, JournaledMap } from "./journal.js";
import { ReentrancyGuard } from "./reentrancy.js";
import { TermRegistry } from "./term-registry.js";
import type {
  ApprovalType,
  AtomCreationPreview,
  DepositBatchRequest,
  DepositPreview,
  DepositRequest,
  FeesAndShares,
  RedeemBatchRequest,
  RedeemPreview,
  RedeemRequest,
  TripleCreationPreview,
  VaultSnapshot,
  VaultState,
} from "./types.js";
import { MultiVaultError, ZERO_FEES } from "./types.js";
import { UtilizationLedger } from "./utilization.js";
import { VaultStore } from "./vault-store.js";

// =============================================================================
// Options
// =============================================================================

export interface MultiVaultOptions {
  /** Parsed configuration snapshot (see parseMultiVaultConfig) */
  readonly config: MultiVaultConfig;
  readonly curves: CurveProvider;
  readonly walletFactory: AtomWalletFactory;
  readonly sink: BondingSink;

  /** Where committed events go. Default: a fresh InMemoryEventStore */
  readonly eventStore?: EventStore;

  /** ISO timestamp source for event metadata */
  readonly now?: () => string;

  /** Event and correlation id source */
  readonly generateId?: () => string;
}

function sameAccount(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function requireSameLength(lengths: readonly number[]): void {
  const [first = 0] = lengths;
  if (lengths.some((length) => length !== first)) {
    throw new MultiVaultError(
      "ARRAYS_LENGTH_MISMATCH",
      `Batch arrays differ in length: ${lengths.join(", ")}`,
    );
  }
  if (first === 0) {
    throw new MultiVaultError("EMPTY_ARRAY", "Batch must contain at least one entry");
  }
}

// =============================================================================
// MultiVault
// =============================================================================

export class MultiVault {
  private readonly journal = new Journal();
  private readonly guard = new ReentrancyGuard();
  private readonly recorder: EventRecorder;
  private readonly store: EventStore;

  private readonly curves: CurveProvider;
  private readonly walletFactory: AtomWalletFactory;
  private readonly sink: BondingSink;

  private readonly configCell: JournaledCell<MultiVaultConfig>;
  private readonly pausedCell: JournaledCell<boolean>;
  private readonly atomWalletFees: JournaledMap<string, bigint>;

  private readonly registry: TermRegistry;
  private readonly vaults: VaultStore;
  private readonly fees: FeeEngine;
  private readonly utilization: UtilizationLedger;
  private readonly approvals: ApprovalRegistry;
  private readonly assets: AssetLedger;

  private deferred: Array<() => void> = [];

  constructor(options: MultiVaultOptions) {
    this.curves = options.curves;
    this.walletFactory = options.walletFactory;
    this.sink = options.sink;
    this.store = options.eventStore ?? new InMemoryEventStore();
    this.recorder = new EventRecorder({ now: options.now, generateId: options.generateId });

    this.configCell = new JournaledCell(this.journal, options.config);
    this.pausedCell = new JournaledCell(this.journal, false);
    this.atomWalletFees = new JournaledMap(this.journal);

    this.registry = new TermRegistry(this.journal);
    this.assets = new AssetLedger(this.journal);
    this.vaults = new VaultStore({
      journal: this.journal,
      curves: this.curves,
      recorder: this.recorder,
      vaultTypeOf: (termId) => this.registry.getVaultType(termId),
    });
    this.fees = new FeeEngine({
      registry: this.registry,
      vaults: this.vaults,
      curves: this.curves,
      config: () => this.configCell.get(),
      paused: () => this.pausedCell.get(),
    });
    this.utilization = new UtilizationLedger({
      journal: this.journal,
      recorder: this.recorder,
      assets: this.assets,
      sink: this.sink,
      config: () => this.configCell.get(),
      defer: (effect) => {
        this.deferred.push(effect);
      },
    });
    this.approvals = new ApprovalRegistry(this.journal, this.recorder);
  }

  // ===========================================================================
  // Call wrapper
  // ===========================================================================

  private execute<T>(actor: Address, fn: () => T): T {
    const { result, events } = this.guard.run(() => {
      this.recorder.begin(canonicalAddress(actor));
      try {
        const value = this.journal.transact(() => {
          const inner = fn();
          this.runDeferred();
          return inner;
        });
        return { result: value, events: this.recorder.drain() };
      } catch (err) {
        this.recorder.discard();
        this.deferred = [];
        throw err;
      }
    });

    if (events.length > 0) {
      this.store.append(MULTIVAULT_STREAM, events);
    }
    return result;
  }

  private runDeferred(): void {
    while (this.deferred.length > 0) {
      const effect = this.deferred.shift();
      effect?.();
    }
  }

  private get config(): MultiVaultConfig {
    return this.configCell.get();
  }

  private get defaultCurveId(): CurveId {
    return this.config.bondingCurve.defaultCurveId;
  }

  // ===========================================================================
  // Term creation
  // ===========================================================================

  createAtom(sender: Address, data: Hex, assets: bigint): TermId {
    const [atomId] = this.createAtoms(sender, [data], [assets]);
    if (atomId === undefined) {
      throw new MultiVaultError("EMPTY_ARRAY", "No atom was created");
    }
    return atomId;
  }

  /**
   * Create atoms, each funded by the matching entry of `assets`.
   * The batch total is pulled from `sender` up front.
   */
  createAtoms(caller: Address, data: readonly Hex[], assets: readonly bigint[]): TermId[] {
    const sender = canonicalAddress(caller);
    return this.execute(sender, () => {
      this.requireNotPaused();
      requireSameLength([data.length, assets.length]);

      const total = sum(assets);
      this.assets.pull(sender, total);

      const ids = data.map((atomData, i) => this.createAtomInternal(sender, atomData, assets[i] ?? 0n));
      this.utilization.addUtilization(sender, total);
      return ids;
    });
  }

  private createAtomInternal(sender: Address, data: Hex, assets: bigint): TermId {
    const config = this.config;
    const maxLength = config.general.atomDataMaxLength;
    if (size(data) > maxLength) {
      throw new MultiVaultError(
        "ATOM_DATA_TOO_LONG",
        `Atom data is ${String(size(data))} bytes, at most ${String(maxLength)} allowed`,
      );
    }
    const cost = atomCost(config);
    if (assets < cost) {
      throw new MultiVaultError(
        "INSUFFICIENT_CREATION_ASSETS",
        `Atom creation needs at least ${cost.toString()} assets, got ${assets.toString()}`,
      );
    }

    const atomId = calculateAtomId(data);
    if (this.registry.isAtom(atomId)) {
      throw new MultiVaultError("ATOM_EXISTS", `Atom ${atomId} already exists`);
    }

    const termIndex = this.registry.registerAtom(atomId, data);
    this.utilization.accrueProtocolFee(sender, config.atom.atomCreationProtocolFee);
    this.openGhostVault(atomId, this.defaultCurveId);

    this.recorder.emit(MULTIVAULT_EVENTS.ATOM_CREATED, {
      creator: sender,
      termId: atomId,
      atomData: data,
      atomWallet: this.walletFactory.computeAtomWalletAddr(atomId),
      termIndex,
    });

    const net = assets - cost;
    if (net > 0n) {
      this.creationDeposit(sender, atomId, net);
    }
    return atomId;
  }

  createTriple(
    sender: Address,
    subjectId: TermId,
    predicateId: TermId,
    objectId: TermId,
    assets: bigint,
  ): TermId {
    const [tripleId] = this.createTriples(sender, [subjectId], [predicateId], [objectId], [assets]);
    if (tripleId === undefined) {
      throw new MultiVaultError("EMPTY_ARRAY", "No triple was created");
    }
    return tripleId;
  }

  createTriples(
    caller: Address,
    subjectIds: readonly TermId[],
    predicateIds: readonly TermId[],
    objectIds: readonly TermId[],
    assets: readonly bigint[],
  ): TermId[] {
    const sender = canonicalAddress(caller);
    return this.execute(sender, () => {
      this.requireNotPaused();
      requireSameLength([subjectIds.length, predicateIds.length, objectIds.length, assets.length]);

      const total = sum(assets);
      this.assets.pull(sender, total);

      const ids: TermId[] = [];
      subjectIds.forEach((subjectId, i) => {
        ids.push(
          this.createTripleInternal(
            sender,
            {
              subjectId,
              predicateId: predicateIds[i] ?? subjectId,
              objectId: objectIds[i] ?? subjectId,
            },
            assets[i] ?? 0n,
          ),
        );
      });
      this.utilization.addUtilization(sender, total);
      return ids;
    });
  }

  private createTripleInternal(sender: Address, atoms: TripleAtoms, assets: bigint): TermId {
    const config = this.config;
    for (const atomId of [atoms.subjectId, atoms.predicateId, atoms.objectId]) {
      if (!this.registry.isAtom(atomId)) {
        throw new MultiVaultError("ATOM_DOES_NOT_EXIST", `Atom ${atomId} does not exist`);
      }
    }

    const tripleId = calculateTripleId(atoms.subjectId, atoms.predicateId, atoms.objectId);
    if (this.registry.isTriple(tripleId)) {
      throw new MultiVaultError("TRIPLE_EXISTS", `Triple ${tripleId} already exists`);
    }

    const cost = tripleCost(config);
    if (assets < cost) {
      throw new MultiVaultError(
        "INSUFFICIENT_CREATION_ASSETS",
        `Triple creation needs at least ${cost.toString()} assets, got ${assets.toString()}`,
      );
    }

    const termIndex = this.registry.registerTriple(tripleId, atoms);
    const counterId = calculateCounterTripleId(tripleId);
    this.utilization.accrueProtocolFee(sender, config.triple.tripleCreationProtocolFee);

    const defaultCurve = this.defaultCurveId;
    this.openGhostVault(tripleId, defaultCurve);
    this.openGhostVault(counterId, defaultCurve);

    // Remainder of the split stays in custody.
    const perAtom = config.triple.totalAtomDepositsOnTripleCreation / 3n;
    if (perAtom > 0n) {
      for (const atomId of [atoms.subjectId, atoms.predicateId, atoms.objectId]) {
        this.addVaultAssets(atomId, defaultCurve, perAtom);
      }
    }

    this.recorder.emit(MULTIVAULT_EVENTS.TRIPLE_CREATED, {
      creator: sender,
      termId: tripleId,
      counterTermId: counterId,
      subjectId: atoms.subjectId,
      predicateId: atoms.predicateId,
      objectId: atoms.objectId,
      termIndex,
    });

    const net = assets - cost;
    if (net > 0n) {
      this.creationDeposit(sender, tripleId, net);
    }
    return tripleId;
  }

  /** Deposit of the value left after a creation's static cost. */
  private creationDeposit(sender: Address, termId: TermId, net: bigint): void {
    const curveId = this.defaultCurveId;
    const before = this.vaults.getTotals(termId, curveId);
    const result = this.fees.computeFeesAndShares({
      rawAmount: net,
      termId,
      curveId,
      isDeposit: true,
    });
    this.applyDeposit(sender, sender, termId, curveId, net, before, result);
  }

  /**
   * Seed an unopened vault with minShare ghost shares owned by the admin,
   * backed by minShare assets.
   */
  private openGhostVault(termId: TermId, curveId: CurveId): void {
    const { admin, minShare } = this.config.general;
    this.vaults.setTotals(termId, curveId, { totalAssets: minShare, totalShares: minShare });
    this.vaults.mint(admin, termId, curveId, minShare);
  }

  /** Raise a vault's assets without minting shares. */
  private addVaultAssets(termId: TermId, curveId: CurveId, amount: bigint): void {
    const totals = this.vaults.getTotals(termId, curveId);
    this.vaults.setTotals(termId, curveId, {
      totalAssets: totals.totalAssets + amount,
      totalShares: totals.totalShares,
    });
  }

  // ===========================================================================
  // Deposits
  // ===========================================================================

  /** Deposit `assets` from `sender` for `receiver`; returns the shares minted. */
  deposit(caller: Address, input: DepositRequest): bigint {
    const sender = canonicalAddress(caller);
    const request = { ...input, receiver: canonicalAddress(input.receiver) };
    return this.execute(sender, () => {
      this.requireNotPaused();
      this.assets.pull(sender, request.assets);
      const shares = this.depositInternal(sender, request);
      this.utilization.addUtilization(sender, request.assets);
      return shares;
    });
  }

  depositBatch(caller: Address, input: DepositBatchRequest): bigint[] {
    const sender = canonicalAddress(caller);
    const request = { ...input, receiver: canonicalAddress(input.receiver) };
    return this.execute(sender, () => {
      this.requireNotPaused();
      requireSameLength([
        request.termIds.length,
        request.curveIds.length,
        request.assets.length,
        request.minShares.length,
      ]);

      const total = sum(request.assets);
      this.assets.pull(sender, total);

      const minted = request.termIds.map((termId, i) =>
        this.depositInternal(sender, {
          receiver: request.receiver,
          termId,
          curveId: request.curveIds[i] ?? this.defaultCurveId,
          assets: request.assets[i] ?? 0n,
          minShares: request.minShares[i] ?? 0n,
        }),
      );
      this.utilization.addUtilization(sender, total);
      return minted;
    });
  }

  private depositInternal(sender: Address, request: DepositRequest): bigint {
    const { receiver, termId, curveId, assets } = request;
    const config = this.config;

    this.requireTermAndCurve(termId, curveId);
    if (assets < config.general.minDeposit) {
      throw new MultiVaultError(
        "DEPOSIT_BELOW_MINIMUM",
        `Deposit of ${assets.toString()} is below the minimum of ${config.general.minDeposit.toString()}`,
      );
    }
    if (!this.approvals.canDeposit(sender, receiver)) {
      throw new MultiVaultError(
        "SENDER_NOT_APPROVED",
        `${sender} is not approved to deposit for ${receiver}`,
      );
    }
    this.requireNoCounterStake(receiver, termId, curveId);

    let raw = assets;
    if (!this.vaults.isOpen(termId, curveId)) {
      const ghostCost = this.ghostCost(termId);
      if (assets <= ghostCost) {
        throw new MultiVaultError(
          "DEPOSIT_TOO_SMALL_FOR_GHOST_SHARES",
          `Opening this vault costs ${ghostCost.toString()} assets, deposit is ${assets.toString()}`,
        );
      }
      this.openVault(termId, curveId);
      raw = assets - ghostCost;
    }

    const before = this.vaults.getTotals(termId, curveId);
    const result = this.fees.computeFeesAndShares({ rawAmount: raw, termId, curveId, isDeposit: true });
    if (result.shares === 0n) {
      throw new MultiVaultError("ZERO_SHARES", "Deposit would mint zero shares");
    }
    const minShares = request.minShares ?? 0n;
    if (result.shares < minShares) {
      throw new MultiVaultError(
        "SLIPPAGE_EXCEEDED",
        `Deposit mints ${result.shares.toString()} shares, below the minimum of ${minShares.toString()}`,
      );
    }

    this.applyDeposit(sender, receiver, termId, curveId, assets, before, result);
    return result.shares;
  }

  /**
   * State changes of a priced deposit: totals, shares, fee accruals,
   * fee flow-through and the triple fan-out.
   */
  private applyDeposit(
    sender: Address,
    receiver: Address,
    termId: TermId,
    curveId: CurveId,
    assets: bigint,
    before: VaultTotals,
    result: FeesAndShares,
  ): void {
    const after: VaultTotals = {
      totalAssets: before.totalAssets + result.assetsDelta,
      totalShares: before.totalShares + result.shares,
    };
    this.vaults.setTotals(termId, curveId, after);
    this.vaults.mint(receiver, termId, curveId, result.shares);

    const { fees } = result;
    this.utilization.accrueProtocolFee(sender, fees.protocolFee);
    if (fees.atomWalletFee > 0n) {
      this.accrueAtomWalletFee(termId, fees.atomWalletFee);
    }

    const defaultCurve = this.defaultCurveId;
    if (curveId !== defaultCurve && fees.entryFee > 0n) {
      this.addVaultAssets(termId, defaultCurve, fees.entryFee);
    }

    if (fees.atomDepositFraction > 0n) {
      this.fanOutToAtoms(receiver, termId, fees.atomDepositFraction);
    }

    this.recorder.emit(MULTIVAULT_EVENTS.DEPOSITED, {
      sender,
      receiver,
      termId,
      curveId,
      vaultType: this.registry.getVaultType(termId),
      assets: assets.toString(),
      assetsAfterFees: result.assets.toString(),
      shares: result.shares.toString(),
      receiverShares: this.vaults.balanceOf(receiver, termId, curveId).toString(),
      fees: feesPayload(fees),
      totalsBefore: totalsPayload(before),
      totalsAfter: totalsPayload(after),
    });
  }

  /**
   * Split a triple deposit's atom fraction across its three atoms'
   * default-curve vaults. One hop only: the legs pay the entry fee
   * and never fan out further.
   */
  private fanOutToAtoms(receiver: Address, tripleId: TermId, fraction: bigint): void {
    const atoms = this.registry.getTriple(tripleId);
    if (atoms === undefined) {
      throw new MultiVaultError("TERM_DOES_NOT_EXIST", `Triple ${tripleId} does not exist`);
    }
    const perAtom = fraction / 3n;
    if (perAtom === 0n) return;

    const curveId = this.defaultCurveId;
    for (const atomId of [atoms.subjectId, atoms.predicateId, atoms.objectId]) {
      const before = this.vaults.getTotals(atomId, curveId);
      const leg = this.fees.computeFeesAndShares({
        rawAmount: perAtom,
        termId: atomId,
        curveId,
        isDeposit: true,
        isUnderlyingAtomLeg: true,
      });
      this.vaults.setTotals(atomId, curveId, {
        totalAssets: before.totalAssets + leg.assetsDelta,
        totalShares: before.totalShares + leg.shares,
      });
      this.vaults.mint(receiver, atomId, curveId, leg.shares);
    }
  }

  private accrueAtomWalletFee(atomId: TermId, amount: bigint): void {
    const wallet = this.walletFactory.computeAtomWalletAddr(atomId);
    const key = wallet.toLowerCase();
    this.atomWalletFees.set(key, (this.atomWalletFees.get(key) ?? 0n) + amount);
    this.recorder.emit(MULTIVAULT_EVENTS.ATOM_WALLET_FEE_ACCRUED, {
      termId: atomId,
      wallet,
      amount: amount.toString(),
    });
  }

  private ghostCost(termId: TermId): bigint {
    const { minShare } = this.config.general;
    return this.registry.getVaultType(termId) === "atom" ? minShare : 2n * minShare;
  }

  /** Open a vault on a new curve; a triple stance opens its opposite too. */
  private openVault(termId: TermId, curveId: CurveId): void {
    this.openGhostVault(termId, curveId);
    const opposite = this.registry.oppositeOf(termId);
    if (opposite !== undefined && !this.vaults.isOpen(opposite, curveId)) {
      this.openGhostVault(opposite, curveId);
    }
  }

  private requireNoCounterStake(receiver: Address, termId: TermId, curveId: CurveId): void {
    if (curveId !== this.defaultCurveId) return;
    const opposite = this.registry.oppositeOf(termId);
    if (opposite === undefined) return;
    if (this.vaults.balanceOf(receiver, opposite, curveId) > 0n) {
      throw new MultiVaultError(
        "HAS_COUNTER_STAKE",
        `${receiver} holds shares in the opposing vault ${opposite}`,
      );
    }
  }

  // ===========================================================================
  // Redemptions
  // ===========================================================================

  /** Redeem `receiver`'s shares; returns the assets paid to `receiver`. */
  redeem(caller: Address, input: RedeemRequest): bigint {
    const sender = canonicalAddress(caller);
    const request = { ...input, receiver: canonicalAddress(input.receiver) };
    return this.execute(sender, () => {
      const { assets, rawAssets } = this.redeemInternal(sender, request);
      this.utilization.addUtilization(request.receiver, -rawAssets);
      return assets;
    });
  }

  redeemBatch(caller: Address, input: RedeemBatchRequest): bigint[] {
    const sender = canonicalAddress(caller);
    const request = { ...input, receiver: canonicalAddress(input.receiver) };
    return this.execute(sender, () => {
      requireSameLength([
        request.termIds.length,
        request.curveIds.length,
        request.shares.length,
        request.minAssets.length,
      ]);

      const results = request.termIds.map((termId, i) =>
        this.redeemInternal(sender, {
          receiver: request.receiver,
          termId,
          curveId: request.curveIds[i] ?? this.defaultCurveId,
          shares: request.shares[i] ?? 0n,
          minAssets: request.minAssets[i] ?? 0n,
        }),
      );
      this.utilization.addUtilization(request.receiver, -sum(results.map((r) => r.rawAssets)));
      return results.map((r) => r.assets);
    });
  }

  private redeemInternal(
    sender: Address,
    request: RedeemRequest,
  ): { readonly assets: bigint; readonly rawAssets: bigint } {
    const { receiver, termId, curveId, shares } = request;
    const { minShare } = this.config.general;

    this.requireTermAndCurve(termId, curveId);
    if (!this.approvals.canRedeem(sender, receiver)) {
      throw new MultiVaultError(
        "SENDER_NOT_APPROVED",
        `${sender} is not approved to redeem for ${receiver}`,
      );
    }
    if (shares === 0n) {
      throw new MultiVaultError("ZERO_SHARES", "Cannot redeem zero shares");
    }
    const balance = this.vaults.balanceOf(receiver, termId, curveId);
    if (shares > balance) {
      throw new MultiVaultError(
        "INSUFFICIENT_BALANCE",
        `${receiver} holds ${balance.toString()} shares, cannot redeem ${shares.toString()}`,
      );
    }
    const before = this.vaults.getTotals(termId, curveId);
    const remaining = before.totalShares - shares;
    if (remaining < minShare) {
      throw new MultiVaultError(
        "INSUFFICIENT_REMAINING_SHARES",
        `Redemption would leave ${remaining.toString()} shares, the floor is ${minShare.toString()}`,
      );
    }

    const rawAssets = this.curves.previewRedeem(curveId, shares, before);
    const result = this.fees.computeFeesAndShares({
      rawAmount: rawAssets,
      termId,
      curveId,
      isDeposit: false,
      sharesToRedeem: shares,
    });
    if (result.assets === 0n) {
      throw new MultiVaultError("ZERO_ASSETS", "Redemption would pay out zero assets");
    }
    const minAssets = request.minAssets ?? 0n;
    if (result.assets < minAssets) {
      throw new MultiVaultError(
        "SLIPPAGE_EXCEEDED",
        `Redemption pays ${result.assets.toString()} assets, below the minimum of ${minAssets.toString()}`,
      );
    }
    if (result.assetsDelta > before.totalAssets) {
      throw new MultiVaultError(
        "INSUFFICIENT_ASSETS",
        `Vault holds ${before.totalAssets.toString()} assets, redemption needs ${result.assetsDelta.toString()}`,
      );
    }

    const after: VaultTotals = {
      totalAssets: before.totalAssets - result.assetsDelta,
      totalShares: remaining,
    };
    this.vaults.burn(receiver, termId, curveId, shares);
    this.vaults.setTotals(termId, curveId, after);

    const { fees } = result;
    this.utilization.accrueProtocolFee(sender, fees.protocolFee);
    if (curveId !== this.defaultCurveId && fees.exitFee > 0n) {
      this.addVaultAssets(termId, this.defaultCurveId, fees.exitFee);
    }
    this.assets.pay(receiver, result.assets);

    this.recorder.emit(MULTIVAULT_EVENTS.REDEEMED, {
      sender,
      receiver,
      termId,
      curveId,
      vaultType: this.registry.getVaultType(termId),
      shares: shares.toString(),
      receiverShares: this.vaults.balanceOf(receiver, termId, curveId).toString(),
      assets: result.assets.toString(),
      fees: feesPayload(fees),
      totalsBefore: totalsPayload(before),
      totalsAfter: totalsPayload(after),
    });
    return { assets: result.assets, rawAssets };
  }

  // ===========================================================================
  // Approvals & atom wallets
  // ===========================================================================

  approve(owner: Address, sender: Address, approvalType: ApprovalType): void {
    this.execute(owner, () => {
      this.approvals.approve(canonicalAddress(owner), canonicalAddress(sender), approvalType);
    });
  }

  /**
   * Pay an atom wallet's accrued deposit fees to the wallet's owner.
   * Only the wallet itself may claim.
   */
  claimAtomWalletDepositFees(caller: Address, atomId: TermId): bigint {
    return this.execute(caller, () => {
      if (!this.registry.isAtom(atomId)) {
        throw new MultiVaultError("ATOM_DOES_NOT_EXIST", `Atom ${atomId} does not exist`);
      }
      const wallet = this.walletFactory.computeAtomWalletAddr(atomId);
      if (!sameAccount(caller, wallet)) {
        throw new MultiVaultError("UNAUTHORIZED", `Only the atom wallet ${wallet} may claim its fees`);
      }
      const key = wallet.toLowerCase();
      const amount = this.atomWalletFees.get(key) ?? 0n;
      if (amount === 0n) {
        throw new MultiVaultError("NOTHING_TO_CLAIM", `Atom wallet ${wallet} has no fees to claim`);
      }

      const owner = this.walletFactory.atomWalletOwner(atomId);
      this.atomWalletFees.set(key, 0n);
      this.assets.pay(owner, amount);
      this.recorder.emit(MULTIVAULT_EVENTS.ATOM_WALLET_FEE_CLAIMED, {
        termId: atomId,
        wallet,
        owner,
        amount: amount.toString(),
      });
      return amount;
    });
  }

  // ===========================================================================
  // Administration
  // ===========================================================================

  setPaused(caller: Address, paused: boolean): void {
    this.execute(caller, () => {
      this.requireAdmin(caller);
      this.pausedCell.set(paused);
      this.recorder.emit(MULTIVAULT_EVENTS.PAUSE_CHANGED, { paused });
    });
  }

  /**
   * Replace the configuration snapshot with a strictly newer version.
   *
   * @throws MultiVaultError INVALID_CONFIG, STALE_CONFIG or UNAUTHORIZED
   */
  syncConfig(caller: Address, input: unknown): MultiVaultConfig {
    return this.execute(caller, () => {
      this.requireAdmin(caller);
      const next = parseMultiVaultConfig(input);
      const current = this.config.version;
      if (next.version <= current) {
        throw new MultiVaultError(
          "STALE_CONFIG",
          `Config version ${String(next.version)} is not newer than ${String(current)}`,
        );
      }
      this.configCell.set(next);
      this.recorder.emit(MULTIVAULT_EVENTS.CONFIG_SYNCED, { version: next.version });
      return next;
    });
  }

  /** Issue base assets, e.g. to fund accounts of a standalone deployment. */
  mintAssets(caller: Address, to: Address, amount: bigint): void {
    const receiver = canonicalAddress(to);
    this.execute(caller, () => {
      this.requireAdmin(caller);
      this.assets.mint(receiver, amount);
      this.recorder.emit(MULTIVAULT_EVENTS.ASSETS_MINTED, { to: receiver, amount: amount.toString() });
    });
  }

  // ===========================================================================
  // Previews
  // ===========================================================================

  previewAtomCreate(assets: bigint): AtomCreationPreview {
    return this.previewCreate("atom", assets, atomCost(this.config));
  }

  previewTripleCreate(assets: bigint): TripleCreationPreview {
    return this.previewCreate("triple", assets, tripleCost(this.config));
  }

  private previewCreate(vaultType: VaultType, assets: bigint, cost: bigint): AtomCreationPreview {
    if (assets < cost) {
      throw new MultiVaultError(
        "INSUFFICIENT_CREATION_ASSETS",
        `Creation needs at least ${cost.toString()} assets, got ${assets.toString()}`,
      );
    }
    const net = assets - cost;
    if (net === 0n) {
      return { shares: 0n, assetsAfterFixedFees: 0n, assetsAfterFees: 0n, fees: ZERO_FEES };
    }
    const config = this.config;
    const { minShare } = config.general;
    const result = computeFeesAndShares({
      rawAmount: net,
      vaultType,
      curveId: config.bondingCurve.defaultCurveId,
      isDefaultCurve: true,
      totals: { totalAssets: minShare, totalShares: minShare },
      isDeposit: true,
      isUnderlyingAtomLeg: false,
      sharesToRedeem: 0n,
      paused: this.pausedCell.get(),
      config,
      curves: this.curves,
    });
    return {
      shares: result.shares,
      assetsAfterFixedFees: net,
      assetsAfterFees: result.assets,
      fees: result.fees,
    };
  }

  /** Shares a deposit would mint now, counting the opening cost of an unopened vault. */
  previewDeposit(termId: TermId, curveId: CurveId, assets: bigint): DepositPreview {
    this.requireTermAndCurve(termId, curveId);
    let raw = assets;
    let ghostAssets = 0n;
    let totals: VaultTotals | undefined;
    if (!this.vaults.isOpen(termId, curveId)) {
      ghostAssets = this.ghostCost(termId);
      if (assets <= ghostAssets) {
        throw new MultiVaultError(
          "DEPOSIT_TOO_SMALL_FOR_GHOST_SHARES",
          `Opening this vault costs ${ghostAssets.toString()} assets, deposit is ${assets.toString()}`,
        );
      }
      const { minShare } = this.config.general;
      raw = assets - ghostAssets;
      totals = { totalAssets: minShare, totalShares: minShare };
    }
    const result = this.fees.computeFeesAndShares({
      rawAmount: raw,
      termId,
      curveId,
      isDeposit: true,
      totals,
    });
    return { shares: result.shares, assetsAfterFees: result.assets, ghostAssets, fees: result.fees };
  }

  previewRedeem(termId: TermId, curveId: CurveId, shares: bigint): RedeemPreview {
    this.requireTermAndCurve(termId, curveId);
    const totals = this.vaults.getTotals(termId, curveId);
    const rawAssets = this.curves.previewRedeem(curveId, shares, totals);
    const result = this.fees.computeFeesAndShares({
      rawAmount: rawAssets,
      termId,
      curveId,
      isDeposit: false,
      sharesToRedeem: shares,
    });
    return { assets: result.assets, rawAssets, fees: result.fees };
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  getConfig(): MultiVaultConfig {
    return this.config;
  }

  isPaused(): boolean {
    return this.pausedCell.get();
  }

  getAtomCost(): bigint {
    return atomCost(this.config);
  }

  getTripleCost(): bigint {
    return tripleCost(this.config);
  }

  getVault(termId: TermId, curveId: CurveId): VaultState {
    const vaultType = this.registry.getVaultType(termId);
    const totals = this.vaults.getTotals(termId, curveId);
    return { termId, curveId, vaultType, ...totals };
  }

  getShares(account: Address, termId: TermId, curveId: CurveId): bigint {
    return this.vaults.balanceOf(account, termId, curveId);
  }

  currentSharePrice(termId: TermId, curveId: CurveId): bigint {
    return this.vaults.sharePrice(curveId, this.vaults.getTotals(termId, curveId));
  }

  convertToShares(termId: TermId, curveId: CurveId, assets: bigint): bigint {
    return this.curves.convertToShares(curveId, assets, this.vaults.getTotals(termId, curveId));
  }

  convertToAssets(termId: TermId, curveId: CurveId, shares: bigint): bigint {
    return this.curves.convertToAssets(curveId, shares, this.vaults.getTotals(termId, curveId));
  }

  maxRedeem(account: Address, termId: TermId, curveId: CurveId): bigint {
    return this.vaults.balanceOf(account, termId, curveId);
  }

  isTermCreated(termId: TermId): boolean {
    return this.registry.isTermCreated(termId);
  }

  isAtom(termId: TermId): boolean {
    return this.registry.isAtom(termId);
  }

  isTriple(termId: TermId): boolean {
    return this.registry.isTriple(termId);
  }

  isCounterTriple(termId: TermId): boolean {
    return this.registry.isCounterTriple(termId);
  }

  getVaultType(termId: TermId): VaultType {
    return this.registry.getVaultType(termId);
  }

  getAtom(atomId: TermId): Hex | undefined {
    return this.registry.getAtomData(atomId);
  }

  getTriple(termId: TermId): TripleAtoms | undefined {
    return this.registry.getTriple(termId);
  }

  getCounterIdFromTripleId(tripleId: TermId): TermId | undefined {
    return this.registry.getCounterIdFromTripleId(tripleId);
  }

  getTripleIdFromCounterId(counterId: TermId): TermId | undefined {
    return this.registry.getTripleIdFromCounterId(counterId);
  }

  getTermIndex(termId: TermId): number | undefined {
    return this.registry.getTermIndex(termId);
  }

  totalTermsCreated(): number {
    return this.registry.totalTermsCreated();
  }

  getApproval(owner: Address, sender: Address): ApprovalType {
    return this.approvals.getApproval(owner, sender);
  }

  computeAtomWalletAddr(atomId: TermId): Address {
    return this.walletFactory.computeAtomWalletAddr(atomId);
  }

  accumulatedAtomWalletDepositFees(wallet: Address): bigint {
    return this.atomWalletFees.get(wallet.toLowerCase()) ?? 0n;
  }

  currentEpoch(): number {
    return this.utilization.currentEpoch();
  }

  /** Last epoch an action seeded, undefined before the first action. */
  lastSeededEpoch(): number | undefined {
    return this.utilization.lastSeededEpoch();
  }

  getUserUtilizationForEpoch(account: Address, epoch: number): bigint {
    return this.utilization.getUserUtilizationForEpoch(account, epoch);
  }

  getTotalUtilizationForEpoch(epoch: number): bigint {
    return this.utilization.getTotalUtilizationForEpoch(epoch);
  }

  getUserLastActiveEpoch(account: Address): number {
    return this.utilization.getUserLastActiveEpoch(account);
  }

  accumulatedProtocolFees(epoch: number): bigint {
    return this.utilization.accumulatedProtocolFees(epoch);
  }

  isProtocolFeeDistributionEnabledAtEpoch(epoch: number): boolean {
    return this.utilization.isProtocolFeeDistributionEnabledAtEpoch(epoch);
  }

  assetBalanceOf(account: Address): bigint {
    return this.assets.balanceOf(account);
  }

  /** Base assets held by the engine: vault assets, unsettled fees and dust. */
  heldAssets(): bigint {
    return this.assets.held();
  }

  snapshotVaults(): VaultSnapshot[] {
    return this.vaults.snapshot();
  }

  /** The event store committed calls are appended to. */
  get events(): EventStore {
    return this.store;
  }

  // ===========================================================================
  // Guards
  // ===========================================================================

  private requireNotPaused(): void {
    if (this.pausedCell.get()) {
      throw new MultiVaultError("PAUSED", "The multivault is paused");
    }
  }

  private requireAdmin(caller: Address): void {
    if (!sameAccount(caller, this.config.general.admin)) {
      throw new MultiVaultError("UNAUTHORIZED", `${caller} is not the admin`);
    }
  }

  private requireTermAndCurve(termId: TermId, curveId: CurveId): void {
    if (!this.registry.isTermCreated(termId)) {
      throw new MultiVaultError("TERM_DOES_NOT_EXIST", `Term ${termId} does not exist`);
    }
    if (!this.curves.isCurveIdValid(curveId)) {
      throw new MultiVaultError("INVALID_CURVE_ID", `Curve ${String(curveId)} is not registered`);
    }
  }
}

/**
 * MultiVaultService — Composition root for the engine and its collaborators.
 *
 * Route handlers delegate to this service; they never build domain
 * objects themselves. One service wraps one MultiVault, its event log,
 * its curve registry and the in-process stand-ins for the epoch
 * clock, bonding sink and atom wallet factory.
 */

import { CurveRegistry, LinearCurve } from "@termvault/curves";
import type { BondingCurve } from "@termvault/curves";
import {
  InMemoryEventStore,
  MULTIVAULT_STREAM,
} from "@termvault/event-store";
import type {
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
  EventStoreIntegrityResult,
  Subscription,
} from "@termvault/event-store";
import { MultiVault } from "@termvault/multivault";
import type { MultiVaultConfig } from "@termvault/multivault";
import {
  DeterministicAtomWalletFactory,
  EpochBondingSink,
  EpochClock,
} from "@termvault/periphery";
import type { AtomWalletFactoryConfig } from "@termvault/periphery";
import type { Address } from "@termvault/types";

// =============================================================================
// Configuration
// =============================================================================

export interface CommittedEventLogEntry {
  readonly type: string;
  readonly globalPosition: number;
  readonly correlationId: string;
  readonly actor: string;
  readonly termId?: string | undefined;
}

export interface MultiVaultServiceConfig {
  readonly multivault: MultiVaultConfig;
  readonly epochLengthSeconds: number;
  readonly epochStartTimestamp: number;
  readonly sinkAddress: Address;
  readonly atomWallets: AtomWalletFactoryConfig;

  /** Registered in order, so the first is curve 1. Default: two linear curves */
  readonly curves?: readonly BondingCurve[];

  /** Millisecond wall clock for epochs. Default: Date.now */
  readonly now?: () => number;

  /** Called once for every event the engine commits */
  readonly onEvent?: (entry: CommittedEventLogEntry) => void;
}

function defaultCurves(): BondingCurve[] {
  return [new LinearCurve({ name: "linear" }), new LinearCurve({ name: "linear-offset" })];
}

function toLogEntry(stored: HashedStoredEvent): CommittedEventLogEntry {
  const termId = stored.event.payload["termId"];
  return {
    type: stored.event.type,
    globalPosition: stored.globalPosition,
    correlationId: stored.event.metadata.correlationId,
    actor: stored.event.metadata.actor,
    termId: typeof termId === "string" ? termId : undefined,
  };
}

// =============================================================================
// Service
// =============================================================================

export class MultiVaultService {
  readonly vault: MultiVault;
  readonly eventStore: InMemoryEventStore;
  readonly curves: CurveRegistry;
  readonly clock: EpochClock;
  readonly sink: EpochBondingSink;
  readonly atomWallets: DeterministicAtomWalletFactory;

  private readonly subscription: Subscription | undefined;
  private _ready = false;

  constructor(config: MultiVaultServiceConfig) {
    this.curves = new CurveRegistry();
    for (const curve of config.curves ?? defaultCurves()) {
      this.curves.register(curve);
    }

    this.clock = new EpochClock({
      epochLength: config.epochLengthSeconds,
      startTimestamp: config.epochStartTimestamp,
      now: config.now,
    });
    this.sink = new EpochBondingSink(config.sinkAddress, this.clock);
    this.atomWallets = new DeterministicAtomWalletFactory(config.atomWallets);
    this.eventStore = new InMemoryEventStore();

    const onEvent = config.onEvent;
    if (onEvent !== undefined) {
      this.subscription = this.eventStore.subscribe(MULTIVAULT_STREAM, (stored) => {
        onEvent(toLogEntry(stored));
      });
    }

    this.vault = new MultiVault({
      config: config.multivault,
      curves: this.curves,
      walletFactory: this.atomWallets,
      sink: this.sink,
      eventStore: this.eventStore,
    });

    this._ready = true;
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  // ─── Health & Integrity ──────────────────────────────────────────

  checkIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  /** Ready while running and the hash chain verifies. */
  isReady(): boolean {
    return this._ready && this.checkIntegrity().valid;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  stop(): void {
    this.subscription?.unsubscribe();
    this._ready = false;
  }
}

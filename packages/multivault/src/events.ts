/**
 * @termvault/multivault — Event recording.
 *
 * Events raised during a call are buffered and reach the event store
 * only when the call commits. A failed call discards its buffer.
 */

import { randomUUID } from "node:crypto";
import { createVersionedEvent } from "@termvault/event-store";
import type {
  FeesPayload,
  MultiVaultEventPayloads,
  MultiVaultEventType,
  TotalsPayload,
} from "@termvault/event-store";
import type { Address, DomainEvent, VaultTotals } from "@termvault/types";
import type { FeesBreakdown } from "./types.js";

/** Schema version every multivault event is written at. */
export const EVENT_SCHEMA_VERSION = 1;

export interface EventRecorderOptions {
  /** ISO timestamp source. Default: wall clock */
  readonly now?: () => string;

  /** Event and correlation id source. Default: random UUIDs */
  readonly generateId?: () => string;
}

export class EventRecorder {
  private readonly now: () => string;
  private readonly generateId: () => string;
  private pending: DomainEvent[] = [];
  private actor: Address | undefined;
  private correlationId = "";

  constructor(options?: EventRecorderOptions) {
    this.now = options?.now ?? (() => new Date().toISOString());
    this.generateId = options?.generateId ?? randomUUID;
  }

  /** Start buffering for a call made by `actor`. */
  begin(actor: Address): void {
    this.pending = [];
    this.actor = actor;
    this.correlationId = this.generateId();
  }

  emit<T extends MultiVaultEventType>(type: T, payload: MultiVaultEventPayloads[T]): void {
    this.pending.push(
      createVersionedEvent(
        type,
        {
          eventId: this.generateId(),
          timestamp: this.now(),
          actor: this.actor ?? "",
          correlationId: this.correlationId,
          source: "multivault",
        },
        payload,
        EVENT_SCHEMA_VERSION,
      ),
    );
  }

  /** Hand over the buffered events and reset. */
  drain(): readonly DomainEvent[] {
    const events = this.pending;
    this.pending = [];
    this.actor = undefined;
    return events;
  }

  discard(): void {
    this.pending = [];
    this.actor = undefined;
  }
}

// ─── Payload Helpers ─────────────────────────────────────────────────────

export function totalsPayload(totals: VaultTotals): TotalsPayload {
  return {
    totalAssets: totals.totalAssets.toString(),
    totalShares: totals.totalShares.toString(),
  };
}

export function feesPayload(fees: FeesBreakdown): FeesPayload {
  return {
    entry: fees.entryFee.toString(),
    exit: fees.exitFee.toString(),
    protocol: fees.protocolFee.toString(),
    atomWallet: fees.atomWalletFee.toString(),
    atomDepositFraction: fees.atomDepositFraction.toString(),
  };
}

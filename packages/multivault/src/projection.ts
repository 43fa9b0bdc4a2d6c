/**
 * @termvault/multivault — Vault projection.
 *
 * Rebuilds every vault's totals and share balances from the event log
 * alone. Replaying a live engine's log yields exactly its
 * `snapshotVaults()`.
 *
 * Only `totals_changed`, `shares.minted` and `shares.burned` carry
 * vault state; every other event is skipped after validation.
 */

import {
  MULTIVAULT_EVENTS,
  createMultiVaultCatalog,
} from "@termvault/event-store";
import type { EventCatalog } from "@termvault/event-store";
import { canonicalAddress, isAddress, isTermId } from "@termvault/types";
import type { Address, CurveId, DomainEvent, TermId } from "@termvault/types";
import type { VaultSnapshot } from "./types.js";
import { MultiVaultError } from "./types.js";

interface ProjectedVault {
  readonly termId: TermId;
  readonly curveId: CurveId;
  totalAssets: bigint;
  totalShares: bigint;
  readonly balances: Map<Address, bigint>;
}

type Payload = DomainEvent["payload"];

function invalid(event: DomainEvent, reason: string): MultiVaultError {
  return new MultiVaultError(
    "INVALID_EVENT_LOG",
    `Event ${event.metadata.eventId} (${event.type}): ${reason}`,
  );
}

function readTermId(event: DomainEvent, payload: Payload): TermId {
  const value = payload["termId"];
  if (!isTermId(value)) throw invalid(event, "termId is not a 32-byte id");
  return value;
}

function readCurveId(event: DomainEvent, payload: Payload): CurveId {
  const value = payload["curveId"];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw invalid(event, "curveId is not an integer");
  }
  return value;
}

function readAmount(event: DomainEvent, source: unknown, key: string): bigint {
  if (typeof source !== "object" || source === null || !(key in source)) {
    throw invalid(event, `${key} is missing`);
  }
  const value: unknown = Reflect.get(source, key);
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw invalid(event, `${key} is not an amount`);
  }
  return BigInt(value);
}

function vaultKey(termId: TermId, curveId: CurveId): string {
  return `${termId}:${String(curveId)}`;
}

/**
 * Replay `events` (oldest first) into vault snapshots.
 *
 * @throws MultiVaultError INVALID_EVENT_LOG for an event that fails its
 *   catalog schema or carries malformed identifiers
 */
export function projectVaults(
  events: readonly DomainEvent[],
  catalog: EventCatalog = createMultiVaultCatalog(),
): VaultSnapshot[] {
  const vaults = new Map<string, ProjectedVault>();

  const vaultFor = (termId: TermId, curveId: CurveId): ProjectedVault => {
    const key = vaultKey(termId, curveId);
    let vault = vaults.get(key);
    if (vault === undefined) {
      vault = { termId, curveId, totalAssets: 0n, totalShares: 0n, balances: new Map() };
      vaults.set(key, vault);
    }
    return vault;
  };

  for (const stored of events) {
    const event = catalog.upcast(stored);
    if (catalog.has(event.type) && !catalog.validate(event.type, event.payload)) {
      throw invalid(event, "payload does not match its schema");
    }
    const { payload } = event;

    switch (event.type) {
      case MULTIVAULT_EVENTS.TOTALS_CHANGED: {
        const vault = vaultFor(readTermId(event, payload), readCurveId(event, payload));
        vault.totalAssets = readAmount(event, payload["after"], "totalAssets");
        vault.totalShares = readAmount(event, payload["after"], "totalShares");
        break;
      }
      case MULTIVAULT_EVENTS.SHARES_MINTED:
      case MULTIVAULT_EVENTS.SHARES_BURNED: {
        const raw = payload["account"];
        if (!isAddress(raw)) throw invalid(event, "account is not an address");
        const account = canonicalAddress(raw);
        const vault = vaultFor(readTermId(event, payload), readCurveId(event, payload));
        const amount = readAmount(event, payload, "amount");
        const current = vault.balances.get(account) ?? 0n;
        const next = event.type === MULTIVAULT_EVENTS.SHARES_MINTED ? current + amount : current - amount;
        if (next < 0n) throw invalid(event, `burn exceeds the balance of ${account}`);
        if (next === 0n) {
          vault.balances.delete(account);
        } else {
          vault.balances.set(account, next);
        }
        break;
      }
      default:
        break;
    }
  }

  return [...vaults.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, vault]) => ({
      termId: vault.termId,
      curveId: vault.curveId,
      totalAssets: vault.totalAssets,
      totalShares: vault.totalShares,
      balances: vault.balances,
    }));
}

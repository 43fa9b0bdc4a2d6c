/**
 * Runtime Type Guards
 *
 * Narrowing functions for termvault domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, replayed event logs, external integrations).
 */

import type { Address, TermId, VaultType } from "./term.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Identity guards
// =============================================================================

const TERM_ID_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const VAULT_TYPES = new Set<string>(["atom", "triple", "counter_triple"]);

export function isTermId(value: unknown): value is TermId {
  return typeof value === "string" && TERM_ID_PATTERN.test(value);
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * Lowercase form of an address. Accounts are keyed and recorded in this
 * form, so one account reached in two letter cases stays one account.
 */
export function canonicalAddress(address: Address): Address {
  return `0x${address.slice(2).toLowerCase()}`;
}

export function isVaultType(value: unknown): value is VaultType {
  return typeof value === "string" && VAULT_TYPES.has(value);
}

/** Non-negative integer in base-10 string form, as carried by event payloads. */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["multivault", "bonding", "node"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  return (
    typeof value === "object" &&
    value !== null &&
    "eventId" in value &&
    typeof value.eventId === "string" &&
    "timestamp" in value &&
    typeof value.timestamp === "string" &&
    "actor" in value &&
    typeof value.actor === "string" &&
    "correlationId" in value &&
    typeof value.correlationId === "string" &&
    "source" in value &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    "metadata" in value &&
    isEventMetadata(value.metadata) &&
    "payload" in value &&
    typeof value.payload === "object" &&
    value.payload !== null
  );
}

/**
 * @termvault/types — Shared domain types for the termvault stack.
 *
 * These types are used across all termvault packages:
 * - Term identity (atoms, triples, counter-triples)
 * - Vault totals and vault stances
 * - Collaborator capabilities (curves, atom wallets, bonding sink)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Term & vault types
export type {
  Hex,
  TermId,
  Address,
  CurveId,
  TermKind,
  VaultType,
  VaultTotals,
  TripleAtoms,
} from "./term.js";

// Collaborators
export type {
  CurveProvider,
  AtomWalletFactory,
  BondingSink,
} from "./collaborators.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

export { ONE_SHARE } from "./term.js";
export { mulDiv, mulDivUp } from "./math.js";

// Runtime type guards
export {
  isTermId,
  isAddress,
  canonicalAddress,
  isVaultType,
  isAmountString,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";

/**
 * @termvault/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog for schema versioning and migration
 * - Multivault domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError, isHashedEvent } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog & schema versioning
export type { EventSchema, EventMigration, CatalogErrorCode } from "./catalog.js";
export {
  EventCatalog,
  CatalogError,
  SCHEMA_VERSION_KEY,
  createVersionedEvent,
  getSchemaVersion,
} from "./catalog.js";

// Multivault domain events
export {
  MULTIVAULT_EVENTS,
  MULTIVAULT_STREAM,
  createMultiVaultCatalog,
} from "./multivault-events.js";
export type {
  MultiVaultEventType,
  MultiVaultEventPayloads,
  TotalsPayload,
  FeesPayload,
  AtomCreatedPayload,
  TripleCreatedPayload,
  DepositedPayload,
  RedeemedPayload,
  TotalsChangedPayload,
  SharesMovedPayload,
  ProtocolFeeAccruedPayload,
  ProtocolFeeSettledPayload,
  AtomWalletFeeAccruedPayload,
  AtomWalletFeeClaimedPayload,
  ApprovalChangedPayload,
  UtilizationChangedPayload,
  ConfigSyncedPayload,
  PauseChangedPayload,
  AssetsMintedPayload,
} from "./multivault-events.js";

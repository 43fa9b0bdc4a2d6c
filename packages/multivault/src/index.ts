/**
 * @termvault/multivault — Vault ledger and fee-settlement engine.
 *
 * Provides:
 * - MultiVault, the engine behind every term, vault and fee
 * - Term identity (atom, triple and counter-triple ids)
 * - The single fee-and-share computation
 * - Epoch utilization with lazy rollover and fee settlement
 * - Validated configuration snapshots
 * - Vault projection from the event log
 *
 * @packageDocumentation
 */

// Engine
export { MultiVault } from "./multivault.js";
export type { MultiVaultOptions } from "./multivault.js";

// Types
export type {
  FeesBreakdown,
  FeesAndShares,
  ApprovalType,
  DepositRequest,
  RedeemRequest,
  DepositBatchRequest,
  RedeemBatchRequest,
  VaultState,
  VaultSnapshot,
  AtomCreationPreview,
  TripleCreationPreview,
  DepositPreview,
  RedeemPreview,
  MultiVaultErrorCode,
} from "./types.js";
export { MultiVaultError, ZERO_FEES } from "./types.js";

// Identity
export {
  COUNTER_SALT,
  calculateAtomId,
  calculateTripleId,
  calculateCounterTripleId,
} from "./identity.js";

// Configuration
export {
  MultiVaultConfigSchema,
  parseMultiVaultConfig,
  atomCost,
  tripleCost,
} from "./config.js";
export type { MultiVaultConfig, MultiVaultConfigInput } from "./config.js";

// Fees
export { computeFeesAndShares, FeeEngine } from "./fee-engine.js";
export type { FeeInputs, FeeRequest } from "./fee-engine.js";
export { feeOnRaw } from "./fee-math.js";

// Building blocks
export { Journal, JournaledMap, JournaledCell } from "./journal.js";
export { ReentrancyGuard } from "./reentrancy.js";
export { APPROVAL_TYPES, isApprovalType } from "./approvals.js";
export { EVENT_SCHEMA_VERSION } from "./events.js";

// Projection
export { projectVaults } from "./projection.js";

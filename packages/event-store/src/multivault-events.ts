/**
 * @termvault/event-store — Multivault Domain Event Definitions.
 *
 * Naming convention: `multivault.<entity>.<action>`.
 *
 * Every quantity travels as a base-10 string so payloads survive JSON
 * and canonicalization. The log alone is enough to rebuild every
 * vault: `totals_changed` carries each totals update and
 * `shares.minted` / `shares.burned` carry each balance change.
 */

import { isAmountString } from "@termvault/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Event Types
// =============================================================================

export const MULTIVAULT_STREAM = "multivault";

export const MULTIVAULT_EVENTS = {
  ATOM_CREATED: "multivault.atom.created",
  TRIPLE_CREATED: "multivault.triple.created",
  DEPOSITED: "multivault.vault.deposited",
  REDEEMED: "multivault.vault.redeemed",
  TOTALS_CHANGED: "multivault.vault.totals_changed",
  SHARES_MINTED: "multivault.shares.minted",
  SHARES_BURNED: "multivault.shares.burned",
  PROTOCOL_FEE_ACCRUED: "multivault.protocol_fee.accrued",
  PROTOCOL_FEE_SETTLED: "multivault.protocol_fee.settled",
  ATOM_WALLET_FEE_ACCRUED: "multivault.atom_wallet_fee.accrued",
  ATOM_WALLET_FEE_CLAIMED: "multivault.atom_wallet_fee.claimed",
  APPROVAL_CHANGED: "multivault.approval.changed",
  UTILIZATION_CHANGED: "multivault.utilization.changed",
  CONFIG_SYNCED: "multivault.config.synced",
  PAUSE_CHANGED: "multivault.pause.changed",
  ASSETS_MINTED: "multivault.assets.minted",
} as const;

export type MultiVaultEventType =
  (typeof MULTIVAULT_EVENTS)[keyof typeof MULTIVAULT_EVENTS];

// =============================================================================
// Payloads
// =============================================================================

export type TotalsPayload = {
  readonly totalAssets: string;
  readonly totalShares: string;
};

export type FeesPayload = {
  readonly entry: string;
  readonly exit: string;
  readonly protocol: string;
  readonly atomWallet: string;
  readonly atomDepositFraction: string;
};

export type AtomCreatedPayload = {
  readonly creator: string;
  readonly termId: string;
  readonly atomData: string;
  readonly atomWallet: string;
  readonly termIndex: number;
};

export type TripleCreatedPayload = {
  readonly creator: string;
  readonly termId: string;
  readonly counterTermId: string;
  readonly subjectId: string;
  readonly predicateId: string;
  readonly objectId: string;
  readonly termIndex: number;
};

export type DepositedPayload = {
  readonly sender: string;
  readonly receiver: string;
  readonly termId: string;
  readonly curveId: number;
  readonly vaultType: string;
  readonly assets: string;
  readonly assetsAfterFees: string;
  readonly shares: string;
  readonly receiverShares: string;
  readonly fees: FeesPayload;
  readonly totalsBefore: TotalsPayload;
  readonly totalsAfter: TotalsPayload;
};

export type RedeemedPayload = {
  readonly sender: string;
  readonly receiver: string;
  readonly termId: string;
  readonly curveId: number;
  readonly vaultType: string;
  readonly shares: string;
  readonly receiverShares: string;
  readonly assets: string;
  readonly fees: FeesPayload;
  readonly totalsBefore: TotalsPayload;
  readonly totalsAfter: TotalsPayload;
};

export type TotalsChangedPayload = {
  readonly termId: string;
  readonly curveId: number;
  readonly vaultType: string;
  readonly before: TotalsPayload;
  readonly after: TotalsPayload;
  readonly sharePrice: string;
};

export type SharesMovedPayload = {
  readonly account: string;
  readonly termId: string;
  readonly curveId: number;
  readonly amount: string;
};

export type ProtocolFeeAccruedPayload = {
  readonly epoch: number;
  readonly sender: string;
  readonly amount: string;
};

export type ProtocolFeeSettledPayload = {
  readonly epoch: number;
  readonly amount: string;
  readonly destination: string;
  readonly distributed: boolean;
};

export type AtomWalletFeeAccruedPayload = {
  readonly termId: string;
  readonly wallet: string;
  readonly amount: string;
};

export type AtomWalletFeeClaimedPayload = {
  readonly termId: string;
  readonly wallet: string;
  readonly owner: string;
  readonly amount: string;
};

export type ApprovalChangedPayload = {
  readonly owner: string;
  readonly sender: string;
  readonly approvalType: string;
};

export type UtilizationChangedPayload = {
  readonly account: string;
  readonly epoch: number;
  readonly delta: string;
  readonly personalTotal: string;
  readonly globalTotal: string;
};

export type ConfigSyncedPayload = {
  readonly version: number;
};

export type PauseChangedPayload = {
  readonly paused: boolean;
};

export type AssetsMintedPayload = {
  readonly to: string;
  readonly amount: string;
};

/** Payload shape of each multivault event type. */
export interface MultiVaultEventPayloads {
  [MULTIVAULT_EVENTS.ATOM_CREATED]: AtomCreatedPayload;
  [MULTIVAULT_EVENTS.TRIPLE_CREATED]: TripleCreatedPayload;
  [MULTIVAULT_EVENTS.DEPOSITED]: DepositedPayload;
  [MULTIVAULT_EVENTS.REDEEMED]: RedeemedPayload;
  [MULTIVAULT_EVENTS.TOTALS_CHANGED]: TotalsChangedPayload;
  [MULTIVAULT_EVENTS.SHARES_MINTED]: SharesMovedPayload;
  [MULTIVAULT_EVENTS.SHARES_BURNED]: SharesMovedPayload;
  [MULTIVAULT_EVENTS.PROTOCOL_FEE_ACCRUED]: ProtocolFeeAccruedPayload;
  [MULTIVAULT_EVENTS.PROTOCOL_FEE_SETTLED]: ProtocolFeeSettledPayload;
  [MULTIVAULT_EVENTS.ATOM_WALLET_FEE_ACCRUED]: AtomWalletFeeAccruedPayload;
  [MULTIVAULT_EVENTS.ATOM_WALLET_FEE_CLAIMED]: AtomWalletFeeClaimedPayload;
  [MULTIVAULT_EVENTS.APPROVAL_CHANGED]: ApprovalChangedPayload;
  [MULTIVAULT_EVENTS.UTILIZATION_CHANGED]: UtilizationChangedPayload;
  [MULTIVAULT_EVENTS.CONFIG_SYNCED]: ConfigSyncedPayload;
  [MULTIVAULT_EVENTS.PAUSE_CHANGED]: PauseChangedPayload;
  [MULTIVAULT_EVENTS.ASSETS_MINTED]: AssetsMintedPayload;
}

// =============================================================================
// Validation Helpers
// =============================================================================

type Payload = Readonly<Record<string, unknown>>;

function isObject(value: unknown): value is Payload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasString(p: Payload, ...keys: readonly string[]): boolean {
  return keys.every((k) => typeof p[k] === "string");
}

function hasAmount(p: Payload, ...keys: readonly string[]): boolean {
  return keys.every((k) => isAmountString(p[k]));
}

/** Signed base-10 integer, as carried by utilization deltas. */
function hasSignedAmount(p: Payload, key: string): boolean {
  const v = p[key];
  return typeof v === "string" && /^-?\d+$/.test(v);
}

function hasInteger(p: Payload, ...keys: readonly string[]): boolean {
  return keys.every((k) => Number.isInteger(p[k]));
}

function isTotals(value: unknown): boolean {
  return isObject(value) && hasAmount(value, "totalAssets", "totalShares");
}

function isFees(value: unknown): boolean {
  return (
    isObject(value) &&
    hasAmount(value, "entry", "exit", "protocol", "atomWallet", "atomDepositFraction")
  );
}

// =============================================================================
// Schemas
// =============================================================================

const TERM_SCHEMAS: readonly EventSchema[] = [
  {
    type: MULTIVAULT_EVENTS.ATOM_CREATED,
    version: 1,
    description: "An atom was created and its default-curve vault opened",
    source: "multivault",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "creator", "termId", "atomData", "atomWallet") &&
      hasInteger(p, "termIndex"),
  },
  {
    type: MULTIVAULT_EVENTS.TRIPLE_CREATED,
    version: 1,
    description: "A triple was created with its counter-triple vault",
    source: "multivault",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "creator", "termId", "counterTermId", "subjectId", "predicateId", "objectId") &&
      hasInteger(p, "termIndex"),
  },
];

const VAULT_SCHEMAS: readonly EventSchema[] = [
  {
    type: MULTIVAULT_EVENTS.DEPOSITED,
    version: 1,
    description: "Assets were deposited into a vault and shares minted",
    source: "multivault",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "sender", "receiver", "termId", "vaultType") &&
      hasInteger(p, "curveId") &&
      hasAmount(p, "assets", "assetsAfterFees", "shares", "receiverShares") &&
      isFees(p["fees"]) &&
      isTotals(p["totalsBefore"]) &&
      isTotals(p["totalsAfter"]),
  },
  {
    type: MULTIVAULT_EVENTS.REDEEMED,
    version: 1,
    description: "Shares were redeemed from a vault for assets",
    source: "multivault",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "sender", "receiver", "termId", "vaultType") &&
      hasInteger(p, "curveId") &&
      hasAmount(p, "shares", "receiverShares", "assets") &&
      isFees(p["fees"]) &&
      isTotals(p["totalsBefore"]) &&
      isTotals(p["totalsAfter"]),
  },
  {
    type: MULTIVAULT_EVENTS.TOTALS_CHANGED,
    version: 1,
    description: "A vault's total assets or total shares changed",
    source: "multivault",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "termId", "vaultType") &&
      hasInteger(p, "curveId") &&
      hasAmount(p, "sharePrice") &&
      isTotals(p["before"]) &&
      isTotals(p["after"]),
  },
  {
    type: MULTIVAULT_EVENTS.SHARES_MINTED,
    version: 1,
    description: "Shares were credited to an account",
    source: "multivault",
    validate: (p) =>
      isObject(p) && hasString(p, "account", "termId") && hasInteger(p, "curveId") && hasAmount(p, "amount"),
  },
  {
    type: MULTIVAULT_EVENTS.SHARES_BURNED,
    version: 1,
    description: "Shares were debited from an account",
    source: "multivault",
    validate: (p) =>
      isObject(p) && hasString(p, "account", "termId") && hasInteger(p, "curveId") && hasAmount(p, "amount"),
  },
];

const FEE_SCHEMAS: readonly EventSchema[] = [
  {
    type: MULTIVAULT_EVENTS.PROTOCOL_FEE_ACCRUED,
    version: 1,
    description: "Protocol fees were accrued for the current epoch",
    source: "multivault",
    validate: (p) => isObject(p) && hasInteger(p, "epoch") && hasString(p, "sender") && hasAmount(p, "amount"),
  },
  {
    type: MULTIVAULT_EVENTS.PROTOCOL_FEE_SETTLED,
    version: 1,
    description: "An epoch's protocol fees were sent to the sink or the treasury",
    source: "multivault",
    validate: (p) =>
      isObject(p) &&
      hasInteger(p, "epoch") &&
      hasAmount(p, "amount") &&
      hasString(p, "destination") &&
      typeof p["distributed"] === "boolean",
  },
  {
    type: MULTIVAULT_EVENTS.ATOM_WALLET_FEE_ACCRUED,
    version: 1,
    description: "Deposit fees were accrued for an atom wallet",
    source: "multivault",
    validate: (p) => isObject(p) && hasString(p, "termId", "wallet") && hasAmount(p, "amount"),
  },
  {
    type: MULTIVAULT_EVENTS.ATOM_WALLET_FEE_CLAIMED,
    version: 1,
    description: "An atom wallet claimed its accrued deposit fees",
    source: "multivault",
    validate: (p) =>
      isObject(p) && hasString(p, "termId", "wallet", "owner") && hasAmount(p, "amount"),
  },
];

const ACCOUNT_SCHEMAS: readonly EventSchema[] = [
  {
    type: MULTIVAULT_EVENTS.APPROVAL_CHANGED,
    version: 1,
    description: "An account changed what another account may do on its behalf",
    source: "multivault",
    validate: (p) => isObject(p) && hasString(p, "owner", "sender", "approvalType"),
  },
  {
    type: MULTIVAULT_EVENTS.UTILIZATION_CHANGED,
    version: 1,
    description: "An account's utilization for the current epoch changed",
    source: "multivault",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "account") &&
      hasInteger(p, "epoch") &&
      hasSignedAmount(p, "delta") &&
      hasSignedAmount(p, "personalTotal") &&
      hasSignedAmount(p, "globalTotal"),
  },
  {
    type: MULTIVAULT_EVENTS.ASSETS_MINTED,
    version: 1,
    description: "Base assets were issued to an account",
    source: "multivault",
    validate: (p) => isObject(p) && hasString(p, "to") && hasAmount(p, "amount"),
  },
];

const ADMIN_SCHEMAS: readonly EventSchema[] = [
  {
    type: MULTIVAULT_EVENTS.CONFIG_SYNCED,
    version: 1,
    description: "A newer configuration snapshot was synchronized",
    source: "multivault",
    validate: (p) => isObject(p) && hasInteger(p, "version"),
  },
  {
    type: MULTIVAULT_EVENTS.PAUSE_CHANGED,
    version: 1,
    description: "The pause flag changed",
    source: "multivault",
    validate: (p) => isObject(p) && typeof p["paused"] === "boolean",
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Catalog with every multivault event registered at version 1.
 */
export function createMultiVaultCatalog(): EventCatalog {
  const catalog = new EventCatalog();

  for (const schema of [
    ...TERM_SCHEMAS,
    ...VAULT_SCHEMAS,
    ...FEE_SCHEMAS,
    ...ACCOUNT_SCHEMAS,
    ...ADMIN_SCHEMAS,
  ]) {
    catalog.register(schema);
  }

  return catalog;
}

/**
 * Term & Vault Types
 *
 * Identity and ledger primitives shared by every termvault package.
 *
 * Rules:
 * - Identifiers are 0x-prefixed hex strings (32 bytes for terms, 20 for accounts)
 * - Quantities are bigint inside the engine, decimal strings at the edges
 * - A vault is keyed by (term, curve), never by term alone
 */

/** Fixed-point unit of one share, and the scale of share prices. */
export const ONE_SHARE = 10n ** 18n;

/** 0x-prefixed hex string. */
export type Hex = `0x${string}`;

/** 32-byte content-addressed identifier of an atom, triple or counter-triple. */
export type TermId = Hex;

/** 20-byte account address. */
export type Address = Hex;

/** Integer id selecting a bonding curve in the curve registry (1-based). */
export type CurveId = number;

/** The two kinds of created terms. Counter-triples are not created, only mirrored. */
export type TermKind = "atom" | "triple";

/**
 * Which stance a vault represents.
 *
 * - atom: vault of an atom term
 * - triple: vault of a positive triple
 * - counter_triple: vault of the negation of a triple
 */
export type VaultType = "atom" | "triple" | "counter_triple";

/**
 * Asset/share totals of a single (term, curve) vault.
 */
export interface VaultTotals {
  readonly totalAssets: bigint;
  readonly totalShares: bigint;
}

/**
 * The three atom ids a triple is built from, in order.
 */
export interface TripleAtoms {
  readonly subjectId: TermId;
  readonly predicateId: TermId;
  readonly objectId: TermId;
}

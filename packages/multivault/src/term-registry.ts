/**
 * @termvault/multivault — Term registry.
 *
 * Records created atoms and triples, and the counter→triple reverse
 * map that is the only thing marking an id as a counter-triple.
 * Terms are never removed or changed once registered.
 */

import type { Hex, TermId, TripleAtoms, VaultType } from "@termvault/types";
import { calculateCounterTripleId } from "./identity.js";
import type { Journal } from "./journal.js";
import { JournaledCell, JournaledMap } from "./journal.js";
import { MultiVaultError } from "./types.js";

export class TermRegistry {
  private readonly atoms: JournaledMap<TermId, Hex>;
  private readonly triples: JournaledMap<TermId, TripleAtoms>;
  private readonly counterToTriple: JournaledMap<TermId, TermId>;
  private readonly termIndex: JournaledMap<TermId, number>;
  private readonly termCount: JournaledCell<number>;

  constructor(journal: Journal) {
    this.atoms = new JournaledMap(journal);
    this.triples = new JournaledMap(journal);
    this.counterToTriple = new JournaledMap(journal);
    this.termIndex = new JournaledMap(journal);
    this.termCount = new JournaledCell(journal, 0);
  }

  // ─── Registration ───────────────────────────────────────────────────

  /** Store an atom's data and return its 1-based term index. */
  registerAtom(atomId: TermId, data: Hex): number {
    this.atoms.set(atomId, data);
    return this.nextIndex(atomId);
  }

  /**
   * Store a triple's atoms, link its counter id, and return the
   * triple's 1-based term index.
   */
  registerTriple(tripleId: TermId, atoms: TripleAtoms): number {
    this.triples.set(tripleId, atoms);
    this.counterToTriple.set(calculateCounterTripleId(tripleId), tripleId);
    return this.nextIndex(tripleId);
  }

  private nextIndex(termId: TermId): number {
    const index = this.termCount.get() + 1;
    this.termCount.set(index);
    this.termIndex.set(termId, index);
    return index;
  }

  // ─── Predicates ─────────────────────────────────────────────────────

  isAtom(termId: TermId): boolean {
    return this.atoms.has(termId);
  }

  /** True for positive triples and their counter-triples. */
  isTriple(termId: TermId): boolean {
    return this.triples.has(termId) || this.counterToTriple.has(termId);
  }

  isCounterTriple(termId: TermId): boolean {
    return this.counterToTriple.has(termId);
  }

  isTermCreated(termId: TermId): boolean {
    return this.isAtom(termId) || this.isTriple(termId);
  }

  // ─── Lookups ────────────────────────────────────────────────────────

  /**
   * @throws MultiVaultError TERM_DOES_NOT_EXIST for unknown ids
   */
  getVaultType(termId: TermId): VaultType {
    if (this.atoms.has(termId)) return "atom";
    if (this.triples.has(termId)) return "triple";
    if (this.counterToTriple.has(termId)) return "counter_triple";
    throw new MultiVaultError("TERM_DOES_NOT_EXIST", `Term ${termId} does not exist`);
  }

  getAtomData(atomId: TermId): Hex | undefined {
    return this.atoms.get(atomId);
  }

  /** Atoms of a triple. A counter id resolves to its positive triple's atoms. */
  getTriple(termId: TermId): TripleAtoms | undefined {
    const positive = this.counterToTriple.get(termId) ?? termId;
    return this.triples.get(positive);
  }

  getTripleIdFromCounterId(counterId: TermId): TermId | undefined {
    return this.counterToTriple.get(counterId);
  }

  /** Counter id of a registered positive triple. */
  getCounterIdFromTripleId(tripleId: TermId): TermId | undefined {
    return this.triples.has(tripleId) ? calculateCounterTripleId(tripleId) : undefined;
  }

  /**
   * The opposite stance of a triple vault: counter for a positive
   * triple, positive for a counter. Undefined for atoms.
   */
  oppositeOf(termId: TermId): TermId | undefined {
    const positive = this.counterToTriple.get(termId);
    if (positive !== undefined) return positive;
    return this.getCounterIdFromTripleId(termId);
  }

  getTermIndex(termId: TermId): number | undefined {
    return this.termIndex.get(termId);
  }

  totalTermsCreated(): number {
    return this.termCount.get();
  }
}

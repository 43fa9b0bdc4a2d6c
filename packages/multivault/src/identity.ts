/**
 * @termvault/multivault — Term identity.
 *
 *   atomId(data)          = keccak256(data)
 *   tripleId(s, p, o)     = keccak256(s ‖ p ‖ o)
 *   counterId(tripleId)   = keccak256(COUNTER_SALT ‖ tripleId)
 *
 * A counter id is told apart from a positive triple only by the
 * registry's counter→triple map, never by its value.
 */

import { concat, keccak256, toBytes } from "viem";
import type { Hex, TermId } from "@termvault/types";

/** Domain separator of counter-triple ids. */
export const COUNTER_SALT: Hex = keccak256(toBytes("COUNTER_SALT"));

export function calculateAtomId(data: Hex): TermId {
  return keccak256(data);
}

export function calculateTripleId(
  subjectId: TermId,
  predicateId: TermId,
  objectId: TermId,
): TermId {
  return keccak256(concat([subjectId, predicateId, objectId]));
}

export function calculateCounterTripleId(tripleId: TermId): TermId {
  return keccak256(concat([COUNTER_SALT, tripleId]));
}

/**
 * @termvault/event-store — Hash chain for a tamper-evident event log.
 *
 * Each event is canonicalized with RFC 8785 (JCS) and hashed with
 * SHA-256 together with its predecessor's hash:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Changing any stored event breaks the chain from that point on.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  HashedStoredEvent,
  IntegrityError,
  StoredEvent,
} from "./types.js";

/** `previousHash` of the first event in the chain. */
export const GENESIS_HASH = "genesis";

function canonicalEventContent(event: StoredEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Hex-encoded SHA-256 of an event chained to `previousHash`.
 */
export function computeEventHash(
  event: StoredEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Verify a run of hashed events given in global position order.
 *
 * The first event must link to GENESIS_HASH unless `anchorHash`
 * names the hash of the event just before the run.
 */
export function verifyHashChain(
  events: readonly HashedStoredEvent[],
  anchorHash: string = GENESIS_HASH,
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = anchorHash;

  for (const event of events) {
    if (event.previousHash !== previousHash) {
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${event.globalPosition}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${event.globalPosition}: expected "${expectedHash}", got "${event.hash}"`,
      });
    } else if (errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }

    previousHash = event.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}

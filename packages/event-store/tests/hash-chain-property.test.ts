/**
 * Property-based tests for hash chain integrity.
 *
 * 1. Any N events form a valid chain
 * 2. Removing an inner event breaks the chain
 * 3. Changing any payload breaks the chain
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { DomainEvent } from "@termvault/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { verifyHashChain } from "../src/hash-chain.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbDomainEvent: fc.Arbitrary<DomainEvent> = fc.record({
  type: fc.constantFrom(
    "multivault.vault.deposited",
    "multivault.vault.redeemed",
    "multivault.shares.minted",
    "multivault.shares.burned",
  ),
  metadata: fc.record({
    eventId: fc.uuid(),
    timestamp: fc.constant("2026-01-01T00:00:00.000Z"),
    actor: fc.hexaString({ minLength: 40, maxLength: 40 }).map((h) => `0x${h}`),
    correlationId: fc.uuid(),
    source: fc.constant("multivault" as const),
  }),
  payload: fc.record({
    amount: fc.bigInt({ min: 0n, max: 10n ** 24n }).map((n) => n.toString()),
    curveId: fc.integer({ min: 1, max: 4 }),
  }),
});

// =============================================================================
// Tests
// =============================================================================

describe("hash chain property tests", () => {
  it("any N events produce a valid chain", () => {
    fc.assert(
      fc.property(fc.array(arbDomainEvent, { minLength: 1, maxLength: 20 }), (events) => {
        const store = new InMemoryEventStore();
        store.append("multivault", events);
        expect(store.verifyIntegrity().valid).toBe(true);
      }),
      { numRuns: 50 },
    );
  });

  it("removing an inner event breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 3, maxLength: 10 }),
        fc.nat(),
        (events, removeIndex) => {
          const store = new InMemoryEventStore();
          store.append("multivault", events);

          const all = [...store.readAll()];
          all.splice(1 + (removeIndex % (all.length - 2)), 1);
          expect(verifyHashChain(all).valid).toBe(false);
        },
      ),
      { numRuns: 50 },
    );
  });

  it("changing any payload breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 1, maxLength: 10 }),
        fc.nat(),
        (events, index) => {
          const store = new InMemoryEventStore();
          store.append("multivault", events);

          const all = [...store.readAll()];
          const i = index % all.length;
          const target = all[i];
          if (target === undefined) return;
          all[i] = {
            ...target,
            event: { ...target.event, payload: { ...target.event.payload, tampered: true } },
          };
          expect(verifyHashChain(all).valid).toBe(false);
        },
      ),
      { numRuns: 50 },
    );
  });
});

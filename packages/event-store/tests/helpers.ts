/**
 * Shared fixtures for event-store tests.
 */

import type { DomainEvent } from "@termvault/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Readonly<Record<string, unknown>> = {},
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "0x0000000000000000000000000000000000000001",
      correlationId: "call-1",
      source: "multivault",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "test.event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`, { i }));
}

export const FIXED_NOW = (): string => "2026-01-01T00:00:00.000Z";

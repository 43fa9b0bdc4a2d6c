/**
 * Event Types
 *
 * The multivault records each committed call as a batch of DomainEvents
 * sharing one correlation id. Payloads are JSON-safe: every quantity is
 * a decimal string, so replaying the log rebuilds the same vaults.
 */

/** Which termvault component emitted an event. */
export type EventSource = "multivault" | "bonding" | "node";

export interface EventMetadata {
  readonly eventId: string;

  /** ISO 8601 */
  readonly timestamp: string;

  /** Account whose call raised the event */
  readonly actor: string;

  /** Same for every event raised by one engine call */
  readonly correlationId: string;

  readonly source: EventSource;
}

export interface DomainEvent {
  /** `<component>.<entity>.<action>`, e.g. "multivault.vault.deposited" */
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * @termvault/event-store — Event catalog.
 *
 * Knows the current schema version of each event type, how to check a
 * payload against it, and how to lift payloads written at an older
 * version. Replay reads every stored event through `upcast`, so the log
 * itself is never rewritten.
 */

import type { DomainEvent, EventMetadata } from "@termvault/types";

// =============================================================================
// Types
// =============================================================================

export interface EventSchema {
  /** e.g. "multivault.vault.deposited" */
  readonly type: string;
  readonly version: number;
  readonly description: string;
  readonly source: EventMetadata["source"];

  /** Checks a payload written at `version`. */
  validate(payload: unknown): boolean;
}

/** Lifts a payload by exactly one schema version. */
export type EventMigration = (
  payload: Readonly<Record<string, unknown>>,
) => Readonly<Record<string, unknown>>;

export type CatalogErrorCode =
  | "UNKNOWN_EVENT_TYPE"
  | "VERSION_DOWNGRADE"
  | "MISSING_MIGRATION";

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message: string) {
    super(message);
    this.name = "CatalogError";
    this.code = code;
  }
}

/** Payload key that records the schema version an event was written at. */
export const SCHEMA_VERSION_KEY = "_schemaVersion";

// =============================================================================
// Catalog
// =============================================================================

export class EventCatalog {
  private readonly schemas = new Map<string, EventSchema>();

  /** Keyed by `${type}@${fromVersion}` */
  private readonly migrations = new Map<string, EventMigration>();

  /**
   * Add a schema, or move an existing type to a newer version.
   *
   * @throws CatalogError VERSION_DOWNGRADE if `schema` is older than the registered one
   */
  register(schema: EventSchema): void {
    const current = this.schemas.get(schema.type);
    if (current !== undefined && schema.version < current.version) {
      throw new CatalogError(
        "VERSION_DOWNGRADE",
        `"${schema.type}" is at version ${current.version}, cannot register version ${schema.version}`,
      );
    }
    if (current === undefined || schema.version > current.version) {
      this.schemas.set(schema.type, schema);
    }
  }

  /**
   * @throws CatalogError UNKNOWN_EVENT_TYPE if the type was never registered
   */
  registerMigration(eventType: string, fromVersion: number, migration: EventMigration): void {
    if (!this.schemas.has(eventType)) {
      throw new CatalogError(
        "UNKNOWN_EVENT_TYPE",
        `Cannot register migration for unknown event type "${eventType}"`,
      );
    }
    this.migrations.set(`${eventType}@${fromVersion}`, migration);
  }

  has(eventType: string): boolean {
    return this.schemas.has(eventType);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this.schemas.get(eventType);
  }

  /** Registered types in lexical order. */
  types(): string[] {
    return [...this.schemas.keys()].sort();
  }

  /** False for unregistered types. */
  validate(eventType: string, payload: unknown): boolean {
    return this.schemas.get(eventType)?.validate(payload) ?? false;
  }

  /**
   * Lift a payload written at `fromVersion` to the registered version.
   * Unknown types, and versions at or past the registered one, pass
   * through unchanged.
   *
   * @throws CatalogError MISSING_MIGRATION if a step is not registered
   */
  migrate(
    eventType: string,
    payload: Readonly<Record<string, unknown>>,
    fromVersion: number,
  ): Readonly<Record<string, unknown>> {
    const target = this.schemas.get(eventType)?.version ?? fromVersion;

    let lifted = payload;
    for (let v = fromVersion; v < target; v++) {
      const step = this.migrations.get(`${eventType}@${v}`);
      if (step === undefined) {
        throw new CatalogError(
          "MISSING_MIGRATION",
          `Missing migration for "${eventType}" from version ${v} to ${v + 1}`,
        );
      }
      lifted = step(lifted);
    }
    return lifted;
  }

  /** The event with its payload lifted; the same object if nothing changed. */
  upcast(event: DomainEvent): DomainEvent {
    const payload = this.migrate(event.type, event.payload, getSchemaVersion(event));
    return payload === event.payload ? event : { ...event, payload };
  }

  get size(): number {
    return this.schemas.size;
  }
}

// =============================================================================
// Versioned Payloads
// =============================================================================

export function createVersionedEvent(
  type: string,
  metadata: EventMetadata,
  payload: Readonly<Record<string, unknown>>,
  schemaVersion: number,
): DomainEvent {
  return { type, metadata, payload: { ...payload, [SCHEMA_VERSION_KEY]: schemaVersion } };
}

/** Version recorded in the payload; 1 when absent or malformed. */
export function getSchemaVersion(event: DomainEvent): number {
  const version = event.payload[SCHEMA_VERSION_KEY];
  return typeof version === "number" && Number.isInteger(version) && version > 0 ? version : 1;
}

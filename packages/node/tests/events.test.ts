/**
 * Tests for event query routes and the committed-event hook.
 *
 * A fresh test app has committed two events: the mints that fund
 * ALICE and BOB.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { MULTIVAULT_EVENTS, MULTIVAULT_STREAM } from "@termvault/event-store";
import { calculateAtomId } from "@termvault/multivault";
import type { CommittedEventLogEntry } from "../src/services/multivault-service.js";
import { encodeCursor } from "../src/types/pagination.js";
import { ADMIN, ALICE, BOB, actAs, atomData, bodyOf, createTestApp } from "./setup.js";
import type { TestApp } from "./setup.js";

const EventPage = z.object({
  data: z.array(
    z.object({
      globalPosition: z.number(),
      version: z.number(),
      event: z.object({ type: z.string(), payload: z.record(z.unknown()) }),
    }),
  ),
  pagination: z.object({ cursor: z.string().nullable(), hasMore: z.boolean() }),
});

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

async function createAtom(label: string): Promise<void> {
  const res = await instance.app.request(
    actAs(ALICE, "/api/v1/atoms", { data: atomData(label), assets: "1500" }),
  );
  expect(res.status).toBe(201);
}

describe("GET /api/v1/events", () => {
  it("lists committed events in order", async () => {
    const res = await instance.app.request("/api/v1/events");

    expect(res.status).toBe(200);
    const body = await bodyOf(res, EventPage);
    expect(body.data.map((e) => e.globalPosition)).toEqual([1, 2]);
    expect(body.data.map((e) => e.event.payload)).toEqual([
      { to: ALICE, amount: "1000000" },
      { to: BOB, amount: "1000000" },
    ]);
    expect(body.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("pages with a cursor", async () => {
    const first = await bodyOf(await instance.app.request("/api/v1/events?limit=1"), EventPage);
    expect(first.data.map((e) => e.globalPosition)).toEqual([1]);
    expect(first.pagination).toEqual({
      cursor: encodeCursor("globalPosition", 1),
      hasMore: true,
    });

    const cursor = encodeCursor("globalPosition", 1);
    const second = await bodyOf(
      await instance.app.request(`/api/v1/events?limit=1&cursor=${cursor}`),
      EventPage,
    );
    expect(second.data.map((e) => e.globalPosition)).toEqual([2]);
    expect(second.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("starts after a given position", async () => {
    const body = await bodyOf(await instance.app.request("/api/v1/events?afterPosition=1"), EventPage);
    expect(body.data.map((e) => e.globalPosition)).toEqual([2]);
  });

  it("filters by event type", async () => {
    await createAtom("d1");
    const res = await instance.app.request(`/api/v1/events?type=${MULTIVAULT_EVENTS.ATOM_CREATED}`);

    const body = await bodyOf(res, EventPage);
    expect(body.data).toHaveLength(1);
    expect(body.data[0]?.event.payload).toMatchObject({
      creator: ALICE,
      termId: calculateAtomId(atomData("d1")),
      termIndex: 1,
    });
  });

  it("rejects a limit over 100", async () => {
    const res = await instance.app.request("/api/v1/events?limit=101");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { code: "VALIDATION_ERROR", message: "Query parameter validation failed" },
    });
  });
});

describe("GET /api/v1/events/integrity", () => {
  it("verifies the hash chain", async () => {
    const res = await instance.app.request("/api/v1/events/integrity");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { valid: true, lastVerifiedPosition: 2, errors: [], globalPosition: 2 },
    });
  });
});

describe("GET /api/v1/events/:streamId", () => {
  it("lists one stream by version", async () => {
    const res = await instance.app.request(`/api/v1/events/${MULTIVAULT_STREAM}?limit=1`);

    const body = await bodyOf(res, EventPage);
    expect(body.data.map((e) => e.version)).toEqual([1]);
    expect(body.pagination).toEqual({ cursor: encodeCursor("version", 1), hasMore: true });
  });

  it("returns an empty list for an unknown stream", async () => {
    const res = await instance.app.request("/api/v1/events/nonexistent");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: [], pagination: { cursor: null, hasMore: false } });
  });
});

describe("committed event hook", () => {
  it("reports every committed event with its call's correlation id", async () => {
    const entries: CommittedEventLogEntry[] = [];
    instance = createTestApp({ onEvent: (entry) => entries.push(entry) });

    expect(entries.map((e) => [e.type, e.globalPosition, e.actor])).toEqual([
      [MULTIVAULT_EVENTS.ASSETS_MINTED, 1, ADMIN],
      [MULTIVAULT_EVENTS.ASSETS_MINTED, 2, ADMIN],
    ]);

    await createAtom("d1");
    const creation = entries.slice(2);
    expect(creation.length).toBeGreaterThan(1);
    expect(new Set(creation.map((e) => e.correlationId)).size).toBe(1);
    expect(creation.every((e) => e.actor === ALICE)).toBe(true);
    expect(creation.find((e) => e.type === MULTIVAULT_EVENTS.ATOM_CREATED)?.termId).toBe(
      calculateAtomId(atomData("d1")),
    );
  });

  it("stops reporting once the service stops", async () => {
    const entries: CommittedEventLogEntry[] = [];
    instance = createTestApp({ onEvent: (entry) => entries.push(entry) });
    instance.service.stop();

    await createAtom("d1");
    expect(entries).toHaveLength(2);
  });
});

/**
 * Event query routes.
 *
 * GET /api/v1/events              — List all events (cursor pagination, ?type= filter)
 * GET /api/v1/events/integrity    — Verify the hash chain
 * GET /api/v1/events/:streamId    — List events for a stream
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { readQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    const query = readQuery(c, ListEventsQuerySchema);

    const events = service.readAllEvents(
      query.afterPosition !== undefined
        ? { fromPosition: query.afterPosition + 1 }
        : undefined,
    );
    const filtered =
      query.type !== undefined ? events.filter((e) => e.event.type === query.type) : events;

    const result = paginate(
      filtered,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.globalPosition,
      "globalPosition",
    );

    return c.json(result);
  });

  routes.get("/integrity", (c) => {
    const service = c.get("service");
    const integrity = service.checkIntegrity();
    return c.json({
      data: {
        ...integrity,
        globalPosition: service.eventStore.globalPosition(),
      },
    });
  });

  routes.get("/:streamId", (c) => {
    const service = c.get("service");
    const streamId = c.req.param("streamId");
    const query = readQuery(c, ListStreamEventsQuerySchema);

    const events = service.readStreamEvents(
      streamId,
      query.afterVersion !== undefined
        ? { fromVersion: query.afterVersion + 1 }
        : undefined,
    );

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.version,
      "version",
    );

    return c.json(result);
  });

  return routes;
}

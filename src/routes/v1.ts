import { Hono } from "hono";
import type { InMemoryEntityHost, PublishedEntity } from "../host/entity-host.js";
import { AppError } from "../middleware/error-handler.js";
import type { ContentHub } from "../services/content-hub.js";
import type { EntityState } from "../types/content.js";

function toEntityView(entity: PublishedEntity) {
  return {
    ...entity.descriptor,
    state: entity.current?.state ?? null,
    available: entity.current?.available ?? false,
    attributes: entity.current?.attributes ?? {},
    lastUpdated: entity.current?.lastUpdated ?? null,
  };
}

function toStateView(state: EntityState) {
  return {
    entityId: state.entityId,
    state: state.state,
    available: state.available,
    attributes: state.attributes,
    lastUpdated: state.lastUpdated,
  };
}

export function createV1Router(hub: ContentHub, host: InMemoryEntityHost): Hono {
  const app = new Hono();

  app.get("/categories", (c) => {
    return c.json({
      code: 200,
      message: "ok",
      data: hub.listCategories(),
    });
  });

  app.get("/time-buckets", (c) => {
    return c.json({
      code: 200,
      message: "ok",
      data: hub.describeTimeBuckets(),
    });
  });

  app.get("/entities", (c) => {
    return c.json({
      code: 200,
      message: "ok",
      data: host.listEntities().map(toEntityView),
    });
  });

  app.get("/entities/:id", (c) => {
    const entity = host.getEntity(c.req.param("id"));
    if (!entity) {
      throw new AppError("Entity Not Found", 404);
    }
    return c.json({
      code: 200,
      message: "ok",
      data: toEntityView(entity),
    });
  });

  app.post("/entities/:id/refresh", async (c) => {
    const state = await hub.refreshEntity(c.req.param("id"));
    return c.json({
      code: 200,
      message: "ok",
      data: toStateView(state),
    });
  });

  app.post("/refresh", async (c) => {
    const states = await hub.refreshAll("manual");
    return c.json({
      code: 200,
      message: "ok",
      data: states.map(toStateView),
    });
  });

  return app;
}

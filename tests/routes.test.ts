import { Hono } from "hono";
import { afterEach, describe, expect, test } from "vitest";
import { createApp } from "../src/app.js";
import { parseHubConfig } from "../src/config/hub-config.js";
import { formatErrorResponse } from "../src/middleware/error-handler.js";
import { requestIdMiddleware } from "../src/middleware/request-id.js";
import { InMemoryEntityHost } from "../src/host/entity-host.js";
import { ContentCache } from "../src/services/content-cache.js";
import { ContentHub } from "../src/services/content-hub.js";
import { ApiError } from "../src/services/tian-client.js";
import { HOUR, TEST_API_KEY, createClock, createFakeFetcher } from "./fixtures.js";

const T0 = new Date(2026, 2, 1, 10, 0, 0).getTime();

interface EntityView {
  entityId: string;
  name: string;
  kind: string;
  state: string | null;
  available: boolean;
  attributes: Record<string, string | number>;
  lastUpdated: string | null;
}

interface StateView {
  entityId: string;
  state: string;
  available: boolean;
  attributes: Record<string, string | number>;
}

const hubs: ContentHub[] = [];

async function setup(options: { enabledCategories?: string[]; rateLimitMax?: number; before?: (fake: ReturnType<typeof createFakeFetcher>) => void } = {}) {
  const clock = createClock(T0);
  const fake = createFakeFetcher(clock.now);
  options.before?.(fake);
  const host = new InMemoryEntityHost();
  const cache = new ContentCache({ nowFn: clock.now, useRedis: false });
  const hub = new ContentHub({
    config: parseHubConfig({ apiKey: TEST_API_KEY, enabledCategories: options.enabledCategories }),
    host,
    fetcher: fake.fetcher,
    cache,
    nowFn: clock.now,
    schedulerEnabled: false,
  });
  hubs.push(hub);
  await hub.start();
  const app = createApp({ hub, host, rateLimitMax: options.rateLimitMax });
  return { clock, fake, host, hub, app };
}

afterEach(async () => {
  await Promise.all(hubs.splice(0).map((hub) => hub.stop()));
});

describe("entity routes", () => {
  test("lists every registered entity with its current state", async () => {
    const { app } = await setup();

    const res = await app.request("/api/v1/entities");
    const body = (await res.json()) as { code: number; data: EntityView[] };

    expect(res.status).toBe(200);
    expect(body.code).toBe(200);
    expect(body.data.map((entity) => entity.entityId)).toEqual([
      "morning",
      "evening",
      "maxim",
      "joke",
      "sentence",
      "couplet",
      "history",
      "poetry",
      "songci",
      "yuanqu",
      "scrolling_content",
      "time_slot_content",
    ]);
  });

  test("returns one entity by id", async () => {
    const { app } = await setup();

    const res = await app.request("/api/v1/entities/time_slot_content");
    const body = (await res.json()) as { data: EntityView };

    expect(res.status).toBe(200);
    expect(body.data).toMatchObject({
      entityId: "time_slot_content",
      name: "时段内容",
      kind: "time_slot",
      state: "笑话正文",
      available: true,
    });
    expect(body.data.attributes.time_slot).toBe("笑话时段");
  });

  test("starts the rotation on the first enabled category", async () => {
    const { app } = await setup({ enabledCategories: ["poetry", "history"] });

    const body = (await (await app.request("/api/v1/entities/scrolling_content")).json()) as { data: EntityView };

    expect(body.data.state).toBe("历史正文");
    expect(body.data.attributes.content_type).toBe("history");
  });

  test("answers 404 for unknown entities", async () => {
    const { app } = await setup();

    const res = await app.request("/api/v1/entities/weather");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ code: 404, message: "Entity Not Found" });

    const refresh = await app.request("/api/v1/entities/weather/refresh", { method: "POST" });
    expect(refresh.status).toBe(404);
  });

  test("publishes the failure state of a category that never loaded", async () => {
    const { app } = await setup({
      before: (fake) => fake.fail("history", new ApiError("history", 130, "")),
    });

    const body = (await (await app.request("/api/v1/entities/history")).json()) as { data: EntityView };

    expect(body.data.state).toBe("API请求失败");
    expect(body.data.available).toBe(false);
    expect(body.data.attributes.code).toBe(130);
    expect(body.data.attributes.error).toBe("TianAPI returned 130: call frequency exceeded");
  });
});

describe("refresh routes", () => {
  test("a manual refresh inside the freshness window does not refetch", async () => {
    const { app, fake } = await setup();
    expect(fake.fetch).toHaveBeenCalledTimes(10);

    const res = await app.request("/api/v1/entities/joke/refresh", { method: "POST" });
    const body = (await res.json()) as { data: StateView };

    expect(res.status).toBe(200);
    expect(body.data.entityId).toBe("joke");
    expect(body.data.state).toBe("笑话正文");
    expect(fake.fetch).toHaveBeenCalledTimes(10);
  });

  test("a manual refresh after the freshness window fetches again", async () => {
    const { app, clock, fake } = await setup();

    clock.advance(HOUR);
    await app.request("/api/v1/entities/joke/refresh", { method: "POST" });

    expect(fake.fetch).toHaveBeenCalledTimes(11);
    expect(fake.fetch).toHaveBeenLastCalledWith("joke", TEST_API_KEY);
  });

  test("refreshing everything returns sensors and selectors", async () => {
    const { app } = await setup({ enabledCategories: ["songci"] });

    const body = (await (await app.request("/api/v1/refresh", { method: "POST" })).json()) as { data: StateView[] };

    expect(body.data.map((state) => state.entityId)).toEqual([
      "morning",
      "evening",
      "songci",
      "scrolling_content",
      "time_slot_content",
    ]);
  });
});

describe("catalogue routes", () => {
  test("lists every category with its enabled flag", async () => {
    const { app } = await setup({ enabledCategories: ["joke"] });

    const body = (await (await app.request("/api/v1/categories")).json()) as {
      data: Array<{ id: string; kind: string; title: string; icon: string; enabled: boolean }>;
    };

    expect(body.data).toHaveLength(10);
    expect(body.data[0]).toEqual({ id: "morning", kind: "greeting", title: "早安心语", icon: "mdi:weather-sunny", enabled: true });
    expect(body.data[2]).toMatchObject({ id: "maxim", enabled: false });
    expect(body.data[3]).toMatchObject({ id: "joke", enabled: true });
  });

  test("describes the time bucket table of the entry", async () => {
    const { app } = await setup({ enabledCategories: ["poetry", "joke", "history"] });

    const body = (await (await app.request("/api/v1/time-buckets")).json()) as {
      data: Array<{ start: string; end: string; category: string }>;
    };

    expect(body.data).toEqual([
      { start: "05:00", end: "08:00", category: "morning" },
      { start: "08:00", end: "12:40", category: "joke" },
      { start: "12:40", end: "17:20", category: "history" },
      { start: "17:20", end: "22:00", category: "poetry" },
      { start: "22:00", end: "05:00", category: "evening" },
    ]);
  });
});

describe("service routes", () => {
  test("reports health", async () => {
    const { app } = await setup();

    const res = await app.request("/healthz");
    const body = (await res.json()) as {
      data: {
        status: string;
        scheduler: { enabled: boolean; started: boolean };
        enabledCategories: string[];
        cache: Record<string, number | boolean>;
        entities: unknown[];
      };
    };

    expect(res.status).toBe(200);
    expect(body.data.status).toBe("ok");
    expect(body.data.scheduler).toMatchObject({ enabled: false, started: true });
    expect(body.data.enabledCategories).toHaveLength(8);
    expect(body.data.cache).toEqual({ entries: 10, freshEntries: 10, redisEnabled: false, redisReady: false });
    expect(body.data.entities).toHaveLength(12);
  });

  test("answers 404 for unknown paths", async () => {
    const { app } = await setup();

    const res = await app.request("/nope");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ code: 404, message: "Not Found" });
  });

  test("rate limits the api", async () => {
    const { app } = await setup({ rateLimitMax: 2 });

    expect((await app.request("/api/v1/categories")).status).toBe(200);
    expect((await app.request("/api/v1/categories")).status).toBe(200);
    const limited = await app.request("/api/v1/categories");

    expect(limited.status).toBe(429);
    expect(limited.headers.get("x-ratelimit-remaining")).toBe("0");
    expect(await limited.json()).toEqual({ code: 429, message: "Too Many Requests" });
    expect((await app.request("/healthz")).status).toBe(200);
  });

  test("stopping the hub unregisters its entities", async () => {
    const { app, host, hub } = await setup();

    await hub.stop();

    expect(host.listEntities()).toEqual([]);
    const body = (await (await app.request("/api/v1/entities")).json()) as { data: EntityView[] };
    expect(body.data).toEqual([]);
  });
});

describe("error handler", () => {
  test("hides unexpected errors behind a 500", async () => {
    const app = new Hono();
    app.use("*", requestIdMiddleware);
    app.get("/boom", () => {
      throw new Error("database exploded");
    });
    app.onError((error, c) => formatErrorResponse(error, c));

    const res = await app.request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ code: 500, message: "Internal Server Error" });
  });
});

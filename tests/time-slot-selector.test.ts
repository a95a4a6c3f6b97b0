import { describe, expect, test } from "vitest";
import { OPTIONAL_CATEGORY_IDS, buildCategoryRegistry } from "../src/domain/categories.js";
import { ContentCache } from "../src/services/content-cache.js";
import { buildTimeBucketTable } from "../src/services/time-buckets.js";
import { TimeSlotSelector } from "../src/services/time-slot-selector.js";
import { MINUTE, createClock, makePayload } from "./fixtures.js";

const T0 = new Date(2026, 2, 1, 10, 0, 0).getTime();

function setup() {
  const clock = createClock(T0);
  const cache = new ContentCache({ nowFn: clock.now, useRedis: false });
  const table = buildTimeBucketTable(buildCategoryRegistry(OPTIONAL_CATEGORY_IDS));
  const selector = new TimeSlotSelector({ table, cache, nowFn: clock.now });
  return { clock, cache, selector };
}

describe("TimeSlotSelector", () => {
  test("selects the category whose bucket holds the local time", () => {
    const { selector } = setup();

    expect(selector.select(T0)).toBe("joke");
    expect(selector.select(new Date(2026, 2, 1, 23, 30).getTime())).toBe("evening");
    expect(selector.select(new Date(2026, 2, 2, 6, 15).getTime())).toBe("morning");
  });

  test("mirrors the cached payload of the active bucket", async () => {
    const { cache, selector } = setup();
    await cache.set("joke", makePayload("joke", T0));

    const state = await selector.onUpdateTick();

    expect(state.entityId).toBe("time_slot_content");
    expect(state.state).toBe("笑话正文");
    expect(state.available).toBe(true);
    expect(state.attributes).toMatchObject({
      title: "🌻每日笑话",
      title2: "每日笑话",
      subtitle: "测试笑话",
      content1: "笑话正文",
      time_slot: "笑话时段",
      code: 200,
      update_time: "2026-03-01 10:00:00",
      update_date: "2026-03-01",
    });
  });

  test("keeps the bucket entry time while the bucket stays active", async () => {
    const { clock, cache, selector } = setup();
    await cache.set("joke", makePayload("joke", T0));

    await selector.onUpdateTick();
    clock.advance(30 * MINUTE);
    const state = await selector.onUpdateTick();

    expect(state.attributes.update_time).toBe("2026-03-01 10:00:00");
    expect(state.lastUpdated).toBe(new Date(T0 + 30 * MINUTE).toISOString());
  });

  test("waits with the bucket's slot label when its category is not cached", async () => {
    const { clock, cache, selector } = setup();
    await cache.set("joke", makePayload("joke", T0));

    clock.set(new Date(2026, 2, 1, 11, 30).getTime());
    const state = await selector.onUpdateTick();

    expect(state.state).toBe("等待数据加载");
    expect(state.attributes.title).toBe("时段内容");
    expect(state.attributes.time_slot).toBe("名句时段");
    expect(state.attributes.content2).toBe("等待数据加载，请稍后查看");
  });

  test("falls back to a default slot when no bucket matches", async () => {
    const clock = createClock(T0);
    const cache = new ContentCache({ nowFn: clock.now, useRedis: false });
    const selector = new TimeSlotSelector({ table: [], cache, nowFn: clock.now });

    const state = await selector.onUpdateTick();

    expect(state.state).toBe("等待数据加载");
    expect(state.attributes.time_slot).toBe("默认时段");
  });
});

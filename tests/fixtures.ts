import { vi } from "vitest";
import type { CategoryId } from "../src/domain/categories.js";
import { normalizeContent } from "../src/services/normalize.js";
import type { ContentFetcher } from "../src/services/tian-client.js";
import type { ContentPayload } from "../src/types/content.js";

export const TEST_API_KEY = "test-secret-".padEnd(32, "0");

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;

export const SAMPLE_RESULTS: Record<CategoryId, unknown> = {
  morning: { content: "新的一天，加油" },
  evening: { content: "今天辛苦了" },
  maxim: { en: "Keep going.", zh: "继续前行。" },
  joke: { list: [{ title: "测试笑话", content: "笑话正文" }] },
  sentence: { content: "学而不止。", source: "测试古籍" },
  couplet: { content: "上联测试 下联测试" },
  history: { content: "历史正文" },
  poetry: { list: [{ content: "山色远连天。云影落溪前。", title: "晚眺", author: "无名氏", kind: "五言" }] },
  songci: { content: "词句一。词句二。", source: "测试词牌" },
  yuanqu: { list: [{ content: "曲句。", title: "测试曲", author: "测试作者" }] },
};

export function makePayload(category: CategoryId, nowMs: number, result: unknown = SAMPLE_RESULTS[category]): ContentPayload {
  const payload = normalizeContent(category, { code: 200, msg: "success", result }, nowMs);
  if (!payload) {
    throw new Error(`fixture for ${category} produced no payload`);
  }
  return payload;
}

export function createClock(startMs: number) {
  let now = startMs;
  return {
    now: () => now,
    set: (value: number) => {
      now = value;
    },
    advance: (ms: number) => {
      now += ms;
    },
  };
}

/** Fetcher stand-in that answers from SAMPLE_RESULTS unless a category is told to fail. */
export function createFakeFetcher(nowFn: () => number) {
  const failures = new Map<CategoryId, Error>();
  const fetch = vi.fn(async (category: CategoryId, _apiKey: string): Promise<ContentPayload> => {
    const failure = failures.get(category);
    if (failure) {
      throw failure;
    }
    return makePayload(category, nowFn());
  });
  const fetcher: ContentFetcher = { fetch };
  return {
    fetcher,
    fetch,
    fail: (category: CategoryId, error: Error) => {
      failures.set(category, error);
    },
    recover: (category: CategoryId) => {
      failures.delete(category);
    },
  };
}

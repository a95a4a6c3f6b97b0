import { Redis } from "ioredis";
import { z } from "zod";
import { env } from "../config/env.js";
import { CATEGORY_DEFINITIONS, isCategoryId, type CategoryId } from "../domain/categories.js";
import type { CacheEntry, CacheLookup, ContentPayload } from "../types/content.js";
import { errorMessage, logger } from "../utils/logger.js";

/** The slice of the ioredis client the cache mirror uses. */
export interface RedisMirrorClient {
  readonly status?: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  quit(): Promise<unknown>;
}

interface ContentCacheOptions {
  ttlSeconds?: number;
  nowFn?: () => number;
  useRedis?: boolean;
  redisUrl?: string;
  redisPrefix?: string;
  /** Used instead of connecting to `redisUrl`. */
  redis?: RedisMirrorClient;
}

export class NoCacheAvailableError extends Error {
  readonly category: CategoryId;

  constructor(category: CategoryId, cause: Error) {
    super(`No cached content for ${category}: ${cause.message}`, { cause });
    this.name = "NoCacheAvailableError";
    this.category = category;
  }
}

const alignmentSchema = z.enum(["left", "center"]);

const cacheEntrySchema = z.object({
  fetchedAt: z.number(),
  payload: z.object({
    category: z.custom<CategoryId>((value) => typeof value === "string" && isCategoryId(value)),
    title: z.string(),
    statusCode: z.number(),
    updateTime: z.string(),
    fetchedAt: z.number(),
    primary: z.string(),
    fields: z.record(z.string()),
    display: z.object({
      title2: z.string(),
      subtitle: z.string(),
      content1: z.string(),
      content2: z.string(),
      align: alignmentSchema,
      subalign: alignmentSchema,
    }),
  }),
});

/**
 * One entry per category. An entry is fresh while `now - fetchedAt < ttl`; stale entries are
 * kept and only replaced by the next successful fetch.
 */
export class ContentCache {
  private readonly entries = new Map<CategoryId, CacheEntry>();

  private readonly inflight = new Map<CategoryId, Promise<CacheLookup>>();

  private redis: RedisMirrorClient | null = null;

  private readonly ttlMs: number;

  private readonly nowFn: () => number;

  private readonly redisPrefix: string;

  constructor(options: ContentCacheOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? env.CACHE_TTL_SECONDS) * 1000;
    this.nowFn = options.nowFn ?? (() => Date.now());
    this.redisPrefix = options.redisPrefix ?? env.REDIS_PREFIX;

    const useRedis = options.useRedis ?? env.USE_REDIS;
    const redisUrl = options.redisUrl ?? env.REDIS_URL;

    if (options.redis) {
      this.redis = options.redis;
    } else if (useRedis && redisUrl) {
      const client = new Redis(redisUrl, {
        lazyConnect: true,
        maxRetriesPerRequest: 1,
      });
      client.connect().catch((error: unknown) => {
        logger.warn("redis_connect_failed", { error: errorMessage(error) });
        if (this.redis === client) {
          this.redis = null;
        }
      });
      this.redis = client;
    }
  }

  private namespacedKey(category: CategoryId): string {
    return `${this.redisPrefix}:${category}`;
  }

  isFresh(entry: CacheEntry, now = this.nowFn()): boolean {
    return now - entry.fetchedAt < this.ttlMs;
  }

  /** Read-only view for the selectors; never fetches. */
  peek(category: CategoryId): CacheEntry | undefined {
    return this.entries.get(category);
  }

  async set(category: CategoryId, payload: ContentPayload): Promise<CacheEntry> {
    const previous = this.entries.get(category);
    const fetchedAt = Math.max(previous?.fetchedAt ?? 0, this.nowFn());
    const entry: CacheEntry = { payload, fetchedAt };
    this.entries.set(category, entry);

    if (this.redis) {
      try {
        await this.redis.set(this.namespacedKey(category), JSON.stringify(entry));
      } catch (error) {
        logger.warn("redis_set_failed", { category, error: errorMessage(error) });
      }
    }

    return entry;
  }

  async getOrFetch(category: CategoryId, fetcher: () => Promise<ContentPayload>): Promise<CacheLookup> {
    const existing = this.entries.get(category);
    if (existing && this.isFresh(existing)) {
      logger.debug("cache_hit", { category });
      return { payload: existing.payload, origin: "cache" };
    }

    const pending = this.inflight.get(category);
    if (pending) {
      return pending;
    }

    const loading = this.refetch(category, fetcher).finally(() => {
      this.inflight.delete(category);
    });
    this.inflight.set(category, loading);
    return loading;
  }

  private async refetch(category: CategoryId, fetcher: () => Promise<ContentPayload>): Promise<CacheLookup> {
    try {
      const payload = await fetcher();
      const entry = await this.set(category, payload);
      return { payload: entry.payload, origin: "network" };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const stale = this.entries.get(category);
      if (stale) {
        logger.warn("cache_serving_stale", {
          category,
          fetchedAt: new Date(stale.fetchedAt).toISOString(),
          error: cause.message,
        });
        return { payload: stale.payload, origin: "stale", error: cause };
      }
      throw new NoCacheAvailableError(category, cause);
    }
  }

  /** Loads entries mirrored to Redis by an earlier run. Returns how many were restored. */
  async hydrate(): Promise<number> {
    if (!this.redis) {
      return 0;
    }

    let restored = 0;
    for (const { id } of CATEGORY_DEFINITIONS) {
      try {
        const raw = await this.redis.get(this.namespacedKey(id));
        if (!raw) continue;
        const parsed = cacheEntrySchema.safeParse(JSON.parse(raw));
        if (!parsed.success || parsed.data.payload.category !== id) {
          logger.warn("redis_entry_invalid", { category: id });
          continue;
        }
        const current = this.entries.get(id);
        if (!current || current.fetchedAt < parsed.data.fetchedAt) {
          const { payload, fetchedAt } = parsed.data;
          this.entries.set(id, {
            fetchedAt,
            payload: Object.freeze({
              ...payload,
              fields: Object.freeze(payload.fields),
              display: Object.freeze(payload.display),
            }),
          });
          restored += 1;
        }
      } catch (error) {
        logger.warn("redis_get_failed", { category: id, error: errorMessage(error) });
      }
    }
    return restored;
  }

  async close(): Promise<void> {
    const redis = this.redis;
    this.redis = null;
    if (!redis) {
      return;
    }
    try {
      await redis.quit();
    } catch (error) {
      logger.warn("redis_quit_failed", { error: errorMessage(error) });
    }
  }

  health(): { entries: number; freshEntries: number; redisEnabled: boolean; redisReady: boolean } {
    const now = this.nowFn();
    let freshEntries = 0;
    for (const entry of this.entries.values()) {
      if (this.isFresh(entry, now)) freshEntries += 1;
    }
    return {
      entries: this.entries.size,
      freshEntries,
      redisEnabled: Boolean(this.redis),
      redisReady: this.redis?.status === "ready",
    };
  }
}
